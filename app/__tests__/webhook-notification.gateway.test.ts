import { WebhookNotificationGateway, parseWebhookUrls } from '../domain/services/notification';
import { createTestLogger } from './support/fakes';

const message = {
  title: 'Relevant post from newsdesk',
  body: 'A new fab expands domestic capacity.',
  fields: [{ name: 'Platform', value: 'x', inline: true }]
};

describe('WebhookNotificationGateway', () => {
  let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('parses a comma separated list and skips invalid urls', () => {
    const urls = parseWebhookUrls(' https://hooks.example.test/a , ,not a url,https://alerts.example.test/b');
    const gateway = new WebhookNotificationGateway(createTestLogger(), urls);

    expect(urls).toEqual(['https://hooks.example.test/a', 'not a url', 'https://alerts.example.test/b']);
    expect(gateway.listServers()).toEqual([
      { id: 'webhook-1', name: 'hooks.example.test', kind: 'webhook' },
      { id: 'webhook-3', name: 'alerts.example.test', kind: 'webhook' }
    ]);
  });

  it('posts an embed to every target and reports each delivery', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(null, { status: 204 }))
      .mockResolvedValueOnce(new Response('nope', { status: 500, statusText: 'Internal Server Error' }));
    const gateway = new WebhookNotificationGateway(createTestLogger(), [
      'https://hooks.example.test/a',
      'https://alerts.example.test/b'
    ]);

    const deliveries = await gateway.notify(message);

    expect(deliveries).toEqual([
      { serverId: 'webhook-1', success: true },
      { serverId: 'webhook-2', success: false, error: 'Webhook failed with status 500: Internal Server Error' }
    ]);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://hooks.example.test/a');
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      embeds: [
        {
          title: 'Relevant post from newsdesk',
          description: 'A new fab expands domestic capacity.',
          fields: [{ name: 'Platform', value: 'x', inline: true }]
        }
      ]
    });
  });

  it('turns a network failure into a failed delivery', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const gateway = new WebhookNotificationGateway(createTestLogger(), ['https://hooks.example.test/a']);

    await expect(gateway.notify(message)).resolves.toEqual([
      { serverId: 'webhook-1', success: false, error: 'fetch failed' }
    ]);
  });

  it('does nothing without targets', async () => {
    const gateway = new WebhookNotificationGateway(createTestLogger(), []);

    expect(await gateway.notify(message)).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
