import { PromptTemplateNotFoundError } from '../core/errors';
import type { AnalysisOutcome, SocialPost } from '../application/types';
import { ContentAnalysisService, PromptTemplateService, deriveMediaType } from '../application/services';
import type { IDispatcherService } from '../domain/services/dispatch';
import type { NotificationGateway } from '../domain/services/notification';
import { createTestLogger } from './support/fakes';

const post: SocialPost = {
  id: 'post-1',
  text: 'Chipmaker announces a new fab in Ohio',
  platform: 'x',
  author: 'newsdesk',
  url: 'https://social.example.test/newsdesk/1',
  media: [{ url: 'https://cdn.example.test/fab.png', kind: 'image' }]
};

function outcome(isRelevant: boolean): AnalysisOutcome {
  return {
    result: { isRelevant, analyticalBriefing: 'A new fab expands domestic capacity.', confidence: 90 },
    fingerprint: 'fp',
    providerId: 'provider-a',
    cached: false,
    attempts: 1,
    elapsedMs: 20
  };
}

function createService() {
  const logger = createTestLogger();
  const dispatcher: jest.Mocked<IDispatcherService> = { analyze: jest.fn() };
  const gateway: jest.Mocked<NotificationGateway> = {
    listServers: jest.fn().mockReturnValue([]),
    notify: jest.fn().mockResolvedValue([{ serverId: 'webhook-1', success: true }])
  };
  const templates = new PromptTemplateService(logger);
  const service = new ContentAnalysisService(logger, dispatcher, templates, gateway);
  return { dispatcher, gateway, templates, service };
}

describe('deriveMediaType', () => {
  it('prefers video over gif over image', () => {
    expect(deriveMediaType({ media: [{ url: 'a', kind: 'image' }, { url: 'b', kind: 'gif' }] })).toBe('gif');
    expect(deriveMediaType({ media: [{ url: 'a', kind: 'image' }, { url: 'b', kind: 'video' }] })).toBe('video');
    expect(deriveMediaType({ media: [] })).toBe('text');
    expect(deriveMediaType({})).toBe('text');
  });
});

describe('ContentAnalysisService', () => {
  it('builds a request from the post using the media type template', () => {
    const { service, templates } = createService();

    expect(service.buildRequest(post, { requestId: 'req-1' })).toEqual({
      content: 'Chipmaker announces a new fab in Ohio',
      mediaType: 'image',
      promptTemplate: templates.resolve(undefined, 'image'),
      mediaUrls: ['https://cdn.example.test/fab.png'],
      requestId: 'req-1'
    });
  });

  it('notifies about a relevant post', async () => {
    const { service, dispatcher, gateway } = createService();
    dispatcher.analyze.mockResolvedValue(outcome(true));

    const analysis = await service.analyzePost(post);

    expect(analysis).toMatchObject({ postId: 'post-1', mediaType: 'image', notifications: [{ serverId: 'webhook-1', success: true }] });
    expect(gateway.notify).toHaveBeenCalledWith({
      title: 'Relevant post from newsdesk',
      body: 'A new fab expands domestic capacity.',
      url: 'https://social.example.test/newsdesk/1',
      fields: [
        { name: 'Platform', value: 'x', inline: true },
        { name: 'Author', value: 'newsdesk', inline: true },
        { name: 'Confidence', value: '90%', inline: true }
      ]
    });
  });

  it('stays quiet for irrelevant posts or when asked not to notify', async () => {
    const { service, dispatcher, gateway } = createService();
    dispatcher.analyze.mockResolvedValueOnce(outcome(false)).mockResolvedValueOnce(outcome(true));

    expect((await service.analyzePost(post)).notifications).toEqual([]);
    expect((await service.analyzePost(post, { notify: false })).notifications).toEqual([]);
    expect(gateway.notify).not.toHaveBeenCalled();
  });

  it('does not notify again for an outcome served from the cache', async () => {
    const { service, dispatcher, gateway } = createService();
    dispatcher.analyze.mockResolvedValue({ ...outcome(true), cached: true, attempts: 0 });

    const analysis = await service.analyzePost(post);

    expect(analysis.outcome.cached).toBe(true);
    expect(analysis.notifications).toEqual([]);
    expect(gateway.notify).not.toHaveBeenCalled();
  });

  it('rejects an unknown template before dispatching', async () => {
    const { service, dispatcher } = createService();

    await expect(service.analyzePost(post, { template: 'limerick' })).rejects.toThrow(
      new PromptTemplateNotFoundError('limerick')
    );
    expect(dispatcher.analyze).not.toHaveBeenCalled();
  });

  it('rethrows dispatch failures', async () => {
    const { service, dispatcher } = createService();
    dispatcher.analyze.mockRejectedValue(new Error('No eligible provider for media type "image"'));

    await expect(service.analyzePost(post)).rejects.toThrow('No eligible provider for media type "image"');
  });
});

describe('PromptTemplateService', () => {
  it('resolves named, media-specific and default templates', () => {
    const { templates } = createService();

    expect(templates.listTemplates()).toEqual(['announcement', 'default', 'gif', 'image', 'text', 'video']);
    expect(templates.resolve('announcement', 'text')).toContain('{content}');
    expect(templates.resolve(undefined, 'video')).toBe(templates.resolve('video', 'text'));
    expect(() => templates.resolve('missing', 'text')).toThrow(PromptTemplateNotFoundError);
  });
});
