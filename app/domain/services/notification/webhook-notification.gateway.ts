import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import { toError, type ILogger } from '../../../core/logging';
import type {
  NotificationDelivery,
  NotificationGateway,
  NotificationMessage,
  NotificationServer
} from './notification.gateway';

interface WebhookTarget extends NotificationServer {
  readonly url: string;
}

const EMBED_COLOR = 0x2f80ed;
const DELIVERY_TIMEOUT_MS = 10000;

export function parseWebhookUrls(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value !== '');
}

@injectable()
export class WebhookNotificationGateway implements NotificationGateway {
  private readonly logger: ILogger;
  private readonly targets: WebhookTarget[];

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    webhookUrls: readonly string[] = parseWebhookUrls(process.env.NOTIFICATION_WEBHOOK_URLS)
  ) {
    this.logger = logger.createChild('WebhookNotificationGateway');
    this.targets = this.buildTargets(webhookUrls);

    if (this.targets.length === 0) {
      this.logger.warn('No notification webhooks configured - relevant posts will not be forwarded');
    }
  }

  listServers(): NotificationServer[] {
    return this.targets.map(({ id, name, kind }) => ({ id, name, kind }));
  }

  async notify(message: NotificationMessage): Promise<NotificationDelivery[]> {
    if (this.targets.length === 0) {
      return [];
    }

    const payload = JSON.stringify({
      embeds: [
        {
          title: this.truncateText(message.title, 256),
          description: this.truncateText(message.body, 4000),
          color: EMBED_COLOR,
          ...(message.url !== undefined && { url: message.url }),
          fields: (message.fields ?? []).map(field => ({
            name: this.truncateText(field.name, 256),
            value: this.truncateText(field.value, 1000),
            inline: field.inline ?? false
          })),
          timestamp: new Date().toISOString()
        }
      ]
    });

    return Promise.all(this.targets.map(target => this.deliver(target, payload)));
  }

  private async deliver(target: WebhookTarget, payload: string): Promise<NotificationDelivery> {
    try {
      const response = await fetch(target.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json'
        },
        body: payload,
        signal: AbortSignal.timeout(DELIVERY_TIMEOUT_MS)
      });

      if (!response.ok) {
        throw new Error(`Webhook failed with status ${response.status}: ${response.statusText}`);
      }

      this.logger.info('Notification delivered', { metadata: { serverId: target.id, server: target.name } });
      return { serverId: target.id, success: true };
    } catch (error) {
      const failure = toError(error);
      this.logger.error('Failed to deliver notification', failure, {
        metadata: { serverId: target.id, server: target.name }
      });
      return { serverId: target.id, success: false, error: failure.message };
    }
  }

  private buildTargets(webhookUrls: readonly string[]): WebhookTarget[] {
    const targets: WebhookTarget[] = [];

    webhookUrls.forEach((url, index) => {
      try {
        const parsed = new URL(url);
        targets.push({ id: `webhook-${index + 1}`, name: parsed.host, kind: 'webhook', url });
      } catch (error) {
        this.logger.warn('Ignoring invalid notification webhook URL', {
          metadata: { position: index + 1, error: toError(error).message }
        });
      }
    });

    return targets;
  }

  private truncateText(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    return text.substring(0, maxLength - 3) + '...';
  }
}
