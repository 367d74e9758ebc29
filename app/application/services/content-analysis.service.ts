import { injectable, inject } from 'inversify';
import { TYPES } from '../../core/container/types';
import { toError, type ILogger } from '../../core/logging';
import type { MediaType } from '../../domain/entities';
import type { IDispatcherService } from '../../domain/services/dispatch';
import type { NotificationDelivery, NotificationGateway, NotificationMessage } from '../../domain/services/notification';
import type { AnalysisOutcome, AnalysisRequest, PostAnalysisOptions, PostMediaKind, SocialPost } from '../types';
import type { IPromptTemplateService } from './prompt-template.service';

export interface PostAnalysis {
  readonly postId: string;
  readonly mediaType: MediaType;
  readonly outcome: AnalysisOutcome;
  readonly notifications: NotificationDelivery[];
}

const MEDIA_PRECEDENCE: readonly PostMediaKind[] = ['video', 'gif', 'image'];

export function deriveMediaType(post: Pick<SocialPost, 'media'>): MediaType {
  const kinds = new Set((post.media ?? []).map(media => media.kind));
  return MEDIA_PRECEDENCE.find(kind => kinds.has(kind)) ?? 'text';
}

/**
 * Entry point for the content pipeline: one post in, one analysis out.
 * Terminal dispatch errors are logged and rethrown so the caller can skip
 * the post.
 */
@injectable()
export class ContentAnalysisService {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.DispatcherService) private readonly dispatcher: IDispatcherService,
    @inject(TYPES.PromptTemplateService) private readonly promptTemplates: IPromptTemplateService,
    @inject(TYPES.NotificationGateway) private readonly notificationGateway: NotificationGateway
  ) {
    this.logger = logger.createChild('ContentAnalysisService');
  }

  /**
   * Turns a post into a dispatchable request. Throws PromptTemplateNotFoundError
   * for an unknown explicit template.
   */
  buildRequest(post: SocialPost, options: PostAnalysisOptions = {}): AnalysisRequest {
    const mediaType = deriveMediaType(post);
    return {
      content: post.text,
      mediaType,
      promptTemplate: this.promptTemplates.resolve(options.template, mediaType),
      mediaUrls: (post.media ?? []).map(media => media.url),
      ...(options.requestId !== undefined && { requestId: options.requestId })
    };
  }

  async analyzePost(post: SocialPost, options: PostAnalysisOptions = {}): Promise<PostAnalysis> {
    const request = this.buildRequest(post, options);
    const { mediaType } = request;

    let outcome: AnalysisOutcome;
    try {
      outcome = await this.dispatcher.analyze(request);
    } catch (error) {
      this.logger.warn('Post analysis failed', {
        requestId: options.requestId,
        metadata: { postId: post.id, mediaType, error: toError(error).message }
      });
      throw error;
    }

    // A cached outcome was already announced when it was first analyzed.
    const notifications = outcome.result.isRelevant && !outcome.cached && options.notify !== false
      ? await this.notificationGateway.notify(this.buildNotification(post, outcome))
      : [];

    this.logger.info('Post analyzed', {
      requestId: options.requestId,
      providerId: outcome.providerId,
      duration: outcome.elapsedMs,
      metadata: {
        postId: post.id,
        mediaType,
        isRelevant: outcome.result.isRelevant,
        cached: outcome.cached,
        notified: notifications.filter(delivery => delivery.success).length
      }
    });

    return { postId: post.id, mediaType, outcome, notifications };
  }

  private buildNotification(post: SocialPost, outcome: AnalysisOutcome): NotificationMessage {
    const { result } = outcome;
    const fields = [
      ...(post.platform ? [{ name: 'Platform', value: post.platform, inline: true }] : []),
      ...(post.author ? [{ name: 'Author', value: post.author, inline: true }] : []),
      ...(result.confidence !== undefined ? [{ name: 'Confidence', value: `${result.confidence}%`, inline: true }] : []),
      ...(result.reason ? [{ name: 'Reason', value: result.reason }] : []),
      ...(result.keywords && result.keywords.length > 0 ? [{ name: 'Keywords', value: result.keywords.join(', ') }] : [])
    ];

    return {
      title: post.author ? `Relevant post from ${post.author}` : 'Relevant post',
      body: result.analyticalBriefing,
      ...(post.url !== undefined && { url: post.url }),
      fields
    };
  }
}
