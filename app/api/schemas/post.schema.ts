import { t } from 'elysia';
import type { SocialPost } from '../../application/types';

export const PostMediaSchema = t.Object({
  url: t.String({ minLength: 1 }),
  kind: t.Union([t.Literal('image'), t.Literal('video'), t.Literal('gif')])
});

export const PostSchema = t.Object({
  id: t.String({ minLength: 1 }),
  text: t.String(),
  platform: t.Optional(t.String()),
  author: t.Optional(t.String()),
  url: t.Optional(t.String()),
  media: t.Optional(t.Array(PostMediaSchema, { maxItems: 16 }))
});

export type PostBody = typeof PostSchema.static;

export function toSocialPost(body: PostBody): SocialPost {
  return {
    id: body.id,
    text: body.text,
    ...(body.platform !== undefined && { platform: body.platform }),
    ...(body.author !== undefined && { author: body.author }),
    ...(body.url !== undefined && { url: body.url }),
    ...(body.media !== undefined && { media: body.media })
  };
}
