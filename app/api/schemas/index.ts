export { PostSchema, PostMediaSchema, toSocialPost, type PostBody } from './post.schema';
