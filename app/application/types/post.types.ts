export type PostMediaKind = 'image' | 'video' | 'gif';

export interface PostMedia {
  readonly url: string;
  readonly kind: PostMediaKind;
}

export interface SocialPost {
  readonly id: string;
  readonly text: string;
  readonly platform?: string;
  readonly author?: string;
  readonly url?: string;
  readonly media?: readonly PostMedia[];
}

export interface PostAnalysisOptions {
  readonly template?: string;
  readonly notify?: boolean;
  readonly requestId?: string;
}
