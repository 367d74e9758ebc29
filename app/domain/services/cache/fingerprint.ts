import crypto from 'crypto';
import type { MediaType } from '../../entities';

export interface FingerprintInput {
  readonly content: string;
  readonly mediaType: MediaType;
  readonly promptTemplate: string;
  readonly mediaUrls?: readonly string[];
}

export function normalizeContent(content: string): string {
  return content.replace(/\s+/g, ' ').trim();
}

/**
 * Two requests that differ only in whitespace or in the order of their media
 * URLs share a fingerprint.
 */
export function computeFingerprint(input: FingerprintInput): string {
  const canonical = JSON.stringify([
    normalizeContent(input.content),
    input.mediaType,
    input.promptTemplate,
    [...(input.mediaUrls ?? [])].sort()
  ]);

  return crypto.createHash('sha256').update(canonical, 'utf8').digest('hex');
}
