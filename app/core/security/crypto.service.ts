import { injectable, inject } from 'inversify';
import crypto from 'crypto';
import type { ILogger } from '../logging';
import { TYPES } from '../container/types';

const DEFAULT_MASTER_KEY = 'default-master-key-change-in-production';
const ALGORITHM = 'aes-256-gcm';

export interface EncryptedSecret {
  readonly encrypted: string;
  readonly iv: string;
  readonly authTag: string;
  readonly algorithm: typeof ALGORITHM;
}

export interface ICryptoService {
  encryptSecret(plaintext: string): EncryptedSecret;
  decryptSecret(secret: EncryptedSecret): string;
  constantTimeEquals(candidate: string, expected: string): boolean;
  sha256(value: string): string;
}

@injectable()
export class CryptoService implements ICryptoService {
  private readonly logger: ILogger;
  private readonly key: Buffer;

  constructor(@inject(TYPES.Logger) logger: ILogger) {
    this.logger = logger.createChild('CryptoService');

    const masterKey = process.env.SECRETS_MASTER_KEY || DEFAULT_MASTER_KEY;
    if (masterKey === DEFAULT_MASTER_KEY) {
      this.logger.warn('SECRETS_MASTER_KEY is not set; provider keys are encrypted with the default key');
    }
    this.key = crypto.createHash('sha256').update(masterKey, 'utf8').digest();
  }

  encryptSecret(plaintext: string): EncryptedSecret {
    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

    return {
      encrypted: encrypted.toString('hex'),
      iv: iv.toString('hex'),
      authTag: cipher.getAuthTag().toString('hex'),
      algorithm: ALGORITHM
    };
  }

  decryptSecret(secret: EncryptedSecret): string {
    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.key, Buffer.from(secret.iv, 'hex'));
      decipher.setAuthTag(Buffer.from(secret.authTag, 'hex'));

      return Buffer.concat([
        decipher.update(Buffer.from(secret.encrypted, 'hex')),
        decipher.final()
      ]).toString('utf8');
    } catch (error) {
      this.logger.error('Failed to decrypt secret', error instanceof Error ? error : undefined);
      throw new Error('Secret decryption failed');
    }
  }

  constantTimeEquals(candidate: string, expected: string): boolean {
    const candidateDigest = crypto.createHash('sha256').update(candidate, 'utf8').digest();
    const expectedDigest = crypto.createHash('sha256').update(expected, 'utf8').digest();
    return crypto.timingSafeEqual(candidateDigest, expectedDigest);
  }

  sha256(value: string): string {
    return crypto.createHash('sha256').update(value, 'utf8').digest('hex');
  }
}
