import { RateLimiter, SecurityService } from '../core/security';
import { createCryptoService, createTestLogger } from './support/fakes';

describe('CryptoService', () => {
  it('round-trips a secret without storing it in the clear', () => {
    const crypto = createCryptoService();

    const secret = crypto.encryptSecret('test-secret');

    expect(secret.algorithm).toBe('aes-256-gcm');
    expect(secret.encrypted).not.toContain('test-secret');
    expect(crypto.decryptSecret(secret)).toBe('test-secret');
  });

  it('refuses a tampered secret', () => {
    const crypto = createCryptoService();
    const secret = crypto.encryptSecret('test-secret');

    expect(() => crypto.decryptSecret({ ...secret, authTag: '00'.repeat(16) })).toThrow('Secret decryption failed');
  });

  it('compares strings of any length', () => {
    const crypto = createCryptoService();

    expect(crypto.constantTimeEquals('test-secret', 'test-secret')).toBe(true);
    expect(crypto.constantTimeEquals('test-secret', 'test')).toBe(false);
    expect(crypto.sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});

describe('SecurityService', () => {
  const previousKey = process.env.ADMIN_API_KEY;

  beforeEach(() => {
    process.env.ADMIN_API_KEY = 'test-secret';
  });

  afterEach(() => {
    if (previousKey === undefined) {
      delete process.env.ADMIN_API_KEY;
    } else {
      process.env.ADMIN_API_KEY = previousKey;
    }
  });

  function createSecurity() {
    const logger = createTestLogger();
    return new SecurityService(logger, createCryptoService(logger), new RateLimiter(logger));
  }

  it('accepts the admin bearer token', async () => {
    const result = await createSecurity().authenticateAdmin('Bearer test-secret', { ipAddress: '10.0.0.1' });

    expect(result.success).toBe(true);
  });

  it('rejects a missing or wrong token with 401', async () => {
    const security = createSecurity();

    await expect(security.authenticateAdmin(undefined, { ipAddress: '10.0.0.2' })).resolves.toMatchObject({
      success: false,
      statusCode: 401,
      error: 'Missing or invalid authorization header'
    });
    await expect(security.authenticateAdmin('Bearer wrong', { ipAddress: '10.0.0.2' })).resolves.toMatchObject({
      success: false,
      statusCode: 401,
      error: 'Invalid API key'
    });
  });

  it('limits requests per address', async () => {
    const security = createSecurity();
    const config = { keyPrefix: 'test', points: 2, duration: 60, blockDuration: 60 };

    const results: boolean[] = [];
    for (let i = 0; i < 3; i++) {
      results.push((await security.checkRateLimit({ ipAddress: '10.0.0.3' }, config)).allowed);
    }
    const other = await security.checkRateLimit({ ipAddress: '10.0.0.4' }, config);

    expect(results).toEqual([true, true, false]);
    expect(other.allowed).toBe(true);
  });
});
