export { CryptoService } from './crypto.service';
export type { ICryptoService, EncryptedSecret } from './crypto.service';
export { RateLimiter } from './rate-limiter';
export type { IRateLimiter, RateLimitConfig, RateLimitResult } from './rate-limiter';
export { SecurityService } from './security.service';
export type { ISecurityService, SecurityContext, AuthenticationResult } from './security.service';
