/**
 * A bearer token and the instant it stops being valid
 */
export interface AccessToken {
  token: string;
  expiresAt: Date;
}

/**
 * Credential broker interface - supplies tokens for a scope (audience).
 * Implementations throw AuthFailure when no token can be produced.
 */
export interface CredentialBroker {
  requestToken(scope: string): Promise<AccessToken>;
}

/**
 * How a scope's token is reused:
 * - cache: reuse until within the refresh buffer of expiry
 * - always-refresh: ask the broker on every request
 */
export type TokenCachePolicy = 'cache' | 'always-refresh';

/**
 * Token provider interface - what remote clients depend on
 */
export interface TokenProvider {
  /** Get a valid token for a scope (refreshing if needed) */
  getToken(scope: string): Promise<string>;

  /** Drop any cached token for a scope */
  invalidate?(scope: string): void;
}

export interface TokenCacheOptions {
  /** Refresh tokens this many ms before expiry (default: 300000 = 5 min) */
  refreshBufferMs?: number;
  /** Per-scope reuse policy; scopes not listed use `cache` */
  policies?: Record<string, TokenCachePolicy>;
  /** Clock, injectable for tests */
  now?: () => number;
}
