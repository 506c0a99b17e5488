import type {
  AccessToken,
  CredentialBroker,
  TokenCacheOptions,
  TokenCachePolicy,
  TokenProvider,
} from './types.js';
import { AuthFailure } from '../errors/index.js';
import { AUTH_DEFAULTS } from '../config/constants.js';
import { silentLogger, type StructuredLogger } from '../observability/logger.js';
import { errorMessage } from '../utils/type-guards.js';

/**
 * Per-scope token cache with refresh ahead of expiry.
 *
 * The map reads and writes are synchronous, so no await ever sits between
 * deciding a token is stale and replacing it. Concurrent misses for one
 * scope share a single broker request.
 */
export class TokenCache implements TokenProvider {
  private readonly tokens = new Map<string, AccessToken>();
  private readonly refreshes = new Map<string, Promise<AccessToken>>();
  private readonly broker: CredentialBroker;
  private readonly refreshBufferMs: number;
  private readonly policies: Record<string, TokenCachePolicy>;
  private readonly now: () => number;
  private readonly logger: StructuredLogger;

  constructor(
    broker: CredentialBroker,
    options: TokenCacheOptions & { logger?: StructuredLogger } = {}
  ) {
    this.broker = broker;
    this.refreshBufferMs = options.refreshBufferMs ?? AUTH_DEFAULTS.REFRESH_BUFFER_MS;
    this.policies = options.policies ?? {};
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger();
  }

  async getToken(scope: string): Promise<string> {
    const cached = this.usableToken(scope);
    if (cached) {
      return cached.token;
    }

    const fresh = await this.refresh(scope);
    return fresh.token;
  }

  /**
   * Fetch a new token for a scope regardless of what is cached
   */
  async refresh(scope: string): Promise<AccessToken> {
    // Deduplicate concurrent refresh requests
    const pending = this.refreshes.get(scope);
    if (pending) {
      return pending;
    }

    const request = this.requestFromBroker(scope);
    this.refreshes.set(scope, request);

    try {
      return await request;
    } finally {
      this.refreshes.delete(scope);
    }
  }

  invalidate(scope: string): void {
    this.tokens.delete(scope);
  }

  /** Cached token for a scope, usable or not (for monitoring) */
  peek(scope: string): AccessToken | undefined {
    return this.tokens.get(scope);
  }

  policyFor(scope: string): TokenCachePolicy {
    return this.policies[scope] ?? 'cache';
  }

  private usableToken(scope: string): AccessToken | undefined {
    if (this.policyFor(scope) === 'always-refresh') {
      return undefined;
    }

    const cached = this.tokens.get(scope);
    if (!cached) {
      return undefined;
    }

    // Refresh if within buffer of expiry
    return this.now() + this.refreshBufferMs < cached.expiresAt.getTime() ? cached : undefined;
  }

  private async requestFromBroker(scope: string): Promise<AccessToken> {
    this.logger.debug('Requesting token', { scope });

    let token: AccessToken;
    try {
      token = await this.broker.requestToken(scope);
    } catch (error) {
      if (error instanceof AuthFailure) {
        throw error;
      }
      throw new AuthFailure(`Failed to get token for ${scope}: ${errorMessage(error)}`, { cause: error });
    }

    this.tokens.set(scope, token);
    this.logger.debug('Token cached', { scope, expiresAt: token.expiresAt.toISOString() });
    return token;
  }
}
