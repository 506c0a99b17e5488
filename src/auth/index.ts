// Types
export type {
  AccessToken,
  CredentialBroker,
  TokenCachePolicy,
  TokenProvider,
  TokenCacheOptions,
} from './types.js';

// Brokers
export { StaticCredentialBroker, CommandCredentialBroker, type CommandRunner } from './brokers.js';

// Token cache
export { TokenCache } from './token-cache.js';
