/**
 * 函式庫進入點
 */

export { buildCacheKey, canonicalize, CacheKeyError } from './lib/cache-key.js';
export { loggers, setLogLevel, StructuredLogger, type LogLevel } from './lib/logger.js';
export { getMetricsContentType, getMetricsSnapshot, resetMetrics } from './lib/metrics.js';
export { ValidationError } from './lib/validation.js';
export {
  ApiClient,
  AuthenticationRequiredError,
  ResourceApi,
  type ApiClientOptions,
  type ApiRequest,
} from './services/api-client.js';
export {
  AuthPipeline,
  NoValidCredentialError,
  selectWorkingSecret,
  type AuthenticationResult,
  type AuthFlow,
  type AuthRequest,
  type CredentialSource,
  type EstablishedCredential,
} from './services/auth.js';
export { ConfigService, getConfigService, setConfigService } from './services/config.js';
export {
  PrivateQobuzApi,
  PRIVATE_QOBUZ_CLIENT_NAME,
  type PrivateQobuzApiOptions,
} from './services/qobuz/client.js';
export {
  getResponseCache,
  ResponseCache,
  setResponseCache,
  type ResponseCacheOptions,
} from './services/response-cache.js';
export {
  JsonFileTokenPersistence,
  MemoryTokenPersistence,
  type TokenPersistence,
} from './services/token-persistence.js';
export {
  BYPASS_MARKER,
  getTokenStore,
  parseUserIdentifier,
  setTokenStore,
  StoreUnavailableError,
  TokenStore,
} from './services/token-store.js';
export { ApiRequestError, ofetchTransport } from './services/transport.js';
export {
  DEFAULT_TIER_DURATIONS,
  getTtlPolicyRegistry,
  InvalidTierDurationError,
  setTtlPolicyRegistry,
  TtlPolicyRegistry,
  UnknownTierError,
} from './services/ttl-policy.js';
export type { CacheTier, CacheableValue } from './types/cache.js';
export type { HttpTransport, TransportRequest } from './types/http.js';
export type {
  CredentialFilter,
  CredentialInput,
  CredentialLookup,
  CredentialRecord,
  CredentialSummary,
} from './types/token.js';
