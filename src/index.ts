/**
 * Public API
 */

export { InfiniteCraftSession } from './client/session';
export type { SessionOptions, PairOptions } from './client/session';
export { Element, elementFromRecord, emptyElement } from './client/element';
export type { ElementClass } from './client/element';
export { DiscoveryStore, checkStorageFile } from './client/discovery-store';
export type { DiscoveryStoreOptions, GetDiscoveriesOptions } from './client/discovery-store';
export { RateLimiter } from './client/rate-limiter';
export type { RateLimiterOptions } from './client/rate-limiter';
export { ApiClient } from './client/api-client';
export type { ApiClientOptions } from './client/api-client';

export {
  InfiniteCraftError,
  SessionStateError,
  ClientResponseError,
  StorageError,
  toErrorMessage,
} from './shared/errors';
export type { StorageErrorCode } from './shared/errors';
export { SessionState } from './shared/types';
export type { DiscoveryRecord, PairResponseBody, PairQuery } from './shared/types';
export { STARTING_DISCOVERIES, DEFAULT_HEADERS, API_ROUTES } from './shared/constants';
export { config } from './shared/config';
export type { Config } from './shared/config';
export { createLogger, setLogLevel, LogLevel } from './shared/logger';

export * from './mock-server';
