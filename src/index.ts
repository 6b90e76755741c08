/**
 * filefetch - streaming HTTP(S) downloads with resumable staging files
 */

export * from './download';
export { loadConfig, initMonitoring } from './utils/config';
export { logger } from './utils/logger';
export { FileManager } from './utils/FileManager';
export { URLValidator } from './utils/UrlValidator';
export {
  createRetryPolicy,
  computeBackoffDelay,
  nextRetry,
  initialRetryState,
  DEFAULT_RETRY_POLICY,
} from './utils/retryHelper';
export type { RetryPolicy, RetryState, RetryDecision } from './utils/retryHelper';
export type { FetchConfig, RetryConfig } from './types';
