/**
 * Download System - Main Entry Point
 */

// Core components
export * from './core';

// Transport
export { NodeFetchTransport, classifyNetworkError, parseContentRange } from './transport/NodeFetchTransport';
export type { NodeFetchTransportOptions } from './transport/NodeFetchTransport';

// Progress display
export { ProgressBar, catchDownloadProgress, formatBytes, formatDuration } from './progress/ProgressBar';
export type { ProgressBarOptions } from './progress/ProgressBar';

// Cache
export { DownloadCache, DEFAULT_CACHE_DIRECTORY } from './cache/DownloadCache';

// Helpers
export {
  downloadFile,
  downloadFileSmart,
  getUrlFilename,
  getUrlContentType,
  guessUrlFilename,
  clearDownloadCache,
} from './helpers';
export type { HelperOptions } from './helpers';
