/**
 * Core index - exports all core components
 */

export * from './types';
export * from './errors';
export {
  resolveFilename,
  sanitizeFilename,
  parseContentDisposition,
  filenameFromUrl,
  extensionFromContentType,
  MAX_FILENAME_BYTES,
} from './FilenameResolver';
export type { ContentDisposition, FilenameSource } from './FilenameResolver';
export { ProgressReporter, withProgress, DEFAULT_SMOOTHING_WINDOW_MS } from './ProgressReporter';
export type { ProgressReporterOptions } from './ProgressReporter';
export { StreamWriter, stagingPathFor, DEFAULT_STAGING_SUFFIX } from './StreamWriter';
export { RemoteResource } from './RemoteResource';
export { DownloadOrchestrator, DEFAULT_CHUNK_SIZE } from './DownloadOrchestrator';
export type { DownloadOrchestratorOptions, OrchestratorDefaults } from './DownloadOrchestrator';
