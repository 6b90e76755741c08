/**
 * Shared type definitions for filefetch
 */

export type { FetchConfig, RetryConfig } from './config';
