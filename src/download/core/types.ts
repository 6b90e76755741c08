/**
 * Core Types for the download engine
 */

import type { RetryPolicy } from '../../utils/retryHelper';
import type { DownloadError } from './errors';

// ============================================================================
// Enums
// ============================================================================

export enum TransferPhase {
  RESOLVING = 'resolving',
  STREAMING = 'streaming',
  FINALIZING = 'finalizing',
  DONE = 'done',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

// ============================================================================
// Transport
// ============================================================================

/**
 * What a probe learns about a resource before any byte is streamed
 */
export interface ResourceInfo {
  /** Final URL after redirects */
  url: string;
  totalBytes: number | null;
  contentDisposition?: string;
  contentType?: string;
  acceptsRanges: boolean;
  etag?: string;
  lastModified?: string;
}

export interface OpenStreamOptions {
  /** Byte offset to start from; 0 requests the whole resource */
  offset: number;
  /** Sent as If-Range so a changed resource answers with its full body */
  validator?: string;
}

export interface RemoteStream {
  status: number;
  /** Offset the server actually honored: the requested one on 206, 0 on 200 */
  offset: number;
  /** Size of the whole resource, when the response tells */
  totalBytes: number | null;
  etag?: string;
  lastModified?: string;
  body: AsyncIterable<Uint8Array>;
}

/**
 * Injected HTTP capability. Implementations throw UnreachableError or
 * TransientNetworkError, never raw client errors.
 */
export interface HttpTransport {
  probe(url: string): Promise<ResourceInfo>;
  open(url: string, options: OpenStreamOptions): Promise<RemoteStream>;
}

// ============================================================================
// Progress
// ============================================================================

export interface ProgressSnapshot {
  readonly bytesTransferred: number;
  readonly totalBytes: number | null;
  /** 0-100, null when the total is unknown */
  readonly percentage: number | null;
  /** Smoothed rate in bytes per second */
  readonly rate: number;
  readonly elapsedMs: number;
  /** Estimated remaining seconds, null when unknown */
  readonly etaSeconds: number | null;
  readonly phase: TransferPhase;
}

export type ProgressEndStatus = 'completed' | 'aborted';

export type ProgressCallback = (snapshot: ProgressSnapshot) => void;

/**
 * Receives progress pushes, e.g. a terminal progress bar
 */
export interface ProgressSink {
  update(snapshot: ProgressSnapshot): void;
  end(snapshot: ProgressSnapshot, status: ProgressEndStatus): void;
}

// ============================================================================
// Download
// ============================================================================

export interface DownloadOptions {
  /** Explicit filename, takes priority over anything the server declares */
  filename?: string;
  /** Directory the resolved filename is joined to */
  directory?: string;
  /** Full destination path; skips filename resolution when set */
  destination?: string;
  chunkSize?: number;
  maxRetries?: number;
  retry?: Partial<RetryPolicy>;
  signal?: AbortSignal;
  /** Deadline in ms, checked at chunk boundaries like the signal */
  timeoutMs?: number;
  overwrite?: boolean;
  useCache?: boolean;
  onProgress?: ProgressCallback;
  progressSinks?: ProgressSink[];
}

export type CancelReason = 'signal' | 'timeout';

export interface CompletedOutcome {
  status: 'completed';
  filePath: string;
  bytes: number;
  attempts: number;
  /** Staging length the first attempt resumed from */
  resumedFrom: number;
  fromCache: boolean;
}

export interface CancelledOutcome {
  status: 'cancelled';
  reason: CancelReason;
  stagingPath: string;
  bytesStaged: number;
}

export interface FailedOutcome {
  status: 'failed';
  error: DownloadError;
  stagingPath?: string;
}

export type DownloadOutcome = CompletedOutcome | CancelledOutcome | FailedOutcome;

// ============================================================================
// Event Types
// ============================================================================

export type DownloadEventType =
  | 'phase'
  | 'progress'
  | 'retry'
  | 'completed'
  | 'cancelled'
  | 'failed';

export interface DownloadEvent {
  type: DownloadEventType;
  url: string;
  timestamp: Date;
  data?: Record<string, unknown>;
}

export type DownloadEventHandler = (event: DownloadEvent) => void;
