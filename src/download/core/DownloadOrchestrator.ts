/**
 * DownloadOrchestrator - Main coordinator for a single streaming download
 * Resolving → Streaming → Finalizing → Done, any of the first three may end in Failed.
 *
 * Each call to `download()` owns its own TransferState, staging file and
 * progress reporter; concurrent calls only need distinct destinations.
 */

import { EventEmitter } from 'events';
import path from 'path';
import { FetchConfig } from '../../types';
import { FileManager } from '../../utils/FileManager';
import { logError, logger, logOperation } from '../../utils/logger';
import {
  createRetryPolicy,
  initialRetryState,
  nextRetry,
  RetryPolicy,
  sleep,
} from '../../utils/retryHelper';
import { URLValidator } from '../../utils/UrlValidator';
import { DownloadCache } from '../cache/DownloadCache';
import { NodeFetchTransport } from '../transport/NodeFetchTransport';
import { rechunk, skipBytes } from './chunking';
import {
  DestinationError,
  DownloadError,
  errorMessage,
  IncompleteTransferError,
  TransientNetworkError,
  UnreachableError,
} from './errors';
import { resolveFilename } from './FilenameResolver';
import { ProgressReporter, withProgress } from './ProgressReporter';
import { RemoteResource } from './RemoteResource';
import { StreamWriter, stagingPathFor } from './StreamWriter';
import {
  CancelReason,
  DownloadEvent,
  DownloadEventHandler,
  DownloadOptions,
  DownloadOutcome,
  HttpTransport,
  ProgressSnapshot,
  TransferPhase,
} from './types';

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export interface OrchestratorDefaults {
  directory: string;
  chunkSize: number;
  retry: Partial<RetryPolicy>;
  /** 0 disables the deadline */
  timeoutMs: number;
  cacheDisabled: boolean;
}

export interface DownloadOrchestratorOptions {
  transport?: HttpTransport;
  fileManager?: FileManager;
  cache?: DownloadCache;
  defaults?: Partial<OrchestratorDefaults>;
  /** Clock in milliseconds */
  now?: () => number;
  /** Wait between retries */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Mutable state of one in-flight download. Never shared across calls.
 */
interface TransferState {
  url: string;
  phase: TransferPhase;
  totalBytes: number | null;
  startedAt: number;
  attempts: number;
  resumedFrom: number;
  deadline: number | null;
  signal?: AbortSignal;
}

type StreamResult =
  | { status: 'streamed' }
  | { status: 'cancelled'; reason: CancelReason };

export class DownloadOrchestrator extends EventEmitter {
  private readonly transport: HttpTransport;
  private readonly fileManager: FileManager;
  private readonly cache: DownloadCache;
  private readonly defaults: OrchestratorDefaults;
  private readonly urlValidator = new URLValidator();
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<void>;
  private eventHandlers: DownloadEventHandler[] = [];

  constructor(options: DownloadOrchestratorOptions = {}) {
    super();
    this.fileManager = options.fileManager ?? new FileManager();
    this.transport = options.transport ?? new NodeFetchTransport();
    this.cache = options.cache ?? new DownloadCache(undefined, this.fileManager);
    this.defaults = {
      directory: process.cwd(),
      chunkSize: DEFAULT_CHUNK_SIZE,
      retry: {},
      timeoutMs: 0,
      cacheDisabled: false,
      ...options.defaults,
    };
    this.now = options.now ?? Date.now;
    this.wait = options.sleep ?? sleep;
  }

  /**
   * Build an orchestrator wired to the loaded configuration
   */
  static fromConfig(config: FetchConfig, options: DownloadOrchestratorOptions = {}): DownloadOrchestrator {
    logger.level = config.logLevel;
    const fileManager = options.fileManager ?? new FileManager();
    return new DownloadOrchestrator({
      transport: new NodeFetchTransport({
        userAgent: config.userAgent,
        connectTimeout: config.connectTimeout,
        readTimeout: config.readTimeout,
      }),
      cache: new DownloadCache(config.cacheDirectory, fileManager),
      fileManager,
      ...options,
      defaults: {
        directory: config.downloadDirectory,
        chunkSize: config.chunkSize,
        retry: config.retry,
        timeoutMs: config.downloadTimeout,
        cacheDisabled: config.cacheDisabled,
        ...options.defaults,
      },
    });
  }

  /**
   * Add event handler
   */
  onDownloadEvent(handler: DownloadEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emitEvent(type: DownloadEvent['type'], url: string, data?: Record<string, unknown>): void {
    const event: DownloadEvent = {
      type,
      url,
      timestamp: new Date(),
      data,
    };

    this.guardListener(type, () => this.emit(type, event));
    this.eventHandlers.forEach((handler) => this.guardListener(type, () => handler(event)));
  }

  // Listeners observe the transfer; a throwing one cannot change its outcome
  private guardListener(type: DownloadEvent['type'], fn: () => void): void {
    try {
      fn();
    } catch (error) {
      logger.warn('Download event listener failed', { event: type, error: errorMessage(error) });
    }
  }

  private enterPhase(state: TransferState, reporter: ProgressReporter, phase: TransferPhase): void {
    state.phase = phase;
    reporter.setPhase(phase);
    this.emitEvent('phase', state.url, { phase });
  }

  /**
   * Download `url` to disk. Never rejects for transfer problems: failures come
   * back as a `failed` outcome, cancellation as `cancelled`.
   */
  async download(url: string, options: DownloadOptions = {}): Promise<DownloadOutcome> {
    const chunkSize = options.chunkSize ?? this.defaults.chunkSize;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    const policy = createRetryPolicy({
      ...this.defaults.retry,
      ...options.retry,
      ...(options.maxRetries !== undefined ? { maxRetries: options.maxRetries } : {}),
    });
    const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs;
    const useCache = (options.useCache ?? false) && !this.defaults.cacheDisabled;

    const state: TransferState = {
      url,
      phase: TransferPhase.RESOLVING,
      totalBytes: null,
      startedAt: this.now(),
      attempts: 0,
      resumedFrom: 0,
      deadline: timeoutMs > 0 ? this.now() + timeoutMs : null,
      signal: options.signal,
    };

    const onProgress = (snapshot: ProgressSnapshot): void => {
      this.emitEvent('progress', url, { snapshot });
      if (options.onProgress) {
        options.onProgress(snapshot);
      }
    };

    return withProgress(
      { onProgress, sinks: options.progressSinks, now: this.now },
      async (reporter) => {
        let writer: StreamWriter | undefined;
        try {
          this.enterPhase(state, reporter, TransferPhase.RESOLVING);
          const resource = await this.resolve(url);
          const destination = this.destinationFor(resource, options);
          writer = new StreamWriter(destination, { fileManager: this.fileManager });

          if (options.overwrite === false && (await this.fileManager.fileExists(destination))) {
            throw new DestinationError(destination, `Destination already exists: ${destination}`, {
              errno: 'EEXIST',
            });
          }

          state.totalBytes = resource.totalBytes;
          reporter.setTotal(resource.totalBytes);
          logOperation('Download started', {
            url,
            destination,
            totalBytes: resource.totalBytes,
            acceptsRanges: resource.acceptsRanges,
          });

          const fromCache = useCache && (await this.restoreFromCache(writer, state, reporter));

          if (!fromCache) {
            const result = await this.stream(resource, writer, reporter, state, chunkSize, policy);
            if (result.status === 'cancelled') {
              return await this.cancelled(state, reporter, writer, result.reason);
            }
          }

          this.enterPhase(state, reporter, TransferPhase.FINALIZING);
          const filePath = await writer.commit(state.totalBytes);
          const bytes = await this.fileManager.getFileSize(filePath);

          if (useCache && !fromCache) {
            await this.storeInCache(url, filePath);
          }

          this.enterPhase(state, reporter, TransferPhase.DONE);
          reporter.finish('completed');
          logOperation('Download completed', {
            url,
            filePath,
            bytes,
            attempts: state.attempts,
            resumedFrom: state.resumedFrom,
            elapsedMs: this.now() - state.startedAt,
          });
          this.emitEvent('completed', url, { filePath, bytes });

          return {
            status: 'completed',
            filePath,
            bytes,
            attempts: state.attempts,
            resumedFrom: state.resumedFrom,
            fromCache,
          };
        } catch (error) {
          if (!(error instanceof DownloadError)) {
            throw error;
          }
          return this.failed(state, reporter, writer, error);
        }
      },
    );
  }

  /**
   * Validate the URL and probe the resource. Not retried.
   */
  private async resolve(url: string): Promise<RemoteResource> {
    const validation = this.urlValidator.validate(url);
    if (!validation.valid) {
      throw new UnreachableError(url, `Invalid download URL ${url}: ${validation.error}`);
    }
    return RemoteResource.probe(url, this.transport);
  }

  private destinationFor(resource: RemoteResource, options: DownloadOptions): string {
    if (options.destination) {
      return path.resolve(options.destination);
    }
    const directory = options.directory ?? this.defaults.directory;
    return path.resolve(directory, resolveFilename(resource, options.filename));
  }

  private cancelReason(state: TransferState): CancelReason | null {
    if (state.signal?.aborted) {
      return 'signal';
    }
    if (state.deadline !== null && this.now() >= state.deadline) {
      return 'timeout';
    }
    return null;
  }

  /**
   * Streaming state: attempt, and on transient failures wait and resume
   * from whatever the staging file holds.
   */
  private async stream(
    resource: RemoteResource,
    writer: StreamWriter,
    reporter: ProgressReporter,
    state: TransferState,
    chunkSize: number,
    policy: RetryPolicy,
  ): Promise<StreamResult> {
    this.enterPhase(state, reporter, TransferPhase.STREAMING);

    let offset = await writer.stagedBytes();
    const total = resource.totalBytes;
    if (offset > 0 && !resource.acceptsRanges) {
      logger.info('Server does not accept ranges, restarting staging file', { url: state.url });
      offset = 0;
    } else if (total !== null && offset > total) {
      logger.warn('Staging file is larger than the resource, restarting', {
        url: state.url,
        staged: offset,
        total,
      });
      offset = 0;
    }
    state.resumedFrom = offset;
    reporter.startAt(offset);
    if (offset > 0) {
      logOperation('Resuming download', { url: state.url, offset });
    }

    if (total !== null && total > 0 && offset === total) {
      logger.info('Staging file already complete', { url: state.url, bytes: offset });
      return { status: 'streamed' };
    }

    let retry = initialRetryState();
    for (;;) {
      const reason = this.cancelReason(state);
      if (reason) {
        return { status: 'cancelled', reason };
      }

      state.attempts = retry.attempt;
      try {
        const result = await this.streamAttempt(resource, writer, reporter, state, offset, chunkSize);
        await writer.close();
        return result;
      } catch (error) {
        await this.closeAfterFailure(writer);
        if (!(error instanceof TransientNetworkError)) {
          throw error;
        }

        const next = nextRetry(policy, retry, error);
        retry = next.state;
        if (next.decision.action === 'give-up') {
          throw new TransientNetworkError(
            `Download of ${state.url} failed after ${next.decision.attempts} attempts: ${error.message}`,
            { attempts: next.decision.attempts, cause: error },
          );
        }

        offset = await writer.stagedBytes();
        logger.warn(
          `Transfer interrupted, retrying in ${next.decision.delay}ms (retry ${next.decision.attempt - 1}/${policy.maxRetries})`,
          { url: state.url, offset, error: error.message },
        );
        this.emitEvent('retry', state.url, {
          attempt: next.decision.attempt,
          delay: next.decision.delay,
          offset,
          error: error.message,
        });
        await this.wait(next.decision.delay);
      }
    }
  }

  /**
   * One pass over the remote stream starting at `offset`
   */
  private async streamAttempt(
    resource: RemoteResource,
    writer: StreamWriter,
    reporter: ProgressReporter,
    state: TransferState,
    offset: number,
    chunkSize: number,
  ): Promise<StreamResult> {
    const stream = await resource.open(offset);

    if (stream.offset > offset) {
      throw new IncompleteTransferError(
        `Server resumed at byte ${stream.offset} instead of ${offset}`,
        state.totalBytes,
        offset,
      );
    }
    const skip = offset - stream.offset;
    const totalChanged =
      stream.totalBytes !== null && state.totalBytes !== null && stream.totalBytes !== state.totalBytes;
    if (totalChanged || (skip > 0 && !resource.matches(stream))) {
      await writer.open(0);
      await writer.close();
      throw new IncompleteTransferError(
        `Resource at ${state.url} changed since the transfer started`,
        state.totalBytes,
        offset,
        'RESOURCE_CHANGED',
      );
    }
    if (skip > 0) {
      logger.info('Server ignored the range request, skipping bytes already staged', {
        url: state.url,
        skip,
      });
    }
    if (state.totalBytes === null && stream.totalBytes !== null) {
      state.totalBytes = stream.totalBytes;
      reporter.setTotal(stream.totalBytes);
    }

    await writer.open(offset);
    for await (const chunk of rechunk(skipBytes(stream.body, skip), chunkSize)) {
      await writer.write(chunk);
      reporter.advance(chunk.byteLength);

      const reason = this.cancelReason(state);
      if (reason) {
        return { status: 'cancelled', reason };
      }
    }
    return { status: 'streamed' };
  }

  private async closeAfterFailure(writer: StreamWriter): Promise<void> {
    try {
      await writer.close();
    } catch (error) {
      logger.warn('Failed to close staging file after an interrupted transfer', {
        stagingPath: writer.stagingPath,
        error: errorMessage(error),
      });
    }
  }

  /**
   * Entries are keyed on the requested URL, not on where redirects lead.
   */
  private async restoreFromCache(
    writer: StreamWriter,
    state: TransferState,
    reporter: ProgressReporter,
  ): Promise<boolean> {
    const cached = await this.cache.get(state.url);
    if (!cached) {
      return false;
    }
    const size = await this.fileManager.getFileSize(cached);
    if (state.totalBytes !== null && size !== state.totalBytes) {
      logger.info('Cached copy does not match the remote size, ignoring it', {
        url: state.url,
        cached: size,
        total: state.totalBytes,
      });
      return false;
    }

    logger.debug('Serving download from cache', { url: state.url, cached });
    this.enterPhase(state, reporter, TransferPhase.STREAMING);
    await this.fileManager.copyFile(cached, writer.stagingPath);
    state.totalBytes = size;
    reporter.setTotal(size);
    reporter.advance(size);
    return true;
  }

  private async storeInCache(url: string, filePath: string): Promise<void> {
    try {
      await this.cache.store(url, filePath);
    } catch (error) {
      // The download itself succeeded
      logger.warn('Failed to cache download', {
        url,
        error: errorMessage(error),
      });
    }
  }

  private async cancelled(
    state: TransferState,
    reporter: ProgressReporter,
    writer: StreamWriter,
    reason: CancelReason,
  ): Promise<DownloadOutcome> {
    await writer.close();
    this.enterPhase(state, reporter, TransferPhase.CANCELLED);
    reporter.finish('aborted');

    const bytesStaged = await writer.stagedBytes();
    logOperation('Download cancelled', { url: state.url, reason, bytesStaged });
    this.emitEvent('cancelled', state.url, { reason, stagingPath: writer.stagingPath, bytesStaged });

    return { status: 'cancelled', reason, stagingPath: writer.stagingPath, bytesStaged };
  }

  private async failed(
    state: TransferState,
    reporter: ProgressReporter,
    writer: StreamWriter | undefined,
    error: DownloadError,
  ): Promise<DownloadOutcome> {
    if (writer) {
      await this.closeAfterFailure(writer);
    }
    const failedIn = state.phase;
    this.enterPhase(state, reporter, TransferPhase.FAILED);
    reporter.finish('aborted');

    const stagingPath =
      writer && (await this.fileManager.fileExists(writer.stagingPath)) ? writer.stagingPath : undefined;
    logError(error, { url: state.url, phase: failedIn, code: error.code, stagingPath });
    this.emitEvent('failed', state.url, { error: error.message, code: error.code, phase: failedIn });

    return { status: 'failed', error, stagingPath };
  }

  /**
   * Delete the staging file left behind for `destination`
   */
  async discardStaging(destination: string): Promise<boolean> {
    const removed = await this.fileManager.deleteFile(stagingPathFor(path.resolve(destination)));
    if (removed) {
      logger.info('Staging file discarded', { destination });
    }
    return removed;
  }
}
