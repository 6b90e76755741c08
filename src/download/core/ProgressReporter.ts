/**
 * ProgressReporter - scoped byte accumulator for a single transfer
 *
 * Not shared between transfers: one reporter belongs to one download and is
 * only advanced from that download's loop.
 */

import { logger } from '../../utils/logger';
import { errorMessage } from './errors';
import {
  ProgressCallback,
  ProgressEndStatus,
  ProgressSink,
  ProgressSnapshot,
  TransferPhase,
} from './types';

/** Time constant of the exponential rate smoothing */
export const DEFAULT_SMOOTHING_WINDOW_MS = 3000;

export interface ProgressReporterOptions {
  totalBytes?: number | null;
  onProgress?: ProgressCallback;
  sinks?: ProgressSink[];
  smoothingWindowMs?: number;
  /** Clock in milliseconds */
  now?: () => number;
}

export class ProgressReporter {
  private bytes = 0;
  private total: number | null;
  private rate = 0;
  private hasRate = false;
  private pendingBytes = 0;
  private phase = TransferPhase.RESOLVING;
  private endStatus: ProgressEndStatus | null = null;
  private readonly startedAt: number;
  private lastUpdateAt: number;
  private readonly smoothingWindowMs: number;
  private readonly now: () => number;
  private readonly onProgress?: ProgressCallback;
  private readonly sinks: ProgressSink[];

  constructor(options: ProgressReporterOptions = {}) {
    this.now = options.now ?? Date.now;
    this.total = options.totalBytes ?? null;
    this.onProgress = options.onProgress;
    this.sinks = options.sinks ?? [];
    this.smoothingWindowMs = options.smoothingWindowMs ?? DEFAULT_SMOOTHING_WINDOW_MS;
    this.startedAt = this.now();
    this.lastUpdateAt = this.startedAt;
  }

  get finished(): boolean {
    return this.endStatus !== null;
  }

  get status(): ProgressEndStatus | null {
    return this.endStatus;
  }

  setTotal(totalBytes: number | null): void {
    this.total = totalBytes;
  }

  setPhase(phase: TransferPhase): void {
    this.phase = phase;
  }

  /**
   * Count bytes already on disk from an earlier attempt. They move the
   * position but not the rate.
   */
  startAt(offset: number): void {
    if (!Number.isFinite(offset) || offset < this.bytes) {
      throw new RangeError(`Cannot move progress back from ${this.bytes} to ${offset}`);
    }
    this.bytes = offset;
    this.pendingBytes = 0;
    this.lastUpdateAt = this.now();
  }

  advance(bytes: number): void {
    if (!Number.isFinite(bytes) || bytes < 0) {
      throw new RangeError(`Progress can only advance by a non-negative amount, got ${bytes}`);
    }
    if (this.endStatus !== null) {
      throw new Error('Progress reporter already finished');
    }

    this.bytes += bytes;
    this.pendingBytes += bytes;
    this.sampleRate();
    this.notify();
  }

  /**
   * Exponential smoothing of the instantaneous rate. Samples taken in the
   * same millisecond are folded into the next one.
   */
  private sampleRate(): void {
    const now = this.now();
    const elapsed = now - this.lastUpdateAt;
    if (elapsed <= 0) {
      return;
    }

    const instant = (this.pendingBytes / elapsed) * 1000;
    if (!this.hasRate) {
      this.rate = instant;
      this.hasRate = true;
    } else {
      const weight = 1 - Math.exp(-elapsed / this.smoothingWindowMs);
      this.rate += weight * (instant - this.rate);
    }
    this.pendingBytes = 0;
    this.lastUpdateAt = now;
  }

  snapshot(): ProgressSnapshot {
    const total = this.total;
    let percentage: number | null = null;
    let etaSeconds: number | null = null;

    if (total !== null) {
      percentage = total > 0 ? Math.min(100, (this.bytes / total) * 100) : 100;
      const remaining = Math.max(0, total - this.bytes);
      if (remaining === 0) {
        etaSeconds = 0;
      } else if (this.rate > 0) {
        etaSeconds = remaining / this.rate;
      }
    }

    return Object.freeze({
      bytesTransferred: this.bytes,
      totalBytes: total,
      percentage,
      rate: this.rate,
      elapsedMs: this.now() - this.startedAt,
      etaSeconds,
      phase: this.phase,
    });
  }

  /**
   * Move to the terminal display state. Only the first call has an effect.
   */
  finish(status: ProgressEndStatus): boolean {
    if (this.endStatus !== null) {
      return false;
    }
    this.endStatus = status;
    const snapshot = this.snapshot();
    for (const sink of this.sinks) {
      this.guard('end', () => sink.end(snapshot, status));
    }
    return true;
  }

  private notify(): void {
    if (!this.onProgress && this.sinks.length === 0) {
      return;
    }
    const snapshot = this.snapshot();
    if (this.onProgress) {
      const callback = this.onProgress;
      this.guard('onProgress', () => callback(snapshot));
    }
    for (const sink of this.sinks) {
      this.guard('update', () => sink.update(snapshot));
    }
  }

  // A broken listener must not abort the transfer it observes
  private guard(listener: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      logger.warn('Progress listener failed', {
        listener,
        error: errorMessage(error),
      });
    }
  }
}

/**
 * Run `body` with a reporter that is finished on every exit path: as
 * `completed` when the body resolves, `aborted` when it throws. A body may
 * finish the reporter itself first; the later call is then a no-op.
 */
export async function withProgress<T>(
  options: ProgressReporterOptions,
  body: (reporter: ProgressReporter) => Promise<T>,
): Promise<T> {
  const reporter = new ProgressReporter(options);
  let status: ProgressEndStatus = 'aborted';
  try {
    const result = await body(reporter);
    status = 'completed';
    return result;
  } finally {
    reporter.finish(status);
  }
}
