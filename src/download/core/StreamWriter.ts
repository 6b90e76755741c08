/**
 * StreamWriter - persists a byte stream into a staging file next to the
 * destination, then promotes it with an atomic rename.
 *
 * The destination is only ever touched by `commit()`. A failed or cancelled
 * transfer leaves the staging file for a later resume; only `discard()`
 * removes it.
 */

import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { FileManager } from '../../utils/FileManager';
import { logger } from '../../utils/logger';
import { IncompleteTransferError, toDestinationError } from './errors';

export const DEFAULT_STAGING_SUFFIX = '.part';

export interface StreamWriterOptions {
  stagingSuffix?: string;
  fileManager?: FileManager;
}

/**
 * Staging path for a destination, stable across invocations so a later run can resume it
 */
export function stagingPathFor(destination: string, suffix: string = DEFAULT_STAGING_SUFFIX): string {
  return `${destination}${suffix}`;
}

export class StreamWriter {
  readonly destination: string;
  readonly stagingPath: string;
  private readonly fileManager: FileManager;
  private handle: FileHandle | null = null;
  private position = 0;

  constructor(destination: string, options: StreamWriterOptions = {}) {
    this.destination = path.resolve(destination);
    this.stagingPath = stagingPathFor(this.destination, options.stagingSuffix);
    this.fileManager = options.fileManager ?? new FileManager();
  }

  /**
   * Bytes written to the staging file so far
   */
  get bytesWritten(): number {
    return this.position;
  }

  /**
   * Length of the staging file on disk, 0 if there is none
   */
  stagedBytes(): Promise<number> {
    return this.fileManager.getFileSize(this.stagingPath);
  }

  /**
   * Prepare the staging file so the next write lands at `offset`
   */
  async open(offset: number): Promise<void> {
    await this.close();
    await this.fileManager.ensureDir(path.dirname(this.destination));

    const staged = await this.stagedBytes();
    if (offset > staged) {
      throw new IncompleteTransferError(
        `Cannot resume at byte ${offset}: staging file only holds ${staged} bytes`,
        offset,
        staged,
      );
    }
    if (offset === 0 || staged !== offset) {
      await this.fileManager.truncate(this.stagingPath, offset);
    }

    try {
      this.handle = await fs.open(this.stagingPath, 'a');
    } catch (error) {
      throw toDestinationError(error, this.stagingPath, 'open');
    }
    this.position = offset;
    logger.debug('Staging file opened', { stagingPath: this.stagingPath, offset });
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (!this.handle) {
      throw new Error('StreamWriter.write() called before open()');
    }
    try {
      let written = 0;
      while (written < chunk.byteLength) {
        const result = await this.handle.write(chunk, written, chunk.byteLength - written);
        written += result.bytesWritten;
      }
    } catch (error) {
      throw toDestinationError(error, this.stagingPath, 'write');
    }
    this.position += chunk.byteLength;
  }

  /**
   * Flush and close the staging file. Safe to call repeatedly.
   */
  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    this.handle = null;
    try {
      await handle.sync();
    } catch (error) {
      await handle.close();
      throw toDestinationError(error, this.stagingPath, 'flush');
    }
    try {
      await handle.close();
    } catch (error) {
      throw toDestinationError(error, this.stagingPath, 'close');
    }
  }

  /**
   * Verify the staged length and atomically move it to the destination
   */
  async commit(expectedTotal: number | null): Promise<string> {
    await this.close();

    const staged = await this.stagedBytes();
    if (expectedTotal !== null && staged !== expectedTotal) {
      throw new IncompleteTransferError(
        `Expected ${expectedTotal} bytes but staging file holds ${staged}`,
        expectedTotal,
        staged,
      );
    }
    if (!(await this.fileManager.fileExists(this.stagingPath))) {
      throw new IncompleteTransferError('Staging file is missing', expectedTotal, 0);
    }

    await this.fileManager.rename(this.stagingPath, this.destination);
    logger.debug('Staging file promoted', {
      stagingPath: this.stagingPath,
      destination: this.destination,
      bytes: staged,
    });
    return this.destination;
  }

  /**
   * Remove the staging file (explicit cleanup)
   */
  async discard(): Promise<boolean> {
    await this.close();
    this.position = 0;
    return this.fileManager.deleteFile(this.stagingPath);
  }
}
