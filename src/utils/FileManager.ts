import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';
import { errorMessage, isErrnoException, toDestinationError } from '../download/core/errors';

/**
 * FileManager - filesystem primitives for staging files, destinations and the cache
 * Failures other than a missing file surface as DestinationError
 */
export class FileManager {
  /**
   * Create a directory (and its parents) if it doesn't exist
   */
  async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
      logger.error('Failed to create directory', { path: dirPath, error });
      throw toDestinationError(error, dirPath, 'create directory');
    }
  }

  /**
   * Get file size in bytes, 0 when the file doesn't exist
   */
  async getFileSize(filePath: string): Promise<number> {
    try {
      const stats = await fs.stat(filePath);
      return stats.size;
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return 0;
      }
      throw toDestinationError(error, filePath, 'stat');
    }
  }

  /**
   * Check if file exists
   */
  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Delete a file. Returns false when there was nothing to delete.
   */
  async deleteFile(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      logger.debug('File deleted', { path: filePath });
      return true;
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      logger.error('Failed to delete file', {
        path: filePath,
        error: errorMessage(error),
      });
      throw toDestinationError(error, filePath, 'delete');
    }
  }

  /**
   * Shrink (or create) a file to exactly `length` bytes
   */
  async truncate(filePath: string, length: number): Promise<void> {
    try {
      const handle = await fs.open(filePath, 'a');
      try {
        await handle.truncate(length);
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw toDestinationError(error, filePath, 'truncate');
    }
  }

  /**
   * Rename within one volume, atomically replacing the target
   */
  async rename(from: string, to: string): Promise<void> {
    try {
      await fs.rename(from, to);
    } catch (error) {
      throw toDestinationError(error, to, 'rename to');
    }
  }

  async copyFile(from: string, to: string): Promise<void> {
    try {
      await this.ensureDir(path.dirname(to));
      await fs.copyFile(from, to);
    } catch (error) {
      throw toDestinationError(error, to, 'copy to');
    }
  }

  /**
   * Remove a directory tree, ignoring a missing one
   */
  async removeDir(dirPath: string): Promise<void> {
    try {
      await fs.rm(dirPath, { recursive: true, force: true });
      logger.debug('Directory removed', { path: dirPath });
    } catch (error) {
      throw toDestinationError(error, dirPath, 'remove');
    }
  }
}
