/**
 * DownloadCache - keeps copies of downloaded files keyed by their URL so a
 * repeated download can be served from disk. Lives in a temporary directory
 * by default and may be wiped by the OS at any time.
 */

import { createHash } from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileManager } from '../../utils/FileManager';
import { logger } from '../../utils/logger';
import { isErrnoException, toDestinationError } from '../core/errors';

export const DEFAULT_CACHE_DIRECTORY = path.join(os.tmpdir(), 'filefetch-downloadcache');

function hashKey(key: string): string {
  return createHash('sha256').update(key, 'utf8').digest('hex');
}

export class DownloadCache {
  readonly directory: string;
  private readonly fileManager: FileManager;

  constructor(directory: string = DEFAULT_CACHE_DIRECTORY, fileManager: FileManager = new FileManager()) {
    this.directory = directory;
    this.fileManager = fileManager;
  }

  private entryPath(url: string): string {
    return path.join(this.directory, hashKey(url));
  }

  /**
   * Path of the cached copy for `url`, or null
   */
  async get(url: string): Promise<string | null> {
    const entry = this.entryPath(url);
    return (await this.fileManager.fileExists(entry)) ? entry : null;
  }

  /**
   * Store a copy of `filePath` for `url`, replacing any previous entry
   */
  async store(url: string, filePath: string): Promise<string> {
    const entry = this.entryPath(url);
    const staging = `${entry}.${process.pid}.tmp`;
    await this.fileManager.copyFile(filePath, staging);
    await this.fileManager.rename(staging, entry);
    logger.debug('Download cached', { url, entry });
    return entry;
  }

  async isEmpty(): Promise<boolean> {
    try {
      const entries = await fs.readdir(this.directory);
      return entries.length === 0;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return true;
      }
      throw toDestinationError(error, this.directory, 'read');
    }
  }

  async clear(): Promise<void> {
    await this.fileManager.removeDir(this.directory);
    logger.info('Download cache cleared', { directory: this.directory });
  }
}
