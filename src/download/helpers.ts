/**
 * One-call helpers on top of DownloadOrchestrator. Unlike the orchestrator
 * they throw: the DownloadError of a failed transfer, or CancelledError.
 */

import { loadConfig } from '../utils/config';
import { DownloadCache } from './cache/DownloadCache';
import { DownloadOrchestrator } from './core/DownloadOrchestrator';
import { CancelledError, ResolutionError } from './core/errors';
import { resolveFilename } from './core/FilenameResolver';
import { RemoteResource } from './core/RemoteResource';
import { DownloadOptions, HttpTransport } from './core/types';
import { NodeFetchTransport } from './transport/NodeFetchTransport';

export interface HelperOptions extends Omit<DownloadOptions, 'destination' | 'directory'> {
  orchestrator?: DownloadOrchestrator;
}

let sharedOrchestrator: DownloadOrchestrator | undefined;

function defaultOrchestrator(): DownloadOrchestrator {
  if (!sharedOrchestrator) {
    sharedOrchestrator = DownloadOrchestrator.fromConfig(loadConfig());
  }
  return sharedOrchestrator;
}

async function run(url: string, options: HelperOptions, target: Pick<DownloadOptions, 'destination' | 'directory'>): Promise<string> {
  const { orchestrator = defaultOrchestrator(), ...downloadOptions } = options;
  const outcome = await orchestrator.download(url, { ...downloadOptions, ...target });

  switch (outcome.status) {
    case 'completed':
      return outcome.filePath;
    case 'cancelled':
      throw new CancelledError(outcome.stagingPath, outcome.reason);
    case 'failed':
      throw outcome.error;
  }
}

/**
 * Download `url` to an explicit file path
 */
export function downloadFile(url: string, destination: string, options: HelperOptions = {}): Promise<string> {
  return run(url, options, { destination });
}

/**
 * Download `url` into `directory`, naming the file after what the server declares
 */
export function downloadFileSmart(url: string, directory: string, options: HelperOptions = {}): Promise<string> {
  return run(url, options, { directory });
}

/**
 * Filename declared by the Content-Disposition header. Throws
 * ResolutionError when the server declares none.
 */
export async function getUrlFilename(url: string, transport: HttpTransport = new NodeFetchTransport()): Promise<string> {
  const resource = await RemoteResource.probe(url, transport);
  if (!resource.declaredFilename) {
    throw new ResolutionError(`Missing 'Content-Disposition' filename in '${url}' response`);
  }
  return resource.declaredFilename;
}

/**
 * Content-Type of the resource, e.g. `image/svg+xml` or `text/html; charset=utf-8`
 */
export async function getUrlContentType(
  url: string,
  transport: HttpTransport = new NodeFetchTransport(),
): Promise<string | null> {
  const resource = await RemoteResource.probe(url, transport);
  return resource.contentType ?? null;
}

/**
 * The filename a download of `url` would be saved under
 */
export async function guessUrlFilename(url: string, transport: HttpTransport = new NodeFetchTransport()): Promise<string> {
  const resource = await RemoteResource.probe(url, transport);
  return resolveFilename(resource);
}

/**
 * Delete every cached download
 */
export async function clearDownloadCache(cache?: DownloadCache): Promise<void> {
  const target = cache ?? new DownloadCache(loadConfig().cacheDirectory);
  await target.clear();
}
