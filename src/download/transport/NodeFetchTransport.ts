/**
 * NodeFetchTransport - HttpTransport built on node-fetch
 *
 * Maps every client failure onto the engine's taxonomy: probe failures are
 * UnreachableError, failures while streaming are TransientNetworkError unless
 * the server answered with a definitive 4xx.
 */

import { Readable } from 'stream';
import fetch, { FetchError, Headers, Response } from 'node-fetch';
import { logger } from '../../utils/logger';
import {
  DownloadError,
  errorMessage,
  IncompleteTransferError,
  isErrnoException,
  TransientNetworkError,
  UnreachableError,
} from '../core/errors';
import { HttpTransport, OpenStreamOptions, RemoteStream, ResourceInfo } from '../core/types';

export interface NodeFetchTransportOptions {
  userAgent?: string;
  /** Time allowed until response headers arrive, in ms */
  connectTimeout?: number;
  /** Longest silence allowed between two body reads, in ms; defaults to connectTimeout */
  readTimeout?: number;
  headers?: Record<string, string>;
}

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ERR_STREAM_PREMATURE_CLOSE',
]);

type RequestStage = 'probe' | 'open' | 'body';

function errorCode(error: unknown): string | undefined {
  if (isErrnoException(error) && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

/**
 * Close a response body that will not be read, releasing its socket.
 * Responses built without a body have none to close.
 */
function discardBody(body: NodeJS.ReadableStream | null, error?: Error): void {
  if (body instanceof Readable) {
    body.destroy(error);
  } else if (body && error) {
    body.emit('error', error);
  }
}

/**
 * Translate a client error into the engine taxonomy
 */
export function classifyNetworkError(url: string, error: unknown, stage: RequestStage): DownloadError {
  if (error instanceof DownloadError) {
    return error;
  }
  const message = errorMessage(error);

  if (stage === 'probe') {
    return new UnreachableError(url, `Cannot reach ${url}: ${message}`, { cause: error });
  }

  const isTimeout = isAbortError(error);
  const code = errorCode(error);
  const transient =
    stage === 'body' ||
    isTimeout ||
    (code !== undefined && TRANSIENT_CODES.has(code)) ||
    (error instanceof FetchError && error.type !== 'max-redirect');

  if (transient) {
    return new TransientNetworkError(`Connection to ${url} failed: ${message}`, { cause: error });
  }
  return new UnreachableError(url, `Cannot reach ${url}: ${message}`, { cause: error });
}

function statusError(url: string, response: Response): DownloadError {
  const message = `HTTP ${response.status} ${response.statusText} from ${url}`;
  if (TRANSIENT_STATUSES.has(response.status)) {
    return new TransientNetworkError(message);
  }
  return new UnreachableError(url, message, { status: response.status });
}

function parseLength(value: string | null): number | null {
  if (value === null || !/^\d+$/.test(value.trim())) {
    return null;
  }
  return parseInt(value, 10);
}

/**
 * `bytes start-end/total`; total may be `*`
 */
export function parseContentRange(value: string | null): { start: number; total: number | null } | null {
  if (!value) {
    return null;
  }
  const match = /^\s*bytes\s+(\d+)-(\d+)\/(\d+|\*)\s*$/i.exec(value);
  if (!match) {
    return null;
  }
  return {
    start: parseInt(match[1], 10),
    total: match[3] === '*' ? null : parseInt(match[3], 10),
  };
}

function optionalHeader(headers: Headers, name: string): string | undefined {
  return headers.get(name) ?? undefined;
}

export class NodeFetchTransport implements HttpTransport {
  private readonly userAgent: string;
  private readonly connectTimeout: number;
  private readonly readTimeout: number;
  private readonly extraHeaders: Record<string, string>;

  constructor(options: NodeFetchTransportOptions = {}) {
    // Some hosts refuse clients without a browser-like agent
    this.userAgent = options.userAgent ?? 'Mozilla/5.0';
    this.connectTimeout = options.connectTimeout ?? 30000;
    this.readTimeout = options.readTimeout ?? this.connectTimeout;
    this.extraHeaders = options.headers ?? {};
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    return { 'User-Agent': this.userAgent, ...this.extraHeaders, ...extra };
  }

  /**
   * Issue a request whose connect phase is bounded by `connectTimeout`.
   * The body is bounded per read by `readTimeout` in `readBody`.
   */
  private async request(
    url: string,
    method: 'HEAD' | 'GET',
    headers: Record<string, string>,
  ): Promise<{ response: Response; controller: AbortController }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.connectTimeout);
    try {
      const response = await fetch(url, {
        method,
        headers: this.headers(headers),
        redirect: 'follow',
        signal: controller.signal,
      });
      return { response, controller };
    } finally {
      clearTimeout(timeout);
    }
  }

  async probe(url: string): Promise<ResourceInfo> {
    try {
      let { response } = await this.request(url, 'HEAD', {});

      if (response.status === 405 || response.status === 501) {
        logger.debug('HEAD refused, probing with a ranged GET', { url, status: response.status });
        const probe = await this.request(url, 'GET', { Range: 'bytes=0-0' });
        response = probe.response;
        // Only the headers are needed
        response.body.on('error', (error: Error) => {
          logger.debug('Probe body closed', { url, error: error.message });
        });
        probe.controller.abort();
      }

      if (!response.ok) {
        discardBody(response.body);
        throw new UnreachableError(url, `HTTP ${response.status} ${response.statusText} from ${url}`, {
          status: response.status,
        });
      }

      const range = response.status === 206 ? parseContentRange(response.headers.get('content-range')) : null;
      const acceptRanges = (response.headers.get('accept-ranges') ?? '').toLowerCase();

      return {
        url: response.url || url,
        totalBytes: range ? range.total : parseLength(response.headers.get('content-length')),
        contentDisposition: optionalHeader(response.headers, 'content-disposition'),
        contentType: optionalHeader(response.headers, 'content-type'),
        acceptsRanges: range !== null || acceptRanges.split(',').map((v) => v.trim()).includes('bytes'),
        etag: optionalHeader(response.headers, 'etag'),
        lastModified: optionalHeader(response.headers, 'last-modified'),
      };
    } catch (error) {
      throw classifyNetworkError(url, error, 'probe');
    }
  }

  async open(url: string, options: OpenStreamOptions): Promise<RemoteStream> {
    const extra: Record<string, string> = {};
    if (options.offset > 0) {
      extra.Range = `bytes=${options.offset}-`;
      if (options.validator) {
        extra['If-Range'] = options.validator;
      }
    }

    let response: Response;
    try {
      ({ response } = await this.request(url, 'GET', extra));
    } catch (error) {
      throw classifyNetworkError(url, error, 'open');
    }

    if (response.status === 416) {
      discardBody(response.body);
      const range = parseContentRange(response.headers.get('content-range'));
      throw new IncompleteTransferError(
        `Server refused range starting at byte ${options.offset}`,
        range ? range.total : null,
        options.offset,
      );
    }
    if (!response.ok) {
      discardBody(response.body);
      throw statusError(url, response);
    }

    let offset = 0;
    let totalBytes = parseLength(response.headers.get('content-length'));
    if (response.status === 206) {
      const range = parseContentRange(response.headers.get('content-range'));
      if (!range) {
        discardBody(response.body);
        throw new UnreachableError(url, `Unparseable Content-Range from ${url}`, { status: 206 });
      }
      offset = range.start;
      totalBytes = range.total;
    }

    return {
      status: response.status,
      offset,
      totalBytes,
      etag: optionalHeader(response.headers, 'etag'),
      lastModified: optionalHeader(response.headers, 'last-modified'),
      body: this.readBody(url, response),
    };
  }

  /**
   * Iterate the body. The idle timer only runs while waiting on the socket,
   * not while the consumer holds a chunk.
   */
  private async *readBody(url: string, response: Response): AsyncGenerator<Uint8Array> {
    const body = response.body;
    let timer: NodeJS.Timeout | undefined;
    const arm = (): void => {
      timer = setTimeout(() => {
        discardBody(body, new TransientNetworkError(`No data from ${url} for ${this.readTimeout}ms`));
      }, this.readTimeout);
    };

    arm();
    try {
      for await (const chunk of body) {
        clearTimeout(timer);
        yield typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
        arm();
      }
    } catch (error) {
      throw classifyNetworkError(url, error, 'body');
    } finally {
      clearTimeout(timer);
    }
  }
}
