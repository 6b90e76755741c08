import { parseContentDisposition } from './FilenameResolver';
import { HttpTransport, RemoteStream, ResourceInfo } from './types';

/**
 * RemoteResource - immutable description of a probed URL, plus the capability
 * to open its byte stream at an offset.
 */
export class RemoteResource {
  readonly url: string;
  readonly totalBytes: number | null;
  readonly declaredFilename?: string;
  readonly contentType?: string;
  readonly acceptsRanges: boolean;
  readonly etag?: string;
  readonly lastModified?: string;
  private readonly transport: HttpTransport;

  constructor(info: ResourceInfo, transport: HttpTransport) {
    this.url = info.url;
    this.totalBytes = info.totalBytes;
    this.declaredFilename = info.contentDisposition
      ? parseContentDisposition(info.contentDisposition).filename
      : undefined;
    this.contentType = info.contentType;
    this.acceptsRanges = info.acceptsRanges;
    this.etag = info.etag;
    this.lastModified = info.lastModified;
    this.transport = transport;
    Object.freeze(this);
  }

  static async probe(url: string, transport: HttpTransport): Promise<RemoteResource> {
    const info = await transport.probe(url);
    return new RemoteResource(info, transport);
  }

  /**
   * Validator usable in If-Range. Weak ETags are not allowed there.
   */
  get validator(): string | undefined {
    if (this.etag && !this.etag.startsWith('W/')) {
      return this.etag;
    }
    return this.lastModified;
  }

  open(offset: number): Promise<RemoteStream> {
    return this.transport.open(this.url, {
      offset,
      validator: offset > 0 ? this.validator : undefined,
    });
  }

  /**
   * Whether a full-body response still describes the probed version
   */
  matches(stream: Pick<RemoteStream, 'etag' | 'lastModified'>): boolean {
    if (this.etag && stream.etag) {
      return this.etag === stream.etag;
    }
    if (this.lastModified && stream.lastModified) {
      return this.lastModified === stream.lastModified;
    }
    return true;
  }
}
