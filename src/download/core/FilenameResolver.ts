/**
 * FilenameResolver - derives a filesystem-safe target filename for a remote resource
 *
 * Candidates, in priority order: explicit caller name, Content-Disposition
 * filename, last URL path segment, generated fallback. A candidate that
 * sanitizes to an empty string falls through to the next one.
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../utils/logger';
import { ResolutionError } from './errors';
import type { RemoteResource } from './RemoteResource';

/** Most filesystems cap a name at 255 bytes */
export const MAX_FILENAME_BYTES = 255;

// Extensions longer than this are treated as part of the name when truncating
const MAX_EXTENSION_BYTES = 32;

const WINDOWS_RESERVED = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;

const GUESSABLE_MEDIA_TYPES = new Set(['image', 'video', 'audio', 'text']);

export type FilenameSource = 'explicit' | 'declared' | 'url' | 'fallback';

export interface ContentDisposition {
  type: string;
  filename?: string;
  parameters: Record<string, string>;
}

type ResolvableResource = Pick<RemoteResource, 'url' | 'declaredFilename' | 'contentType'>;

/**
 * Parse a Content-Disposition header value. Never throws: malformed
 * parameters are skipped or taken as-is.
 */
export function parseContentDisposition(header: string): ContentDisposition {
  const separator = header.indexOf(';');
  const type = (separator === -1 ? header : header.slice(0, separator)).trim().toLowerCase();
  const parameters: Record<string, string> = {};

  if (separator !== -1) {
    const paramPattern = /;\s*([^=;\s]+)\s*=\s*("(?:[^"\\]|\\.)*"|[^;]*)/g;
    const rest = header.slice(separator);
    let match: RegExpExecArray | null;
    while ((match = paramPattern.exec(rest)) !== null) {
      const key = match[1].toLowerCase();
      if (!(key in parameters)) {
        parameters[key] = unquote(match[2].trim());
      }
    }
  }

  // filename* (RFC 5987) wins over the plain form
  let filename: string | undefined;
  if (parameters['filename*']) {
    filename = decodeExtendedValue(parameters['filename*']);
  }
  if (!filename && parameters.filename) {
    filename = parameters.filename;
  }

  return { type, filename, parameters };
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  // Unterminated quote
  if (value.startsWith('"')) {
    return value.slice(1);
  }
  return value;
}

/**
 * Decode `charset'language'percent-encoded` values
 */
function decodeExtendedValue(value: string): string {
  const match = /^([^']*)'[^']*'(.*)$/.exec(value);
  if (!match) {
    return safeDecodeURIComponent(value);
  }
  const charset = match[1].toLowerCase();
  const encoded = match[2];

  if (charset === 'iso-8859-1' || charset === 'latin1') {
    const bytes: number[] = [];
    for (let i = 0; i < encoded.length; i++) {
      const hex = encoded.slice(i + 1, i + 3);
      if (encoded[i] === '%' && /^[0-9a-f]{2}$/i.test(hex)) {
        bytes.push(parseInt(hex, 16));
        i += 2;
      } else {
        bytes.push(encoded.charCodeAt(i) & 0xff);
      }
    }
    return Buffer.from(bytes).toString('latin1');
  }

  return safeDecodeURIComponent(encoded);
}

function safeDecodeURIComponent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed escapes are kept verbatim
    return value;
  }
}

/**
 * Make a candidate safe to use as a single path component. Returns an empty
 * string when nothing usable is left.
 */
export function sanitizeFilename(candidate: string): string {
  // Keep only the last non-empty path component
  const components = candidate.split(/[/\\]+/).filter((part) => part.length > 0);
  let name = components.length > 0 ? components[components.length - 1] : '';

  name = name
    // Null bytes and control characters
    .replace(/[\x00-\x1f\x7f]/g, '')
    // Reserved characters on common filesystems
    .replace(/[<>:"|?*]/g, '_')
    .replace(/_+/g, '_')
    // Leading/trailing dots and whitespace
    .replace(/^[\s.]+|[\s.]+$/g, '');

  if (!name) {
    return '';
  }

  if (WINDOWS_RESERVED.test(name)) {
    name = `_${name}`;
  }

  return truncateFilename(name, MAX_FILENAME_BYTES);
}

/**
 * Bound a name to `maxBytes` UTF-8 bytes, keeping its extension when short enough
 */
export function truncateFilename(name: string, maxBytes: number): string {
  if (Buffer.byteLength(name, 'utf8') <= maxBytes) {
    return name;
  }

  let extension = path.extname(name);
  if (Buffer.byteLength(extension, 'utf8') > MAX_EXTENSION_BYTES) {
    extension = '';
  }
  const budget = maxBytes - Buffer.byteLength(extension, 'utf8');
  const base = name.slice(0, name.length - extension.length);

  // Cut on code point boundaries
  let truncated = '';
  let used = 0;
  for (const char of base) {
    const size = Buffer.byteLength(char, 'utf8');
    if (used + size > budget) {
      break;
    }
    truncated += char;
    used += size;
  }

  return `${truncated.replace(/[\s.]+$/, '')}${extension}`;
}

/**
 * Last segment of the URL path, percent-decoded, without query or fragment
 */
export function filenameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // Not absolute: strip query and fragment by hand
    pathname = url.split(/[?#]/)[0];
  }
  const segments = pathname.split('/');
  return safeDecodeURIComponent(segments[segments.length - 1]);
}

/**
 * Extension implied by an image/video/audio/text content type, e.g.
 * `image/svg+xml` gives `.svg`. Empty for anything else.
 */
export function extensionFromContentType(contentType?: string): string {
  if (!contentType) {
    return '';
  }
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  const [type, subtype] = mediaType.split('/');
  if (!subtype || !GUESSABLE_MEDIA_TYPES.has(type)) {
    return '';
  }
  const extension = subtype.split('+')[0].replace(/[^a-z0-9.-]/g, '');
  return extension ? `.${extension}` : '';
}

export function generateFallbackFilename(): string {
  return `download-${uuidv4().slice(0, 8)}`;
}

/**
 * Pick and sanitize the target filename for a resource
 */
export function resolveFilename(resource: ResolvableResource, explicitName?: string): string {
  const candidates: Array<[FilenameSource, string | undefined]> = [
    ['explicit', explicitName],
    ['declared', resource.declaredFilename],
    ['url', filenameFromUrl(resource.url)],
  ];

  for (const [source, candidate] of candidates) {
    if (!candidate) {
      continue;
    }
    let filename = sanitizeFilename(candidate);
    if (!filename) {
      logger.debug('Filename candidate discarded after sanitization', { source, candidate });
      continue;
    }
    if (source === 'url' && !path.extname(filename)) {
      filename = truncateFilename(
        filename + extensionFromContentType(resource.contentType),
        MAX_FILENAME_BYTES,
      );
    }
    logger.debug('Filename resolved', { url: resource.url, source, filename });
    return filename;
  }

  const fallback = sanitizeFilename(
    generateFallbackFilename() + extensionFromContentType(resource.contentType),
  );
  if (!fallback) {
    throw new ResolutionError(`Could not derive a safe filename for ${resource.url}`);
  }
  logger.debug('Filename resolved', { url: resource.url, source: 'fallback', filename: fallback });
  return fallback;
}
