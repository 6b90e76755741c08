/**
 * Stream shaping helpers for the streaming loop
 */

/**
 * Regroup an arbitrary byte stream into chunks of exactly `chunkSize` bytes;
 * only the last chunk may be shorter. When the source fails, the bytes
 * already received are yielded as a short chunk before the error is rethrown,
 * so a resume starts exactly where the source stopped.
 */
export async function* rechunk(
  source: AsyncIterable<Uint8Array>,
  chunkSize: number,
): AsyncGenerator<Uint8Array> {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const parts: Uint8Array[] = [];
  let size = 0;

  const flush = (): Buffer => {
    const chunk = Buffer.concat(parts);
    parts.length = 0;
    size = 0;
    return chunk;
  };

  try {
    for await (const piece of source) {
      let data = piece;
      while (data.byteLength > 0) {
        const missing = chunkSize - size;
        if (data.byteLength < missing) {
          parts.push(data);
          size += data.byteLength;
          break;
        }
        parts.push(data.subarray(0, missing));
        yield flush();
        data = data.subarray(missing);
      }
    }
  } catch (error) {
    if (size > 0) {
      yield flush();
    }
    throw error;
  }

  if (size > 0) {
    yield flush();
  }
}

/**
 * Drop the first `count` bytes of a stream
 */
export async function* skipBytes(
  source: AsyncIterable<Uint8Array>,
  count: number,
): AsyncGenerator<Uint8Array> {
  let remaining = count;
  for await (const piece of source) {
    if (remaining >= piece.byteLength) {
      remaining -= piece.byteLength;
      continue;
    }
    yield remaining > 0 ? piece.subarray(remaining) : piece;
    remaining = 0;
  }
}
