export const DEFAULT_READ_CHUNK_SIZE = 4 * 1024 * 1024;

/**
 * Re-slice a byte stream into buffers of exactly `chunkSize` bytes (the last one
 * may be shorter). At most one chunk is held in memory at a time.
 */
export async function* readInChunks(
  source: AsyncIterable<Uint8Array>,
  chunkSize = DEFAULT_READ_CHUNK_SIZE,
): AsyncGenerator<Buffer> {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${String(chunkSize)}`);
  }

  let pending: Buffer[] = [];
  let pendingBytes = 0;

  for await (const piece of source) {
    const buffer = Buffer.from(piece.buffer, piece.byteOffset, piece.byteLength);
    let offset = 0;

    while (offset < buffer.length) {
      const take = Math.min(chunkSize - pendingBytes, buffer.length - offset);
      pending.push(buffer.subarray(offset, offset + take));
      pendingBytes += take;
      offset += take;

      if (pendingBytes === chunkSize) {
        yield Buffer.concat(pending, pendingBytes);
        pending = [];
        pendingBytes = 0;
      }
    }
  }

  if (pendingBytes > 0) {
    yield Buffer.concat(pending, pendingBytes);
  }
}
