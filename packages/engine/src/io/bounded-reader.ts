import { concat } from "../utils/buffer.js";
import type { ByteReader } from "./socket-reader.js";

/**
 * Delivers at most `remaining` bytes from the source, then reports end of
 * stream. Each read is truncated to the budget before it reaches the source,
 * so the source is never advanced past the boundary.
 */
export class BoundedReader implements ByteReader {
  constructor(
    private readonly source: ByteReader,
    private remaining: number,
  ) {}

  get remainingBytes(): number {
    return Math.max(0, this.remaining);
  }

  async read(maxBytes: number): Promise<Uint8Array | null> {
    if (this.remaining <= 0) {
      return null;
    }

    const chunk = await this.source.read(Math.min(maxBytes, this.remaining));
    if (chunk) {
      this.remaining -= chunk.length;
    }
    return chunk;
  }
}

const READ_ALL_CHUNK_SIZE = 64 * 1024;

/** Read until the reader reports end of stream. */
export async function readAll(reader: ByteReader): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  while (true) {
    const chunk = await reader.read(READ_ALL_CHUNK_SIZE);
    if (chunk === null) break;
    chunks.push(chunk);
  }
  return concat(chunks);
}
