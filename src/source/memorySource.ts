import type { ByteSource } from "./byteSource.js";

export type MemoryByteSourceOptions = Readonly<{
  // chunkSize caps how many bytes a single fill hands out (default: unlimited).
  chunkSize?: number;
}>;

// MemoryByteSource serves an in-memory byte array, optionally in fixed-size chunks.
export class MemoryByteSource implements ByteSource {
  private off = 0;
  private readonly chunkSize: number;

  fillCalls = 0;

  constructor(private readonly data: Uint8Array, opts: MemoryByteSourceOptions = {}) {
    const chunkSize = opts.chunkSize ?? Number.MAX_SAFE_INTEGER;
    if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) throw new Error("invalid chunkSize");
    this.chunkSize = chunkSize;
  }

  get remaining(): number {
    return this.data.length - this.off;
  }

  fill(target: Uint8Array, maxLength: number): number {
    this.fillCalls++;
    const n = Math.min(maxLength, target.length, this.chunkSize, this.remaining);
    if (n <= 0) return 0;
    target.set(this.data.subarray(this.off, this.off + n), 0);
    this.off += n;
    return n;
  }
}

// ChunkedByteSource replays a scripted sequence of chunks, one chunk per fill.
// A chunk larger than the requested length is served over several fills.
export class ChunkedByteSource implements ByteSource {
  private readonly chunks: Uint8Array[];
  private headOff = 0;

  constructor(chunks: readonly Uint8Array[]) {
    this.chunks = chunks.filter((c) => c.length > 0);
  }

  fill(target: Uint8Array, maxLength: number): number {
    const head = this.chunks[0];
    if (head === undefined) return 0;
    const n = Math.min(maxLength, target.length, head.length - this.headOff);
    if (n <= 0) return 0;
    target.set(head.subarray(this.headOff, this.headOff + n), 0);
    this.headOff += n;
    if (this.headOff === head.length) {
      this.chunks.shift();
      this.headOff = 0;
    }
    return n;
  }
}
