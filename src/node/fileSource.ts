import { closeSync, openSync, readSync } from "node:fs";

import type { ByteSource } from "../source/byteSource.js";

// FileByteSource reads sequentially from a file descriptor with blocking reads.
export class FileByteSource implements ByteSource {
  private closed = false;

  constructor(readonly fd: number, private readonly ownsFd = false) {}

  // open opens path for reading; the returned source closes the descriptor on close().
  static open(path: string): FileByteSource {
    return new FileByteSource(openSync(path, "r"), true);
  }

  fill(target: Uint8Array, maxLength: number): number {
    if (this.closed) throw new Error("file source closed");
    const n = Math.min(maxLength, target.length);
    if (n <= 0) return 0;
    return readSync(this.fd, target, 0, n, null);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsFd) closeSync(this.fd);
  }
}
