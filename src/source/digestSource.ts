import { sha256 } from "@noble/hashes/sha256";

import { normalizeSource } from "./byteSource.js";
import type { ByteSource, FillFn } from "./byteSource.js";

// DigestByteSource forwards fills to an inner source and hashes every byte it hands out.
// The digest covers bytes pulled from the source, which may run ahead of what a reader consumed.
export class DigestByteSource implements ByteSource {
  private readonly inner: FillFn;
  private readonly hash = sha256.create();
  private count = 0;

  constructor(inner: FillFn | ByteSource) {
    this.inner = normalizeSource(inner);
  }

  get bytesHashed(): number {
    return this.count;
  }

  fill(target: Uint8Array, maxLength: number): number {
    const n = this.inner(target, maxLength);
    if (n > 0) {
      this.hash.update(target.subarray(0, n));
      this.count += n;
    }
    return n;
  }

  // digest returns the SHA-256 of everything pulled so far without finalizing the running hash.
  digest(): Uint8Array {
    return this.hash.clone().digest();
  }
}
