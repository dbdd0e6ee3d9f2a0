// u32be encodes a number into 4 bytes big-endian.
export function u32be(n: number): Uint8Array {
  const b = new Uint8Array(4);
  const v = n >>> 0;
  b[0] = (v >>> 24) & 0xff;
  b[1] = (v >>> 16) & 0xff;
  b[2] = (v >>> 8) & 0xff;
  b[3] = v & 0xff;
  return b;
}

// readU32be reads a 4-byte big-endian number.
export function readU32be(buf: Uint8Array, off: number): number {
  if (off < 0 || off + 4 > buf.length) throw new Error("u32 out of range");
  return ((buf[off]! << 24) | (buf[off + 1]! << 16) | (buf[off + 2]! << 8) | buf[off + 3]!) >>> 0;
}

// concatBytes concatenates buffers into a single Uint8Array.
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const c of chunks) total += c.length;
  const out = new Uint8Array(total);
  let off = 0;
  for (const c of chunks) {
    out.set(c, off);
    off += c.length;
  }
  return out;
}

export type PrefixMatch = "full" | "partial" | "none";

// matchAt compares needle against haystack starting at off.
// "partial" means haystack ends before the needle does and every available byte agrees.
export function matchAt(haystack: Uint8Array, off: number, needle: Uint8Array): PrefixMatch {
  const avail = Math.min(needle.length, haystack.length - off);
  for (let i = 0; i < avail; i++) {
    if (haystack[off + i] !== needle[i]) return "none";
  }
  return avail === needle.length ? "full" : "partial";
}
