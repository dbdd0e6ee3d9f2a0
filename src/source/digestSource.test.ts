import { sha256 } from "@noble/hashes/sha256";
import { describe, expect, test } from "vitest";

import { BufferedReadStream } from "../stream/readStream.js";
import { DigestByteSource } from "./digestSource.js";
import { MemoryByteSource } from "./memorySource.js";

const te = new TextEncoder();

describe("DigestByteSource", () => {
  test("hashes every byte it passes through", () => {
    const data = te.encode("hello, digest");
    const src = new DigestByteSource(new MemoryByteSource(data, { chunkSize: 3 }));
    const target = new Uint8Array(16);
    let total = 0;
    for (;;) {
      const n = src.fill(target, 16);
      if (n === 0) break;
      total += n;
    }
    expect(total).toBe(data.length);
    expect(src.bytesHashed).toBe(data.length);
    expect(src.digest()).toEqual(sha256(data));
  });

  test("digest can be taken repeatedly while reading", () => {
    const src = new DigestByteSource(new MemoryByteSource(te.encode("abcdef"), { chunkSize: 3 }));
    const stream = new BufferedReadStream(src, { bufferSize: 3 });
    stream.readExact(3, () => undefined);
    expect(src.digest()).toEqual(sha256(te.encode("abc")));
    stream.readExact(3, () => undefined);
    expect(src.digest()).toEqual(sha256(te.encode("abcdef")));
  });
});
