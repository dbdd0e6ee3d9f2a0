import type { BufferedReadStream } from "../stream/readStream.js";
import { readU32be, u32be } from "../utils/bin.js";

export const DEFAULT_MAX_JSON_FRAME_BYTES = 1 << 20;

const te = new TextEncoder();
const td = new TextDecoder();

// JsonFramingError marks malformed or oversized frames.
export class JsonFramingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonFramingError";
  }
}

// encodeJsonFrame encodes a JSON payload with a 4-byte big-endian length prefix.
export function encodeJsonFrame(v: unknown): Uint8Array {
  const json = te.encode(JSON.stringify(v));
  const out = new Uint8Array(4 + json.length);
  out.set(u32be(json.length), 0);
  out.set(json, 4);
  return out;
}

// readJsonFrame reads and parses a length-prefixed JSON payload.
// maxBytes <= 0 leaves the frame size to the stream's readSizeLimit; a stream without one still
// refuses frames over DEFAULT_MAX_JSON_FRAME_BYTES.
export function readJsonFrame(stream: BufferedReadStream, maxBytes: number = DEFAULT_MAX_JSON_FRAME_BYTES): unknown {
  const n = stream.readExact(4, (hdr) => readU32be(hdr, 0));
  const cap = maxBytes > 0 ? maxBytes : stream.readSizeLimit === undefined ? DEFAULT_MAX_JSON_FRAME_BYTES : 0;
  if (cap > 0 && n > cap) throw new JsonFramingError("frame too large");
  const text = stream.readExact(n, (payload) => td.decode(payload));
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new JsonFramingError(`bad frame payload: ${e instanceof Error ? e.message : String(e)}`);
  }
}
