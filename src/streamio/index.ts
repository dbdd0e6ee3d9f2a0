import type { BufferedReadStream, ReadUntilOptions } from "../stream/readStream.js";
import { isReadStreamError } from "../utils/errors.js";

const te = new TextEncoder();
const td = new TextDecoder();

const LINE_DELIMITERS: readonly Uint8Array[] = [te.encode("\r\n"), te.encode("\n")];
const NO_DELIMITERS: readonly Uint8Array[] = [];

export type Delimiter = Uint8Array | string;

export type ReadBytesUntilResult = Readonly<{
  data: Uint8Array;
  // delimiterIndex is the index of the delimiter that matched, or -1 when reading to the end.
  delimiterIndex: number;
}>;

function encodeDelimiters(delimiters: readonly Delimiter[]): Uint8Array[] {
  return delimiters.map((d) => (typeof d === "string" ? te.encode(d) : d));
}

// readBytes reads exactly n bytes into a buffer owned by the caller.
export function readBytes(stream: BufferedReadStream, n: number): Uint8Array {
  return stream.readExact(n, (view) => view.slice());
}

// readBytesUntil reads up to the first of the given delimiters (strings are UTF-8 encoded) and
// returns an owned copy of the data.
export function readBytesUntil(
  stream: BufferedReadStream,
  delimiters: readonly Delimiter[],
  opts: ReadUntilOptions = {}
): ReadBytesUntilResult {
  return stream.readUntil(encodeDelimiters(delimiters), opts, (view, delimiter) => ({
    data: view.slice(),
    delimiterIndex: delimiter?.index ?? -1
  }));
}

// readToEnd drains the stream until the source reports end of data or the read budget is used up.
export function readToEnd(stream: BufferedReadStream): Uint8Array {
  return stream.readUntil(NO_DELIMITERS, {}, (view) => view.slice());
}

// readLine returns the next line without its "\n" or "\r\n" terminator, the trailing unterminated
// line, or null when nothing is left.
export function readLine(stream: BufferedReadStream): string | null {
  try {
    return stream.readUntil(LINE_DELIMITERS, {}, (view) => td.decode(view));
  } catch (e) {
    if (!isReadStreamError(e, "delimiters_not_found")) throw e;
  }
  // The failed scan left every byte it pulled in the buffer.
  return stream.readUntil(NO_DELIMITERS, {}, (view) => (view.length > 0 ? td.decode(view) : null));
}
