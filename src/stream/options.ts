import { normalizeObserver } from "../observability/observer.js";
import type { ReadStreamObserver, ReadStreamObserverLike } from "../observability/observer.js";
import { ReadStreamError } from "../utils/errors.js";
import { DEFAULT_BUFFER_SIZE, DEFAULT_BUFFER_SIZE_INCREMENT } from "./constants.js";

export type ReadStreamOptions = Readonly<{
  /** Preferred buffer size. Larger exact reads allocate temporarily; smaller ones shrink back to this. */
  bufferSize?: number;
  /** Bytes added to a full buffer while scanning for delimiters. */
  bufferSizeIncrement?: number;
  /** Maximum number of bytes ever pulled from the source. Unlimited when omitted. */
  readSizeLimit?: number;
  observer?: ReadStreamObserverLike;
}>;

export type NormalizedReadStreamOptions = Readonly<{
  bufferSize: number;
  bufferSizeIncrement: number;
  readSizeLimit: number | undefined;
  observer: ReadStreamObserver;
}>;

function invalidOption(name: string, v: unknown): ReadStreamError {
  return new ReadStreamError({ code: "invalid_option", message: `invalid ${name}: ${String(v)}` });
}

function positiveInt(name: string, v: number | undefined, dflt: number): number {
  if (v === undefined) return dflt;
  if (!Number.isSafeInteger(v) || v <= 0) throw invalidOption(name, v);
  return v;
}

// checkReadSizeLimit validates a read budget; undefined means unlimited.
export function checkReadSizeLimit(v: number | undefined): number | undefined {
  if (v === undefined) return undefined;
  if (!Number.isSafeInteger(v) || v < 0) throw invalidOption("readSizeLimit", v);
  return v;
}

export function normalizeReadStreamOptions(opts: ReadStreamOptions = {}): NormalizedReadStreamOptions {
  return {
    bufferSize: positiveInt("bufferSize", opts.bufferSize, DEFAULT_BUFFER_SIZE),
    bufferSizeIncrement: positiveInt("bufferSizeIncrement", opts.bufferSizeIncrement, DEFAULT_BUFFER_SIZE_INCREMENT),
    readSizeLimit: checkReadSizeLimit(opts.readSizeLimit),
    observer: normalizeObserver(opts.observer)
  };
}
