import type { ReadStreamObserver } from "../observability/observer.js";
import { normalizeSource } from "../source/byteSource.js";
import type { ByteSource, FillFn } from "../source/byteSource.js";
import { isReadStreamError, ReadStreamError } from "../utils/errors.js";
import type { ReadStreamErrorCode } from "../utils/errors.js";
import { DelimiterScanner } from "./delimiterScanner.js";
import type { DelimiterMatch, MatchingMode } from "./delimiterScanner.js";
import { GrowableBuffer } from "./growableBuffer.js";
import { checkReadSizeLimit, normalizeReadStreamOptions } from "./options.js";
import type { ReadStreamOptions } from "./options.js";
import { allowedReadSize, exceedsReadBudget } from "./readBudget.js";

export type ReadUntilOptions = Readonly<{
  /** How delimiters starting at the same offset are ranked (default "earliest"). */
  mode?: MatchingMode;
  /** Whether the view passed to the handler ends with the delimiter (default false). */
  includeDelimiter?: boolean;
}>;

// MatchedDelimiter identifies the delimiter that ended a readUntil.
// bytes is a view into the stream buffer with the same lifetime as the data view.
export type MatchedDelimiter = Readonly<{
  index: number;
  bytes: Uint8Array;
}>;

export type ReadExactHandler<T> = (view: Uint8Array) => T;
export type ReadUntilHandler<T> = (view: Uint8Array, delimiter: MatchedDelimiter | null) => T;

type UntilResult = Readonly<{ view: Uint8Array; delimiter: MatchedDelimiter | null }>;

/**
 * BufferedReadStream reads exact sizes or delimited spans from a synchronous byte source.
 *
 * Views passed to handlers point into the stream's internal buffer. They are only valid while the
 * handler runs; copy them (`view.slice()`) to keep the bytes. Handlers must not call back into
 * the same stream.
 *
 * The delimiter is always consumed by {@link readUntil}; `includeDelimiter` only controls whether
 * it shows up at the end of the view.
 */
export class BufferedReadStream {
  private readonly fill: FillFn;
  private readonly buffer: GrowableBuffer;
  private readonly observer: ReadStreamObserver;

  private position = 0;
  private totalRead = 0;
  private limit: number | undefined;
  private busy = false;

  constructor(source: FillFn | ByteSource, opts: ReadStreamOptions = {}) {
    const o = normalizeReadStreamOptions(opts);
    this.fill = normalizeSource(source);
    this.observer = o.observer;
    this.buffer = new GrowableBuffer(o.bufferSize, o.bufferSizeIncrement, o.observer);
    this.limit = o.readSizeLimit;
  }

  /** Number of bytes handed out to callers so far. */
  get currentReadPosition(): number {
    return this.position;
  }

  /** Number of bytes pulled from the source so far (may run ahead of currentReadPosition). */
  get totalReadBytesCount(): number {
    return this.totalRead;
  }

  get bufferCapacity(): number {
    return this.buffer.capacity;
  }

  /** Bytes pulled from the source but not consumed yet. */
  get bufferedByteCount(): number {
    return this.buffer.windowLength;
  }

  get readSizeLimit(): number | undefined {
    return this.limit;
  }

  set readSizeLimit(v: number | undefined) {
    this.limit = checkReadSizeLimit(v);
  }

  readExact<T>(size: number, handler: ReadExactHandler<T>): T {
    this.enter();
    try {
      const view = this.report(() => this.takeExact(size));
      return handler(view);
    } finally {
      this.busy = false;
    }
  }

  readUntil<T>(delimiters: readonly Uint8Array[], opts: ReadUntilOptions, handler: ReadUntilHandler<T>): T {
    this.enter();
    try {
      const r = this.report(() => this.takeUntil(delimiters, opts));
      return handler(r.view, r.delimiter);
    } finally {
      this.busy = false;
    }
  }

  private takeExact(size: number): Uint8Array {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new ReadStreamError({ code: "invalid_input", message: `invalid read size: ${String(size)}` });
    }
    const missing = size - this.buffer.windowLength;
    // The budget is checked before sizing the buffer so a refused read leaves it untouched.
    if (missing > 0 && exceedsReadBudget(this.totalRead, this.limit, missing)) {
      throw new ReadStreamError({
        code: "read_size_limit_reached",
        message: `need ${missing} more bytes, ${String(this.limit)} allowed and ${this.totalRead} already read`
      });
    }
    this.buffer.reserve(size);
    if (missing > 0) {
      while (this.buffer.windowLength < size) {
        if (this.pull() === 0) {
          throw new ReadStreamError({ code: "no_more_data", message: `wanted ${size} bytes, got ${this.buffer.windowLength}` });
        }
      }
    }
    const view = this.buffer.consume(size);
    this.position += size;
    return view;
  }

  private takeUntil(delimiters: readonly Uint8Array[], opts: ReadUntilOptions): UntilResult {
    const scanner = new DelimiterScanner(delimiters, opts.mode ?? "earliest");
    const includeDelimiter = opts.includeDelimiter ?? false;

    for (;;) {
      const m = scanner.scan(this.buffer.window());
      if (m !== undefined) return this.takeMatch(m, includeDelimiter);
      if (allowedReadSize(this.totalRead, this.limit, 1) === 0) break;
      this.buffer.makeRoom();
      if (this.pull() === 0) break;
    }

    const m = scanner.best();
    if (m !== undefined) return this.takeMatch(m, includeDelimiter);
    if (delimiters.length > 0) {
      throw new ReadStreamError({ code: "delimiters_not_found", message: `${this.buffer.windowLength} bytes left` });
    }

    const rest = this.buffer.windowLength;
    const view = this.buffer.consume(rest);
    this.position += rest;
    return { view, delimiter: null };
  }

  private takeMatch(m: DelimiterMatch, includeDelimiter: boolean): UntilResult {
    const consumed = m.offset + m.length;
    const all = this.buffer.consume(consumed);
    this.position += consumed;
    return {
      view: includeDelimiter ? all : all.subarray(0, m.offset),
      delimiter: { index: m.index, bytes: all.subarray(m.offset) }
    };
  }

  // pull reads into the free space after the window, within the read budget.
  // Returns 0 at end of data or when the budget is used up.
  private pull(): number {
    const max = allowedReadSize(this.totalRead, this.limit, this.buffer.freeSpace);
    if (max === 0) return 0;
    let n: number;
    try {
      n = this.buffer.fillFrom(this.fill, max);
    } catch (e) {
      if (!isReadStreamError(e)) this.observer.onSourceError(e);
      throw e;
    }
    this.totalRead += n;
    this.observer.onSourceRead(max, n);
    return n;
  }

  private enter(): void {
    if (this.busy) {
      throw this.reportNew("reentrant_call", "stream used from inside a read handler");
    }
    this.busy = true;
  }

  private report<T>(op: () => T): T {
    try {
      return op();
    } catch (e) {
      if (isReadStreamError(e)) this.observer.onReadError(e.code);
      throw e;
    }
  }

  private reportNew(code: ReadStreamErrorCode, message: string): ReadStreamError {
    this.observer.onReadError(code);
    return new ReadStreamError({ code, message });
  }
}
