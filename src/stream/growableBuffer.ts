import type { ReadStreamObserver } from "../observability/observer.js";
import type { FillFn } from "../source/byteSource.js";
import { ReadStreamError } from "../utils/errors.js";

/**
 * GrowableBuffer owns one contiguous byte region and the window of unconsumed bytes inside it.
 *
 * Every copy or reallocation of the region happens in {@link reserve} or {@link makeRoom}; the
 * window only moves forward otherwise. Views handed out by {@link window} and {@link consume}
 * alias the region and are invalidated by the next call that may resize or compact it.
 */
export class GrowableBuffer {
  private region: Uint8Array;
  private start = 0;
  private length = 0;

  constructor(
    readonly defaultCapacity: number,
    readonly growthIncrement: number,
    private readonly observer: ReadStreamObserver
  ) {
    this.region = new Uint8Array(defaultCapacity);
  }

  get capacity(): number {
    return this.region.length;
  }

  get windowStart(): number {
    return this.start;
  }

  get windowLength(): number {
    return this.length;
  }

  // freeSpace is the number of bytes that fit after the window without moving it.
  get freeSpace(): number {
    return this.region.length - (this.start + this.length);
  }

  window(): Uint8Array {
    return this.region.subarray(this.start, this.start + this.length);
  }

  /**
   * reserve makes sure size bytes fit in the region from the window start.
   *
   * - fits as is: nothing moves;
   * - fits in the default capacity: an oversized region shrinks back to it, otherwise the window
   *   is compacted in place;
   * - fits in the current capacity: compact in place;
   * - otherwise: reallocate to exactly size bytes.
   */
  reserve(size: number): void {
    if (size <= this.region.length - this.start) return;

    if (size <= this.defaultCapacity) {
      if (this.region.length !== this.defaultCapacity) {
        this.relocate(this.defaultCapacity);
        this.observer.onBufferResize("shrink", this.region.length);
      } else {
        this.compact();
      }
      return;
    }

    if (size <= this.region.length) {
      this.compact();
      return;
    }

    this.relocate(size);
    this.observer.onBufferResize("reallocate", this.region.length);
  }

  // makeRoom frees space after a window that reaches the end of the region. The window is slid to
  // offset 0 when it does not start there; otherwise the region grows by growthIncrement.
  makeRoom(): void {
    if (this.start + this.length < this.region.length) return;
    if (this.start > 0) {
      this.compact();
      return;
    }
    this.relocate(this.region.length + this.growthIncrement);
    this.observer.onBufferResize("grow", this.region.length);
  }

  // fillFrom pulls at most maxLength bytes from fill into the space after the window.
  fillFrom(fill: FillFn, maxLength: number): number {
    const max = Math.min(maxLength, this.freeSpace);
    if (max <= 0) return 0;
    const end = this.start + this.length;
    const n = fill(this.region.subarray(end, end + max), max);
    if (!Number.isSafeInteger(n) || n < 0 || n > max) {
      throw new ReadStreamError({ code: "invalid_source_result", message: `source returned ${String(n)} for at most ${max} bytes` });
    }
    this.length += n;
    return n;
  }

  // consume removes n bytes from the front of the window and returns a view of them.
  consume(n: number): Uint8Array {
    if (n < 0 || n > this.length) throw new RangeError("consume out of window");
    const view = this.region.subarray(this.start, this.start + n);
    this.start += n;
    this.length -= n;
    return view;
  }

  private compact(): void {
    if (this.start === 0) return;
    this.region.copyWithin(0, this.start, this.start + this.length);
    this.start = 0;
    this.observer.onBufferResize("compact", this.region.length);
  }

  private relocate(capacity: number): void {
    const next = new Uint8Array(capacity);
    next.set(this.window(), 0);
    this.region = next;
    this.start = 0;
  }
}
