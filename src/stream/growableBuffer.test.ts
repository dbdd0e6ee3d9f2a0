import { describe, expect, test } from "vitest";

import { normalizeObserver } from "../observability/observer.js";
import type { BufferResizeKind } from "../observability/observer.js";
import { MemoryByteSource } from "../source/memorySource.js";
import { isReadStreamError } from "../utils/errors.js";
import { GrowableBuffer } from "./growableBuffer.js";

function makeBuffer(defaultCapacity: number, increment: number) {
  const events: Array<[BufferResizeKind, number]> = [];
  const observer = normalizeObserver({ onBufferResize: (kind, capacity) => events.push([kind, capacity]) });
  return { buf: new GrowableBuffer(defaultCapacity, increment, observer), events };
}

function fillWith(bytes: number[]) {
  const src = new MemoryByteSource(new Uint8Array(bytes));
  return (target: Uint8Array, maxLength: number) => src.fill(target, maxLength);
}

describe("GrowableBuffer", () => {
  test("reserve leaves the window alone when the size fits after it", () => {
    const { buf, events } = makeBuffer(8, 4);
    expect(buf.fillFrom(fillWith([1, 2, 3, 4, 5, 6]), 100)).toBe(6);
    expect(Array.from(buf.consume(4))).toEqual([1, 2, 3, 4]);
    buf.reserve(4);
    expect(buf.windowStart).toBe(4);
    expect(events).toEqual([]);
  });

  test("reserve compacts, reallocates to the exact size, then compacts in the larger region", () => {
    const { buf, events } = makeBuffer(8, 4);
    buf.fillFrom(fillWith([1, 2, 3, 4, 5, 6]), 100);
    buf.consume(4);

    buf.reserve(6);
    expect(buf.windowStart).toBe(0);
    expect(Array.from(buf.window())).toEqual([5, 6]);

    buf.reserve(12);
    expect(buf.capacity).toBe(12);
    expect(Array.from(buf.window())).toEqual([5, 6]);

    buf.consume(1);
    buf.reserve(10);
    expect(buf.windowStart).toBe(1);
    buf.reserve(12);
    expect(buf.windowStart).toBe(0);
    expect(buf.capacity).toBe(12);
    expect(Array.from(buf.window())).toEqual([6]);

    expect(events).toEqual([
      ["compact", 8],
      ["reallocate", 12],
      ["compact", 12]
    ]);
  });

  test("reserve shrinks an oversized region back to the default capacity", () => {
    const { buf, events } = makeBuffer(4, 4);
    buf.reserve(10);
    buf.fillFrom(fillWith([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]), 100);
    buf.consume(9);
    buf.reserve(3);
    expect(buf.capacity).toBe(4);
    expect(buf.windowStart).toBe(0);
    expect(Array.from(buf.window())).toEqual([9]);
    expect(events).toEqual([
      ["reallocate", 10],
      ["shrink", 4]
    ]);
  });

  test("makeRoom grows by the increment, or compacts when the window does not start at 0", () => {
    const { buf, events } = makeBuffer(4, 3);
    const fill = fillWith([1, 2, 3, 4, 5, 6, 7]);
    expect(buf.fillFrom(fill, 100)).toBe(4);
    expect(buf.freeSpace).toBe(0);

    buf.makeRoom();
    expect(buf.capacity).toBe(7);
    expect(Array.from(buf.window())).toEqual([1, 2, 3, 4]);

    buf.consume(2);
    buf.makeRoom();
    expect(events).toEqual([["grow", 7]]);

    expect(buf.fillFrom(fill, 100)).toBe(3);
    buf.makeRoom();
    expect(buf.windowStart).toBe(0);
    expect(buf.freeSpace).toBe(2);
    expect(Array.from(buf.window())).toEqual([3, 4, 5, 6, 7]);
    expect(events).toEqual([
      ["grow", 7],
      ["compact", 7]
    ]);
  });

  test("fillFrom never offers more than the free space", () => {
    const { buf } = makeBuffer(4, 4);
    const asked: number[] = [];
    buf.fillFrom((target, maxLength) => {
      asked.push(maxLength, target.length);
      return 0;
    }, 100);
    expect(asked).toEqual([4, 4]);
  });

  test("fillFrom rejects out-of-range source results and keeps the window", () => {
    const { buf } = makeBuffer(4, 4);
    buf.fillFrom(fillWith([1]), 100);
    let err: unknown;
    try {
      buf.fillFrom(() => 5, 100);
    } catch (e) {
      err = e;
    }
    expect(isReadStreamError(err, "invalid_source_result")).toBe(true);
    expect(() => buf.fillFrom(() => 1.5, 100)).toThrow(/invalid_source_result/);
    expect(() => buf.fillFrom(() => -1, 100)).toThrow(/invalid_source_result/);
    expect(buf.windowLength).toBe(1);
  });

  test("consume rejects sizes outside the window", () => {
    const { buf } = makeBuffer(4, 4);
    expect(() => buf.consume(1)).toThrow(RangeError);
  });
});
