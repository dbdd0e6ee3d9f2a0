import { describe, expect, test } from "vitest";
import { normalizeObserver, NoopObserver } from "./observer.js";

describe("observer", () => {
  test("normalizeObserver returns NoopObserver for undefined", () => {
    expect(normalizeObserver()).toBe(NoopObserver);
  });

  test("normalizeObserver keeps provided callbacks and fills the rest", () => {
    const reads: Array<[number, number]> = [];
    const o = normalizeObserver({ onSourceRead: (requested, received) => reads.push([requested, received]) });
    o.onSourceRead(8, 3);
    expect(reads).toEqual([[8, 3]]);
    expect(o.onBufferResize).toBe(NoopObserver.onBufferResize);
    expect(o.onReadError).toBe(NoopObserver.onReadError);
    expect(o.onSourceError).toBe(NoopObserver.onSourceError);
  });
});
