import type { ReadStreamErrorCode } from "../utils/errors.js";

export type BufferResizeKind = "compact" | "grow" | "shrink" | "reallocate";

export type ReadStreamObserver = {
  // onSourceRead fires after every successful pull, including end-of-data pulls (received = 0).
  onSourceRead(requested: number, received: number): void;
  onBufferResize(kind: BufferResizeKind, capacity: number): void;
  onReadError(code: ReadStreamErrorCode): void;
  // onSourceError fires before the source's error is rethrown to the caller.
  onSourceError(error: unknown): void;
};

export type ReadStreamObserverLike = Partial<ReadStreamObserver>;

export const NoopObserver: ReadStreamObserver = {
  onSourceRead: () => {},
  onBufferResize: () => {},
  onReadError: () => {},
  onSourceError: () => {}
};

export function normalizeObserver(observer?: ReadStreamObserverLike): ReadStreamObserver {
  if (observer == null) return NoopObserver;
  return {
    onSourceRead: observer.onSourceRead ?? NoopObserver.onSourceRead,
    onBufferResize: observer.onBufferResize ?? NoopObserver.onBufferResize,
    onReadError: observer.onReadError ?? NoopObserver.onReadError,
    onSourceError: observer.onSourceError ?? NoopObserver.onSourceError
  };
}
