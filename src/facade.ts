export { BufferedReadStream } from "./stream/readStream.js";
export type { MatchedDelimiter, ReadExactHandler, ReadUntilHandler, ReadUntilOptions } from "./stream/readStream.js";
export type { ReadStreamOptions } from "./stream/options.js";
export type { MatchingMode } from "./stream/delimiterScanner.js";
export { DEFAULT_BUFFER_SIZE, DEFAULT_BUFFER_SIZE_INCREMENT, MATCHING_MODES } from "./stream/constants.js";

export type { ByteSource, FillFn } from "./source/byteSource.js";
export { ChunkedByteSource, MemoryByteSource } from "./source/memorySource.js";
export type { MemoryByteSourceOptions } from "./source/memorySource.js";
export { DigestByteSource } from "./source/digestSource.js";

export type { ReadStreamErrorCode } from "./utils/errors.js";
export { isReadStreamError, ReadStreamError } from "./utils/errors.js";

export type { BufferResizeKind, ReadStreamObserver, ReadStreamObserverLike } from "./observability/observer.js";
export { NoopObserver } from "./observability/observer.js";

export type { Delimiter, ReadBytesUntilResult } from "./streamio/index.js";
export { readBytes, readBytesUntil, readLine, readToEnd } from "./streamio/index.js";

export { DEFAULT_MAX_JSON_FRAME_BYTES, encodeJsonFrame, JsonFramingError, readJsonFrame } from "./framing/jsonframe.js";
