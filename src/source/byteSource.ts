// FillFn copies at most maxLength bytes into target and returns how many it wrote.
// Returning 0 means end of data; failures are thrown.
export type FillFn = (target: Uint8Array, maxLength: number) => number;

export interface ByteSource {
  fill(target: Uint8Array, maxLength: number): number;
}

export function normalizeSource(source: FillFn | ByteSource): FillFn {
  return typeof source === "function" ? source : (target, maxLength) => source.fill(target, maxLength);
}
