import { matchAt } from "../utils/bin.js";
import { ReadStreamError } from "../utils/errors.js";
import { MATCHING_MODES } from "./constants.js";

export type MatchingMode = (typeof MATCHING_MODES)[number];

// DelimiterMatch locates one delimiter occurrence relative to the start of the scanned window.
export type DelimiterMatch = Readonly<{
  offset: number;
  index: number;
  length: number;
}>;

function outranksAtSameOffset(mode: MatchingMode, a: DelimiterMatch, b: DelimiterMatch): boolean {
  if (mode === "shortest" && a.length !== b.length) return a.length < b.length;
  if (mode === "longest" && a.length !== b.length) return a.length > b.length;
  return a.index < b.index;
}

function better(mode: MatchingMode, a: DelimiterMatch, b: DelimiterMatch): boolean {
  if (a.offset !== b.offset) return a.offset < b.offset;
  return outranksAtSameOffset(mode, a, b);
}

export function isMatchingMode(v: unknown): v is MatchingMode {
  return MATCHING_MODES.some((m) => m === v);
}

/**
 * DelimiterScanner searches a growing window for the first occurrence of any of several
 * delimiters.
 *
 * The window passed to {@link scan} must keep the bytes of previous calls at the same offsets and
 * may only grow at the end. Positions before the search offset are never examined again.
 */
export class DelimiterScanner {
  readonly minLength: number;
  readonly maxLength: number;

  private readonly matched: boolean[];
  private readonly candidates: DelimiterMatch[] = [];
  private searchOffset = 0;

  constructor(private readonly delimiters: readonly Uint8Array[], readonly mode: MatchingMode) {
    if (!isMatchingMode(mode)) {
      throw new ReadStreamError({ code: "invalid_input", message: `unknown matching mode: ${String(mode)}` });
    }
    let min = delimiters.length > 0 ? Number.MAX_SAFE_INTEGER : 0;
    let max = 0;
    for (const d of delimiters) {
      if (d.length === 0) throw new ReadStreamError({ code: "invalid_input", message: "empty delimiter" });
      min = Math.min(min, d.length);
      max = Math.max(max, d.length);
    }
    this.minLength = min;
    this.maxLength = max;
    this.matched = delimiters.map(() => false);
  }

  /**
   * scan examines the window from the search offset and returns a match once no delimiter that
   * is still only partially visible could start earlier than it, or tie with it and win.
   * Returns undefined when more data is needed.
   */
  scan(window: Uint8Array): DelimiterMatch | undefined {
    const end = window.length;
    if (this.delimiters.length === 0) return undefined;

    // Earliest position where each unmatched delimiter runs into the end of the window.
    const pendingAt: number[] = this.delimiters.map(() => Number.POSITIVE_INFINITY);
    if (this.candidates.length > 0 || end - this.searchOffset >= this.minLength) {
      for (let p = this.searchOffset; p < end; p++) {
        for (let i = 0; i < this.delimiters.length; i++) {
          if (this.matched[i]) continue;
          const d = this.delimiters[i];
          if (d === undefined) continue;
          const m = matchAt(window, p, d);
          if (m === "full") {
            this.matched[i] = true;
            this.candidates.push({ offset: p, index: i, length: d.length });
          } else if (m === "partial" && pendingAt[i] === Number.POSITIVE_INFINITY) {
            pendingAt[i] = p;
          }
        }
      }
    }

    const best = this.best();
    if (best !== undefined && !this.threatened(best, pendingAt)) return best;

    this.searchOffset = Math.max(this.searchOffset, end - this.maxLength + 1);
    return undefined;
  }

  // best returns the winning candidate among confirmed matches, if any.
  best(): DelimiterMatch | undefined {
    let out: DelimiterMatch | undefined;
    for (const c of this.candidates) {
      if (out === undefined || better(this.mode, c, out)) out = c;
    }
    return out;
  }

  private threatened(best: DelimiterMatch, pendingAt: readonly number[]): boolean {
    for (let i = 0; i < this.delimiters.length; i++) {
      if (this.matched[i]) continue;
      const p = pendingAt[i] ?? Number.POSITIVE_INFINITY;
      if (p < best.offset) return true;
      if (p === best.offset) {
        const length = this.delimiters[i]?.length ?? 0;
        if (outranksAtSameOffset(this.mode, { offset: p, index: i, length }, best)) return true;
      }
    }
    return false;
  }
}
