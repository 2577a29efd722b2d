import type { BoundaryLevel } from "@docindex/types";
import type { CharRange } from "./window.js";

/** Cutting after a marker puts the marker at the end of the earlier chunk. */
const BOUNDARY_PATTERNS: Record<BoundaryLevel, RegExp> = {
  // form feed, three or more newlines, or the newline before a markdown heading
  section: /\n{3,}|\f|\n(?=#{1,6}\s)/g,
  paragraph: /\n[ \t]*\n/g,
  sentence: /[.!?]["')\]]*\s+/g,
  line: /\n/g,
  word: /\s+/g,
};

/** Marker ranges of one level, in source order and non-overlapping. */
export function findMarkers(text: string, level: BoundaryLevel): CharRange[] {
  const pattern = new RegExp(BOUNDARY_PATTERNS[level].source, "g");
  return Array.from(text.matchAll(pattern), (match) => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));
}

/** Index of the last element satisfying `pred`, for a predicate true on a prefix of `items`. */
export function lastIndexWhere<T>(items: readonly T[], pred: (item: T) => boolean): number {
  let lo = 0;
  let hi = items.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const item = items[mid];
    if (item !== undefined && pred(item)) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
}
