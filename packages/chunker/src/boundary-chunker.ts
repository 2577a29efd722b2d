import {
  DEFAULT_BOUNDARY_POLICY,
  type BoundaryLevel,
  type Chunk,
  type ChunkSource,
} from "@docindex/types";
import type { ChunkWindow, IChunker } from "./chunker.interface.js";
import { findMarkers, lastIndexWhere } from "./boundaries.js";
import {
  alignBack,
  hardCut,
  nextBoundary,
  strideRanges,
  toChunks,
  validateWindow,
  type CharRange,
} from "./window.js";

/**
 * Boundary-aware windows.
 *
 * Each window `[start, start + chunkSize)` is cut after the last marker of the
 * highest-priority level that has one inside the window, provided the cut
 * leaves more than `chunkOverlap` characters. Without one the window is cut
 * hard. The next window starts `chunkOverlap` characters before the cut,
 * moved forward out of any marker it lands in. Hard cuts and starts are
 * moved back off the middle of a surrogate pair.
 *
 * A window reaching the end of the text is the last one, unless the previous
 * cut was hard: a run of hard cuts keeps stepping by the stride while its
 * starts are inside the text, like {@link FixedChunker}.
 */
export class BoundaryChunker implements IChunker {
  readonly strategy = "boundary";
  readonly policy: readonly BoundaryLevel[];

  constructor(policy: readonly BoundaryLevel[] = DEFAULT_BOUNDARY_POLICY) {
    if (policy.length === 0) {
      throw new RangeError("Boundary policy needs at least one level");
    }
    this.policy = policy;
  }

  chunk(text: string, window: ChunkWindow, source: ChunkSource): Chunk[] {
    validateWindow(window);
    if (text.trim().length === 0) {
      return [];
    }
    if (text.length <= window.chunkSize) {
      return toChunks(text, [{ start: 0, end: text.length }], source);
    }

    const markers = this.policy.map((level) => findMarkers(text, level));
    const ranges: CharRange[] = [];
    let start = 0;
    let hardRun = false;

    for (;;) {
      if (start + window.chunkSize >= text.length) {
        if (hardRun) {
          ranges.push(...strideRanges(text, start, window));
        } else {
          ranges.push({ start, end: text.length });
        }
        break;
      }

      const cut = this.findCut(markers, start, window);
      const end = cut ?? hardCut(text, start, window.chunkSize);
      hardRun = cut === undefined;
      ranges.push({ start, end });
      const next = this.nextStart(markers, alignBack(text, end - window.chunkOverlap), end);
      start = next > start ? next : nextBoundary(text, start);
    }

    return toChunks(text, ranges, source);
  }

  /** End of the last marker of the first level with a usable one. */
  private findCut(
    markers: CharRange[][],
    start: number,
    window: ChunkWindow,
  ): number | undefined {
    const limit = start + window.chunkSize;
    const floor = start + window.chunkOverlap;
    for (const levelMarkers of markers) {
      const index = lastIndexWhere(levelMarkers, (m) => m.end <= limit);
      const marker = levelMarkers[index];
      if (marker && marker.end > floor) {
        return marker.end;
      }
    }
    return undefined;
  }

  /** Move `position` past any marker it falls inside, never beyond `cut`. */
  private nextStart(markers: CharRange[][], position: number, cut: number): number {
    let next = position;
    let moved = true;
    while (moved && next < cut) {
      moved = false;
      for (const levelMarkers of markers) {
        const marker = levelMarkers[lastIndexWhere(levelMarkers, (m) => m.start < next)];
        if (marker && marker.end > next) {
          next = Math.min(marker.end, cut);
          moved = true;
        }
      }
    }
    return next;
  }
}
