import type { Chunk, ChunkSource } from "@docindex/types";
import type { ChunkWindow } from "./chunker.interface.js";
import { chunkId } from "./chunk-id.js";

export interface CharRange {
  start: number;
  end: number;
}

export function validateWindow({ chunkSize, chunkOverlap }: ChunkWindow): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${String(chunkSize)}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(
      `chunkOverlap must be an integer in [0, chunkSize), got ${String(chunkOverlap)}`,
    );
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Whether `index` falls between the two halves of a surrogate pair. */
export function splitsPair(text: string, index: number): boolean {
  return (
    index > 0 &&
    index < text.length &&
    isLowSurrogate(text.charCodeAt(index)) &&
    isHighSurrogate(text.charCodeAt(index - 1))
  );
}

/** `index`, moved back one code unit when it would split a surrogate pair. */
export function alignBack(text: string, index: number): number {
  return splitsPair(text, index) ? index - 1 : index;
}

/** First character boundary after `index`. */
export function nextBoundary(text: string, index: number): number {
  return splitsPair(text, index + 1) ? index + 2 : index + 1;
}

/** End of a hard cut at most `chunkSize` after `start`, on a character boundary. */
export function hardCut(text: string, start: number, chunkSize: number): number {
  const end = alignBack(text, Math.min(start + chunkSize, text.length));
  return end > start ? end : nextBoundary(text, start);
}

/**
 * Starts `start, start + stride, ...` inside the text, each cut at most `size`
 * later. Starts and cuts never split a surrogate pair.
 */
export function strideRanges(text: string, start: number, window: ChunkWindow): CharRange[] {
  const stride = window.chunkSize - window.chunkOverlap;
  const ranges: CharRange[] = [];
  let s = start;
  while (s < text.length) {
    ranges.push({ start: s, end: hardCut(text, s, window.chunkSize) });
    const next = alignBack(text, s + stride);
    s = next > s ? next : nextBoundary(text, s);
  }
  return ranges;
}

export function toChunks(text: string, ranges: CharRange[], source: ChunkSource): Chunk[] {
  return ranges.map((range, index) => ({
    id: chunkId(source.fingerprint, index),
    documentKey: source.documentKey,
    index,
    startChar: range.start,
    endChar: range.end,
    text: text.slice(range.start, range.end),
  }));
}
