import { ChunkingError } from "../domain/errors.js";
import { TextBoundary } from "../infra/parsers/documentLoader.js";

export const DEFAULT_CHUNK_WINDOW = 500;
export const DEFAULT_CHUNK_OVERLAP = 50;

// Paragraph, then line, then sentence punctuation; a hard cut is the fallback.
const SEPARATORS = ["\n\n", "\n", ". ", "! ", "? "];

// A separator earlier than this share of the window would leave a runt chunk.
const MIN_SPLIT_RATIO = 0.55;

export interface ChunkOptions {
  window?: number;
  overlap?: number;
}

export interface TextChunk {
  index: number;
  text: string;
  start: number;
  end: number;
}

/**
 * Splits `text` into spans of at most `window` UTF-16 code units. Each span
 * after the first starts `overlap` code units before the previous one ended.
 * Cuts never fall inside a surrogate pair: an end that would is moved back one
 * unit, and a start that would is moved back one unit too, so such a pair of
 * neighbours shares `overlap + 1` units.
 */
export function* chunkText(
  text: string,
  { window = DEFAULT_CHUNK_WINDOW, overlap = DEFAULT_CHUNK_OVERLAP }: ChunkOptions = {},
): Generator<TextChunk, void, undefined> {
  assertChunkOptions(window, overlap);
  if (!text) {
    return;
  }

  const minSplit = Math.max(overlap + 1, Math.floor(window * MIN_SPLIT_RATIO));
  let start = 0;
  let index = 0;

  while (start < text.length) {
    const hardEnd = Math.min(start + window, text.length);
    let end =
      hardEnd < text.length
        ? start + findSplitPoint(text.slice(start, hardEnd), minSplit)
        : hardEnd;
    if (end - 1 > start && splitsSurrogatePair(text, end)) {
      end -= 1;
    }

    yield { index, text: text.slice(start, end), start, end };
    index += 1;

    if (end >= text.length) {
      return;
    }
    let next = end - overlap;
    if (splitsSurrogatePair(text, next)) {
      next = next - 1 > start ? next - 1 : next + 1;
    }
    start = next;
  }
}

export function splitIntoChunks(text: string, options?: ChunkOptions): string[] {
  return Array.from(chunkText(text, options), (chunk) => chunk.text);
}

/** Label of the last boundary at or before `offset`, if any. */
export function boundaryAt(boundaries: TextBoundary[], offset: number): string | null {
  let label: string | null = null;
  for (const boundary of boundaries) {
    if (boundary.offset > offset) {
      break;
    }
    label = boundary.label;
  }
  return label;
}

/** True when `offset` falls between the high and low halves of one code point. */
function splitsSurrogatePair(text: string, offset: number): boolean {
  if (offset <= 0 || offset >= text.length) {
    return false;
  }
  const before = text.charCodeAt(offset - 1);
  const after = text.charCodeAt(offset);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

function findSplitPoint(window: string, minSplit: number): number {
  for (const separator of SEPARATORS) {
    const idx = window.lastIndexOf(separator);
    if (idx >= 0 && idx + separator.length >= minSplit) {
      return idx + separator.length;
    }
  }
  return window.length;
}

function assertChunkOptions(window: number, overlap: number): void {
  if (!Number.isInteger(window) || window <= 0) {
    throw new ChunkingError(`Chunk window must be a positive integer, got ${window}.`, {
      window,
    });
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= window) {
    throw new ChunkingError(
      `Chunk overlap must be an integer in [0, ${window}), got ${overlap}.`,
      { window, overlap },
    );
  }
}
