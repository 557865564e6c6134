import { InputValidationError } from "../errors.js";
import { codePoints } from "../utils/text.js";

export const MIN_CHUNK_SIZE = 100;
export const DEFAULT_CHUNK_SIZE = 800;
export const DEFAULT_CHUNK_OVERLAP = 200;

export type TextChunk = {
  /** Ordinal among emitted chunks. */
  index: number;
  /** Window bounds in code points, `end` clipped to the text length. */
  start: number;
  end: number;
  text: string;
};

function assertChunkParams(size: number, overlap: number): void {
  if (!Number.isInteger(size) || !Number.isInteger(overlap)) {
    throw new InputValidationError("Chunk size and overlap must be integers");
  }
  if (overlap < 0) {
    throw new InputValidationError("Chunk overlap must not be negative");
  }
  if (size <= overlap) {
    throw new InputValidationError("Chunk size must be greater than overlap");
  }
  if (size < MIN_CHUNK_SIZE) {
    throw new InputValidationError(`Chunk size too small (minimum ${MIN_CHUNK_SIZE})`);
  }
}

/**
 * Split text into overlapping fixed-size windows.
 *
 * Sizes count code points. Windows start at 0 and advance by
 * `size - overlap`. Whitespace-only windows are skipped. The returned
 * iterable is lazy and can be iterated any number of times; parameters are
 * checked eagerly.
 */
export function chunkText(
  text: string,
  size = DEFAULT_CHUNK_SIZE,
  overlap = DEFAULT_CHUNK_OVERLAP,
): Iterable<TextChunk> {
  assertChunkParams(size, overlap);
  const step = size - overlap;

  return {
    *[Symbol.iterator]() {
      const points = codePoints(text);
      let index = 0;
      for (let start = 0; start < points.length; start += step) {
        const end = Math.min(start + size, points.length);
        const slice = points.slice(start, end).join("");
        if (slice.trim().length === 0) continue;
        yield { index: index++, start, end, text: slice };
      }
    },
  };
}

/** Upper bound on the number of windows, used for previews. */
export function estimateChunkCount(
  length: number,
  size = DEFAULT_CHUNK_SIZE,
  overlap = DEFAULT_CHUNK_OVERLAP,
): number {
  assertChunkParams(size, overlap);
  if (length <= 0) return 0;
  return Math.ceil(length / (size - overlap));
}
