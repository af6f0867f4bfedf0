import { ConfigError } from "./errors";
import type { Chunk, Document } from "./types";

/** Reject window parameters that could not make forward progress. */
export function assertChunkParams(size: number, overlap: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new ConfigError(`chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigError(`chunk overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= size) {
    throw new ConfigError(`chunk overlap (=${overlap}) must be smaller than chunk size (=${size})`);
  }
}

/**
 * Split text into fixed-size overlapping character windows. Each window
 * starts `size - overlap` characters after the previous one; the walk stops
 * at the first window that reaches the end of the text, so the last window
 * may be shorter than `size`. Empty text yields nothing.
 *
 * Yields `[start, end)` offsets. Parameters are validated before the first
 * value is produced.
 */
export function* windows(length: number, size: number, overlap: number): Generator<[number, number]> {
  assertChunkParams(size, overlap);
  const step = size - overlap;
  for (let start = 0; start < length; start += step) {
    const end = Math.min(length, start + size);
    yield [start, end];
    if (end === length) return;
  }
}

/**
 * Lazily chunk a document. Chunks inherit the document metadata and record
 * their sequence index and character bounds.
 */
export function* chunkDocument(doc: Document, size: number, overlap: number): Generator<Chunk> {
  let index = 0;
  for (const [start, end] of windows(doc.text.length, size, overlap)) {
    yield {
      path: doc.path,
      chunk: index++,
      text: doc.text.slice(start, end),
      start,
      end,
      metadata: doc.metadata,
    };
  }
}

