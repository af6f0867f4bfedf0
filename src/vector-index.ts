import { IndexIntegrityError } from "./errors";
import type { EmbeddedChunk, Fingerprint, RetrievalResult } from "./types";

/**
 * Cosine similarity (normalized dot product). Zero-norm vectors score 0
 * rather than NaN.
 */
export function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  const denom = Math.sqrt(na) * Math.sqrt(nb);
  return denom === 0 ? 0 : dot / denom;
}

export function sameFingerprint(a: Fingerprint, b: Fingerprint): boolean {
  return (
    a.modelName === b.modelName &&
    a.dimension === b.dimension &&
    a.chunkSize === b.chunkSize &&
    a.chunkOverlap === b.chunkOverlap
  );
}

/**
 * Immutable, insertion-ordered set of embedded chunks answering exact top-K
 * cosine queries by linear scan. A rebuild always produces a new instance,
 * so concurrent readers never need a lock.
 */
export class VectorIndex {
  public readonly fingerprint: Fingerprint;
  private readonly entries: readonly EmbeddedChunk[];

  /**
   * @throws {IndexIntegrityError} if a vector does not match the fingerprint
   *         dimension or two entries share an id.
   */
  public constructor(fingerprint: Fingerprint, entries: readonly EmbeddedChunk[]) {
    const ids = new Set<string>();
    for (const e of entries) {
      if (e.emb.length !== fingerprint.dimension) {
        throw new IndexIntegrityError(
          "dimension-mismatch",
          `Entry ${e.id} has dimension ${e.emb.length}, index expects ${fingerprint.dimension}`,
        );
      }
      if (ids.has(e.id)) throw new IndexIntegrityError("corrupted", `Duplicate entry id ${e.id}`);
      ids.add(e.id);
    }
    this.fingerprint = Object.freeze({ ...fingerprint });
    this.entries = Object.freeze([...entries]);
  }

  public get size(): number {
    return this.entries.length;
  }

  /** Entries in insertion order. */
  public getEntries(): readonly EmbeddedChunk[] {
    return this.entries;
  }

  /**
   * Score every entry against `vector` and return the `k` best, highest
   * first. Equal scores keep insertion order. `k` above the index size
   * returns everything; an empty index returns an empty result.
   *
   * @throws {IndexIntegrityError} when the query vector has the wrong dimension.
   */
  public query(vector: Float32Array, k: number): RetrievalResult {
    if (k <= 0 || !this.entries.length) return [];
    if (vector.length !== this.fingerprint.dimension) {
      throw new IndexIntegrityError(
        "dimension-mismatch",
        `Query vector has dimension ${vector.length}, index expects ${this.fingerprint.dimension}`,
      );
    }
    const scored = this.entries.map((e, pos) => ({ e, pos, s: cosine(e.emb, vector) }));
    scored.sort((a, b) => b.s - a.s || a.pos - b.pos);
    return scored.slice(0, k).map(({ e, s }) => ({
      id: e.id,
      path: e.path,
      chunk: e.chunk,
      text: e.text,
      metadata: e.metadata,
      score: s,
    }));
  }
}
