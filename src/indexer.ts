import { assertChunkParams, chunkDocument } from "./chunker";
import type { Embedder } from "./embedder";
import { IndexIntegrityError } from "./errors";
import type { SourceLoader } from "./loader";
import type { IndexStore } from "./persistence";
import { statusManager, type StatusManager } from "./status";
import type { Chunk, EmbeddedChunk, Fingerprint } from "./types";
import { VectorIndex } from "./vector-index";

/**
 * Options required to construct an {@link IndexManager}. All collaborators
 * are injected so tests can swap the embedding oracle and the store path.
 */
export interface IndexManagerOptions {
  docsDir: string;
  loader: SourceLoader;
  embedder: Embedder;
  store: IndexStore;
  chunkSize: number;
  chunkOverlap: number;
  verbose?: boolean;
  status?: StatusManager;
}

/** Stable id of a chunk within an index. */
export function chunkId(chunk: Pick<Chunk, "path" | "chunk">): string {
  return `${chunk.path}#${chunk.chunk}`;
}

/**
 * Owns the index snapshot that queries read from.
 *
 * Builds run fully in isolation: documents are loaded, chunked and embedded
 * into a brand-new {@link VectorIndex}, persisted, and only then swapped in
 * with a single reference assignment. A failed build leaves both the live
 * snapshot and the persisted artifact as they were.
 */
export class IndexManager {
  private readonly opts: IndexManagerOptions;
  private readonly status: StatusManager;
  private index: VectorIndex | null = null;
  private inflight: Promise<VectorIndex> | null = null;

  public constructor(opts: IndexManagerOptions) {
    assertChunkParams(opts.chunkSize, opts.chunkOverlap);
    this.opts = opts;
    this.status = opts.status ?? statusManager;
  }

  /** Fingerprint of the current embedding + chunking configuration. */
  public async fingerprint(): Promise<Fingerprint> {
    return {
      modelName: this.opts.embedder.modelName,
      dimension: await this.opts.embedder.dimension(),
      chunkSize: this.opts.chunkSize,
      chunkOverlap: this.opts.chunkOverlap,
    };
  }

  /** Whether a snapshot is available for queries. */
  public isReady(): boolean {
    return this.index !== null;
  }

  /**
   * Snapshot currently serving queries.
   *
   * @throws {IndexIntegrityError} (`missing`) before the first build or load.
   */
  public current(): VectorIndex {
    if (!this.index) throw new IndexIntegrityError("missing", "Index has not been built or loaded yet");
    return this.index;
  }

  /**
   * Reuse the persisted index when its fingerprint matches, otherwise build
   * from the source directory. Integrity problems with the artifact are
   * logged and resolved by rebuilding.
   */
  public async buildOrLoad(): Promise<VectorIndex> {
    const fingerprint = await this.fingerprint();
    this.status.setPhase("loading");
    try {
      const loaded = await this.opts.store.load(fingerprint);
      this.swap(loaded);
      return loaded;
    } catch (e) {
      if (!(e instanceof IndexIntegrityError)) {
        this.status.markFailed(e);
        throw e;
      }
      console.error(`[RAG] Persisted index unusable (${e.reason}): ${e.message}. Rebuilding.`);
    }
    return this.rebuild();
  }

  /**
   * Full rebuild. Concurrent callers share one in-flight build.
   *
   * @throws {EmbeddingError} when the embedding oracle keeps failing; nothing
   *         is persisted or swapped in that case.
   */
  public rebuild(): Promise<VectorIndex> {
    if (!this.inflight) {
      this.inflight = this.build().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async build(): Promise<VectorIndex> {
    const { docsDir, loader, embedder, store, chunkSize, chunkOverlap, verbose } = this.opts;
    this.status.setPhase("building");
    try {
      const fingerprint = await this.fingerprint();
      const { documents, skipped } = await loader.loadWithReport(docsDir);
      this.status.setDocuments(documents.length, skipped.length);

      const chunks: Chunk[] = [];
      for (const doc of documents) {
        for (const c of chunkDocument(doc, chunkSize, chunkOverlap)) chunks.push(c);
      }
      console.error(
        `[RAG] Created ${chunks.length} chunks from ${documents.length} documents. Generating embeddings...`,
      );
      if (verbose) console.error(`[RAG][verbose] Chunk size ${chunkSize}, overlap ${chunkOverlap}`);
      this.status.setChunkTotals(chunks.length);

      const vectors = await embedder.embedAll(
        chunks.map((c) => c.text),
        (n) => this.status.setEmbedded(n),
      );
      const entries: EmbeddedChunk[] = chunks.map((c, i) => ({ ...c, id: chunkId(c), emb: vectors[i] }));
      const next = new VectorIndex(fingerprint, entries);

      await store.save(next);
      this.swap(next);
      console.error(`[RAG] Index ready: ${next.size} chunks.`);
      return next;
    } catch (e) {
      console.error(`[RAG] Index build failed:`, e instanceof Error ? e.message : e);
      this.status.markFailed(e);
      throw e;
    }
  }

  private swap(next: VectorIndex): void {
    this.index = next;
    this.status.markReady(next.size);
  }
}
