import type { EmbeddingSettings } from "./config";
import type { EmbeddingOracle } from "./embeddings";
import { EmbeddingError } from "./errors";
import { sleep, withTimeout } from "./timeout";

export type EmbedderOptions = Pick<
  EmbeddingSettings,
  "batchSize" | "concurrency" | "maxRetries" | "timeoutMs" | "retryDelayMs"
> & {
  verbose?: boolean;
};

/** Called after each finished batch with the running count of embedded texts. */
export type ProgressListener = (embedded: number, total: number) => void;

/**
 * Batching front for an {@link EmbeddingOracle}. Adds a per-call timeout,
 * bounded retries and optional parallelism across batches while keeping the
 * output in input order.
 */
export class Embedder {
  private readonly oracle: EmbeddingOracle;
  private readonly opts: EmbedderOptions;
  private dim: number | null = null;

  public constructor(oracle: EmbeddingOracle, opts: EmbedderOptions) {
    this.oracle = oracle;
    this.opts = opts;
  }

  public get modelName(): string {
    return this.oracle.modelName;
  }

  /**
   * Vector length produced by the current model. Probed once with a short
   * text and cached; it forms part of the index fingerprint.
   */
  public async dimension(): Promise<number> {
    if (this.dim === null) {
      const [vec] = await this.runBatch(["dimension probe"], 0);
      this.dim = vec.length;
    }
    return this.dim;
  }

  /** Embed a single query string (a one-item batch). */
  public async embedQuery(text: string): Promise<Float32Array> {
    const [vec] = await this.runBatch([text], 0);
    return vec;
  }

  /**
   * Embed all texts. Batches are dispatched to at most `concurrency` workers;
   * each batch writes only to its own pre-allocated slot.
   *
   * @throws {EmbeddingError} as soon as one batch exhausts its retries.
   */
  public async embedAll(texts: readonly string[], onProgress?: ProgressListener): Promise<Float32Array[]> {
    const { batchSize, concurrency } = this.opts;
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += batchSize) batches.push(texts.slice(i, i + batchSize));

    const slots: Float32Array[][] = new Array(batches.length);
    let next = 0;
    let embedded = 0;
    let failed = false;

    const worker = async (): Promise<void> => {
      while (!failed && next < batches.length) {
        const b = next++;
        try {
          slots[b] = await this.runBatch(batches[b], b, () => failed);
        } catch (e) {
          failed = true;
          throw e;
        }
        // A sibling batch failed while this one ran; the build is already lost.
        if (failed) return;
        embedded += batches[b].length;
        onProgress?.(embedded, texts.length);
        if (this.opts.verbose && b % 10 === 0) {
          const pct = ((embedded / Math.max(1, texts.length)) * 100).toFixed(1);
          console.error(`[RAG][verbose] Embedding progress: ${embedded}/${texts.length} (${pct}%)`);
        }
      }
    };

    const workers = Array.from({ length: Math.min(concurrency, batches.length) }, () => worker());
    await Promise.all(workers);
    return slots.flat();
  }

  /**
   * One batch with timeout + retries; validates shape and dimensionality.
   * `cancelled` is checked before each retry so a failed pool stops calling
   * the oracle.
   */
  private async runBatch(
    batch: string[],
    index: number,
    cancelled: () => boolean = () => false,
  ): Promise<Float32Array[]> {
    const { maxRetries, timeoutMs, retryDelayMs } = this.opts;
    let lastError: unknown;
    let attempts = 0;
    for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
      if (attempt > 1 && cancelled()) break;
      attempts = attempt;
      try {
        const vectors = await withTimeout(
          this.oracle.embedBatch(batch),
          timeoutMs,
          `Embedding batch ${index}`,
        );
        this.validate(vectors, batch.length);
        return vectors;
      } catch (e) {
        lastError = e;
        console.error(
          `[RAG] Embedding batch ${index} attempt ${attempt}/${maxRetries + 1} failed:`,
          e instanceof Error ? e.message : e,
        );
        if (attempt <= maxRetries && retryDelayMs > 0) await sleep(retryDelayMs * attempt);
      }
    }
    throw new EmbeddingError(index, attempts, { cause: lastError });
  }

  private validate(vectors: Float32Array[], expected: number): void {
    if (vectors.length !== expected) {
      throw new Error(`oracle returned ${vectors.length} vectors for ${expected} inputs`);
    }
    const dim = this.dim ?? vectors[0]?.length;
    for (const v of vectors) {
      if (!v.length || v.length !== dim) {
        throw new Error(`inconsistent embedding dimension ${v.length} (expected ${dim})`);
      }
    }
  }
}
