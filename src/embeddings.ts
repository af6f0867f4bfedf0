import { pipeline, type FeatureExtractionPipeline } from "@xenova/transformers";
import { configureTransformersCache } from "./cache";

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedding model not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

/**
 * Contract of the embedding model: one fixed-length vector per input text, in
 * input order. Implementations must be deterministic for a given model.
 */
export interface EmbeddingOracle {
  readonly modelName: string;
  embedBatch(texts: readonly string[]): Promise<Float32Array[]>;
}

/**
 * Local sentence-embedding model run through @xenova/transformers
 * (feature-extraction, mean pooling, L2 normalization).
 */
export class TransformersEmbeddings implements EmbeddingOracle {
  public readonly modelName: string;
  private embedder: FeatureExtractionPipeline | null = null;

  public constructor(modelName: string) {
    this.modelName = modelName;
  }

  /** Point the model cache at `cacheDir` (or the project default). */
  public static configureCache(cacheDir?: string): Promise<string> {
    return configureTransformersCache(cacheDir);
  }

  /** Lazily load the pipeline (idempotent). */
  public async init(): Promise<void> {
    if (this.embedder) return;
    console.error(`[RAG] Loading embedding model: ${this.modelName}`);
    this.embedder = await pipeline("feature-extraction", this.modelName);
    console.error(`[RAG] Model ready: ${this.modelName}`);
  }

  /**
   * Embed a batch in a single pipeline call. The output tensor is
   * `[texts.length, dim]`, flattened; it is split back into one vector per text.
   *
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   */
  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    if (!this.embedder) throw new EmbedderNotInitializedError();
    if (!texts.length) return [];
    const output = await this.embedder([...texts], { pooling: "mean", normalize: true });
    const data = output.data;
    if (!(data instanceof Float32Array)) throw new Error(`Unexpected embedding tensor type from ${this.modelName}`);
    const dim = output.dims[output.dims.length - 1];
    const out: Float32Array[] = [];
    for (let i = 0; i < texts.length; i++) {
      out.push(data.slice(i * dim, (i + 1) * dim));
    }
    return out;
  }
}
