import type { RetrievalResult } from "./types";

/**
 * Base class for every failure raised by the ingestion / retrieval pipeline.
 * `code` is stable and safe to branch on; `message` is meant for logs.
 */
export class RagError extends Error {
  public readonly code: string;

  public constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "RagError";
  }
}

/** Invalid or contradictory configuration, raised once at startup. */
export class ConfigError extends RagError {
  public constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

/**
 * A single source file could not be read or parsed. Never fatal to a load;
 * the file is logged and skipped.
 */
export class SourceError extends RagError {
  public readonly path: string;

  public constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("SOURCE_UNREADABLE", `${path}: ${message}`, options);
    this.path = path;
    this.name = "SourceError";
  }
}

/** The embedding oracle kept failing for one batch after all retries. */
export class EmbeddingError extends RagError {
  public readonly batch: number;
  public readonly attempts: number;

  public constructor(batch: number, attempts: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super("EMBEDDING_FAILED", `Embedding batch ${batch} failed after ${attempts} attempt(s)${reason}`, options);
    this.batch = batch;
    this.attempts = attempts;
    this.name = "EmbeddingError";
  }
}

export type IndexIntegrityReason = "missing" | "corrupted" | "fingerprint-mismatch" | "dimension-mismatch";

/** Persisted or in-memory index cannot be used as-is. */
export class IndexIntegrityError extends RagError {
  public readonly reason: IndexIntegrityReason;

  public constructor(reason: IndexIntegrityReason, message: string, options?: { cause?: unknown }) {
    super("INDEX_INTEGRITY", message, options);
    this.reason = reason;
    this.name = "IndexIntegrityError";
  }
}

/**
 * The generative oracle was unreachable, timed out or returned garbage.
 * The retrieval that preceded the call stays available on `context`.
 */
export class GenerationError extends RagError {
  public readonly context: RetrievalResult;

  public constructor(message: string, context: RetrievalResult, options?: { cause?: unknown }) {
    super("GENERATION_UNAVAILABLE", message, options);
    this.context = context;
    this.name = "GenerationError";
  }
}

/** Error thrown when an operation exceeds its time budget. */
export class TimeoutError extends Error {
  public constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}
