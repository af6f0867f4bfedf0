/** Scalar values allowed in document / chunk metadata. */
export type MetadataScalar = string | number | boolean | null;

/** Metadata value: a scalar or a flat list of scalars. */
export type MetadataValue = MetadataScalar | MetadataScalar[];

export type Metadata = Readonly<Record<string, MetadataValue>>;

/** Closed set of supported source formats. */
export type FileType = "markdown" | "text" | "pdf" | "docx" | "csv" | "json";

/**
 * One logical source file after parsing. Documents only live between loading
 * and chunking; they are never stored in the index.
 */
export interface Document {
  /** File path relative to the source root, forward slashes. */
  readonly path: string;
  /** Normalized plain text (front matter and structural markup removed). */
  readonly text: string;
  readonly metadata: Metadata;
  readonly fileType: FileType;
}

/** Contiguous slice of a document's text. */
export interface Chunk {
  /** Parent document path. */
  readonly path: string;
  /** Sequence index within the parent document (0-based). */
  readonly chunk: number;
  readonly text: string;
  /** Inclusive start offset into the parent text. */
  readonly start: number;
  /** Exclusive end offset into the parent text. */
  readonly end: number;
  readonly metadata: Metadata;
}

/** Chunk plus its embedding vector and a stable index-wide identifier. */
export interface EmbeddedChunk extends Chunk {
  readonly id: string;
  readonly emb: Float32Array;
}

/**
 * Identifies the embedding configuration an index was built with. A persisted
 * index is only reused when every field matches the current configuration.
 */
export interface Fingerprint {
  readonly modelName: string;
  readonly dimension: number;
  readonly chunkSize: number;
  readonly chunkOverlap: number;
}

export interface RetrievalHit {
  readonly id: string;
  readonly path: string;
  readonly chunk: number;
  readonly text: string;
  readonly metadata: Metadata;
  /** Cosine similarity in [-1, 1]. */
  readonly score: number;
}

/** Hits ordered by descending score. */
export type RetrievalResult = readonly RetrievalHit[];
