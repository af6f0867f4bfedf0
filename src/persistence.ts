import fs from "node:fs/promises";
import path from "node:path";
import { IndexIntegrityError } from "./errors";
import type { EmbeddedChunk, Fingerprint, Metadata, MetadataScalar, MetadataValue } from "./types";
import { VectorIndex, sameFingerprint } from "./vector-index";

/** Current on-disk layout version. */
export const STORE_VERSION = 2;

/**
 * Serialized entry. `emb` is the vector as base64 little-endian float32.
 */
interface StoredEntry {
  id: string;
  path: string;
  chunk: number;
  start: number;
  end: number;
  text: string;
  metadata: Record<string, MetadataValue>;
  emb: string;
}

interface StoredIndex {
  version: number;
  fingerprint: Fingerprint;
  savedAt: string;
  embEncoding: "f32-base64";
  entries: StoredEntry[];
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isScalar(v: unknown): v is MetadataScalar {
  return v === null || typeof v === "string" || typeof v === "number" || typeof v === "boolean";
}

function readMetadata(v: unknown): Metadata | null {
  if (!isObject(v)) return null;
  const out: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(v)) {
    if (Array.isArray(value) && value.every(isScalar)) out[key] = value;
    else if (isScalar(value)) out[key] = value;
    else return null;
  }
  return out;
}

function readFingerprint(v: unknown): Fingerprint | null {
  if (!isObject(v)) return null;
  const { modelName, dimension, chunkSize, chunkOverlap } = v;
  if (
    typeof modelName !== "string" ||
    typeof dimension !== "number" ||
    typeof chunkSize !== "number" ||
    typeof chunkOverlap !== "number"
  )
    return null;
  return { modelName, dimension, chunkSize, chunkOverlap };
}

function decodeVector(b64: string): Float32Array | null {
  const buf = Buffer.from(b64, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  const out = new Float32Array(buf.byteLength / 4);
  for (let i = 0; i < out.length; i++) out[i] = buf.readFloatLE(i * 4);
  return out;
}

function encodeVector(v: Float32Array): string {
  const buf = Buffer.alloc(v.length * 4);
  for (let i = 0; i < v.length; i++) buf.writeFloatLE(v[i], i * 4);
  return buf.toString("base64");
}

function readEntry(v: unknown): EmbeddedChunk | null {
  if (!isObject(v)) return null;
  const { id, path: p, chunk, start, end, text, metadata, emb } = v;
  if (
    typeof id !== "string" ||
    typeof p !== "string" ||
    typeof chunk !== "number" ||
    typeof start !== "number" ||
    typeof end !== "number" ||
    typeof text !== "string" ||
    typeof emb !== "string"
  )
    return null;
  const meta = readMetadata(metadata);
  const vec = decodeVector(emb);
  if (!meta || !vec) return null;
  return { id, path: p, chunk, start, end, text, metadata: meta, emb: vec };
}

/**
 * Load / save a {@link VectorIndex} as one JSON artifact. Saves go through a
 * temp file and a rename, so the target is either the previous artifact or
 * the complete new one.
 */
export class IndexStore {
  private readonly storePath: string;
  private readonly verbose: boolean;

  public constructor(storePath: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  public get path(): string {
    return this.storePath;
  }

  /**
   * Read the artifact and check it against `expected`.
   *
   * @throws {IndexIntegrityError} reason `missing`, `corrupted` or
   *         `fingerprint-mismatch`; callers rebuild in every case.
   */
  public async load(expected: Fingerprint): Promise<VectorIndex> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (e) {
      throw new IndexIntegrityError("missing", `No persisted index at ${this.storePath}`, { cause: e });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new IndexIntegrityError("corrupted", `Persisted index is not valid JSON`, { cause: e });
    }
    if (!isObject(parsed) || parsed.version !== STORE_VERSION || !Array.isArray(parsed.entries)) {
      throw new IndexIntegrityError("corrupted", `Persisted index has an unknown layout`);
    }
    const fingerprint = readFingerprint(parsed.fingerprint);
    if (!fingerprint) throw new IndexIntegrityError("corrupted", `Persisted index has no fingerprint`);
    if (!sameFingerprint(fingerprint, expected)) {
      throw new IndexIntegrityError(
        "fingerprint-mismatch",
        `Persisted index was built with ${JSON.stringify(fingerprint)}, current is ${JSON.stringify(expected)}`,
      );
    }

    const entries: EmbeddedChunk[] = [];
    for (const [i, e] of parsed.entries.entries()) {
      const entry = readEntry(e);
      if (!entry) throw new IndexIntegrityError("corrupted", `Persisted entry ${i} is malformed`);
      entries.push(entry);
    }
    let index: VectorIndex;
    try {
      index = new VectorIndex(fingerprint, entries);
    } catch (e) {
      if (e instanceof IndexIntegrityError) {
        throw new IndexIntegrityError("corrupted", `Persisted index is inconsistent: ${e.message}`, { cause: e });
      }
      throw e;
    }
    console.error(`[RAG] Loaded persisted index: ${index.size} chunks.`);
    if (this.verbose) console.error(`[RAG][verbose] Loaded from ${this.storePath}`);
    return index;
  }

  /** Persist a complete index, replacing any previous artifact atomically. */
  public async save(index: VectorIndex): Promise<void> {
    const out: StoredIndex = {
      version: STORE_VERSION,
      fingerprint: index.fingerprint,
      savedAt: new Date().toISOString(),
      embEncoding: "f32-base64",
      entries: index.getEntries().map((e) => ({
        id: e.id,
        path: e.path,
        chunk: e.chunk,
        start: e.start,
        end: e.end,
        text: e.text,
        metadata: { ...e.metadata },
        emb: encodeVector(e.emb),
      })),
    };
    await fs.mkdir(path.dirname(this.storePath), { recursive: true });
    const tmp = `${this.storePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(out));
      await fs.rename(tmp, this.storePath);
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw e;
    }
    if (this.verbose) console.error(`[RAG][verbose] Persisted index to ${this.storePath}`);
  }
}
