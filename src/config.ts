import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./errors";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Single dotenv.config() call. Prefer the project-root .env so running from
// another cwd still picks it up.
(() => {
  try {
    const __dirname = path.dirname(fileURLToPath(import.meta.url));
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[RAG] Could not resolve project .env, using cwd:", e);
  }
  dotenv.config();
})();

/** Upper bound for TOP_K and for a per-request `top_k`. */
export const MAX_TOP_K = 50;

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface GenerationSettings {
  readonly host: string;
  readonly model: string;
  readonly timeoutMs: number;
  /** Maximum number of tokens to generate (ollama `num_predict`). */
  readonly maxTokens: number;
  readonly temperature: number;
  readonly repeatPenalty: number;
  /** Context window passed to the model (ollama `num_ctx`). */
  readonly contextWindow: number;
}

export interface EmbeddingSettings {
  readonly modelName: string;
  readonly cacheDir: string | undefined;
  readonly batchSize: number;
  readonly concurrency: number;
  /** Retries after the first failed attempt of a batch. */
  readonly maxRetries: number;
  readonly timeoutMs: number;
  readonly retryDelayMs: number;
}

export interface Config {
  readonly DOCS_DIR: string;
  readonly ALLOWED_EXT: readonly string[];
  readonly EXCLUDED_FOLDERS: readonly string[];
  readonly VERBOSE: boolean;
  readonly CHUNK_SIZE: number;
  readonly CHUNK_OVERLAP: number;
  readonly TOP_K: number;
  readonly INDEX_STORE_PATH: string;
  readonly EMBEDDING: EmbeddingSettings;
  readonly GENERATION: GenerationSettings;
  readonly MCP_TRANSPORT: string;
  readonly MCP_PORT: number;
  readonly HOST: string;
}

type Env = Readonly<Record<string, string | undefined>>;

function list(raw: string | undefined, fallback: string[]): string[] {
  const parsed = raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return parsed?.length ? parsed : fallback;
}

function flag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Integer knob; unset falls back to the default, garbage is a ConfigError. */
function int(env: Env, key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ConfigError(`${key} must be an integer in [${min}, ${max}], got "${raw}"`);
  }
  return n;
}

function num(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min || n > max) {
    throw new ConfigError(`${key} must be a number in [${min}, ${max}], got "${raw}"`);
  }
  return n;
}

/**
 * Parse and validate every recognized knob once. The returned object is
 * frozen and handed to each component's constructor.
 *
 * @throws {ConfigError} on malformed values or CHUNK_OVERLAP >= CHUNK_SIZE.
 */
export function loadConfig(env: Env = process.env): Config {
  const DOCS_DIR = path.resolve(env.DOCS_DIR?.trim() || "training-data");

  // Extensions without leading dots, lower-cased for matching.
  const ALLOWED_EXT = list(env.ALLOWED_EXT, [
    "md",
    "markdown",
    "mdx",
    "txt",
    "log",
    "adoc",
    "rst",
    "pdf",
    "docx",
    "csv",
    "tsv",
    "json",
  ]).map((e) => e.replace(/^\./, "").toLowerCase());

  // Folder names (not globs) pruned during traversal.
  const EXCLUDED_FOLDERS = list(env.EXCLUDED_FOLDERS, ["node_modules", ".git", "dist", "build", ".cache"]);

  const CHUNK_SIZE = int(env, "CHUNK_SIZE", 800, 1, 8000);
  const CHUNK_OVERLAP = int(env, "CHUNK_OVERLAP", 120, 0, 4000);
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    throw new ConfigError(
      `CHUNK_OVERLAP (=${CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (=${CHUNK_SIZE})`,
    );
  }

  const EMBEDDING: EmbeddingSettings = Object.freeze({
    modelName: env.MODEL_NAME?.trim() || "Xenova/all-MiniLM-L6-v2",
    cacheDir: env.TRANSFORMERS_CACHE?.trim() || undefined,
    batchSize: int(env, "EMBED_BATCH_SIZE", 16, 1, 1024),
    concurrency: int(env, "EMBED_CONCURRENCY", 1, 1, 64),
    maxRetries: int(env, "EMBED_MAX_RETRIES", 2, 0, 10),
    timeoutMs: int(env, "EMBED_TIMEOUT_MS", 60_000, 1),
    retryDelayMs: int(env, "EMBED_RETRY_DELAY_MS", 500, 0),
  });

  const GENERATION: GenerationSettings = Object.freeze({
    host: env.OLLAMA_HOST?.trim() || "http://127.0.0.1:11434",
    model: env.OLLAMA_MODEL?.trim() || "qwen3:1.7b",
    timeoutMs: int(env, "GENERATION_TIMEOUT_MS", 300_000, 1),
    maxTokens: int(env, "GENERATION_MAX_TOKENS", 1024, 1),
    temperature: num(env, "GENERATION_TEMPERATURE", 0.1, 0, 2),
    repeatPenalty: num(env, "GENERATION_REPEAT_PENALTY", 1.1, 0, 10),
    contextWindow: int(env, "GENERATION_CONTEXT_WINDOW", 4096, 256),
  });

  return Object.freeze({
    DOCS_DIR,
    ALLOWED_EXT: Object.freeze(ALLOWED_EXT),
    EXCLUDED_FOLDERS: Object.freeze(EXCLUDED_FOLDERS),
    VERBOSE: flag(env.VERBOSE),
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    TOP_K: int(env, "TOP_K", 5, 1, MAX_TOP_K),
    INDEX_STORE_PATH: path.resolve(env.INDEX_STORE_PATH?.trim() || "data/index/index.json"),
    EMBEDDING,
    GENERATION,
    // 'stdio' (default) or 'http'/'streamable-http'.
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
    MCP_PORT: int(env, "MCP_PORT", 3000, 1, 65535),
    HOST: env.HOST?.trim() || "127.0.0.1",
  });
}
