/**
 * Application entry point.
 *
 * 1. Parse and validate configuration (dotenv + environment knobs).
 * 2. Point the transformers model cache at a local directory and load the
 *    embedding model eagerly, so configuration mistakes surface at startup.
 * 3. Load the persisted index when its fingerprint matches the current
 *    model / chunking settings, otherwise build it from DOCS_DIR.
 * 4. Check that the Ollama model used for answers is installed (warning only).
 * 5. Serve the MCP tools over stdio (default) or streamable HTTP.
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - DOCS_DIR               Directory of documents to index (default ./training-data).
 *  - ALLOWED_EXT            Comma list of extensions to index (no leading dots).
 *  - EXCLUDED_FOLDERS       Comma list of folder names skipped during discovery.
 *  - CHUNK_SIZE             Characters per chunk (default 800).
 *  - CHUNK_OVERLAP          Overlap between adjacent chunks (default 120, < CHUNK_SIZE).
 *  - TOP_K                  Default number of chunks retrieved per query (default 5, max 50).
 *  - INDEX_STORE_PATH       Persisted index artifact (default data/index/index.json).
 *  - MODEL_NAME             Embedding model (default Xenova/all-MiniLM-L6-v2).
 *  - TRANSFORMERS_CACHE     Model download directory.
 *  - EMBED_BATCH_SIZE, EMBED_CONCURRENCY, EMBED_MAX_RETRIES, EMBED_TIMEOUT_MS
 *  - EMBED_RETRY_DELAY_MS   Base delay before a batch retry, times the attempt number (default 500).
 *  - OLLAMA_HOST, OLLAMA_MODEL, GENERATION_TIMEOUT_MS, GENERATION_MAX_TOKENS,
 *    GENERATION_TEMPERATURE, GENERATION_REPEAT_PENALTY, GENERATION_CONTEXT_WINDOW
 *  - MCP_TRANSPORT          'stdio' (default) or 'http'/'streamable-http'.
 *  - MCP_PORT, HOST         HTTP listener (default 127.0.0.1:3000).
 *  - VERBOSE                '1'/'true'/'yes'/'on' for progress logging.
 */
import { loadConfig } from "./config";
import { TransformersEmbeddings } from "./embeddings";
import { OllamaGenerator } from "./generation";
import { RagService } from "./rag-service";
import { statusManager } from "./status";
import { createServer } from "./tools";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = loadConfig();

await TransformersEmbeddings.configureCache(config.EMBEDDING.cacheDir);
const embeddings = new TransformersEmbeddings(config.EMBEDDING.modelName);
await embeddings.init();

const generator = new OllamaGenerator(config.GENERATION);
statusManager.setSource(config.DOCS_DIR, embeddings.modelName, generator.modelName);

const rag = new RagService(config, { embeddings, generator });

// Blocks until an index is live; a failed build aborts startup.
await rag.buildOrLoadIndex();

const availability = await generator.checkAvailability();
if (!availability.reachable) {
  console.error(`[RAG] Answers unavailable until Ollama is running at ${config.GENERATION.host}`);
} else if (!availability.installed) {
  console.error(
    `[RAG] Model '${generator.modelName}' not installed in Ollama (available: ${availability.models.join(", ") || "none"}). ` +
      `Run: ollama pull ${generator.modelName}`,
  );
}

const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";
if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(() => createServer(rag), { port: config.MCP_PORT, host: config.HOST });
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(() => createServer(rag));
}
