import type { Config } from "./config";
import { Embedder } from "./embedder";
import type { EmbeddingOracle } from "./embeddings";
import { GenerationOrchestrator, type GenerationOracle } from "./generation";
import { IndexManager } from "./indexer";
import { SourceLoader } from "./loader";
import { IndexStore } from "./persistence";
import { Retriever } from "./retriever";
import type { StatusManager } from "./status";
import type { RetrievalResult } from "./types";
import type { VectorIndex } from "./vector-index";

export interface Answer {
  answer: string;
  sources: RetrievalResult;
}

export interface RagServiceDeps {
  embeddings: EmbeddingOracle;
  generator: GenerationOracle;
  status?: StatusManager;
}

/**
 * The surface consumed by front-ends: build or load the index, retrieve
 * chunks for a query, generate an answer from retrieved chunks. Everything
 * is wired from one validated {@link Config}.
 */
export class RagService {
  public readonly indexManager: IndexManager;
  private readonly retriever: Retriever;
  private readonly orchestrator: GenerationOrchestrator;
  private readonly defaultK: number;

  public constructor(config: Config, deps: RagServiceDeps) {
    const embedder = new Embedder(deps.embeddings, { ...config.EMBEDDING, verbose: config.VERBOSE });
    this.indexManager = new IndexManager({
      docsDir: config.DOCS_DIR,
      loader: new SourceLoader({
        allowedExt: config.ALLOWED_EXT,
        excludedFolders: config.EXCLUDED_FOLDERS,
        verbose: config.VERBOSE,
      }),
      embedder,
      store: new IndexStore(config.INDEX_STORE_PATH, config.VERBOSE),
      chunkSize: config.CHUNK_SIZE,
      chunkOverlap: config.CHUNK_OVERLAP,
      verbose: config.VERBOSE,
      status: deps.status,
    });
    this.retriever = new Retriever(embedder, () => this.indexManager.current());
    this.orchestrator = new GenerationOrchestrator(deps.generator);
    this.defaultK = config.TOP_K;
  }

  /** Load the persisted index if compatible, otherwise build it. */
  public buildOrLoadIndex(): Promise<VectorIndex> {
    return this.indexManager.buildOrLoad();
  }

  /** Rebuild from the source directory and swap the result in. */
  public rebuildIndex(): Promise<VectorIndex> {
    return this.indexManager.rebuild();
  }

  public retrieve(query: string, k: number = this.defaultK): Promise<RetrievalResult> {
    return this.retriever.retrieve(query, k);
  }

  public generate(query: string, context: RetrievalResult): Promise<string> {
    return this.orchestrator.generate(query, context);
  }

  /** Retrieve then generate. A GenerationError still carries the sources. */
  public async answer(query: string, k: number = this.defaultK): Promise<Answer> {
    const sources = await this.retrieve(query, k);
    const answer = await this.generate(query, sources);
    return { answer, sources };
  }
}
