import { APP_VERSION } from "./config";

/** Counters for the most recent (or in-flight) build. */
export interface IndexingStatus {
  documentsLoaded: number;
  documentsSkipped: number;
  chunksTotal: number;
  chunksEmbedded: number;
}

export type IndexPhase = "idle" | "loading" | "building" | "ready" | "failed";

/**
 * Snapshot of process lifecycle + index state, served by `/health`.
 * `ready` stays true while a rebuild runs because the previous index keeps
 * serving queries until the swap.
 */
export interface ServerStatus {
  version: string;
  docsDir: string;
  modelName: string;
  generationModel: string;
  transport: string;
  phase: IndexPhase;
  ready: boolean;
  /** Number of chunks in the index currently serving queries. */
  indexSize: number;
  lastBuiltAt: string | null;
  lastError: string | null;
  startedAt: string;
  indexing: IndexingStatus;
}

function emptyCounters(): IndexingStatus {
  return { documentsLoaded: 0, documentsSkipped: 0, chunksTotal: 0, chunksEmbedded: 0 };
}

/** Centralizes mutation of the status object. */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      docsDir: initial?.docsDir ?? "",
      modelName: initial?.modelName ?? "",
      generationModel: initial?.generationModel ?? "",
      transport: initial?.transport ?? "unknown",
      phase: initial?.phase ?? "idle",
      ready: initial?.ready ?? false,
      indexSize: initial?.indexSize ?? 0,
      lastBuiltAt: initial?.lastBuiltAt ?? null,
      lastError: initial?.lastError ?? null,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: initial?.indexing ?? emptyCounters(),
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setSource(docsDir: string, modelName: string, generationModel: string) {
    this.data.docsDir = docsDir;
    this.data.modelName = modelName;
    this.data.generationModel = generationModel;
  }

  public setPhase(phase: IndexPhase) {
    this.data.phase = phase;
    if (phase === "building") this.data.indexing = emptyCounters();
  }

  public setDocuments(loaded: number, skipped: number) {
    this.data.indexing.documentsLoaded = loaded;
    this.data.indexing.documentsSkipped = skipped;
  }

  public setChunkTotals(total: number, embedded = 0) {
    this.data.indexing.chunksTotal = total;
    this.data.indexing.chunksEmbedded = embedded;
  }

  public setEmbedded(count: number) {
    this.data.indexing.chunksEmbedded = count;
  }

  /** A new index is live. */
  public markReady(indexSize: number, builtAt: string = new Date().toISOString()) {
    this.data.phase = "ready";
    this.data.ready = true;
    this.data.indexSize = indexSize;
    this.data.lastBuiltAt = builtAt;
    this.data.lastError = null;
  }

  /** A build failed; readiness reflects whether an older index still serves. */
  public markFailed(error: unknown) {
    this.data.phase = this.data.ready ? "ready" : "failed";
    this.data.lastError = error instanceof Error ? error.message : String(error);
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Singleton used by the index manager and the /health route.
export const statusManager = new StatusManager();
