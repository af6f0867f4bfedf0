import type { Embedder } from "./embedder";
import type { RetrievalResult } from "./types";
import type { VectorIndex } from "./vector-index";

/**
 * Embeds a query and runs it against whichever index snapshot is live at
 * call time. The snapshot is read once, so a concurrent swap never mixes two
 * indexes within one retrieval.
 */
export class Retriever {
  public constructor(
    private readonly embedder: Embedder,
    private readonly snapshot: () => VectorIndex,
  ) {}

  /**
   * @returns Up to `k` hits, highest score first. An empty index yields `[]`
   *          without calling the embedding model.
   */
  public async retrieve(query: string, k: number): Promise<RetrievalResult> {
    const index = this.snapshot();
    if (index.size === 0 || k <= 0) return [];
    const vector = await this.embedder.embedQuery(query);
    return index.query(vector, k);
  }
}
