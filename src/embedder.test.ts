import { describe, it, expect } from "vitest";
import { Embedder, type EmbedderOptions } from "./embedder";
import type { EmbeddingOracle } from "./embeddings";
import { EmbeddingError, TimeoutError } from "./errors";
import { FakeEmbeddings } from "./testing/fakes";

const opts = (over: Partial<EmbedderOptions> = {}): EmbedderOptions => ({
  batchSize: 2,
  concurrency: 1,
  maxRetries: 2,
  timeoutMs: 1000,
  retryDelayMs: 0,
  ...over,
});

/** Oracle whose batches finish in reverse order of submission. */
class SlowFirstOracle implements EmbeddingOracle {
  readonly modelName = "slow-first";
  private calls = 0;
  async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    const delay = Math.max(0, 40 - this.calls++ * 10);
    await new Promise((r) => setTimeout(r, delay));
    return texts.map((t) => Float32Array.of(Number(t)));
  }
}

/** "cat" always fails at once; every other text settles after `delayMs`. */
class OneBadBatchOracle implements EmbeddingOracle {
  readonly modelName = "one-bad-batch";
  readonly calls: string[] = [];
  constructor(
    private readonly delayMs: number,
    private readonly othersFail: boolean,
  ) {}
  async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    this.calls.push(...texts);
    if (texts.includes("cat")) throw new Error("cat batch rejected");
    await new Promise((r) => setTimeout(r, this.delayMs));
    if (this.othersFail) throw new Error("slow batch rejected");
    return texts.map(() => Float32Array.of(1));
  }
}

const settle = () => new Promise((r) => setTimeout(r, 60));

describe("Embedder", () => {
  it("embeds in batches and preserves input order", async () => {
    const oracle = new FakeEmbeddings();
    const embedder = new Embedder(oracle, opts());
    const vectors = await embedder.embedAll(["cat", "dog dog", "fish", "bird", "cat fish"]);
    expect(oracle.calls).toEqual([["cat", "dog dog"], ["fish", "bird"], ["cat fish"]]);
    expect(vectors.map((v) => Array.from(v))).toEqual([
      [1, 0, 0, 0],
      [0, 2, 0, 0],
      [0, 0, 1, 0],
      [0, 0, 0, 1],
      [1, 0, 1, 0],
    ]);
  });

  it("keeps order when parallel batches finish out of order", async () => {
    const embedder = new Embedder(new SlowFirstOracle(), opts({ batchSize: 1, concurrency: 4 }));
    const vectors = await embedder.embedAll(["1", "2", "3", "4"]);
    expect(vectors.map((v) => v[0])).toEqual([1, 2, 3, 4]);
  });

  it("reports progress after each batch", async () => {
    const seen: Array<[number, number]> = [];
    await new Embedder(new FakeEmbeddings(), opts()).embedAll(["a", "b", "c"], (n, total) => seen.push([n, total]));
    expect(seen).toEqual([
      [2, 3],
      [3, 3],
    ]);
  });

  it("retries a failing batch and succeeds within the retry budget", async () => {
    const oracle = new FakeEmbeddings();
    oracle.failNext = 2;
    const vectors = await new Embedder(oracle, opts({ maxRetries: 2 })).embedAll(["cat"]);
    expect(oracle.calls).toHaveLength(3);
    expect(Array.from(vectors[0])).toEqual([1, 0, 0, 0]);
  });

  it("throws EmbeddingError once retries are exhausted", async () => {
    const oracle = new FakeEmbeddings();
    oracle.alwaysFail = true;
    const err = await new Embedder(oracle, opts({ maxRetries: 1 }))
      .embedAll(["cat", "dog", "fish"])
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingError);
    expect(err).toMatchObject({ batch: 0, attempts: 2, code: "EMBEDDING_FAILED" });
    // first batch failed twice; the second batch is never attempted
    expect(oracle.calls).toEqual([
      ["cat", "dog"],
      ["cat", "dog"],
    ]);
  });

  it("treats a call exceeding the timeout as a failed attempt", async () => {
    const oracle = new FakeEmbeddings();
    oracle.delayMs = 50;
    const err = await new Embedder(oracle, opts({ timeoutMs: 5, maxRetries: 0 }))
      .embedQuery("cat")
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingError);
    expect(err instanceof EmbeddingError && err.cause).toBeInstanceOf(TimeoutError);
  });

  it("rejects vectors whose dimension differs from the probed one", async () => {
    let dim = 3;
    const oracle: EmbeddingOracle = {
      modelName: "shifty",
      embedBatch: async (texts) => texts.map(() => new Float32Array(dim)),
    };
    const embedder = new Embedder(oracle, opts({ maxRetries: 0 }));
    expect(await embedder.dimension()).toBe(3);
    dim = 4;
    await expect(embedder.embedQuery("x")).rejects.toBeInstanceOf(EmbeddingError);
  });

  it("probes the dimension once", async () => {
    const oracle = new FakeEmbeddings();
    const embedder = new Embedder(oracle, opts());
    expect(await embedder.dimension()).toBe(4);
    expect(await embedder.dimension()).toBe(4);
    expect(oracle.calls).toEqual([["dimension probe"]]);
  });

  it("returns nothing for no input", async () => {
    const oracle = new FakeEmbeddings();
    expect(await new Embedder(oracle, opts()).embedAll([])).toEqual([]);
    expect(oracle.calls).toEqual([]);
  });

  it("stops retrying in-flight batches once another batch has failed", async () => {
    const oracle = new OneBadBatchOracle(20, true);
    const embedder = new Embedder(oracle, opts({ batchSize: 1, concurrency: 2, maxRetries: 3 }));
    await expect(embedder.embedAll(["cat", "dog"])).rejects.toBeInstanceOf(EmbeddingError);
    await settle();
    expect(oracle.calls.filter((t) => t === "cat")).toHaveLength(4);
    expect(oracle.calls.filter((t) => t === "dog")).toHaveLength(1);
  });

  it("reports no progress after the pool has failed", async () => {
    const seen: number[] = [];
    const embedder = new Embedder(new OneBadBatchOracle(20, false), opts({ batchSize: 1, concurrency: 2, maxRetries: 0 }));
    await expect(embedder.embedAll(["cat", "dog"], (n) => seen.push(n))).rejects.toBeInstanceOf(EmbeddingError);
    await settle();
    expect(seen).toEqual([]);
  });
});
