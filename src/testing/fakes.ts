import type { EmbeddingOracle } from "../embeddings";
import type { GenerationOracle } from "../generation";

/** Words whose occurrence counts make up the fake embedding, one axis each. */
export const AXES = ["cat", "dog", "fish", "bird"] as const;

/**
 * Deterministic stand-in for the embedding model: each vector counts how
 * often every word in {@link AXES} occurs in the (lower-cased) text.
 */
export class FakeEmbeddings implements EmbeddingOracle {
  public readonly modelName: string;
  public readonly calls: string[][] = [];
  /** Number of upcoming calls that reject. */
  public failNext = 0;
  /** Reject every call. */
  public alwaysFail = false;
  /** Milliseconds each call takes before resolving. */
  public delayMs = 0;

  public constructor(modelName = "fake-model") {
    this.modelName = modelName;
  }

  public static vector(text: string): Float32Array {
    const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
    return Float32Array.from(AXES, (axis) => words.filter((w) => w === axis).length);
  }

  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    this.calls.push([...texts]);
    if (this.delayMs) await new Promise((r) => setTimeout(r, this.delayMs));
    if (this.alwaysFail) throw new Error("embedding service down");
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error("transient embedding failure");
    }
    return texts.map((t) => FakeEmbeddings.vector(t));
  }

  /** Texts embedded so far, excluding dimension probes. */
  public embeddedTexts(): string[] {
    return this.calls.flat().filter((t) => t !== "dimension probe");
  }
}

/** Records prompts and answers with a fixed string, or fails on demand. */
export class FakeGenerator implements GenerationOracle {
  public readonly modelName = "fake-llm";
  public readonly prompts: string[] = [];
  public fail = false;

  public constructor(private readonly reply = "fake answer") {}

  public async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.fail) throw new Error("connect ECONNREFUSED 127.0.0.1:11434");
    return this.reply;
  }
}
