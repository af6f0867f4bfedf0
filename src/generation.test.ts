import { describe, it, expect, vi, afterEach } from "vitest";
import { GenerationError } from "./errors";
import { GenerationOrchestrator, buildPrompt } from "./generation";
import { FakeGenerator } from "./testing/fakes";
import type { RetrievalHit } from "./types";

const hit = (path: string, chunk: number, text: string): RetrievalHit => ({
  id: `${path}#${chunk}`,
  path,
  chunk,
  text,
  metadata: { source: path },
  score: 0.5,
});

const INSTRUCTION =
  "You are a helpful assistant answering questions about a private document collection. " +
  "Answer using only the context below. If the context does not contain the answer, say so. " +
  "Cite sources by their bracketed number.";

describe("buildPrompt", () => {
  it("numbers each context block and names its source", () => {
    const prompt = buildPrompt("Where is the cat?", [hit("a.md", 0, "The cat is here."), hit("b/c.txt", 3, "No cat.")]);
    expect(prompt).toBe(
      `${INSTRUCTION}\n\nContext:\n` +
        "[1] (source: a.md#0)\nThe cat is here.\n\n" +
        "[2] (source: b/c.txt#3)\nNo cat.\n\n" +
        "Question: Where is the cat?\n\nAnswer:",
    );
  });

  it("says so when nothing was retrieved", () => {
    expect(buildPrompt("q", [])).toBe(`${INSTRUCTION}\n\nContext:\n(no relevant context found)\n\nQuestion: q\n\nAnswer:`);
  });
});

describe("GenerationOrchestrator", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("calls the model once and returns its output unmodified", async () => {
    const generator = new FakeGenerator("  Cats sleep a lot.\n");
    const out = await new GenerationOrchestrator(generator).generate("q", [hit("a.md", 0, "x")]);
    expect(out).toBe("  Cats sleep a lot.\n");
    expect(generator.prompts).toHaveLength(1);
  });

  it("wraps model failures in a GenerationError that keeps the context", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const generator = new FakeGenerator();
    generator.fail = true;
    const context = [hit("a.md", 0, "x")];
    const err = await new GenerationOrchestrator(generator).generate("q", context).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GenerationError);
    expect(err).toMatchObject({
      code: "GENERATION_UNAVAILABLE",
      message: "Could not generate a response: connect ECONNREFUSED 127.0.0.1:11434",
    });
    expect(err instanceof GenerationError && err.context).toBe(context);
    expect(err instanceof GenerationError && err.cause).toBeInstanceOf(Error);
  });
});
