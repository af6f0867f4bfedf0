import { describe, it, expect, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { GenerationError } from "./errors";
import { buildPrompt } from "./generation";
import { createWorkspace, type Workspace } from "./testing/workspace";

const DOCS = {
  "cats.md": "cat cat",
  "dogs.md": "dog",
  "fish.md": "fish cat",
};

describe("RagService", () => {
  let ws: Workspace | undefined;

  afterEach(async () => {
    await ws?.cleanup();
    ws = undefined;
    vi.restoreAllMocks();
  });

  it("ranks chunks by similarity to the query", async () => {
    ws = await createWorkspace(DOCS);
    await ws.rag.buildOrLoadIndex();
    const hits = await ws.rag.retrieve("cat");
    expect(hits.map((h) => h.id)).toEqual(["cats.md#0", "fish.md#0", "dogs.md#0"]);
    expect(hits[0].score).toBeCloseTo(1, 6);
    expect(hits[1].score).toBeCloseTo(Math.SQRT1_2, 6);
    expect(hits[2].score).toBe(0);
  });

  it("limits results to K and defaults K to TOP_K", async () => {
    ws = await createWorkspace(DOCS, { TOP_K: "2" });
    await ws.rag.buildOrLoadIndex();
    expect(await ws.rag.retrieve("cat")).toHaveLength(2);
    expect((await ws.rag.retrieve("cat", 1)).map((h) => h.id)).toEqual(["cats.md#0"]);
    expect(await ws.rag.retrieve("cat", 10)).toHaveLength(3);
  });

  it("returns nothing from an empty index without embedding the query", async () => {
    ws = await createWorkspace({});
    await ws.rag.buildOrLoadIndex();
    expect(await ws.rag.retrieve("cat")).toEqual([]);
    expect(ws.embeddings.embeddedTexts()).toEqual([]);
  });

  it("sends the retrieved context to the generator and returns its text", async () => {
    ws = await createWorkspace(DOCS);
    await ws.rag.buildOrLoadIndex();
    const { answer, sources } = await ws.rag.answer("cat", 2);
    expect(answer).toBe("fake answer");
    expect(sources.map((h) => h.id)).toEqual(["cats.md#0", "fish.md#0"]);
    expect(ws.generator.prompts).toEqual([buildPrompt("cat", sources)]);
    expect(ws.generator.prompts[0]).toContain("[1] (source: cats.md#0)\ncat cat");
  });

  it("keeps the retrieval on the GenerationError when the model is unreachable", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    ws = await createWorkspace(DOCS);
    await ws.rag.buildOrLoadIndex();
    ws.generator.fail = true;
    const err = await ws.rag.answer("cat", 1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GenerationError);
    expect(err instanceof GenerationError && err.context.map((h) => h.id)).toEqual(["cats.md#0"]);
  });

  it("serves queries from the new snapshot after a rebuild", async () => {
    ws = await createWorkspace(DOCS);
    await ws.rag.buildOrLoadIndex();
    const before = await ws.rag.retrieve("bird");
    expect(before.every((h) => h.score === 0)).toBe(true);

    await fs.writeFile(path.join(ws.config.DOCS_DIR, "birds.md"), "bird");
    await ws.rag.rebuildIndex();
    const [top] = await ws.rag.retrieve("bird", 1);
    expect(top.id).toBe("birds.md#0");
  });
});
