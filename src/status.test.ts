import { describe, it, expect } from "vitest";
import { StatusManager } from "./status";

describe("StatusManager", () => {
  it("marks a failed first build as failed", () => {
    const status = new StatusManager();
    status.setPhase("building");
    status.markFailed(new Error("embedding service down"));
    expect(status.getStatus()).toMatchObject({ phase: "failed", ready: false, lastError: "embedding service down" });
  });

  it("stays ready when a rebuild fails behind a live index", () => {
    const status = new StatusManager();
    status.markReady(7, "2024-01-01T00:00:00.000Z");
    status.setPhase("building");
    status.markFailed("disk full");
    expect(status.getStatus()).toMatchObject({
      phase: "ready",
      ready: true,
      indexSize: 7,
      lastBuiltAt: "2024-01-01T00:00:00.000Z",
      lastError: "disk full",
    });
  });

  it("resets the counters when a new build starts", () => {
    const status = new StatusManager();
    status.setDocuments(3, 1);
    status.setChunkTotals(10, 4);
    status.setPhase("building");
    expect(status.getStatus().indexing).toEqual({
      documentsLoaded: 0,
      documentsSkipped: 0,
      chunksTotal: 0,
      chunksEmbedded: 0,
    });
  });
});
