import { describe, it, expect } from "vitest";
import { chunkDocument, windows } from "./chunker";
import { ConfigError } from "./errors";
import type { Document } from "./types";

const doc = (text: string): Document => ({
  path: "notes/a.md",
  text,
  metadata: { source: "notes/a.md", title: "A" },
  fileType: "markdown",
});

function splitChunks(text: string, size: number, overlap: number): string[] {
  return Array.from(windows(text.length, size, overlap), ([s, e]) => text.slice(s, e));
}

/** Rebuild the text from each chunk's non-overlapping prefix. */
function reassemble(text: string, size: number, overlap: number): string {
  const bounds = [...windows(text.length, size, overlap)];
  return bounds
    .map(([start, end], i) => (i + 1 < bounds.length ? text.slice(start, bounds[i + 1][0]) : text.slice(start, end)))
    .join("");
}

describe("chunker", () => {
  it("splits with the configured overlap and a shorter final window", () => {
    expect(splitChunks("abcdefghij", 4, 1)).toEqual(["abcd", "defg", "ghij"]);
    expect(splitChunks("abcdefghijk", 4, 1)).toEqual(["abcd", "defg", "ghij", "jk"]);
  });

  it("produces ceil((L - o) / (s - o)) chunks for texts longer than the window", () => {
    const cases: Array<[number, number, number]> = [
      [10, 4, 1],
      [11, 4, 1],
      [1000, 100, 0],
      [1001, 100, 10],
      [2500, 800, 120],
    ];
    for (const [length, size, overlap] of cases) {
      const text = "x".repeat(length);
      expect(splitChunks(text, size, overlap)).toHaveLength(Math.ceil((length - overlap) / (size - overlap)));
    }
  });

  it("reconstructs the text exactly from non-overlapping prefixes", () => {
    const text = "The quick brown fox jumps over the lazy dog. ".repeat(7);
    for (const [size, overlap] of [
      [10, 3],
      [50, 0],
      [64, 63],
      [1000, 10],
    ]) {
      expect(reassemble(text, size, overlap)).toBe(text);
    }
  });

  it("keeps consecutive chunks overlapping by exactly the overlap", () => {
    const chunks = splitChunks("0123456789abcdefghij", 6, 2);
    for (let i = 1; i < chunks.length; i++) {
      expect(chunks[i].slice(0, 2)).toBe(chunks[i - 1].slice(4, 6));
    }
  });

  it("returns one chunk for short text and none for empty text", () => {
    expect(splitChunks("short", 800, 120)).toEqual(["short"]);
    expect(splitChunks("x".repeat(800), 800, 120)).toHaveLength(1);
    expect(splitChunks("", 800, 120)).toEqual([]);
  });

  it("rejects overlap >= size as a configuration error", () => {
    expect(() => splitChunks("abc", 4, 4)).toThrow(ConfigError);
    expect(() => splitChunks("abc", 4, 5)).toThrow(ConfigError);
    expect(() => splitChunks("abc", 0, 0)).toThrow(ConfigError);
    expect(() => splitChunks("abc", 4, -1)).toThrow(ConfigError);
  });

  it("annotates document chunks with index, offsets and inherited metadata", () => {
    const chunks = [...chunkDocument(doc("abcdefghij"), 4, 1)];
    expect(chunks.map((c) => [c.chunk, c.start, c.end, c.text])).toEqual([
      [0, 0, 4, "abcd"],
      [1, 3, 7, "defg"],
      [2, 6, 10, "ghij"],
    ]);
    expect(chunks.every((c) => c.path === "notes/a.md" && c.metadata.title === "A")).toBe(true);
  });

  it("is lazy: windows are produced on demand", () => {
    const gen = chunkDocument(doc("y".repeat(10_000)), 10, 2);
    expect(gen.next().value?.text).toBe("y".repeat(10));
    expect(gen.next().value?.start).toBe(8);
  });
});
