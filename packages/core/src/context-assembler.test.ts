import { describe, it, expect } from "vitest";
import type { ScoredChunk } from "@docguard/types";
import { assembleContext, buildAnswerPrompt, fitPromptToBudget } from "./context-assembler.js";

function chunk(id: string, score: number, content: string): ScoredChunk {
  return { chunkId: id, documentId: id.split("#")[0] ?? id, index: 0, content, score, metadata: {} };
}

const CHUNKS: ScoredChunk[] = [
  chunk("doc-1#0", 0.95, "First chunk content."),
  chunk("doc-2#0", 0.85, "Second chunk content."),
];

describe("assembleContext", () => {
  it("returns empty string for no chunks", () => {
    expect(assembleContext([])).toBe("");
  });

  it("numbers chunks and names their source", () => {
    expect(assembleContext(CHUNKS)).toBe(
      "[1] (Source: doc-1)\nFirst chunk content.\n\n[2] (Source: doc-2)\nSecond chunk content.",
    );
  });
});

describe("buildAnswerPrompt", () => {
  it("keeps the question verbatim and states the organizational values", () => {
    const prompt = buildAnswerPrompt("  What color is the sky?  ", CHUNKS, "candor and care");

    expect(prompt).toContain("Question:   What color is the sky?  \n");
    expect(prompt).toContain("our values of candor and care.");
    expect(prompt).toContain("[1] (Source: doc-1)\nFirst chunk content.");
  });

  it("says so when there is no context", () => {
    expect(buildAnswerPrompt("Anything?", [])).toContain("Context:\n(no relevant passages were found)\n");
  });
});

describe("fitPromptToBudget", () => {
  const long = "x".repeat(400);
  const low = chunk("a#0", 0.5, long);
  const high = chunk("b#0", 0.9, long);
  const mid = chunk("c#0", 0.7, long);
  const chunks = [low, high, mid];

  it("keeps everything when the budget allows", () => {
    const result = fitPromptToBudget("Why?", chunks, 10_000);

    expect(result.used.map((c) => c.chunkId)).toEqual(["b#0", "c#0", "a#0"]);
    expect(result.dropped).toEqual([]);
  });

  it("drops the lowest-scoring chunks first", () => {
    const budget = Math.ceil(buildAnswerPrompt("Why?", [high, mid]).length / 4);

    const result = fitPromptToBudget("Why?", chunks, budget);

    expect(result.used.map((c) => c.chunkId)).toEqual(["b#0", "c#0"]);
    expect(result.dropped.map((c) => c.chunkId)).toEqual(["a#0"]);
    expect(Math.ceil(result.prompt.length / 4)).toBeLessThanOrEqual(budget);
  });

  it("never shortens the question, even when it alone exceeds the budget", () => {
    const question = "q".repeat(200);

    const result = fitPromptToBudget(question, chunks, 10);

    expect(result.used).toEqual([]);
    expect(result.dropped).toHaveLength(3);
    expect(result.prompt).toContain(`Question: ${question}\n`);
  });
});
