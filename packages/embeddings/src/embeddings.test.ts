import { afterEach, describe, it, expect, vi } from "vitest";
import { BackendUnavailableError, DimensionMismatchError, EmptyInputError } from "@docguard/errors";
import { createEmbeddingProvider } from "./factory.js";
import { HashingEmbeddingProvider, tokenize } from "./hashing-provider.js";
import { OllamaEmbeddingProvider } from "./ollama-provider.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("Embeddings", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("createEmbeddingProvider factory", () => {
    it("creates CohereEmbeddingProvider for type 'cohere'", () => {
      const provider = createEmbeddingProvider({
        provider: "cohere",
        cohere: { apiKey: "test-key" },
      });
      expect(provider.name).toBe("cohere");
      expect(provider.dimensions).toBe(384);
      expect(provider.embed).toBeTypeOf("function");
      expect(provider.batchEmbed).toBeTypeOf("function");
    });

    it("creates OllamaEmbeddingProvider for type 'ollama'", () => {
      const provider = createEmbeddingProvider({
        provider: "ollama",
        ollama: { baseUrl: "http://localhost:11434" },
      });
      expect(provider.name).toBe("ollama");
      expect(provider.dimensions).toBe(384);
    });

    it("creates HashingEmbeddingProvider without extra config", () => {
      const provider = createEmbeddingProvider({ provider: "hashing" });
      expect(provider.name).toBe("hashing");
      expect(provider.dimensions).toBe(384);
    });

    it("respects custom dimensions", () => {
      const provider = createEmbeddingProvider({
        provider: "ollama",
        ollama: { baseUrl: "http://localhost:11434", dimensions: 768 },
      });
      expect(provider.dimensions).toBe(768);
    });

    it("throws for missing cohere config", () => {
      expect(() => createEmbeddingProvider({ provider: "cohere" })).toThrow(
        "Cohere config is required",
      );
    });

    it("throws for missing ollama config", () => {
      expect(() => createEmbeddingProvider({ provider: "ollama" })).toThrow(
        "Ollama config is required",
      );
    });

    it("throws for unknown provider", () => {
      expect(() => createEmbeddingProvider({ provider: "unknown" as "cohere" })).toThrow(
        "Unknown embedding provider",
      );
    });
  });

  describe("HashingEmbeddingProvider", () => {
    const provider = new HashingEmbeddingProvider({ dimensions: 64 });

    it("drops stop words when tokenizing", () => {
      expect(tokenize("What color is the Sky?")).toEqual(["color", "sky"]);
    });

    it("is deterministic", async () => {
      const a = await provider.embed("The sky is blue.");
      const b = await provider.embed("The sky is blue.");
      expect(a.embeddings).toEqual(b.embeddings);
    });

    it("returns unit-length vectors of the configured dimension", async () => {
      const result = await provider.batchEmbed(["The sky is blue.", "Water is wet."]);
      expect(result.embeddings).toHaveLength(2);
      expect(result.dimensions).toBe(64);
      for (const vector of result.embeddings) {
        expect(vector).toHaveLength(64);
        const norm = Math.sqrt(vector.reduce((s, v) => s + v * v, 0));
        expect(norm).toBeCloseTo(1, 10);
      }
    });

    it("returns a zero vector when every token is a stop word", async () => {
      const result = await provider.embed("what is the");
      expect(result.embeddings[0]?.every((v) => v === 0)).toBe(true);
    });

    it("rejects blank text", async () => {
      await expect(provider.embed("   ")).rejects.toBeInstanceOf(EmptyInputError);
      await expect(provider.batchEmbed(["ok", "\n"])).rejects.toBeInstanceOf(EmptyInputError);
      await expect(provider.batchEmbed([])).rejects.toBeInstanceOf(EmptyInputError);
    });

    it("is always healthy", async () => {
      await expect(provider.healthCheck()).resolves.toBe(true);
    });
  });

  describe("OllamaEmbeddingProvider", () => {
    const provider = new OllamaEmbeddingProvider({
      baseUrl: "http://ollama.test:11434/",
      dimensions: 3,
    });

    it("posts the batch to /api/embed and returns vectors in order", async () => {
      const fetchMock = vi.fn().mockResolvedValue(
        jsonResponse({
          model: "all-minilm",
          embeddings: [
            [1, 0, 0],
            [0, 1, 0],
          ],
          prompt_eval_count: 7,
        }),
      );
      vi.stubGlobal("fetch", fetchMock);

      const result = await provider.batchEmbed(["first", "second"]);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("http://ollama.test:11434/api/embed");
      expect(JSON.parse(String(init?.body))).toEqual({ model: "all-minilm", input: ["first", "second"] });
      expect(result.embeddings).toEqual([
        [1, 0, 0],
        [0, 1, 0],
      ]);
      expect(result.tokensUsed).toBe(7);
    });

    it("raises BackendUnavailableError when the server cannot be reached", async () => {
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));
      await expect(provider.embed("hello")).rejects.toBeInstanceOf(BackendUnavailableError);
    });

    it("raises BackendUnavailableError on a 5xx response", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("down", { status: 503 })));
      await expect(provider.embed("hello")).rejects.toBeInstanceOf(BackendUnavailableError);
    });

    it("raises BackendUnavailableError when the response body fails mid-read", async () => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"embeddings":[[1,'));
          controller.error(new Error("body timeout"));
        },
      });
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(body, { status: 200 })));

      await expect(provider.embed("hello")).rejects.toBeInstanceOf(BackendUnavailableError);
    });

    it("raises DimensionMismatchError for vectors of the wrong length", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ embeddings: [[1, 2]] })));
      await expect(provider.embed("hello")).rejects.toBeInstanceOf(DimensionMismatchError);
    });

    it("does not call the backend for blank input", async () => {
      const fetchMock = vi.fn();
      vi.stubGlobal("fetch", fetchMock);
      await expect(provider.embed(" ")).rejects.toBeInstanceOf(EmptyInputError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("reports health from /api/tags", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ models: [] })));
      await expect(provider.healthCheck()).resolves.toBe(true);

      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));
      await expect(provider.healthCheck()).resolves.toBe(false);
    });
  });
});
