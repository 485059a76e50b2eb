import { afterEach, describe, expect, it, jest } from "@jest/globals";
import { z } from "zod";
import { loadRagConfig } from "../config.js";
import { createEmbeddingFunction, embedQuery, OpenRouterEmbeddingFunction } from "../embedding-service.js";
import { RagErrorCode } from "../errors.js";
import { HashingEmbeddingFunction, tokenize } from "../hashing-embedder.js";

const requestSchema = z.object({ model: z.string(), input: z.array(z.string()) });

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("HashingEmbeddingFunction", () => {
  const embedder = new HashingEmbeddingFunction(256);

  it("names the model after its dimensionality", () => {
    expect(embedder.modelId).toBe("hashing-fnv1a-256");
  });

  it("tokenizes on anything that is not a letter or digit", () => {
    expect(tokenize("The quick, brown FOX!")).toEqual(["the", "quick", "brown", "fox"]);
  });

  it("returns one unit-length vector per text in order", async () => {
    const vectors = await embedder.embed(["quick fox", "lazy dog"]);
    expect(vectors).toHaveLength(2);
    for (const vector of vectors) {
      expect(vector).toHaveLength(256);
      expect(Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0))).toBeCloseTo(1, 10);
    }
  });

  it("is deterministic and case-insensitive", async () => {
    const [a] = await embedder.embed(["Quick Fox"]);
    const [b] = await new HashingEmbeddingFunction(256).embed(["quick fox"]);
    expect(a).toEqual(b);
  });

  it("hashes punctuation-only text whole and maps blank text to zeros", async () => {
    const [punct, blank] = await embedder.embed(["!!!", "  "]);
    expect(punct?.some((v) => v > 0)).toBe(true);
    expect(blank?.every((v) => v === 0)).toBe(true);
  });
});

describe("OpenRouterEmbeddingFunction", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("batches requests and reassembles vectors in input order", async () => {
    const fetchMock = jest.spyOn(globalThis, "fetch").mockImplementation(async (_input, init) => {
      const body = requestSchema.parse(JSON.parse(String(init?.body)));
      return jsonResponse({ data: body.input.map((text) => ({ embedding: [text.length, 1] })) });
    });
    const progress: Array<[number, number]> = [];
    const embedder = new OpenRouterEmbeddingFunction({
      apiKey: "test-key",
      model: "test-model",
      batchSize: 2,
      concurrency: 2,
      onProgress: (done, total) => progress.push([done, total]),
    });

    const vectors = await embedder.embed(["a", "bb", "ccc"]);

    expect(vectors).toEqual([
      [1, 1],
      [2, 1],
      [3, 1],
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(progress[progress.length - 1]).toEqual([3, 3]);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://openrouter.ai/api/v1/embeddings");
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-key",
      "Content-Type": "application/json",
    });
    expect(requestSchema.parse(JSON.parse(String(init?.body)))).toEqual({ model: "test-model", input: ["a", "bb"] });
  });

  it("surfaces API errors as EMBEDDING_FAILURE", async () => {
    jest.spyOn(globalThis, "fetch").mockImplementation(async () => new Response("boom", { status: 500 }));
    const embedder = new OpenRouterEmbeddingFunction({ apiKey: "test-key", model: "m", batchSize: 10, concurrency: 1 });

    await expect(embedder.embed(["x"])).rejects.toMatchObject({
      code: RagErrorCode.EMBEDDING_FAILURE,
      message: "Embedding API error (500): boom",
    });
  });

  it("rejects a response without embeddings", async () => {
    jest.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse({ error: "nope" }));
    const embedder = new OpenRouterEmbeddingFunction({ apiKey: "test-key", model: "m", batchSize: 10, concurrency: 1 });

    await expect(embedder.embed(["x"])).rejects.toMatchObject({ code: RagErrorCode.EMBEDDING_FAILURE });
  });

  it("rejects a response with the wrong number of embeddings", async () => {
    jest.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse({ data: [{ embedding: [1] }] }));
    const embedder = new OpenRouterEmbeddingFunction({ apiKey: "test-key", model: "m", batchSize: 10, concurrency: 1 });

    await expect(embedder.embed(["x", "y"])).rejects.toMatchObject({
      code: RagErrorCode.EMBEDDING_FAILURE,
      message: "Embedding count mismatch: texts=2 embeddings=1",
    });
  });
});

describe("createEmbeddingFunction", () => {
  it("builds the hashing embedder by default", () => {
    const embedder = createEmbeddingFunction(loadRagConfig({ RAG_HASHING_DIMENSIONS: "64" }));
    expect(embedder.modelId).toBe("hashing-fnv1a-64");
  });

  it("builds the OpenRouter embedder for the configured model", () => {
    const embedder = createEmbeddingFunction(
      loadRagConfig({
        RAG_EMBEDDING_PROVIDER: "openrouter",
        RAG_EMBEDDING_MODEL: "test-model",
        OPENROUTER_API_KEY: "test-key",
      }),
    );
    expect(embedder).toBeInstanceOf(OpenRouterEmbeddingFunction);
    expect(embedder.modelId).toBe("test-model");
  });
});

describe("embedQuery", () => {
  it("embeds a single-element batch", async () => {
    const embedder = new HashingEmbeddingFunction(8);
    const [expected] = await embedder.embed(["quick fox"]);
    expect(await embedQuery(embedder, "quick fox")).toEqual(expected);
  });
});
