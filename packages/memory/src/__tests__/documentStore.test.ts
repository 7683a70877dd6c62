import { describe, expect, it } from "vitest";
import { type EmbeddingProvider, InMemoryDocumentStore } from "../semantic/documentStore";

function createStore(): InMemoryDocumentStore {
  return new InMemoryDocumentStore();
}

async function seed(store: InMemoryDocumentStore): Promise<void> {
  await store.add([
    { id: "a", content: "Paris is the capital of France", metadata: { lang: "en" } },
    { id: "b", content: "Berlin is in Germany", metadata: { lang: "en" } },
    { id: "c", content: "The capital city list", metadata: { lang: "fr" } },
  ]);
}

describe("InMemoryDocumentStore", () => {
  it("ranks keyword matches by score", async () => {
    const store = createStore();
    await seed(store);

    const results = await store.search("capital");

    expect(results.map((doc) => doc.id)).toEqual(["c", "a"]);
  });

  it("honours topK", async () => {
    const store = createStore();
    await seed(store);

    const results = await store.search("capital", { topK: 1 });

    expect(results.map((doc) => doc.id)).toEqual(["c"]);
  });

  it("applies metadata filters", async () => {
    const store = createStore();
    await seed(store);

    const results = await store.search("capital", { filter: { lang: "en" } });

    expect(results.map((doc) => doc.id)).toEqual(["a"]);
  });

  it("drops results below the similarity threshold", async () => {
    const store = createStore();
    await seed(store);

    const results = await store.search("capital", { similarityThreshold: 0.6 });

    expect(results.map((doc) => doc.id)).toEqual(["c"]);
  });

  it("scores partial term overlap", async () => {
    const store = createStore();
    await seed(store);

    const results = await store.search("germany berlin weather");

    expect(results).toHaveLength(1);
    expect(results[0].id).toBe("b");
    expect(results[0].score).toBeCloseTo((2 / 3) * 0.5);
  });

  it("returns nothing for a blank query", async () => {
    const store = createStore();
    await seed(store);

    expect(await store.search("   ")).toEqual([]);
  });

  it("uses cosine similarity when an embedding provider is configured", async () => {
    const vectors: Record<string, number[]> = {
      query: [1, 0],
      near: [0.9, 0.1],
      far: [0, 1],
    };
    const embeddingProvider: EmbeddingProvider = {
      dimension: 2,
      embed: async (text) => vectors[text] ?? [0, 0],
    };
    const store = new InMemoryDocumentStore({ embeddingProvider });
    await store.add([
      { id: "far", content: "far", metadata: {} },
      { id: "near", content: "near", metadata: {} },
    ]);

    const results = await store.search("query");

    expect(results.map((doc) => doc.id)).toEqual(["near", "far"]);
    expect(results[1].score).toBe(0);
  });

  it("rejects embeddings of the wrong dimension", async () => {
    const store = new InMemoryDocumentStore({
      embeddingProvider: { dimension: 3, embed: async () => [1, 0, 0] },
    });

    await expect(
      store.add([{ id: "x", content: "x", metadata: {}, embedding: [1, 0] }])
    ).rejects.toThrow("Embedding for document x has dimension 2, expected 3");
  });

  it("deletes documents", async () => {
    const store = createStore();
    await seed(store);

    await store.delete("c");

    expect(store.size()).toBe(2);
    expect((await store.search("capital")).map((doc) => doc.id)).toEqual(["a"]);
  });
});
