import { describe, it, expect } from "vitest";
import { createLogger } from "../../logging/logger";
import { EmbeddingStore } from "../embedding_store";
import { rankCandidates } from "../similarity_ranker";
import type { NearestMatch, VectorStore } from "../types";

function seededStore() {
  const store = new EmbeddingStore({ db_path: ":memory:", dimensions: 3, logger: createLogger("ranker_test") });
  store.putMany([
    { id: "hall", vector: [1, 0.1, 0] },
    { id: "barn", vector: [0, 1, 0] },
    { id: "loft", vector: [1, 1, 0] },
    { id: "chef", vector: [1, 0, 0] },
    { id: "truck", vector: [0, 0, 1] },
  ]);
  return store;
}

describe("rankCandidates", () => {
  it("ranks each category only among its own ids", () => {
    const store = seededStore();
    const ranked = rankCandidates(
      { store },
      [1, 0, 0],
      new Map([
        ["venue", ["barn", "loft", "hall"]],
        ["catering", ["truck", "chef"]],
      ]),
      2
    );

    expect(ranked).toEqual({ venue: ["hall", "loft"], catering: ["chef", "truck"] });
    store.close();
  });

  it("returns an empty list for a category without candidates", () => {
    const store = seededStore();
    const ranked = rankCandidates({ store }, [1, 0, 0], new Map([["florist", []]]), 2);
    expect(ranked).toEqual({ florist: [] });
    store.close();
  });

  it("keeps object-prototype labels as plain keys", () => {
    const store = seededStore();
    const ranked = rankCandidates(
      { store },
      [1, 0, 0],
      new Map([
        ["__proto__", ["barn", "hall"]],
        ["constructor", []],
      ]),
      2
    );

    expect(Object.entries(ranked)).toEqual([
      ["__proto__", ["hall", "barn"]],
      ["constructor", []],
    ]);
    expect(Object.getPrototypeOf(ranked)).toBe(Object.prototype);
    store.close();
  });

  it("keeps other categories when one lookup fails", () => {
    const logger = createLogger("ranker_test");
    const failing: VectorStore = {
      getMany: () => new Map(),
      putMany: () => ({ success_count: 0, failure_count: 0 }),
      queryNearest: ({ allow_ids, limit }): NearestMatch[] => {
        if (allow_ids?.includes("broken")) throw new Error("index unavailable");
        return (allow_ids ?? []).slice(0, limit).map((id, index) => ({ id, distance: index }));
      },
    };

    const ranked = rankCandidates(
      { store: failing, logger },
      [1, 0, 0],
      new Map([
        ["venue", ["broken"]],
        ["catering", ["chef", "truck", "van"]],
      ]),
      2
    );

    expect(ranked).toEqual({ venue: [], catering: ["chef", "truck"] });
    expect(logger.entries.map((entry) => entry.message)).toContain(
      "[ranker_test] ranking failed for venue: index unavailable"
    );
  });
});
