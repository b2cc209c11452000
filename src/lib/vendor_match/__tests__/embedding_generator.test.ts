import { describe, it, expect } from "vitest";
import { createLogger } from "../../logging/logger";
import { EmbeddingGenerator, buildEmbeddingDocument, l2Normalize } from "../embedding_generator";
import { EmbeddingStore } from "../embedding_store";
import { KeyPool } from "../key_pool";
import type { NormalizeMode } from "../types";
import {
  FakeEmbeddingAdapter,
  createSimulatedClock,
  makeCandidate,
} from "../../../../tests/helpers/vendor_match_fixtures";

function quotaError() {
  return Object.assign(new Error("Rate limit reached for requests"), { status: 429 });
}

function setup(
  vectorFor: (text: string, credential: string) => number[] | null,
  options: { extras?: string[]; normalize?: NormalizeMode; dimensions?: number; native?: number } = {}
) {
  const logger = createLogger("generator_test");
  const clock = createSimulatedClock();
  const keyPool = new KeyPool(
    { default_credential: "test-key-a", extra_credentials: options.extras ?? [], requests_per_minute: 1000 },
    { now: clock.now, sleep: clock.sleep, logger }
  );
  const adapter = new FakeEmbeddingAdapter(vectorFor, options.native ?? 3);
  const store = new EmbeddingStore({ db_path: ":memory:", logger });
  const generator = new EmbeddingGenerator(
    { key_pool: keyPool, adapter, store, logger },
    { dimensions: options.dimensions ?? 3, concurrency: 5, normalize: options.normalize ?? "always" }
  );
  return { generator, adapter, store, keyPool };
}

describe("buildEmbeddingDocument", () => {
  it("joins name, types and the first three reviews with collapsed whitespace", () => {
    const candidate = makeCandidate("p1", "  Sky   Deck ", "venue", {
      primary_type: "event_venue",
      types: ["event_venue", "bar"],
      reviews: ["Great\nview", "Loud", "Friendly staff", "Fourth review"],
    });
    expect(buildEmbeddingDocument(candidate)).toBe("Sky Deck event_venue event_venue bar Great view Loud Friendly staff");
  });

  it("is empty when the candidate has no descriptive fields", () => {
    expect(buildEmbeddingDocument(makeCandidate("p1", "  ", "venue"))).toBe("");
  });
});

describe("l2Normalize", () => {
  it("scales to unit length and leaves zero vectors alone", () => {
    expect(l2Normalize([3, 4])).toEqual([0.6, 0.8]);
    expect(l2Normalize([0, 0])).toEqual([0, 0]);
  });
});

describe("EmbeddingGenerator", () => {
  it("generates exactly one embedding per cache miss", async () => {
    const { generator, adapter, store } = setup(() => [1, 0, 0]);
    store.putMany([{ id: "cached", vector: [0, 1, 0] }]);

    const result = await generator.embedCandidates([
      makeCandidate("cached", "Cached Hall", "venue"),
      makeCandidate("new-1", "New Hall", "venue"),
      makeCandidate("new-2", "New Kitchen", "catering"),
    ]);

    expect(adapter.calls).toHaveLength(2);
    expect(result.cached_count).toBe(1);
    expect(result.generated_count).toBe(2);
    expect(result.vectors.map((entry) => entry.id)).toEqual(["cached", "new-1", "new-2"]);
    expect(store.count()).toBe(3);
  });

  it("embeds a place found under several categories once, from its first occurrence", async () => {
    const { generator, adapter } = setup(() => [1, 0, 0]);
    const result = await generator.embedCandidates([
      makeCandidate("p1", "Sky Deck", "venue", { reviews: ["first"] }),
      makeCandidate("p1", "Sky Deck", "catering", { reviews: ["second"] }),
    ]);

    expect(adapter.calls.map((call) => call.text)).toEqual(["Sky Deck first"]);
    expect(result.vectors).toHaveLength(1);
  });

  it("skips candidates whose document is empty", async () => {
    const { generator, adapter } = setup(() => [1, 0, 0]);
    const result = await generator.embedCandidates([
      makeCandidate("blank", "", "venue"),
      makeCandidate("p1", "Sky Deck", "venue"),
    ]);

    expect(result.skipped_ids).toEqual(["blank"]);
    expect(result.vectors.map((entry) => entry.id)).toEqual(["p1"]);
    expect(adapter.calls).toHaveLength(1);
  });

  it("rotates credentials on quota errors and succeeds on a later attempt", async () => {
    const { generator, adapter } = setup(
      (_text, credential) => {
        if (credential === "test-key-a") throw quotaError();
        return [0, 2, 0];
      },
      { extras: ["test-key-b"] }
    );

    const result = await generator.embedCandidates([makeCandidate("p1", "Sky Deck", "venue")]);

    expect(adapter.calls.map((call) => call.credential)).toEqual(["test-key-a", "test-key-b"]);
    expect(result.vectors).toEqual([{ id: "p1", vector: [0, 1, 0] }]);
    expect(result.failed_ids).toEqual([]);
  });

  it("moves to an untried credential after a server error", async () => {
    const { generator, adapter } = setup(
      (_text, credential) => {
        if (credential === "test-key-a") throw Object.assign(new Error("bad gateway"), { status: 502 });
        return [0, 2, 0];
      },
      { extras: ["test-key-b"] }
    );

    const result = await generator.embedCandidates([makeCandidate("p1", "Sky Deck", "venue")]);

    expect(adapter.calls.map((call) => call.credential)).toEqual(["test-key-a", "test-key-b"]);
    expect(result.vectors).toEqual([{ id: "p1", vector: [0, 1, 0] }]);
    expect(result.failed_ids).toEqual([]);
  });

  it("spreads retries of an empty answer across credentials", async () => {
    const { generator, adapter } = setup((_text, credential) => (credential === "test-key-c" ? [1, 0, 0] : []), {
      extras: ["test-key-b", "test-key-c"],
    });

    expect(await generator.embedText("hello")).toEqual([1, 0, 0]);
    expect(adapter.calls.map((call) => call.credential)).toEqual(["test-key-a", "test-key-b", "test-key-c"]);
  });

  it("reports a candidate as failed after three attempts", async () => {
    const { generator, adapter, store } = setup(() => {
      throw Object.assign(new Error("upstream unavailable"), { status: 503 });
    });

    const result = await generator.embedCandidates([makeCandidate("p1", "Sky Deck", "venue")]);

    expect(adapter.calls).toHaveLength(3);
    expect(result.failed_ids).toEqual(["p1"]);
    expect(result.vectors).toEqual([]);
    expect(store.count()).toBe(0);
  });

  it("stops a candidate as soon as the key pool is exhausted", async () => {
    const { generator, adapter } = setup(() => {
      throw quotaError();
    });

    const result = await generator.embedCandidates([makeCandidate("p1", "Sky Deck", "venue")]);

    expect(adapter.calls).toHaveLength(1);
    expect(result.failed_ids).toEqual(["p1"]);
  });

  it("keeps raw vectors at native dimensionality when normalizing only reduced output", async () => {
    const { generator } = setup(() => [3, 4, 0], { normalize: "when_reduced", dimensions: 3, native: 3 });
    expect(await generator.embedText("hello")).toEqual([3, 4, 0]);
  });

  it("normalizes reduced vectors in when_reduced mode", async () => {
    const { generator } = setup(() => [3, 4, 0], { normalize: "when_reduced", dimensions: 3, native: 3072 });
    expect(await generator.embedText("hello")).toEqual([0.6, 0.8, 0]);
  });

  it("retries empty provider answers", async () => {
    let calls = 0;
    const { generator } = setup(() => {
      calls += 1;
      return calls === 1 ? [] : [0, 0, 5];
    });
    expect(await generator.embedText("hello")).toEqual([0, 0, 1]);
  });
});
