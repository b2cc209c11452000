import { describe, it, expect } from "vitest";
import { createLogger } from "../../logging/logger";
import { CandidateCollector, groupByCategory, normalizeWebsite } from "../candidate_collector";
import { LocationUnresolvableError } from "../errors";
import {
  FakeGeocoder,
  FakePlaces,
  makeCandidate,
  makeDetail,
} from "../../../../tests/helpers/vendor_match_fixtures";

function collector(places: FakePlaces, geocoder = new FakeGeocoder()) {
  return new CandidateCollector(
    { places, geocoder, logger: createLogger("collector_test") },
    { search_concurrency: 3, detail_concurrency: 5 }
  );
}

const QUERIES = [
  { category: "venue", query: "rooftop venue" },
  { category: "catering", query: "event catering" },
];

describe("CandidateCollector", () => {
  it("tags each candidate with its category and query", async () => {
    const places = new FakePlaces(
      { "rooftop venue": ["v1", "v2"], "event catering": ["c1"] },
      {
        v1: makeDetail("v1", "Sky Deck", { rating: 4.6, rating_count: 120, website: "https://example.com/sky" }),
        v2: makeDetail("v2", "Loft 9"),
        c1: makeDetail("c1", "Good Plates", { reviews: ["one", "two", "three", "four"] }),
      }
    );

    const candidates = await collector(places).collectCandidates(QUERIES, "Austin, TX");

    expect(candidates.map((candidate) => [candidate.category, candidate.id])).toEqual([
      ["venue", "v1"],
      ["venue", "v2"],
      ["catering", "c1"],
    ]);
    expect(candidates[0]).toMatchObject({ name: "Sky Deck", query: "rooftop venue", rating: 4.6, rating_count: 120 });
    expect(candidates[2].reviews).toEqual(["one", "two", "three"]);
  });

  it("geocodes the location once", async () => {
    const geocoder = new FakeGeocoder();
    const places = new FakePlaces({}, {});
    await collector(places, geocoder).collectCandidates(QUERIES, "Austin, TX");
    expect(geocoder.calls).toEqual(["Austin, TX"]);
  });

  it("throws LocationUnresolvableError when geocoding finds nothing", async () => {
    const places = new FakePlaces({}, {});
    await expect(
      collector(places, new FakeGeocoder(null)).collectCandidates(QUERIES, "Nowhere")
    ).rejects.toBeInstanceOf(LocationUnresolvableError);
    expect(places.searches).toEqual([]);
  });

  it("isolates a failed search to its own category", async () => {
    const places = new FakePlaces(
      { "rooftop venue": new Error("search exploded"), "event catering": ["c1"] },
      { c1: makeDetail("c1", "Good Plates") }
    );

    const candidates = await collector(places).collectCandidates(QUERIES, "Austin, TX");
    expect(candidates.map((candidate) => candidate.id)).toEqual(["c1"]);
  });

  it("drops only the place whose details fail or are invalid", async () => {
    const places = new FakePlaces(
      { "rooftop venue": ["v1", "v2", "v3"] },
      {
        v1: makeDetail("v1", "Sky Deck"),
        v2: new Error("detail timeout"),
        v3: { id: "v3", name: "Broken", rating: "five" },
      }
    );

    const candidates = await collector(places).collectCandidates([QUERIES[0]], "Austin, TX");
    expect(candidates.map((candidate) => candidate.id)).toEqual(["v1"]);
  });

  it("keeps places whose website is not plain ASCII or not a URL", async () => {
    const places = new FakePlaces(
      { "rooftop venue": ["v1", "v2"] },
      {
        v1: makeDetail("v1", "Café Roof", { website: "https://café-roof.example/menü" }),
        v2: makeDetail("v2", "Loft 9", { website: "call us" }),
      }
    );

    const candidates = await collector(places).collectCandidates([QUERIES[0]], "Austin, TX");

    expect(candidates.map((candidate) => candidate.id)).toEqual(["v1", "v2"]);
    expect(candidates[0].website).toMatch(/^https:\/\/xn--.*\.example\/men%C3%BC$/);
    expect(candidates[1].website).toBeNull();
  });

  it("keeps a place once per category it was found in", async () => {
    const places = new FakePlaces(
      { "rooftop venue": ["shared", "shared"], "event catering": ["shared"] },
      { shared: makeDetail("shared", "Hotel Roof") }
    );

    const candidates = await collector(places).collectCandidates(QUERIES, "Austin, TX");
    expect(candidates.map((candidate) => `${candidate.category}:${candidate.id}`)).toEqual([
      "venue:shared",
      "catering:shared",
    ]);
    expect(places.detailRequests).toEqual(["shared", "shared"]);
  });
});

describe("groupByCategory", () => {
  it("groups unique ids per category in first-seen order", () => {
    const grouped = groupByCategory([
      makeCandidate("a", "A", "venue"),
      makeCandidate("b", "B", "catering"),
      makeCandidate("a", "A", "venue"),
      makeCandidate("c", "C", "venue"),
    ]);
    expect(Array.from(grouped.entries())).toEqual([
      ["venue", ["a", "c"]],
      ["catering", ["b"]],
    ]);
  });
});

describe("normalizeWebsite", () => {
  it("returns the ASCII form of a URL", () => {
    expect(normalizeWebsite(" https://example.com/menü ")).toBe("https://example.com/men%C3%BC");
    expect(normalizeWebsite("https://example.com")).toBe("https://example.com/");
    expect(normalizeWebsite("www.example")).toBeNull();
  });
});
