/**
 * Vendor Match Types
 *
 * Shared shapes for the matching pipeline. Candidates, category queries and
 * ranked results are request-local; embedding records and key usage live for
 * the whole process.
 */

export type Candidate = {
  id: string;
  name: string;
  category: string;
  query: string;
  primary_type: string | null;
  types: string[];
  address: string | null;
  phone: string | null;
  website: string | null;
  rating: number | null;
  rating_count: number;
  reviews: string[];
};

export type CategoryQuery = {
  category: string;
  query: string;
};

export type EmbeddingRecord = {
  id: string;
  vector: number[];
  normalized?: boolean;
};

export type CandidateVector = {
  id: string;
  vector: number[];
};

export type NearestMatch = {
  id: string;
  distance: number;
};

/** Ranked ids per category label. Labels are own keys; read them with `Object.hasOwn`. */
export type RankedResult = Record<string, string[]>;

export type LatLng = {
  latitude: number;
  longitude: number;
};

export type BoundingBox = {
  low: LatLng;
  high: LatLng;
};

export type PlaceSummary = {
  id: string;
  name?: string;
};

export type PlaceDetail = {
  id: string;
  name: string;
  primary_type: string | null;
  types: string[];
  address: string | null;
  phone: string | null;
  website: string | null;
  rating: number | null;
  rating_count: number;
  reviews: string[];
};

export type NormalizeMode = "always" | "when_reduced";

export interface TextGenerator {
  generate(prompt: string, temperature?: number): Promise<string | null>;
}

export interface EmbeddingAdapter {
  /** Native maximum dimensionality of the provider model. */
  readonly native_dimensions: number;
  /**
   * Returns the raw vector, or null when the provider answered without one.
   * Provider failures are thrown so callers can classify quota signals.
   */
  embed(text: string, dimensions: number, credential: string): Promise<number[] | null>;
}

export interface PlaceSearchAdapter {
  search(query: string, bounds: BoundingBox): Promise<PlaceSummary[]>;
  /** Detail record for one place; checked against the PlaceDetail schema by the collector. */
  getDetails(id: string): Promise<unknown>;
}

export interface GeocodingAdapter {
  resolve(location: string): Promise<BoundingBox | null>;
}

export interface VectorStore {
  getMany(ids: Iterable<string>): Map<string, number[]>;
  putMany(records: EmbeddingRecord[]): { success_count: number; failure_count: number };
  queryNearest(params: { embedding: number[]; limit: number; allow_ids?: string[] }): NearestMatch[];
}
