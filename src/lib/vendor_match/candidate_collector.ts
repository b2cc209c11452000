import { createLogger, describeError, type Logger } from "@/src/lib/logging/logger";
import { LocationUnresolvableError } from "./errors";
import { MAX_REVIEW_SNIPPETS } from "./embedding_generator";
import { describeSchemaErrors, validatePlaceDetail } from "./schemas/validators";
import type {
  BoundingBox,
  Candidate,
  CategoryQuery,
  GeocodingAdapter,
  PlaceSearchAdapter,
  PlaceSummary,
} from "./types";
import { mapWithConcurrency } from "./worker_pool";

export type CandidateCollectorDeps = {
  places: PlaceSearchAdapter;
  geocoder: GeocodingAdapter;
  logger?: Logger;
};

export type CandidateCollectorOptions = {
  search_concurrency: number;
  detail_concurrency: number;
};

/** Website in ASCII form (punycode host, percent-encoded path); null when it does not parse. */
export function normalizeWebsite(value: string): string | null {
  try {
    return new URL(value.trim()).href;
  } catch {
    return null;
  }
}

function withNormalizedWebsite(detail: unknown): unknown {
  if (typeof detail !== "object" || detail === null || !("website" in detail)) return detail;
  if (typeof detail.website !== "string") return detail;
  return { ...detail, website: normalizeWebsite(detail.website) };
}

export class CandidateCollector {
  private readonly logger: Logger;

  constructor(
    private readonly deps: CandidateCollectorDeps,
    private readonly options: CandidateCollectorOptions
  ) {
    this.logger = deps.logger ?? createLogger("collector");
  }

  async resolveLocation(location: string): Promise<BoundingBox> {
    let bounds: BoundingBox | null = null;
    try {
      bounds = await this.deps.geocoder.resolve(location);
    } catch (error) {
      this.logger.error(`geocoding "${location}" failed: ${describeError(error)}`);
    }
    if (!bounds) throw new LocationUnresolvableError(location);
    return bounds;
  }

  /**
   * Candidates for one category query. A failed search yields [], a failed or
   * invalid detail drops only that place.
   */
  async collectCategory(query: CategoryQuery, bounds: BoundingBox): Promise<Candidate[]> {
    let summaries: PlaceSummary[];
    try {
      summaries = await this.deps.places.search(query.query, bounds);
    } catch (error) {
      this.logger.error(`search failed for ${query.category} ("${query.query}"): ${describeError(error)}`);
      return [];
    }

    const ids = Array.from(new Set(summaries.map((summary) => summary.id).filter((id) => id.length > 0)));
    const settled = await mapWithConcurrency(ids, this.options.detail_concurrency, (id) => this.deps.places.getDetails(id));

    const candidates: Candidate[] = [];
    settled.forEach((result, index) => {
      const id = ids[index];
      if (!result.ok) {
        this.logger.warn(`details failed for ${id} (${query.category}): ${describeError(result.error)}`);
        return;
      }
      const detail = withNormalizedWebsite(result.value);
      if (!validatePlaceDetail(detail)) {
        this.logger.warn(`details for ${id} rejected: ${describeSchemaErrors(validatePlaceDetail)}`);
        return;
      }
      candidates.push({
        id: detail.id,
        name: detail.name,
        category: query.category,
        query: query.query,
        primary_type: detail.primary_type,
        types: detail.types,
        address: detail.address,
        phone: detail.phone,
        website: detail.website,
        rating: detail.rating,
        rating_count: detail.rating_count,
        reviews: detail.reviews.slice(0, MAX_REVIEW_SNIPPETS),
      });
    });

    this.logger.info(`${query.category}: ${candidates.length}/${ids.length} candidate(s)`);
    return candidates;
  }

  async collectCandidates(queries: CategoryQuery[], location: string): Promise<Candidate[]> {
    const bounds = await this.resolveLocation(location);
    const settled = await mapWithConcurrency(queries, this.options.search_concurrency, (query) =>
      this.collectCategory(query, bounds)
    );

    const all: Candidate[] = [];
    settled.forEach((result, index) => {
      if (result.ok) {
        all.push(...result.value);
        return;
      }
      this.logger.error(`collection failed for ${queries[index].category}: ${describeError(result.error)}`);
    });
    return all;
  }
}

export function groupByCategory(candidates: Candidate[]): Map<string, string[]> {
  const grouped = new Map<string, string[]>();
  for (const candidate of candidates) {
    const ids = grouped.get(candidate.category) ?? [];
    if (!ids.includes(candidate.id)) ids.push(candidate.id);
    grouped.set(candidate.category, ids);
  }
  return grouped;
}
