import { z } from "zod";
import { groupByCategory } from "./candidate_collector";
import type { VendorMatchContext } from "./context";
import { VendorMatchError, type VendorMatchFailure } from "./errors";
import { rankCandidates } from "./similarity_ranker";
import type { Candidate, CategoryQuery, RankedResult } from "./types";

export const RunVendorMatchInputSchema = z.object({
  description: z.string().trim().min(1, "description is required"),
  location: z.string().trim().min(1, "location is required"),
  limit: z.number().int().positive().default(2),
});

export type RunVendorMatchInput = z.input<typeof RunVendorMatchInputSchema>;

export type VendorMatchStats = {
  category_count: number;
  candidate_count: number;
  unique_candidate_count: number;
  cached_count: number;
  generated_count: number;
  failed_count: number;
  skipped_count: number;
  duration_ms: number;
};

export type VendorMatchSuccess = {
  ok: true;
  categories: CategoryQuery[];
  candidates: Candidate[];
  ranked: RankedResult;
  stats: VendorMatchStats;
};

export type VendorMatchResult = VendorMatchSuccess | { ok: false; failure: VendorMatchFailure };

function fail(error: VendorMatchError): VendorMatchResult {
  return { ok: false, failure: error.toFailure() };
}

/**
 * End-to-end match: plan categories, collect candidates, embed them, embed the
 * description, then rank each category. Only request-level problems produce
 * `ok: false`; a failing category or candidate just shrinks the result.
 */
export async function runVendorMatch(
  input: RunVendorMatchInput,
  context: VendorMatchContext
): Promise<VendorMatchResult> {
  const { description, location, limit } = RunVendorMatchInputSchema.parse(input);
  const logger = context.logger.child("run");
  const started = Date.now();

  try {
    logger.info("step 1/5: planning vendor categories");
    const categories = await context.planner.planCategories(description);
    if (!categories || categories.length === 0) {
      return fail(
        new VendorMatchError({
          code: "PLANNER_NO_CATEGORIES",
          stage: "planner",
          reason: "No vendor categories could be derived from the description.",
          next_action: "Rephrase the description with the kind of event and the services needed.",
        })
      );
    }

    logger.info(`step 2/5: collecting candidates for ${categories.length} categories in ${location}`);
    const candidates = await context.collector.collectCandidates(categories, location);

    logger.info(`step 3/5: embedding ${candidates.length} candidate(s)`);
    const embedded = await context.embeddings.embedCandidates(candidates);

    logger.info("step 4/5: embedding the description");
    const queryVector = await context.embeddings.embedText(description, "query");
    if (!queryVector) {
      return fail(
        new VendorMatchError({
          code: "QUERY_EMBEDDING_FAILED",
          stage: "embeddings",
          reason: "The description could not be embedded after retries.",
          retryable: true,
          next_action: "Check the embedding provider status and credentials, then retry.",
        })
      );
    }

    logger.info(`step 5/5: ranking (limit ${limit})`);
    const grouped = groupByCategory(candidates);
    const byCategory = new Map<string, string[]>();
    for (const category of categories) {
      byCategory.set(category.category, grouped.get(category.category) ?? []);
    }
    const ranked = rankCandidates({ store: context.store, logger: logger.child("ranker") }, queryVector, byCategory, limit);

    const stats: VendorMatchStats = {
      category_count: categories.length,
      candidate_count: candidates.length,
      unique_candidate_count: new Set(candidates.map((candidate) => candidate.id)).size,
      cached_count: embedded.cached_count,
      generated_count: embedded.generated_count,
      failed_count: embedded.failed_ids.length,
      skipped_count: embedded.skipped_ids.length,
      duration_ms: Date.now() - started,
    };
    logger.info(`done: ${JSON.stringify(stats)}`);
    return { ok: true, categories, candidates, ranked, stats };
  } catch (error) {
    if (error instanceof VendorMatchError) {
      logger.error(`${error.code} at ${error.stage}: ${error.message}`);
      return fail(error);
    }
    throw error;
  }
}
