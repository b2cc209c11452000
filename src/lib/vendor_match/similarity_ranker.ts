import { createLogger, describeError, type Logger } from "@/src/lib/logging/logger";
import type { RankedResult, VectorStore } from "./types";

export type SimilarityRankerDeps = {
  store: VectorStore;
  logger?: Logger;
};

/**
 * Per-category nearest-neighbour ranking. Each category is answered from its
 * own allow-list; a failing category comes back empty without touching the
 * others.
 */
export function rankCandidates(
  deps: SimilarityRankerDeps,
  queryVector: number[],
  candidatesByCategory: Map<string, string[]>,
  limit: number
): RankedResult {
  const logger = deps.logger ?? createLogger("ranker");
  const entries: Array<[string, string[]]> = [];

  for (const [category, ids] of candidatesByCategory) {
    if (ids.length === 0) {
      entries.push([category, []]);
      continue;
    }
    try {
      const matches = deps.store.queryNearest({ embedding: queryVector, limit, allow_ids: ids });
      entries.push([category, matches.map((match) => match.id)]);
    } catch (error) {
      logger.error(`ranking failed for ${category}: ${describeError(error)}`);
      entries.push([category, []]);
    }
  }

  // fromEntries defines own properties, so labels like "__proto__" stay plain keys.
  return Object.fromEntries(entries);
}
