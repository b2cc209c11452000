import { createLogger, describeError, type Logger } from "@/src/lib/logging/logger";
import { classifyProviderError, QuotaExhaustedError } from "./errors";
import type { KeyPool } from "./key_pool";
import type { Candidate, CandidateVector, EmbeddingAdapter, NormalizeMode, VectorStore } from "./types";
import { mapWithConcurrency } from "./worker_pool";

export const MAX_REVIEW_SNIPPETS = 3;
export const MAX_EMBED_ATTEMPTS = 3;

export type EmbeddingGeneratorDeps = {
  key_pool: KeyPool;
  adapter: EmbeddingAdapter;
  store: VectorStore;
  logger?: Logger;
};

export type EmbeddingGeneratorOptions = {
  dimensions: number;
  concurrency: number;
  normalize: NormalizeMode;
};

export type EmbedCandidatesResult = {
  vectors: CandidateVector[];
  failed_ids: string[];
  skipped_ids: string[];
  cached_count: number;
  generated_count: number;
};

/**
 * Text that represents a candidate for embedding; empty when nothing usable is
 * known. The originating category is left out so a place found under several
 * categories always yields the same document.
 */
export function buildEmbeddingDocument(candidate: Candidate): string {
  const parts = [
    candidate.name,
    candidate.primary_type ?? "",
    candidate.types.join(" "),
    candidate.reviews.slice(0, MAX_REVIEW_SNIPPETS).join(" "),
  ];
  return parts.join(" ").replace(/\s+/g, " ").trim();
}

export function l2Normalize(vector: number[]): number[] {
  let sum = 0;
  for (const value of vector) sum += value * value;
  const norm = Math.sqrt(sum);
  if (norm === 0) return vector.slice();
  return vector.map((value) => value / norm);
}

export class EmbeddingGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly deps: EmbeddingGeneratorDeps,
    private readonly options: EmbeddingGeneratorOptions
  ) {
    this.logger = deps.logger ?? createLogger("embeddings");
  }

  private shouldNormalize() {
    if (this.options.normalize === "always") return true;
    return this.options.dimensions !== this.deps.adapter.native_dimensions;
  }

  /**
   * Embeds one text through the key pool. Up to three attempts, each on a
   * credential not yet tried for this text while one has capacity; quota
   * signals also park the credential. Returns null when every attempt
   * failed. QuotaExhaustedError propagates.
   */
  async embedText(text: string, label = "text"): Promise<number[] | null> {
    const tried: string[] = [];
    for (let attempt = 1; attempt <= MAX_EMBED_ATTEMPTS; attempt += 1) {
      const credential = await this.deps.key_pool.acquire({ avoid: tried });
      tried.push(credential);
      try {
        const raw = await this.deps.adapter.embed(text, this.options.dimensions, credential);
        if (!raw || raw.length === 0) {
          this.logger.warn(`${label}: empty embedding (attempt ${attempt}/${MAX_EMBED_ATTEMPTS})`);
          continue;
        }
        return this.shouldNormalize() ? l2Normalize(raw) : raw;
      } catch (error) {
        const kind = classifyProviderError(error);
        if (kind === "quota_exhausted") {
          await this.deps.key_pool.recordOutcome(credential, true);
        }
        this.logger.warn(`${label}: ${kind} error (attempt ${attempt}/${MAX_EMBED_ATTEMPTS}): ${describeError(error)}`);
        if (kind === "fatal") return null;
      }
    }
    return null;
  }

  async embedCandidates(candidates: Candidate[]): Promise<EmbedCandidatesResult> {
    const documents = new Map<string, string>();
    const skipped = new Set<string>();
    for (const candidate of candidates) {
      if (documents.has(candidate.id) || skipped.has(candidate.id)) continue;
      const document = buildEmbeddingDocument(candidate);
      if (!document) {
        skipped.add(candidate.id);
        this.logger.warn(`skipping ${candidate.id}: empty embedding document`);
        continue;
      }
      documents.set(candidate.id, document);
    }

    const ids = Array.from(documents.keys());
    const cached = this.deps.store.getMany(ids);
    const missing = ids.filter((id) => !cached.has(id));
    this.logger.info(`${ids.length} unique candidate(s): ${cached.size} cached, ${missing.length} to generate`);

    const normalized = this.shouldNormalize();
    const settled = await mapWithConcurrency(missing, this.options.concurrency, async (id) => {
      try {
        return await this.embedText(documents.get(id) ?? "", id);
      } catch (error) {
        if (error instanceof QuotaExhaustedError) {
          this.logger.error(`${id}: key pool exhausted; giving up`);
          return null;
        }
        throw error;
      }
    });

    const generated = new Map<string, number[]>();
    const failed_ids: string[] = [];
    settled.forEach((result, index) => {
      const id = missing[index];
      if (result.ok && result.value) {
        generated.set(id, result.value);
        return;
      }
      failed_ids.push(id);
      if (!result.ok) this.logger.error(`${id}: embedding failed: ${describeError(result.error)}`);
    });

    if (generated.size > 0) {
      this.deps.store.putMany(
        Array.from(generated.entries()).map(([id, vector]) => ({ id, vector, normalized }))
      );
    }

    const vectors: CandidateVector[] = [];
    for (const id of ids) {
      const vector = cached.get(id) ?? generated.get(id);
      if (vector) vectors.push({ id, vector });
    }

    return {
      vectors,
      failed_ids,
      skipped_ids: Array.from(skipped),
      cached_count: cached.size,
      generated_count: generated.size,
    };
  }
}
