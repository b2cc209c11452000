import { createLogger, type Logger } from "@/src/lib/logging/logger";
import { GoogleGeocodingAdapter } from "./adapters/google_geocoding";
import { GooglePlacesAdapter } from "./adapters/google_places";
import { OpenAiEmbeddingAdapter } from "./adapters/openai_embeddings";
import { OpenAiTextGenerator } from "./adapters/openai_text_generator";
import { CandidateCollector } from "./candidate_collector";
import { CategoryPlanner } from "./category_planner";
import type { VendorMatchConfig } from "./config";
import { EmbeddingGenerator } from "./embedding_generator";
import { EmbeddingStore } from "./embedding_store";
import { KeyPool, type KeyPoolDeps } from "./key_pool";
import type { EmbeddingAdapter, GeocodingAdapter, PlaceSearchAdapter, TextGenerator } from "./types";

export type VendorMatchContext = {
  config: VendorMatchConfig;
  logger: Logger;
  key_pool: KeyPool;
  store: EmbeddingStore;
  text_generator: TextGenerator;
  planner: CategoryPlanner;
  collector: CandidateCollector;
  embeddings: EmbeddingGenerator;
};

export type VendorMatchOverrides = {
  logger?: Logger;
  text_generator?: TextGenerator;
  embedding_adapter?: EmbeddingAdapter;
  places?: PlaceSearchAdapter;
  geocoder?: GeocodingAdapter;
  store?: EmbeddingStore;
  clock?: Partial<Pick<KeyPoolDeps, "now" | "sleep">>;
};

function requireKey(value: string | null, name: string): string {
  if (!value) {
    throw new Error(`Missing ${name}. Set it in your environment or .env file.`);
  }
  return value;
}

/**
 * Builds the process-wide collaborators once: key pool, embedding store,
 * provider adapters and the pipeline stages wired to them. Overrides replace
 * individual providers (tests pass in-process fakes).
 */
export function createVendorMatchContext(
  config: VendorMatchConfig,
  overrides: VendorMatchOverrides = {}
): VendorMatchContext {
  const logger = overrides.logger ?? createLogger("vendor_match");

  const key_pool = new KeyPool(
    {
      default_credential: config.openai_api_key,
      extra_credentials: config.extra_api_keys,
      requests_per_minute: config.requests_per_minute,
    },
    { ...overrides.clock, logger: logger.child("key_pool") }
  );

  const text_generator =
    overrides.text_generator ??
    new OpenAiTextGenerator({
      api_key: requireKey(config.openai_api_key, "OPENAI_API_KEY"),
      model: config.text_model,
      logger: logger.child("openai_text"),
    });

  const mapsKey = () => requireKey(config.google_maps_api_key, "GOOGLE_MAPS_API_KEY");
  const places = overrides.places ?? new GooglePlacesAdapter({ api_key: mapsKey() });
  const geocoder = overrides.geocoder ?? new GoogleGeocodingAdapter({ api_key: mapsKey() });
  const embeddingAdapter = overrides.embedding_adapter ?? new OpenAiEmbeddingAdapter(config.embed_model);

  const store =
    overrides.store ??
    new EmbeddingStore({
      db_path: config.db_path,
      dimensions: config.embed_dimensions,
      logger: logger.child("store"),
    });

  return {
    config,
    logger,
    key_pool,
    store,
    text_generator,
    planner: new CategoryPlanner({ generator: text_generator, logger: logger.child("planner") }),
    collector: new CandidateCollector(
      { places, geocoder, logger: logger.child("collector") },
      { search_concurrency: config.search_concurrency, detail_concurrency: config.detail_concurrency }
    ),
    embeddings: new EmbeddingGenerator(
      { key_pool, adapter: embeddingAdapter, store, logger: logger.child("embeddings") },
      {
        dimensions: config.embed_dimensions,
        concurrency: config.embed_concurrency,
        normalize: config.embed_normalize,
      }
    ),
  };
}

export function closeVendorMatchContext(context: VendorMatchContext) {
  context.store.close();
  context.logger.info("context closed");
}
