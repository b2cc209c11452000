import path from "node:path";
import { z } from "zod";

const intFromEnv = (fallback: number, min: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected an integer >= ${min}, got "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : null));

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_API_KEYS: z
    .string()
    .optional()
    .transform((value) => (value ? value.split(",") : [])),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_EMBED_MODEL: z.string().default("text-embedding-3-large"),
  VENDOR_MATCH_EMBED_DIM: intFromEnv(1536, 1),
  VENDOR_MATCH_EMBED_NORMALIZE: z.enum(["always", "when_reduced"]).default("always"),
  VENDOR_MATCH_RPM: intFromEnv(100, 1),
  GOOGLE_MAPS_API_KEY: optionalString,
  VENDOR_MATCH_DB_PATH: optionalString,
  VENDOR_MATCH_SEARCH_CONCURRENCY: intFromEnv(3, 1),
  VENDOR_MATCH_DETAIL_CONCURRENCY: intFromEnv(5, 1),
  VENDOR_MATCH_EMBED_CONCURRENCY: intFromEnv(5, 1),
});

export type VendorMatchConfig = {
  openai_api_key: string | null;
  extra_api_keys: string[];
  text_model: string;
  embed_model: string;
  embed_dimensions: number;
  embed_normalize: "always" | "when_reduced";
  requests_per_minute: number;
  google_maps_api_key: string | null;
  db_path: string;
  search_concurrency: number;
  detail_concurrency: number;
  embed_concurrency: number;
};

export function defaultDbPath() {
  return path.join(process.cwd(), "runs", "vendor_match", "embeddings.db");
}

export function getVendorMatchConfig(env: NodeJS.ProcessEnv = process.env): VendorMatchConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid vendor match configuration: ${details}`);
  }
  const values = parsed.data;
  return {
    openai_api_key: values.OPENAI_API_KEY,
    extra_api_keys: values.OPENAI_API_KEYS,
    text_model: values.OPENAI_MODEL,
    embed_model: values.OPENAI_EMBED_MODEL,
    embed_dimensions: values.VENDOR_MATCH_EMBED_DIM,
    embed_normalize: values.VENDOR_MATCH_EMBED_NORMALIZE,
    requests_per_minute: values.VENDOR_MATCH_RPM,
    google_maps_api_key: values.GOOGLE_MAPS_API_KEY,
    db_path: values.VENDOR_MATCH_DB_PATH ?? defaultDbPath(),
    search_concurrency: values.VENDOR_MATCH_SEARCH_CONCURRENCY,
    detail_concurrency: values.VENDOR_MATCH_DETAIL_CONCURRENCY,
    embed_concurrency: values.VENDOR_MATCH_EMBED_CONCURRENCY,
  };
}
