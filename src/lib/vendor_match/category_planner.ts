import { z } from "zod";
import { createLogger, describeError, type Logger } from "@/src/lib/logging/logger";
import { MalformedUpstreamResponseError } from "./errors";
import { extractJsonPayload } from "./json_payload";
import type { CategoryQuery, TextGenerator } from "./types";

const VendorLabelSchema = z.union([
  z.string(),
  z.object({ category: z.string() }),
  z.object({ type: z.string() }),
]);

const VendorTypesSchema = z.union([
  z.object({
    event_type: z.string().optional(),
    vendors: z.array(VendorLabelSchema),
  }),
  z.array(VendorLabelSchema),
]);

const QueryEntrySchema = z.object({ category: z.string(), query: z.string() });

const SearchQueryListSchema = z.union([
  z.object({ queries: z.array(QueryEntrySchema) }),
  z.array(QueryEntrySchema),
]);

const SearchQueryMapSchema = z.record(z.string());

type QueryEntry = z.infer<typeof QueryEntrySchema>;

function readQueryEntries(payload: unknown): QueryEntry[] | null {
  const listed = SearchQueryListSchema.safeParse(payload);
  if (listed.success) {
    return Array.isArray(listed.data) ? listed.data : listed.data.queries;
  }
  const mapped = SearchQueryMapSchema.safeParse(payload);
  if (mapped.success) {
    return Object.entries(mapped.data).map(([category, query]) => ({ category, query }));
  }
  return null;
}

export type CategoryPlannerDeps = {
  generator: TextGenerator;
  logger?: Logger;
};

function labelText(label: z.infer<typeof VendorLabelSchema>) {
  if (typeof label === "string") return label;
  return "category" in label ? label.category : label.type;
}

/** Unique labels, compared case-insensitively, first spelling kept. */
export function dedupeLabels(labels: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of labels) {
    const label = raw.trim();
    const key = label.toLowerCase();
    if (!label || seen.has(key)) continue;
    seen.add(key);
    result.push(label);
  }
  return result;
}

export function vendorTypesPrompt(description: string) {
  return [
    "You help plan events. Identify the kinds of vendors needed for the event below.",
    'Respond with JSON only: {"event_type": string, "vendors": [{"category": string}]}.',
    "Use short, lowercase category labels such as venue, catering, photography.",
    "",
    `Event: ${description}`,
  ].join("\n");
}

export function searchQueriesPrompt(labels: string[]) {
  return [
    "Write one short place-search query for each vendor category below.",
    'Respond with JSON only: {"queries": [{"category": string, "query": string}]}.',
    "Keep each category label exactly as given.",
    "",
    ...labels.map((label) => `- ${label}`),
  ].join("\n");
}

export class CategoryPlanner {
  private readonly logger: Logger;

  constructor(private readonly deps: CategoryPlannerDeps) {
    this.logger = deps.logger ?? createLogger("planner");
  }

  private async call(prompt: string, temperature: number, label: string): Promise<unknown> {
    let text: string | null;
    try {
      text = await this.deps.generator.generate(prompt, temperature);
    } catch (error) {
      this.logger.error(`${label}: text generation failed: ${describeError(error)}`);
      return undefined;
    }
    if (!text || !text.trim()) {
      this.logger.warn(`${label}: empty response`);
      return undefined;
    }
    const payload = extractJsonPayload(text);
    if (payload === undefined) {
      this.report(new MalformedUpstreamResponseError("planner", `${label}: no JSON payload found`, text));
    }
    return payload;
  }

  private report(error: MalformedUpstreamResponseError) {
    this.logger.warn(`MalformedUpstreamResponse: ${error.message} (${JSON.stringify(error.excerpt)})`);
  }

  /** Structured vendor labels for a description, or null when the model gives none. */
  async extractVendorLabels(description: string): Promise<string[] | null> {
    const payload = await this.call(vendorTypesPrompt(description), 0.2, "vendor types");
    if (payload === undefined) return null;

    const parsed = VendorTypesSchema.safeParse(payload);
    if (!parsed.success) {
      this.report(new MalformedUpstreamResponseError("planner", "vendor types: unexpected payload shape", JSON.stringify(payload)));
      return null;
    }
    const raw = Array.isArray(parsed.data) ? parsed.data : parsed.data.vendors;
    const labels = dedupeLabels(raw.map(labelText));
    return labels.length > 0 ? labels : null;
  }

  /** One search query per label; labels the model skipped are dropped. */
  async generateSearchQueries(labels: string[]): Promise<CategoryQuery[] | null> {
    const payload = await this.call(searchQueriesPrompt(labels), 0.3, "search queries");
    if (payload === undefined) return null;

    const entries = readQueryEntries(payload);
    if (!entries) {
      this.report(new MalformedUpstreamResponseError("planner", "search queries: unexpected payload shape", JSON.stringify(payload)));
      return null;
    }

    const byLabel = new Map<string, string>();
    for (const entry of entries) {
      const key = entry.category.trim().toLowerCase();
      const query = entry.query.trim();
      if (!key || !query || byLabel.has(key)) continue;
      byLabel.set(key, query);
    }

    const result: CategoryQuery[] = [];
    for (const label of labels) {
      const query = byLabel.get(label.toLowerCase());
      if (!query) {
        this.logger.warn(`no search query for category "${label}"; dropping it`);
        continue;
      }
      result.push({ category: label, query });
    }
    return result.length > 0 ? result : null;
  }

  async planCategories(description: string): Promise<CategoryQuery[] | null> {
    const labels = await this.extractVendorLabels(description);
    if (!labels) {
      this.logger.warn("no vendor categories extracted");
      return null;
    }
    this.logger.info(`vendor categories: ${labels.join(", ")}`);

    const queries = await this.generateSearchQueries(labels);
    if (!queries) {
      this.logger.warn("no search queries generated");
      return null;
    }
    return queries;
  }
}
