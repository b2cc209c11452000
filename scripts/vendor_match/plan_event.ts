/**
 * CLI for event vendor matching.
 *
 *   npm run plan -- --description "rooftop product launch for 80 guests" --location "Austin, TX"
 */

import "dotenv/config";
import { Command } from "commander";
import { PlanCommandOptionsSchema, runPlanCommand } from "@/src/lib/event_plan/plan_command";
import { getVendorMatchConfig } from "@/src/lib/vendor_match/config";
import { closeVendorMatchContext, createVendorMatchContext } from "@/src/lib/vendor_match/context";
import { EmbeddingStore } from "@/src/lib/vendor_match/embedding_store";

const collect = (value: string, previous: string[]) => [...previous, value];

const program = new Command();

program.name("vendor-match").description("Match an event description to ranked local vendors").version("0.1.0");

program
  .command("plan")
  .description("Plan an event and recommend vendors per category")
  .requiredOption("--description <text>", "Free-text event description")
  .requiredOption("--location <place>", "City or region to search")
  .option("--limit <number>", "Vendors per category", "2")
  .option("--event-type <type>", "wedding|birthday|corporate|<other>", "General")
  .option("--date <date>", "Event date (ISO 8601)", "")
  .option("--budget <amount>", "Total budget, e.g. $12,000", "")
  .option("--guests <count>", "Expected guest count", "")
  .option("--duration <text>", "Event duration", "")
  .option("--key <apiKey>", "Extra embedding API key (repeatable, max 5)", collect, [])
  .option("--json", "Print JSON instead of text", false)
  .option("--no-narrative", "Skip the generated narrative")
  .action(async (raw: Record<string, unknown>) => {
    const parsed = PlanCommandOptionsSchema.safeParse(raw);
    if (!parsed.success) {
      console.error(`[plan] invalid options: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
      process.exitCode = 1;
      return;
    }

    const config = getVendorMatchConfig();
    const context = createVendorMatchContext({
      ...config,
      extra_api_keys: [...config.extra_api_keys, ...parsed.data.key],
    });
    try {
      const result = await runPlanCommand(parsed.data, context);
      if (result.exit_code === 0) {
        console.log(result.output);
      } else {
        console.error(result.output);
      }
      process.exitCode = result.exit_code;
    } finally {
      closeVendorMatchContext(context);
    }
  });

program
  .command("store-stats")
  .description("Print the number of cached vendor embeddings")
  .action(() => {
    const config = getVendorMatchConfig();
    const store = new EmbeddingStore({ db_path: config.db_path, dimensions: config.embed_dimensions });
    try {
      console.log(JSON.stringify({ db_path: config.db_path, records: store.count() }, null, 2));
    } finally {
      store.close();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`[plan] ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
