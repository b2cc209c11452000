import { z } from "zod";
import type { VendorMatchContext } from "@/src/lib/vendor_match/context";
import { runVendorMatch } from "@/src/lib/vendor_match/run_vendor_match";
import { buildEventPlan, type BuildEventPlanOptions } from "./build_event_plan";
import { writePlanNarrative } from "./plan_narrative";
import type { EventPlan } from "./types";

export const PlanCommandOptionsSchema = z.object({
  description: z.string().trim().min(1, "--description is required"),
  location: z.string().trim().min(1, "--location is required"),
  limit: z.coerce.number().int().positive().default(2),
  eventType: z.string().default("General"),
  date: z.string().default(""),
  budget: z.string().default(""),
  guests: z.string().default(""),
  duration: z.string().default(""),
  key: z.array(z.string()).default([]),
  json: z.boolean().default(false),
  narrative: z.boolean().default(true),
});

export type PlanCommandOptions = z.infer<typeof PlanCommandOptionsSchema>;

export type PlanCommandResult = {
  exit_code: number;
  output: string;
  plan: EventPlan | null;
};

export function renderPlan(plan: EventPlan): string {
  const lines: string[] = [];
  lines.push(plan.title);
  lines.push(`${plan.location} | ${plan.date || "date TBD"} | ${plan.guest_count || "?"} guests | budget ${plan.budget || "n/a"}`);
  lines.push("");
  lines.push("Vendors:");
  if (plan.vendors.length === 0) lines.push("  (no matches)");
  for (const vendor of plan.vendors) {
    const rating = vendor.rating !== null ? ` ${vendor.rating} (${vendor.rating_count})` : "";
    lines.push(`  [${vendor.category}] ${vendor.name}${rating}`);
    if (vendor.address) lines.push(`      ${vendor.address}`);
    const contact = [vendor.phone, vendor.website].filter((value): value is string => Boolean(value));
    if (contact.length > 0) lines.push(`      ${contact.join(" | ")}`);
  }
  lines.push("");
  lines.push("Timeline:");
  for (const item of plan.timeline) lines.push(`  ${item.deadline}: ${item.task}`);
  lines.push("");
  lines.push("Budget:");
  for (const line of plan.budget_breakdown) lines.push(`  ${line.category}: ${line.amount} (${line.percentage}%)`);
  lines.push("");
  lines.push("Tips:");
  for (const tip of plan.tips) lines.push(`  - ${tip}`);
  lines.push("");
  lines.push("Checklist:");
  for (const item of plan.checklist) lines.push(`  [ ] ${item}`);
  if (plan.narrative) {
    lines.push("");
    lines.push(plan.narrative);
  }
  return lines.join("\n");
}

export async function runPlanCommand(
  options: PlanCommandOptions,
  context: VendorMatchContext,
  planOptions: BuildEventPlanOptions = {}
): Promise<PlanCommandResult> {
  const match = await runVendorMatch(
    { description: options.description, location: options.location, limit: options.limit },
    context
  );

  if (!match.ok) {
    const { failure } = match;
    const output = options.json
      ? JSON.stringify({ ok: false, failure }, null, 2)
      : `${failure.code} (${failure.stage}): ${failure.reason}\nNext: ${failure.next_action}`;
    return { exit_code: 1, output, plan: null };
  }

  const form = {
    event_type: options.eventType,
    description: options.description,
    location: options.location,
    date: options.date,
    budget: options.budget,
    guest_count: options.guests,
    duration: options.duration,
  };
  const plan = buildEventPlan(form, match, planOptions);
  if (options.narrative) {
    plan.narrative = await writePlanNarrative(form, plan, context.text_generator, context.logger.child("narrative"));
  }

  const output = options.json
    ? JSON.stringify({ ok: true, plan, ranked: match.ranked, stats: match.stats }, null, 2)
    : renderPlan(plan);
  return { exit_code: 0, output, plan };
}
