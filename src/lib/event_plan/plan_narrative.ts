import { createLogger, describeError, type Logger } from "@/src/lib/logging/logger";
import type { TextGenerator } from "@/src/lib/vendor_match/types";
import type { EventPlan, EventPlanForm } from "./types";

export function narrativePrompt(form: EventPlanForm, plan: EventPlan): string {
  const vendorLines = plan.vendors.map((vendor) => {
    const rating = vendor.rating !== null ? `, rated ${vendor.rating}` : "";
    return `- ${vendor.category}: ${vendor.name}${rating}`;
  });
  return [
    "Write a short, practical plan for the event below in plain prose.",
    "Mention the recommended vendors by name and suggest an order for booking them.",
    "",
    `Event: ${form.description}`,
    `Type: ${form.event_type}`,
    `Location: ${form.location}`,
    `Date: ${form.date || "TBD"}`,
    `Guests: ${form.guest_count || "unknown"}`,
    `Budget: ${form.budget || "unspecified"}`,
    "",
    "Recommended vendors:",
    ...(vendorLines.length > 0 ? vendorLines : ["- none found"]),
  ].join("\n");
}

/** Optional prose summary of the plan; null when the generator returns nothing usable. */
export async function writePlanNarrative(
  form: EventPlanForm,
  plan: EventPlan,
  generator: TextGenerator,
  logger: Logger = createLogger("plan_narrative")
): Promise<string | null> {
  try {
    const text = await generator.generate(narrativePrompt(form, plan), 0.7);
    const trimmed = text?.trim() ?? "";
    if (!trimmed) {
      logger.warn("narrative generation returned no text");
      return null;
    }
    return trimmed;
  } catch (error) {
    logger.error(`narrative generation failed: ${describeError(error)}`);
    return null;
  }
}
