import { z } from "zod";
import rawTemplates from "./templates.json";
import type { EventKind } from "./types";

const TimelineTemplateSchema = z.object({
  time: z.string(),
  task: z.string(),
  status: z.enum(["completed", "priority", "upcoming"]),
  description: z.string(),
  deadline: z.string(),
});

const BudgetTemplateSchema = z.object({
  category: z.string(),
  percentage: z.number().int().min(0).max(100),
  description: z.string(),
});

const PerKind = <T extends z.ZodTypeAny>(item: T) =>
  z.object({ wedding: z.array(item), birthday: z.array(item), corporate: z.array(item) });

const PlanTemplatesSchema = z.object({
  timeline: PerKind(TimelineTemplateSchema),
  budget: PerKind(BudgetTemplateSchema),
  tips: PerKind(z.string()).extend({ general: z.array(z.string()) }),
  checklist: PerKind(z.string()).extend({ general: z.array(z.string()) }),
});

export type PlanTemplates = z.infer<typeof PlanTemplatesSchema>;
export type TimelineTemplate = z.infer<typeof TimelineTemplateSchema>;
export type BudgetTemplate = z.infer<typeof BudgetTemplateSchema>;

export const PLAN_TEMPLATES: PlanTemplates = PlanTemplatesSchema.parse(rawTemplates);

/** Timeline and budget have no general template; those plans use the birthday one. */
export function structuredKind(kind: EventKind): Exclude<EventKind, "general"> {
  return kind === "general" ? "birthday" : kind;
}
