import { nanoid } from "nanoid";
import type { VendorMatchSuccess } from "@/src/lib/vendor_match/run_vendor_match";
import type { Candidate } from "@/src/lib/vendor_match/types";
import { PLAN_TEMPLATES, structuredKind } from "./templates";
import type {
  BudgetLine,
  EventKind,
  EventPlan,
  EventPlanForm,
  TimelineItem,
  VendorRecommendation,
} from "./types";

export const DEFAULT_TOTAL_BUDGET = 10000;

export type BuildEventPlanOptions = {
  now?: Date;
  id?: () => string;
};

export function resolveEventKind(eventType: string): EventKind {
  const lowered = eventType.toLowerCase();
  if (lowered.includes("wedding")) return "wedding";
  if (lowered.includes("birthday")) return "birthday";
  if (lowered.includes("corporate")) return "corporate";
  return "general";
}

export function parseEventDate(value: string): Date | null {
  if (!value.trim()) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function formatMonthYear(value: string): string {
  const date = parseEventDate(value);
  if (!date) return "TBD";
  return date.toLocaleString("en-US", { month: "long", year: "numeric", timeZone: "UTC" });
}

export function buildEventTitle(form: Pick<EventPlanForm, "event_type" | "date">): string {
  const monthYear = formatMonthYear(form.date);
  switch (resolveEventKind(form.event_type)) {
    case "wedding":
      return `Wedding Celebration - ${monthYear}`;
    case "birthday":
      return `Birthday Party - ${monthYear}`;
    case "corporate":
      return `Corporate Event - ${monthYear}`;
    default:
      return `${form.event_type} - ${monthYear}`;
  }
}

/** Total from the digits of a free-text budget ("$12,500" -> 12500). */
export function parseBudgetTotal(budget: string): number {
  const digits = budget.replace(/\D/g, "");
  if (!digits) return DEFAULT_TOTAL_BUDGET;
  return Number.parseInt(digits, 10);
}

export function buildTimeline(kind: EventKind): TimelineItem[] {
  return PLAN_TEMPLATES.timeline[structuredKind(kind)].map((item, index) => ({
    id: `timeline_${index}`,
    ...item,
  }));
}

export function buildBudgetBreakdown(kind: EventKind, budget: string): BudgetLine[] {
  const total = parseBudgetTotal(budget);
  return PLAN_TEMPLATES.budget[structuredKind(kind)].map((item) => ({
    category: item.category,
    amount: Math.round((total * item.percentage) / 100),
    percentage: item.percentage,
    description: item.description,
  }));
}

function describeCandidate(candidate: Candidate): string {
  if (candidate.reviews.length > 0) return candidate.reviews[0];
  if (candidate.primary_type) return candidate.primary_type.replace(/_/g, " ");
  return `Recommended for ${candidate.category}`;
}

/** Ranked ids turned into recommendations, in planned category order. */
export function buildVendorRecommendations(match: VendorMatchSuccess): VendorRecommendation[] {
  const byKey = new Map<string, Candidate>();
  for (const candidate of match.candidates) {
    const key = `${candidate.category}::${candidate.id}`;
    if (!byKey.has(key)) byKey.set(key, candidate);
  }

  const vendors: VendorRecommendation[] = [];
  for (const { category } of match.categories) {
    const ranked = Object.hasOwn(match.ranked, category) ? match.ranked[category] : [];
    for (const id of ranked) {
      const candidate = byKey.get(`${category}::${id}`);
      if (!candidate) continue;
      vendors.push({
        id: candidate.id,
        name: candidate.name,
        category,
        rating: candidate.rating,
        rating_count: candidate.rating_count,
        address: candidate.address,
        phone: candidate.phone,
        website: candidate.website,
        description: describeCandidate(candidate),
      });
    }
  }
  return vendors;
}

export function buildEventPlan(
  form: EventPlanForm,
  match: VendorMatchSuccess | null,
  options: BuildEventPlanOptions = {}
): EventPlan {
  const kind = resolveEventKind(form.event_type);
  const timestamp = (options.now ?? new Date()).toISOString();
  return {
    id: (options.id ?? nanoid)(),
    title: buildEventTitle(form),
    event_type: form.event_type,
    description: form.description,
    location: form.location,
    date: form.date,
    budget: form.budget,
    guest_count: form.guest_count,
    duration: form.duration,
    vendors: match ? buildVendorRecommendations(match) : [],
    timeline: buildTimeline(kind),
    budget_breakdown: buildBudgetBreakdown(kind, form.budget),
    tips: [...PLAN_TEMPLATES.tips[kind]],
    checklist: [...PLAN_TEMPLATES.checklist[kind]],
    narrative: null,
    created_at: timestamp,
    updated_at: timestamp,
  };
}
