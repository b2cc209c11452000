import { parseEventDate } from "./build_event_plan";
import type { EventPlan, EventPlanSummary, PlanStatus } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export function computePlanStatus(date: string, now: Date = new Date()): PlanStatus {
  const eventDate = parseEventDate(date);
  if (!eventDate) return "Planning";
  const daysUntil = Math.floor((eventDate.getTime() - now.getTime()) / DAY_MS);
  if (daysUntil < 0) return "Completed";
  if (daysUntil <= 7) return "This Week";
  if (daysUntil <= 30) return "This Month";
  return "Planning";
}

/** Share of the time between plan creation and the event that has elapsed, 0-100. */
export function computePlanProgress(createdAt: string, date: string, now: Date = new Date()): number {
  const eventDate = parseEventDate(date);
  const created = parseEventDate(createdAt);
  if (!eventDate || !created) return 0;

  const total = eventDate.getTime() - created.getTime();
  if (total <= 0) return 100;
  const elapsed = now.getTime() - created.getTime();
  return Math.round(Math.max(0, Math.min(100, (elapsed / total) * 100)));
}

export function summarizePlan(plan: EventPlan, now: Date = new Date()): EventPlanSummary {
  const guests = /^\d+$/.test(plan.guest_count) ? Number.parseInt(plan.guest_count, 10) : 0;
  return {
    id: plan.id,
    title: plan.title,
    type: plan.event_type,
    date: plan.date,
    budget: plan.budget,
    guests,
    status: computePlanStatus(plan.date, now),
    progress: computePlanProgress(plan.created_at, plan.date, now),
    created_at: plan.created_at,
  };
}
