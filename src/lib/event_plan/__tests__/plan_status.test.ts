import { describe, it, expect } from "vitest";
import { buildEventPlan } from "../build_event_plan";
import { computePlanProgress, computePlanStatus, summarizePlan } from "../plan_status";

const NOW = new Date("2026-06-01T00:00:00.000Z");

describe("computePlanStatus", () => {
  it("buckets by whole days until the event", () => {
    expect(computePlanStatus("2026-05-31", NOW)).toBe("Completed");
    expect(computePlanStatus("2026-06-01", NOW)).toBe("This Week");
    expect(computePlanStatus("2026-06-08", NOW)).toBe("This Week");
    expect(computePlanStatus("2026-06-09", NOW)).toBe("This Month");
    expect(computePlanStatus("2026-07-01", NOW)).toBe("This Month");
    expect(computePlanStatus("2026-07-02", NOW)).toBe("Planning");
  });

  it("treats an unknown date as still planning", () => {
    expect(computePlanStatus("", NOW)).toBe("Planning");
    expect(computePlanStatus("next spring", NOW)).toBe("Planning");
  });
});

describe("computePlanProgress", () => {
  it("reports the elapsed share of the planning window", () => {
    expect(computePlanProgress("2026-05-22T00:00:00.000Z", "2026-06-11", NOW)).toBe(50);
    expect(computePlanProgress("2026-06-02T00:00:00.000Z", "2026-06-11", NOW)).toBe(0);
    expect(computePlanProgress("2026-05-01T00:00:00.000Z", "2026-05-11", NOW)).toBe(100);
  });

  it("is complete when the event is not after creation and zero when undated", () => {
    expect(computePlanProgress("2026-06-01T00:00:00.000Z", "2026-06-01", NOW)).toBe(100);
    expect(computePlanProgress("2026-05-01T00:00:00.000Z", "", NOW)).toBe(0);
  });
});

describe("summarizePlan", () => {
  it("summarizes a stored plan", () => {
    const plan = buildEventPlan(
      {
        event_type: "Birthday",
        description: "Backyard party",
        location: "Denver, CO",
        date: "2026-06-05",
        budget: "$800",
        guest_count: "25",
        duration: "3 hours",
      },
      null,
      { now: new Date("2026-05-26T00:00:00.000Z"), id: () => "plan-9" }
    );

    expect(summarizePlan(plan, NOW)).toEqual({
      id: "plan-9",
      title: "Birthday Party - June 2026",
      type: "Birthday",
      date: "2026-06-05",
      budget: "$800",
      guests: 25,
      status: "This Week",
      progress: 60,
      created_at: "2026-05-26T00:00:00.000Z",
    });
  });

  it("counts non-numeric guest estimates as zero", () => {
    const plan = buildEventPlan(
      {
        event_type: "Gala",
        description: "Fundraiser",
        location: "Austin, TX",
        date: "",
        budget: "",
        guest_count: "about 50",
        duration: "",
      },
      null,
      { id: () => "plan-10" }
    );
    expect(summarizePlan(plan, NOW).guests).toBe(0);
  });
});
