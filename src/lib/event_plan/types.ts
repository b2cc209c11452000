export type EventKind = "wedding" | "birthday" | "corporate" | "general";

export type EventPlanForm = {
  event_type: string;
  description: string;
  location: string;
  date: string;
  budget: string;
  guest_count: string;
  duration: string;
};

export type TimelineStatus = "completed" | "priority" | "upcoming";

export type TimelineItem = {
  id: string;
  time: string;
  task: string;
  status: TimelineStatus;
  description: string;
  deadline: string;
};

export type BudgetLine = {
  category: string;
  amount: number;
  percentage: number;
  description: string;
};

export type VendorRecommendation = {
  id: string;
  name: string;
  category: string;
  rating: number | null;
  rating_count: number;
  address: string | null;
  phone: string | null;
  website: string | null;
  description: string;
};

export type EventPlan = {
  id: string;
  title: string;
  event_type: string;
  description: string;
  location: string;
  date: string;
  budget: string;
  guest_count: string;
  duration: string;
  vendors: VendorRecommendation[];
  timeline: TimelineItem[];
  budget_breakdown: BudgetLine[];
  tips: string[];
  checklist: string[];
  narrative: string | null;
  created_at: string;
  updated_at: string;
};

export type PlanStatus = "Completed" | "This Week" | "This Month" | "Planning";

export type EventPlanSummary = {
  id: string;
  title: string;
  type: string;
  date: string;
  budget: string;
  guests: number;
  status: PlanStatus;
  progress: number;
  created_at: string;
};
