import { z } from "zod";
import { daysBetween, isValidIsoDate } from "./date-helpers.js";
import { roundTo } from "./format-helpers.js";

export const WORKOUT_TYPES = [
  "easy",
  "workout",
  "long_run",
  "tuneup_race",
  "gym",
  "cross_training",
  "rest",
] as const;

export type WorkoutType = (typeof WORKOUT_TYPES)[number];

/** Planned entries of these types are never matched against runs */
export const NON_RUNNING_TYPES: ReadonlySet<WorkoutType> = new Set<WorkoutType>(["gym", "cross_training", "rest"]);

const ISO_DATE_FORMAT = /^\d{4}-\d{2}-\d{2}$/;

const isoDate = z
  .string()
  .regex(ISO_DATE_FORMAT, "must be a date in YYYY-MM-DD format")
  .refine((value) => !ISO_DATE_FORMAT.test(value) || isValidIsoDate(value), "must be a real calendar date");

export const goalRaceSchema = z
  .object({
    date: isoDate,
    race_type: z.string().min(1).max(50),
    distance_km: z.number().positive().max(1000),
    goal_time: z.string().max(20),
    goal_pace_min_per_km: z.string().max(20),
    race_name: z.string().max(200),
  })
  .passthrough();

export const plannedRunSchema = z
  .object({
    day_of_week: z.string().max(20),
    date: isoDate,
    type: z.enum(WORKOUT_TYPES),
    description: z.string().max(2000).optional(),
    distance_km: z.number().nonnegative().max(1000).optional(),
    target_pace_min_per_km: z.string().max(20).optional(),
    structure: z.string().max(2000).optional(),
    duration_minutes: z.number().int().nonnegative().max(1440).optional(),
    race_name: z.string().max(200).optional(),
  })
  .passthrough();

export const trainingWeekSchema = z
  .object({
    week_number: z.number().int().min(0),
    week_start_date: isoDate,
    total_planned_distance_km: z.number().nonnegative().optional(),
    weekly_focus: z.string().max(500).optional(),
    runs: z.array(plannedRunSchema).default([]),
  })
  .passthrough();

/**
 * A training plan as stored. Unknown fields (coach remarks, per-week notes)
 * pass through.
 */
export const trainingPlanSchema = z
  .object({
    id: z.string().optional(),
    plan_name: z.string().min(1).max(200),
    goal_race: goalRaceSchema,
    created_date: isoDate.optional(),
    plan_start_date: isoDate,
    plan_end_date: isoDate,
    notes: z.string().max(10000).optional(),
    weeks: z.array(trainingWeekSchema).default([]),
    is_active: z.boolean().default(true),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
  })
  .passthrough();

export type TrainingPlan = z.infer<typeof trainingPlanSchema>;
export type PlannedRun = z.infer<typeof plannedRunSchema>;

export interface PlanSummary {
  id: string;
  plan_name: string;
  race_date: string | null;
  race_name: string | null;
  is_active: boolean;
  created_at: string | null;
  updated_at: string | null;
}

/** A planned entry together with the week it belongs to. */
export interface ScheduledWorkout {
  week: number;
  planned: PlannedRun;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively merges `updates` into a copy of `base`. Nested objects merge;
 * arrays and scalars replace.
 */
export function mergeDeep(
  base: Record<string, unknown>,
  updates: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(updates)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeDeep(current, value) : value;
  }
  return merged;
}

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
}

export function summarizePlan(plan: TrainingPlan, fallbackId: string): PlanSummary {
  return {
    id: plan.id ?? fallbackId,
    plan_name: plan.plan_name || "Unnamed Plan",
    race_date: plan.goal_race?.date ?? null,
    race_name: plan.goal_race?.race_name ?? null,
    is_active: plan.is_active ?? true,
    created_at: plan.created_at ?? null,
    updated_at: plan.updated_at ?? null,
  };
}

/** Upcoming race first; plans without a race date go last. */
export function compareByRaceDate(a: PlanSummary, b: PlanSummary): number {
  if (a.race_date === b.race_date) return 0;
  if (a.race_date === null) return 1;
  if (b.race_date === null) return -1;
  return a.race_date < b.race_date ? -1 : 1;
}

/** Every dated planned entry, in date order. */
export function flattenSchedule(plan: TrainingPlan): ScheduledWorkout[] {
  const entries: ScheduledWorkout[] = [];
  for (const week of plan.weeks ?? []) {
    for (const planned of week.runs ?? []) {
      if (!planned.date) continue;
      entries.push({ week: week.week_number, planned });
    }
  }
  // Stable: entries on the same date keep plan order
  return entries.sort((a, b) => (a.planned.date < b.planned.date ? -1 : a.planned.date > b.planned.date ? 1 : 0));
}

export interface UpcomingWorkout extends PlannedRun {
  week: number;
  days_away: number;
}

/** Planned entries from `today` through `today + daysAhead`, soonest first. */
export function getUpcomingWorkouts(plan: TrainingPlan, today: string, daysAhead = 7): UpcomingWorkout[] {
  return flattenSchedule(plan)
    .map(({ week, planned }) => ({ ...planned, week, days_away: daysBetween(today, planned.date) }))
    .filter((w) => w.days_away >= 0 && w.days_away <= daysAhead);
}

export interface PlanOverview {
  plan_id: string | null;
  plan_name: string;
  goal_race: TrainingPlan["goal_race"];
  plan_start_date: string;
  plan_end_date: string;
  days_until_race: number | null;
  weeks_until_race: number | null;
  race_status: "upcoming" | "today" | "past" | null;
}

export function buildPlanOverview(plan: TrainingPlan, today: string): PlanOverview {
  const raceDate = plan.goal_race?.date;
  const daysUntil = raceDate ? daysBetween(today, raceDate) : null;

  let raceStatus: PlanOverview["race_status"] = null;
  if (daysUntil !== null) {
    raceStatus = daysUntil > 0 ? "upcoming" : daysUntil === 0 ? "today" : "past";
  }

  return {
    plan_id: plan.id ?? null,
    plan_name: plan.plan_name || "Unnamed Plan",
    goal_race: plan.goal_race,
    plan_start_date: plan.plan_start_date,
    plan_end_date: plan.plan_end_date,
    days_until_race: daysUntil,
    weeks_until_race: daysUntil !== null && daysUntil > 0 ? roundTo(daysUntil / 7, 1) : null,
    race_status: raceStatus,
  };
}
