import type { StoredRun } from "../strava/types.js";
import { daysBetween, toDateKey } from "./date-helpers.js";
import { paceFrom, roundTo } from "./format-helpers.js";
import {
  NON_RUNNING_TYPES,
  flattenSchedule,
  type PlannedRun,
  type ScheduledWorkout,
  type TrainingPlan,
} from "./plan-helpers.js";

/** A run within this many calendar days of a planned date can satisfy it */
export const MATCH_WINDOW_DAYS = 1;
export const UPCOMING_WINDOW_DAYS = 7;
const RECENT_COMPLETED_LIMIT = 5;
const RECENT_MISSED_LIMIT = 10;

export interface ActualRunSummary {
  id: number | null;
  name: string;
  date: string;
  distance_km: number;
  pace: string;
}

export interface CompletedWorkout {
  date: string;
  week: number;
  planned: PlannedRun;
  actual: ActualRunSummary;
}

export interface MissedWorkout extends PlannedRun {
  week: number;
}

export interface UpcomingPlannedWorkout extends PlannedRun {
  week: number;
  days_away: number;
}

export interface AdherenceReport {
  completion_rate: number;
  workouts_completed: number;
  workouts_missed: number;
  workouts_not_tracked: number;
  planned_distance_km: number;
  actual_distance_km: number;
  distance_completion_rate: number;
  completed_workouts: CompletedWorkout[];
  missed_workouts: MissedWorkout[];
  upcoming_workouts: UpcomingPlannedWorkout[];
}

interface DatedRun {
  run: StoredRun;
  date: string;
}

export function summarizeActualRun(run: StoredRun, date: string): ActualRunSummary {
  return {
    id: run.id ?? null,
    name: run.name ?? "Unnamed",
    date,
    distance_km: roundTo((run.distance_metres ?? 0) / 1000, 2),
    pace: paceFrom(run.distance_metres, run.moving_time_seconds),
  };
}

function isRunningActivity(run: StoredRun): boolean {
  return run.sport_type == null || run.sport_type.toLowerCase().includes("run");
}

function percentage(part: number, whole: number): number {
  return whole > 0 ? roundTo((part / whole) * 100, 1) : 0;
}

/**
 * Pairs due planned entries with runs. Exact-day matches are made for every
 * entry before any ±1-day match, so a run on its own planned day is never
 * taken by a neighbour. Within a pass, ties go to the run closest to the
 * planned distance. Each run is used at most once.
 */
export function matchRunsToPlan(due: ScheduledWorkout[], runs: StoredRun[]): Map<number, DatedRun> {
  const candidates: DatedRun[] = [];
  for (const run of runs) {
    const date = toDateKey(run.start_date);
    if (date && isRunningActivity(run)) candidates.push({ run, date });
  }

  const claimed = new Set<DatedRun>();
  const matches = new Map<number, DatedRun>();

  for (let offset = 0; offset <= MATCH_WINDOW_DAYS; offset++) {
    due.forEach(({ planned }, index) => {
      if (matches.has(index)) return;

      const plannedMetres = (planned.distance_km ?? 0) * 1000;
      let best: DatedRun | null = null;
      for (const candidate of candidates) {
        if (claimed.has(candidate)) continue;
        if (Math.abs(daysBetween(planned.date, candidate.date)) !== offset) continue;
        if (
          best === null ||
          Math.abs((candidate.run.distance_metres ?? 0) - plannedMetres) <
            Math.abs((best.run.distance_metres ?? 0) - plannedMetres)
        ) {
          best = candidate;
        }
      }

      if (best) {
        claimed.add(best);
        matches.set(index, best);
      }
    });
  }

  return matches;
}

/**
 * Compares a plan against mirrored runs as of `today` (YYYY-MM-DD).
 *
 * Entries dated today or earlier are due. Due running entries are completed
 * when a run matches them and missed otherwise; due gym, cross-training and
 * rest entries are counted as not tracked. Entries in the next
 * `upcomingDays` days are listed as upcoming.
 */
export function analyzeAdherence(
  plan: TrainingPlan,
  runs: StoredRun[],
  today: string,
  upcomingDays: number = UPCOMING_WINDOW_DAYS,
): AdherenceReport {
  const due: ScheduledWorkout[] = [];
  const upcoming: UpcomingPlannedWorkout[] = [];
  let notTracked = 0;

  for (const entry of flattenSchedule(plan)) {
    const daysAway = daysBetween(today, entry.planned.date);
    if (daysAway > 0) {
      if (daysAway <= upcomingDays) {
        upcoming.push({ ...entry.planned, week: entry.week, days_away: daysAway });
      }
      continue;
    }
    if (NON_RUNNING_TYPES.has(entry.planned.type)) {
      notTracked++;
      continue;
    }
    due.push(entry);
  }

  const matches = matchRunsToPlan(due, runs);

  const completed: CompletedWorkout[] = [];
  const missed: MissedWorkout[] = [];
  let plannedMetres = 0;
  let actualMetres = 0;

  due.forEach(({ planned, week }, index) => {
    plannedMetres += (planned.distance_km ?? 0) * 1000;
    const match = matches.get(index);
    if (match) {
      actualMetres += match.run.distance_metres ?? 0;
      completed.push({
        date: planned.date,
        week,
        planned,
        actual: summarizeActualRun(match.run, match.date),
      });
    } else {
      missed.push({ ...planned, week });
    }
  });

  return {
    completion_rate: percentage(completed.length, completed.length + missed.length),
    workouts_completed: completed.length,
    workouts_missed: missed.length,
    workouts_not_tracked: notTracked,
    planned_distance_km: roundTo(plannedMetres / 1000, 2),
    actual_distance_km: roundTo(actualMetres / 1000, 2),
    distance_completion_rate: percentage(actualMetres, plannedMetres),
    completed_workouts: completed.slice(-RECENT_COMPLETED_LIMIT),
    missed_workouts: missed.slice(-RECENT_MISSED_LIMIT),
    upcoming_workouts: upcoming,
  };
}
