import type { StoredRun, StravaLap } from "../strava/types.js";
import { getWeekDateRange, isoWeekKey, toDateKey } from "./date-helpers.js";
import { formatDuration, formatPace, roundTo } from "./format-helpers.js";

export interface SummaryStats {
  total_runs: number;
  total_distance_km: number;
  total_time: string;
  total_elevation_m: number;
  avg_pace: string;
  avg_hr: number | null;
}

export interface WeeklySummary {
  year: number;
  week: number;
  date_range: string;
  runs: number;
  distance_km: number;
  time: string;
  elevation_m: number;
  avg_pace: string;
  avg_hr: number | null;
}

export interface LapSummary {
  km: number;
  distance_km: number;
  pace: string;
  hr: number | null;
}

export interface IndividualRun {
  id: number | null;
  name: string;
  date: string;
  distance_km: number;
  time: string;
  pace: string;
  elevation_m: number;
  avg_hr: number | null;
  laps: LapSummary[];
}

export interface TrainingReport {
  overall_summary: SummaryStats;
  weekly_summaries: WeeklySummary[];
  individual_runs: IndividualRun[];
}

function lapHeartRates(laps: StravaLap[] | undefined): number[] {
  return (laps ?? [])
    .map((lap) => lap.average_heartrate ?? 0)
    .filter((hr) => hr > 0);
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return Math.round(values.reduce((a, b) => a + b, 0) / values.length);
}

export function calculateSummaryStats(runs: StoredRun[]): SummaryStats {
  if (runs.length === 0) {
    return {
      total_runs: 0,
      total_distance_km: 0,
      total_time: "0:00",
      total_elevation_m: 0,
      avg_pace: "N/A",
      avg_hr: null,
    };
  }

  const totalDistance = runs.reduce((sum, r) => sum + (r.distance_metres ?? 0), 0);
  const totalTime = runs.reduce((sum, r) => sum + (r.moving_time_seconds ?? 0), 0);
  const totalElevation = runs.reduce((sum, r) => sum + (r.total_elevation_gain_metres ?? 0), 0);

  return {
    total_runs: runs.length,
    total_distance_km: roundTo(totalDistance / 1000, 2),
    total_time: formatDuration(totalTime),
    total_elevation_m: Math.round(totalElevation),
    avg_pace: totalDistance > 0 && totalTime > 0 ? formatPace(totalDistance / totalTime) : "N/A",
    // HR comes from laps: the activity summary carries none
    avg_hr: mean(runs.flatMap((r) => lapHeartRates(r.laps))),
  };
}

/** Buckets runs by ISO week of their start date; runs without one are left out. */
export function groupRunsByWeek(runs: StoredRun[]): Map<string, { year: number; week: number; runs: StoredRun[] }> {
  const weeks = new Map<string, { year: number; week: number; runs: StoredRun[] }>();
  for (const run of runs) {
    const key = run.start_date ? isoWeekKey(run.start_date) : null;
    if (!key) continue;
    const id = `${key.year}-${key.week}`;
    const bucket = weeks.get(id) ?? { ...key, runs: [] };
    bucket.runs.push(run);
    weeks.set(id, bucket);
  }
  return weeks;
}

export function buildIndividualRun(run: StoredRun): IndividualRun {
  const laps = (run.laps ?? []).map((lap, i) => {
    const hr = lap.average_heartrate ?? 0;
    return {
      km: i + 1,
      distance_km: roundTo((lap.distance ?? 0) / 1000, 2),
      pace: formatPace(lap.average_speed ?? 0),
      hr: hr > 0 ? Math.round(hr) : null,
    };
  });

  return {
    id: run.id ?? null,
    name: run.name ?? "Unnamed Run",
    date: toDateKey(run.start_date) ?? "",
    distance_km: roundTo((run.distance_metres ?? 0) / 1000, 2),
    time: formatDuration(run.moving_time_seconds ?? 0),
    pace: formatPace(run.average_speed_mps ?? 0),
    elevation_m: Math.round(run.total_elevation_gain_metres ?? 0),
    avg_hr: mean(lapHeartRates(run.laps)),
    laps,
  };
}

export function buildTrainingReport(runs: StoredRun[]): TrainingReport {
  const weekly = Array.from(groupRunsByWeek(runs).values())
    .sort((a, b) => b.year - a.year || b.week - a.week)
    .map(({ year, week, runs: weekRuns }) => {
      const stats = calculateSummaryStats(weekRuns);
      return {
        year,
        week,
        date_range: getWeekDateRange(year, week),
        runs: stats.total_runs,
        distance_km: stats.total_distance_km,
        time: stats.total_time,
        elevation_m: stats.total_elevation_m,
        avg_pace: stats.avg_pace,
        avg_hr: stats.avg_hr,
      };
    });

  return {
    overall_summary: calculateSummaryStats(runs),
    weekly_summaries: weekly,
    individual_runs: runs.map(buildIndividualRun),
  };
}
