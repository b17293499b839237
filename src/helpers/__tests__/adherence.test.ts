import { describe, it, expect } from "vitest";
import type { StoredRun } from "../../strava/types.js";
import { trainingPlanSchema, type TrainingPlan } from "../plan-helpers.js";
import { analyzeAdherence, matchRunsToPlan, summarizeActualRun } from "../adherence.js";

function makePlan(weeks: { week_number: number; runs: { date: string; type: string; distance_km?: number }[] }[]): TrainingPlan {
  return trainingPlanSchema.parse({
    plan_name: "Spring 10k",
    goal_race: {
      date: "2024-04-14",
      race_type: "10k",
      distance_km: 10,
      goal_time: "0:45:00",
      goal_pace_min_per_km: "4:30",
      race_name: "City 10k",
    },
    plan_start_date: "2024-03-04",
    plan_end_date: "2024-04-14",
    weeks: weeks.map((w) => ({
      week_number: w.week_number,
      week_start_date: w.runs[0]?.date ?? "2024-03-04",
      runs: w.runs.map((r) => ({ day_of_week: "", ...r })),
    })),
  });
}

function run(id: number, startDate: string, distanceMetres: number, extra: Partial<StoredRun> = {}): StoredRun {
  return {
    id,
    name: `Run ${id}`,
    sport_type: "Run",
    start_date: startDate,
    distance_metres: distanceMetres,
    moving_time_seconds: distanceMetres * 0.3,
    ...extra,
  };
}

describe("adherence", () => {
  describe("analyzeAdherence", () => {
    const plan = makePlan([
      {
        week_number: 1,
        runs: [
          { date: "2024-03-04", type: "easy", distance_km: 8 },
          { date: "2024-03-05", type: "gym" },
          { date: "2024-03-06", type: "workout", distance_km: 10 },
          { date: "2024-03-08", type: "long_run", distance_km: 20 },
          { date: "2024-03-09", type: "rest" },
        ],
      },
      {
        week_number: 2,
        runs: [
          { date: "2024-03-11", type: "easy", distance_km: 8 },
          { date: "2024-03-13", type: "workout", distance_km: 12 },
          { date: "2024-03-20", type: "long_run", distance_km: 22 },
        ],
      },
    ]);

    const runs = [
      run(1, "2024-03-04T07:00:00Z", 8000),
      run(2, "2024-03-07T07:00:00Z", 10200, { name: "Tempo" }),
      run(3, "2024-03-08T09:00:00Z", 30000, { sport_type: "Ride" }),
    ];

    const report = analyzeAdherence(plan, runs, "2024-03-11");

    it("counts completed, missed and not-tracked entries", () => {
      expect(report.workouts_completed).toBe(2);
      expect(report.workouts_missed).toBe(2);
      expect(report.workouts_not_tracked).toBe(2);
      expect(report.completion_rate).toBe(50);
    });

    it("compares planned and actual distance", () => {
      expect(report.planned_distance_km).toBe(46);
      expect(report.actual_distance_km).toBe(18.2);
      expect(report.distance_completion_rate).toBe(39.6);
    });

    it("matches a run one day off and reports it against the plan", () => {
      expect(report.completed_workouts[1]).toEqual({
        date: "2024-03-06",
        week: 1,
        planned: { day_of_week: "", date: "2024-03-06", type: "workout", distance_km: 10 },
        actual: { id: 2, name: "Tempo", date: "2024-03-07", distance_km: 10.2, pace: "5:00" },
      });
    });

    it("ignores non-running activities and treats today as due", () => {
      expect(report.missed_workouts.map((w) => [w.date, w.week])).toEqual([
        ["2024-03-08", 1],
        ["2024-03-11", 2],
      ]);
    });

    it("lists the next seven days as upcoming", () => {
      expect(report.upcoming_workouts).toEqual([
        { day_of_week: "", date: "2024-03-13", type: "workout", distance_km: 12, week: 2, days_away: 2 },
      ]);
    });

    it("returns a zero completion rate when nothing is due", () => {
      const empty = analyzeAdherence(plan, [], "2024-03-01");
      expect(empty.completion_rate).toBe(0);
      expect(empty.distance_completion_rate).toBe(0);
      expect(empty.upcoming_workouts.map((w) => w.date)).toEqual(["2024-03-04", "2024-03-05", "2024-03-06", "2024-03-08"]);
    });

    it("keeps only the 5 most recent completed workouts", () => {
      const daily = makePlan([
        {
          week_number: 1,
          runs: ["04", "05", "06", "07", "08", "09", "10"].map((d) => ({ date: `2024-03-${d}`, type: "easy", distance_km: 5 })),
        },
      ]);
      const dailyRuns = ["04", "05", "06", "07", "08", "09", "10"].map((d, i) => run(i + 1, `2024-03-${d}T07:00:00Z`, 5000));
      const result = analyzeAdherence(daily, dailyRuns, "2024-03-10");

      expect(result.workouts_completed).toBe(7);
      expect(result.completed_workouts.map((w) => w.date)).toEqual([
        "2024-03-06",
        "2024-03-07",
        "2024-03-08",
        "2024-03-09",
        "2024-03-10",
      ]);
    });
  });

  describe("matchRunsToPlan", () => {
    it("prefers an exact-day match over a neighbouring day", () => {
      const plan = makePlan([
        {
          week_number: 1,
          runs: [
            { date: "2024-03-04", type: "easy", distance_km: 8 },
            { date: "2024-03-05", type: "easy", distance_km: 8 },
          ],
        },
      ]);
      const report = analyzeAdherence(plan, [run(1, "2024-03-05T07:00:00Z", 8000)], "2024-03-05");

      expect(report.completed_workouts.map((w) => w.date)).toEqual(["2024-03-05"]);
      expect(report.missed_workouts.map((w) => w.date)).toEqual(["2024-03-04"]);
    });

    it("breaks ties by closest distance", () => {
      const due = [{ week: 1, planned: { day_of_week: "", date: "2024-03-06", type: "workout" as const, distance_km: 10 } }];
      const matches = matchRunsToPlan(due, [
        run(1, "2024-03-06T06:00:00Z", 5000),
        run(2, "2024-03-06T18:00:00Z", 9500),
      ]);

      expect(matches.get(0)?.run.id).toBe(2);
    });

    it("uses each run at most once", () => {
      const due = [
        { week: 1, planned: { day_of_week: "", date: "2024-03-06", type: "easy" as const, distance_km: 5 } },
        { week: 1, planned: { day_of_week: "", date: "2024-03-06", type: "easy" as const, distance_km: 5 } },
      ];
      const matches = matchRunsToPlan(due, [run(1, "2024-03-06T06:00:00Z", 5000)]);

      expect(matches.size).toBe(1);
      expect(matches.has(0)).toBe(true);
    });

    it("accepts runs without a sport type", () => {
      const due = [{ week: 1, planned: { day_of_week: "", date: "2024-03-06", type: "easy" as const } }];
      const matches = matchRunsToPlan(due, [run(7, "2024-03-06T06:00:00Z", 5000, { sport_type: undefined })]);

      expect(matches.get(0)?.date).toBe("2024-03-06");
    });
  });

  describe("summarizeActualRun", () => {
    it("defaults the name and derives the pace", () => {
      expect(summarizeActualRun({ id: 9, distance_metres: 5000, moving_time_seconds: 1500 }, "2024-03-06")).toEqual({
        id: 9,
        name: "Unnamed",
        date: "2024-03-06",
        distance_km: 5,
        pace: "5:00",
      });
    });
  });
});
