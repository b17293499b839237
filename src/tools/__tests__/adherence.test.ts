import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../helpers/plan-store.js", () => ({
  getPlan: vi.fn(),
  getActivePlanSummary: vi.fn(),
}));

vi.mock("../../helpers/run-store.js", () => ({
  loadAllRuns: vi.fn(),
}));

vi.mock("../../helpers/date-helpers.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../helpers/date-helpers.js")>()),
  getUserCurrentDate: vi.fn().mockResolvedValue("2024-03-11"),
}));

vi.mock("../../context/user-context.js", () => ({
  tryGetUserId: vi.fn().mockReturnValue(1),
}));

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerAdherenceTools } from "../adherence.js";
import { getActivePlanSummary, getPlan } from "../../helpers/plan-store.js";
import { loadAllRuns } from "../../helpers/run-store.js";
import { trainingPlanSchema } from "../../helpers/plan-helpers.js";

const mockGetPlan = getPlan as ReturnType<typeof vi.fn>;
const mockGetActivePlanSummary = getActivePlanSummary as ReturnType<typeof vi.fn>;
const mockLoadAllRuns = loadAllRuns as ReturnType<typeof vi.fn>;

const handlers = new Map<string, Function>();

function parse(result: { content: { text: string }[] }) {
  return JSON.parse(result.content[0].text);
}

const plan = trainingPlanSchema.parse({
  id: "p1",
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
  weeks: [
    {
      week_number: 1,
      week_start_date: "2024-03-04",
      runs: [
        { day_of_week: "Monday", date: "2024-03-04", type: "easy", distance_km: 6 },
        { day_of_week: "Thursday", date: "2024-03-07", type: "workout", distance_km: 8 },
      ],
    },
    {
      week_number: 2,
      week_start_date: "2024-03-11",
      runs: [
        { day_of_week: "Tuesday", date: "2024-03-12", type: "easy", distance_km: 6 },
        { day_of_week: "Saturday", date: "2024-03-16", type: "long_run", distance_km: 14 },
      ],
    },
  ],
});

describe("adherence tools", () => {
  beforeEach(() => {
    handlers.clear();
    mockGetPlan.mockReset();
    mockGetActivePlanSummary.mockReset();
    mockLoadAllRuns.mockReset();

    const server = {
      registerTool: vi.fn((name: string, _config: any, handler: Function) => {
        handlers.set(name, handler);
      }),
    } as unknown as McpServer;
    registerAdherenceTools(server);
  });

  describe("analyze_plan_adherence", () => {
    it("analyzes the active plan when no id is given", async () => {
      mockGetActivePlanSummary.mockResolvedValue({ id: "p1" });
      mockGetPlan.mockResolvedValue(plan);
      mockLoadAllRuns.mockResolvedValue([
        { id: 1, name: "Easy", sport_type: "Run", start_date: "2024-03-05T07:00:00Z", distance_metres: 6000, moving_time_seconds: 2100 },
      ]);

      const body = parse(await handlers.get("analyze_plan_adherence")!({}));

      expect(mockGetPlan).toHaveBeenCalledWith("p1");
      expect(body.plan_id).toBe("p1");
      expect(body.today).toBe("2024-03-11");
      expect(body.overview).toMatchObject({ days_until_race: 34, race_status: "upcoming" });
      expect(body.workouts_completed).toBe(1);
      expect(body.workouts_missed).toBe(1);
      expect(body.completion_rate).toBe(50);
      expect(body.completed_workouts[0].actual).toEqual({
        id: 1,
        name: "Easy",
        date: "2024-03-05",
        distance_km: 6,
        pace: "5:50",
      });
      expect(body.upcoming_workouts.map((w: { date: string }) => w.date)).toEqual(["2024-03-12", "2024-03-16"]);
    });

    it("uses the requested plan", async () => {
      mockGetPlan.mockResolvedValue(plan);
      mockLoadAllRuns.mockResolvedValue([]);

      await handlers.get("analyze_plan_adherence")!({ plan_id: "p1" });

      expect(mockGetActivePlanSummary).not.toHaveBeenCalled();
    });

    it("errors when there is no plan", async () => {
      mockGetActivePlanSummary.mockResolvedValue(null);

      const result = await handlers.get("analyze_plan_adherence")!({});

      expect(result.isError).toBe(true);
      expect(parse(result).error).toBe("No active training plans found. Use save_training_plan to create one first.");
    });

    it("errors for unknown plan ids", async () => {
      mockGetPlan.mockResolvedValue(null);

      const result = await handlers.get("analyze_plan_adherence")!({ plan_id: "zz" });

      expect(parse(result).error).toBe("Plan not found: zz");
    });
  });

  describe("get_upcoming_workouts", () => {
    it("lists workouts from today through the window", async () => {
      mockGetPlan.mockResolvedValue(plan);

      const body = parse(await handlers.get("get_upcoming_workouts")!({ plan_id: "p1", days: 3 }));

      expect(body).toEqual({
        plan_id: "p1",
        today: "2024-03-11",
        workouts: [
          { day_of_week: "Tuesday", date: "2024-03-12", type: "easy", distance_km: 6, week: 2, days_away: 1 },
        ],
        count: 1,
      });
    });
  });
});
