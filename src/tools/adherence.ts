import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { getActivePlanSummary, getPlan } from "../helpers/plan-store.js";
import { buildPlanOverview, getUpcomingWorkouts, type TrainingPlan } from "../helpers/plan-helpers.js";
import { analyzeAdherence } from "../helpers/adherence.js";
import { loadAllRuns } from "../helpers/run-store.js";
import { getUserCurrentDate } from "../helpers/date-helpers.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

type ResolvedPlan = { plan: TrainingPlan; planId: string } | { error: string };

/** The requested plan, or the active plan with the soonest race. */
async function resolvePlan(planId: string | undefined): Promise<ResolvedPlan> {
  if (planId) {
    const plan = await getPlan(planId);
    return plan ? { plan, planId } : { error: `Plan not found: ${planId}` };
  }

  const active = await getActivePlanSummary();
  if (!active) {
    return { error: "No active training plans found. Use save_training_plan to create one first." };
  }
  const plan = await getPlan(active.id);
  return plan ? { plan, planId: active.id } : { error: `Plan not found: ${active.id}` };
}

export function registerAdherenceTools(server: McpServer) {
  server.registerTool(
    "analyze_plan_adherence",
    {
      description: `${APP_CONTEXT}Compare a training plan against the runs in the local mirror.

A planned run counts as completed when a run exists on the same day or one day either side; each run counts once.
Gym, cross-training and rest entries are not tracked. Uses stored runs only; call sync_runs first for fresh data.

Returns the plan overview (goal race, days until race), completion_rate (%), completed/missed counts,
planned vs actual distance, the last 5 completed workouts (planned vs actual), the last 10 missed workouts,
and the workouts of the next 7 days. Defaults to the active plan.`,
      inputSchema: {
        plan_id: z.string().min(1).optional().describe("Plan to analyze. Defaults to the active plan"),
      },
      annotations: { readOnlyHint: true },
    },
    safeHandler("analyze_plan_adherence", async ({ plan_id }) => {
      const resolved = await resolvePlan(plan_id);
      if ("error" in resolved) return toolResponse({ error: resolved.error }, true);

      const today = await getUserCurrentDate();
      const runs = await loadAllRuns();
      const report = analyzeAdherence(resolved.plan, runs, today);

      return toolResponse({
        plan_id: resolved.planId,
        plan_name: resolved.plan.plan_name || "Unnamed Plan",
        today,
        overview: buildPlanOverview(resolved.plan, today),
        ...report,
      });
    })
  );

  server.registerTool(
    "get_upcoming_workouts",
    {
      description: `${APP_CONTEXT}List the planned workouts from today through the next N days, soonest first.

Example: "what's on this week?" → days: 7`,
      inputSchema: {
        plan_id: z.string().min(1).optional().describe("Defaults to the active plan"),
        days: z.number().int().min(0).max(90).optional().describe("Days ahead to include. Defaults to 7"),
      },
      annotations: { readOnlyHint: true },
    },
    safeHandler("get_upcoming_workouts", async ({ plan_id, days }) => {
      const resolved = await resolvePlan(plan_id);
      if ("error" in resolved) return toolResponse({ error: resolved.error }, true);

      const today = await getUserCurrentDate();
      const workouts = getUpcomingWorkouts(resolved.plan, today, days ?? 7);
      return toolResponse({ plan_id: resolved.planId, today, workouts, count: workouts.length });
    })
  );
}
