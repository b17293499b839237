import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { deletePlan, getPlan, listPlans, savePlan, updatePlan } from "../helpers/plan-store.js";
import { formatZodIssues, trainingPlanSchema, WORKOUT_TYPES } from "../helpers/plan-helpers.js";
import { parseJsonObjectParam } from "../helpers/parse-helpers.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

const PLAN_FORMAT = `Plan format:
{
  "plan_name": string,
  "goal_race": { "date": "YYYY-MM-DD", "race_type": "marathon" | "half_marathon" | "10k" | "5k" | ..., "distance_km": number,
                 "goal_time": "H:MM:SS", "goal_pace_min_per_km": "M:SS", "race_name": string },
  "plan_start_date": "YYYY-MM-DD", "plan_end_date": "YYYY-MM-DD", "notes"?: string, "is_active"?: boolean (default true),
  "weeks": [{ "week_number": number, "week_start_date": "YYYY-MM-DD", "total_planned_distance_km"?: number, "weekly_focus"?: string,
              "runs": [{ "day_of_week": string, "date": "YYYY-MM-DD", "type": ${WORKOUT_TYPES.map((t) => `"${t}"`).join(" | ")},
                         "description"?: string, "distance_km"?: number, "target_pace_min_per_km"?: "M:SS", "structure"?: string,
                         "duration_minutes"?: number, "race_name"?: string }] }]
}`;

const jsonObject = z.union([z.string(), z.record(z.unknown())]);

export function registerTrainingPlanTools(server: McpServer) {
  server.registerTool(
    "save_training_plan",
    {
      description: `${APP_CONTEXT}Save a training plan. Translate the athlete's description into the plan format below before calling.
Passing an existing plan_id overwrites that plan (its created_at is kept).

${PLAN_FORMAT}`,
      inputSchema: {
        plan_json: jsonObject.describe("The plan, as an object or a JSON string"),
        plan_id: z.string().min(1).max(64).optional().describe("Id to save under. Generated when omitted"),
      },
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: false },
    },
    safeHandler("save_training_plan", async ({ plan_json, plan_id }) => {
      const input = parseJsonObjectParam(plan_json, "plan_json");
      if (!input.ok) return toolResponse({ error: input.error }, true);

      const parsed = trainingPlanSchema.safeParse(input.value);
      if (!parsed.success) {
        return toolResponse({ error: "Invalid training plan", details: formatZodIssues(parsed.error) }, true);
      }

      const savedId = await savePlan(parsed.data, plan_id);
      return toolResponse({ plan_id: savedId, saved: true, plan_name: parsed.data.plan_name });
    })
  );

  server.registerTool(
    "list_training_plans",
    {
      description: `${APP_CONTEXT}List saved training plans (id, name, race date and name, is_active), soonest race first.`,
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    safeHandler("list_training_plans", async () => {
      const plans = await listPlans();
      return toolResponse({ plans, count: plans.length });
    })
  );

  server.registerTool(
    "get_training_plan",
    {
      description: `${APP_CONTEXT}Get a full training plan by id.`,
      inputSchema: {
        plan_id: z.string().min(1),
      },
      annotations: { readOnlyHint: true },
    },
    safeHandler("get_training_plan", async ({ plan_id }) => {
      const plan = await getPlan(plan_id);
      if (!plan) return toolResponse({ error: `Plan not found: ${plan_id}` }, true);
      return toolResponse({ plan });
    })
  );

  server.registerTool(
    "update_training_plan",
    {
      description: `${APP_CONTEXT}Update an existing training plan. Fields merge into the plan: nested objects (e.g. goal_race) merge key by key,
arrays (e.g. weeks) are replaced as a whole. To change one workout, get the plan, edit the weeks array and send it back.
After any change worth remembering, also call record_plan_adjustment.

Example: race moved → updates_json: { "goal_race": { "date": "2025-10-19" } }`,
      inputSchema: {
        plan_id: z.string().min(1),
        updates_json: jsonObject.describe("Fields to update, as an object or a JSON string"),
      },
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: false },
    },
    safeHandler("update_training_plan", async ({ plan_id, updates_json }) => {
      const updates = parseJsonObjectParam(updates_json, "updates_json");
      if (!updates.ok) return toolResponse({ error: updates.error }, true);

      const result = await updatePlan(plan_id, updates.value);
      if (result.status === "not_found") {
        return toolResponse({ error: `Plan not found: ${plan_id}` }, true);
      }
      if (result.status === "invalid") {
        return toolResponse({ error: "Invalid training plan after update", details: result.issues }, true);
      }
      return toolResponse({ plan_id, updated: true, plan: result.plan });
    })
  );

  server.registerTool(
    "delete_training_plan",
    {
      description: `${APP_CONTEXT}Delete a training plan. Confirm with the athlete first.`,
      inputSchema: {
        plan_id: z.string().min(1),
      },
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: true },
    },
    safeHandler("delete_training_plan", async ({ plan_id }) => {
      const deleted = await deletePlan(plan_id);
      if (!deleted) return toolResponse({ error: `Plan not found: ${plan_id}` }, true);
      return toolResponse({ plan_id, deleted: true });
    })
  );
}
