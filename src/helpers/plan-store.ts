import crypto from "node:crypto";
import pool from "../db/connection.js";
import { getUserId } from "../context/user-context.js";
import type { TrainingPlanRow } from "../db/types.js";
import {
  compareByRaceDate,
  formatZodIssues,
  mergeDeep,
  summarizePlan,
  trainingPlanSchema,
  type PlanSummary,
  type TrainingPlan,
} from "./plan-helpers.js";

export function generatePlanId(): string {
  return crypto.randomUUID().replace(/-/g, "").slice(0, 8);
}

/**
 * Stores a plan under `planId` (or the plan's own id, or a fresh one) and
 * returns the id. Overwriting an existing plan keeps its `created_at`.
 */
export async function savePlan(plan: TrainingPlan, planId?: string): Promise<string> {
  const id = planId ?? plan.id ?? generatePlanId();
  const now = new Date().toISOString();
  const doc: TrainingPlan = {
    ...plan,
    id,
    created_at: plan.created_at ?? now,
    updated_at: now,
  };

  await pool.query(
    `INSERT INTO training_plans (user_id, id, data)
     VALUES ($1, $2, $3::jsonb)
     ON CONFLICT (user_id, id)
     DO UPDATE SET data = jsonb_set(
       EXCLUDED.data, '{created_at}',
       COALESCE(training_plans.data->'created_at', EXCLUDED.data->'created_at')
     )`,
    [getUserId(), id, JSON.stringify(doc)]
  );
  return id;
}

export async function getPlan(planId: string): Promise<TrainingPlan | null> {
  const { rows } = await pool.query<Pick<TrainingPlanRow, "data">>(
    "SELECT data FROM training_plans WHERE user_id = $1 AND id = $2",
    [getUserId(), planId]
  );
  return rows[0]?.data ?? null;
}

export async function listPlans(): Promise<PlanSummary[]> {
  const { rows } = await pool.query<Pick<TrainingPlanRow, "id" | "data">>(
    "SELECT id, data FROM training_plans WHERE user_id = $1",
    [getUserId()]
  );
  return rows.map((r) => summarizePlan(r.data, r.id)).sort(compareByRaceDate);
}

/** First active plan in list order (soonest race), if any. */
export async function getActivePlanSummary(): Promise<PlanSummary | null> {
  const plans = await listPlans();
  return plans.find((p) => p.is_active) ?? null;
}

export type UpdatePlanResult =
  | { status: "updated"; plan: TrainingPlan }
  | { status: "not_found" }
  | { status: "invalid"; issues: string[] };

/**
 * Deep-merges `updates` into the stored plan and saves it if the result is
 * still a valid plan. Arrays (e.g. `weeks`) are replaced, not merged. The
 * plan row stays locked from read to write.
 */
export async function updatePlan(planId: string, updates: Record<string, unknown>): Promise<UpdatePlanResult> {
  const userId = getUserId();
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const { rows } = await client.query<Pick<TrainingPlanRow, "data">>(
      "SELECT data FROM training_plans WHERE user_id = $1 AND id = $2 FOR UPDATE",
      [userId, planId]
    );
    const existing = rows[0]?.data;
    if (!existing) {
      await client.query("ROLLBACK");
      return { status: "not_found" };
    }

    const merged = mergeDeep(existing, updates);
    const parsed = trainingPlanSchema.safeParse(merged);
    if (!parsed.success) {
      await client.query("ROLLBACK");
      return { status: "invalid", issues: formatZodIssues(parsed.error) };
    }

    const plan: TrainingPlan = {
      ...parsed.data,
      id: planId,
      created_at: existing.created_at,
      updated_at: new Date().toISOString(),
    };
    await client.query(
      "UPDATE training_plans SET data = $3::jsonb WHERE user_id = $1 AND id = $2",
      [userId, planId, JSON.stringify(plan)]
    );
    await client.query("COMMIT");
    return { status: "updated", plan };
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

export async function deletePlan(planId: string): Promise<boolean> {
  const { rowCount } = await pool.query(
    "DELETE FROM training_plans WHERE user_id = $1 AND id = $2",
    [getUserId(), planId]
  );
  return (rowCount ?? 0) > 0;
}
