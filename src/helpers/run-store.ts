import pool from "../db/connection.js";
import { getUserId } from "../context/user-context.js";
import type { StoredRun } from "../strava/types.js";
import type { RunRow } from "../db/types.js";

/**
 * Local mirror of the user's Strava runs: one row per activity, the whole
 * run document (summary, streams, laps) kept in `data`.
 */

export async function getExistingRunIds(): Promise<Set<number>> {
  const { rows } = await pool.query<Pick<RunRow, "activity_id">>(
    "SELECT activity_id FROM runs WHERE user_id = $1",
    [getUserId()]
  );
  return new Set(rows.map((r) => Number(r.activity_id)));
}

export async function saveRun(run: StoredRun, activityId: number): Promise<void> {
  await pool.query(
    `INSERT INTO runs (user_id, activity_id, start_date, sport_type, data, fetched_at)
     VALUES ($1, $2, $3, $4, $5::jsonb, NOW())
     ON CONFLICT (user_id, activity_id)
     DO UPDATE SET start_date = EXCLUDED.start_date, sport_type = EXCLUDED.sport_type,
                   data = EXCLUDED.data, fetched_at = NOW()`,
    [getUserId(), activityId, run.start_date ?? null, run.sport_type ?? null, JSON.stringify(run)]
  );
}

export async function loadRun(activityId: number): Promise<StoredRun | null> {
  const { rows } = await pool.query<Pick<RunRow, "data">>(
    "SELECT data FROM runs WHERE user_id = $1 AND activity_id = $2",
    [getUserId(), activityId]
  );
  return rows[0]?.data ?? null;
}

/** Every mirrored run, most recent first. */
export async function loadAllRuns(limit?: number): Promise<StoredRun[]> {
  const params: unknown[] = [getUserId()];
  let sql = "SELECT data FROM runs WHERE user_id = $1 ORDER BY start_date DESC NULLS LAST, activity_id DESC";
  if (limit != null) {
    params.push(limit);
    sql += " LIMIT $2";
  }
  const { rows } = await pool.query<Pick<RunRow, "data">>(sql, params);
  return rows.map((r) => r.data);
}

export async function deleteRun(activityId: number): Promise<boolean> {
  const { rowCount } = await pool.query(
    "DELETE FROM runs WHERE user_id = $1 AND activity_id = $2",
    [getUserId(), activityId]
  );
  return (rowCount ?? 0) > 0;
}
