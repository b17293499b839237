import type { StravaClient } from "../strava/client.js";
import type { ActivitySummary, StoredRun } from "../strava/types.js";
import { getExistingRunIds, saveRun } from "./run-store.js";

export const DEFAULT_LOOKBACK_WEEKS = 4;
const SYNC_PAGE_SIZE = 200;
const DETAIL_STREAMS = ["heartrate", "pace", "altitude", "cadence"];

export interface SyncResult {
  lookback_weeks: number;
  fetched: number;
  runs_found: number;
  new_runs: number;
  saved_ids: number[];
}

export function getLookbackWeeks(): number {
  const fromEnv = Number(process.env.SYNC_LOOKBACK_WEEKS);
  return Number.isInteger(fromEnv) && fromEnv > 0 ? fromEnv : DEFAULT_LOOKBACK_WEEKS;
}

export function isRun(activity: ActivitySummary): boolean {
  return (activity.sport_type ?? "").toLowerCase().includes("run");
}

/**
 * Streams and laps for one activity. Either may fail independently;
 * failures are logged and replaced with null streams / no laps.
 */
export async function fetchRunDetails(
  client: StravaClient,
  activityId: number,
): Promise<Pick<StoredRun, "streams" | "laps">> {
  const details: Pick<StoredRun, "streams" | "laps"> = {};

  try {
    details.streams = await client.getActivityStreams(activityId, DETAIL_STREAMS);
  } catch (err) {
    console.warn(`[sync] Could not fetch streams for ${activityId}:`, err instanceof Error ? err.message : err);
    details.streams = null;
  }

  try {
    details.laps = await client.getActivityLaps(activityId);
  } catch (err) {
    console.warn(`[sync] Could not fetch laps for ${activityId}:`, err instanceof Error ? err.message : err);
    details.laps = [];
  }

  return details;
}

/**
 * Mirrors runs from the last `lookbackWeeks` weeks that aren't stored yet.
 * Already-stored activities are not refetched.
 */
export async function fetchAndSaveNewRuns(
  client: StravaClient,
  lookbackWeeks: number = getLookbackWeeks(),
): Promise<SyncResult> {
  const existingIds = await getExistingRunIds();

  const after = Math.floor((Date.now() - lookbackWeeks * 7 * 86_400_000) / 1000);
  const activities = await client.getActivities({ limit: SYNC_PAGE_SIZE, after });

  const runs = activities.filter(isRun);
  const newRuns = runs.filter((r) => r.id != null && !existingIds.has(r.id));

  const savedIds: number[] = [];
  for (const run of newRuns) {
    const activityId = run.id;
    if (activityId == null) continue;
    const details = await fetchRunDetails(client, activityId);
    await saveRun({ ...run, ...details }, activityId);
    savedIds.push(activityId);
  }

  if (savedIds.length > 0) {
    console.log(`[sync] Saved ${savedIds.length} new run(s)`);
  }

  return {
    lookback_weeks: lookbackWeeks,
    fetched: activities.length,
    runs_found: runs.length,
    new_runs: savedIds.length,
    saved_ids: savedIds,
  };
}
