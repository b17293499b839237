#!/usr/bin/env npx tsx
/**
 * Mirrors new Strava runs for one user from the command line.
 * Run with: npm run sync -- [weeks]
 *
 * Uses DEV_USER_ID (default 1) as the user and the STRAVA_* settings from .env.
 */

import "dotenv/config";
import pool from "../src/db/connection.js";
import { runWithUser } from "../src/context/user-context.js";
import { getStravaClient, STRAVA_NOT_CONFIGURED } from "../src/strava/client.js";
import { fetchAndSaveNewRuns, getLookbackWeeks } from "../src/helpers/run-sync.js";

async function main() {
  const client = getStravaClient();
  if (!client) {
    throw new Error(STRAVA_NOT_CONFIGURED);
  }

  const userId = Number(process.env.DEV_USER_ID ?? 1);
  if (!Number.isInteger(userId) || userId <= 0) {
    throw new Error("DEV_USER_ID must be a positive integer");
  }

  const weeksArg = process.argv[2];
  const weeks = weeksArg ? Number(weeksArg) : getLookbackWeeks();
  if (!Number.isInteger(weeks) || weeks <= 0) {
    throw new Error(`Invalid number of weeks: ${weeksArg}`);
  }

  try {
    const result = await runWithUser(userId, () => fetchAndSaveNewRuns(client, weeks));
    console.log(
      `Checked ${result.fetched} activities from the last ${result.lookback_weeks} week(s): ` +
        `${result.runs_found} run(s), ${result.new_runs} new.`
    );
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error("Sync failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
