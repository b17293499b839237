import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { getStravaClient, STRAVA_NOT_CONFIGURED } from "../strava/client.js";
import { deleteRun, loadAllRuns, loadRun } from "../helpers/run-store.js";
import { fetchAndSaveNewRuns } from "../helpers/run-sync.js";
import { buildIndividualRun } from "../helpers/report-builder.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

export function registerRunTools(server: McpServer) {
  server.registerTool(
    "sync_runs",
    {
      description: `${APP_CONTEXT}Mirror new running activities from Strava into local storage.
Only runs not stored yet are fetched, together with their laps and streams (heartrate, pace, altitude, cadence).
Call this before analyzing plan adherence if the athlete has run since the last sync.`,
      inputSchema: {
        weeks: z.number().int().min(1).max(52).optional().describe("Weeks to look back. Defaults to SYNC_LOOKBACK_WEEKS or 4"),
      },
      annotations: { readOnlyHint: false, openWorldHint: true, destructiveHint: false },
    },
    safeHandler("sync_runs", async ({ weeks }) => {
      const client = getStravaClient();
      if (!client) return toolResponse({ error: STRAVA_NOT_CONFIGURED }, true);

      const result = await fetchAndSaveNewRuns(client, weeks);
      return toolResponse({ ...result });
    })
  );

  server.registerTool(
    "manage_runs",
    {
      description: `${APP_CONTEXT}Read or remove runs in the local mirror (no Strava call).
- action "list": stored runs, newest first, as compact summaries with lap splits
- action "get": one stored run with its full streams and laps
- action "delete": remove a stored run (it is fetched again on the next sync if still in range)`,
      inputSchema: {
        action: z.enum(["list", "get", "delete"]),
        activity_id: z.number().int().positive().optional().describe("Required for get and delete"),
        limit: z.number().int().min(1).max(500).optional().describe("Max runs for list. Defaults to 20"),
      },
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: true },
    },
    safeHandler("manage_runs", async ({ action, activity_id, limit }) => {
      if (action === "list") {
        const runs = await loadAllRuns(limit ?? 20);
        return toolResponse({ runs: runs.map(buildIndividualRun), count: runs.length });
      }

      if (activity_id == null) {
        return toolResponse({ error: `activity_id is required for ${action} action` }, true);
      }

      if (action === "get") {
        const run = await loadRun(activity_id);
        if (!run) return toolResponse({ error: `Run not found: ${activity_id}` }, true);
        return toolResponse({ run });
      }

      const deleted = await deleteRun(activity_id);
      if (!deleted) return toolResponse({ error: `Run not found: ${activity_id}` }, true);
      return toolResponse({ activity_id, deleted: true });
    })
  );
}
