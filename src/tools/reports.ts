import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { getStravaClient, STRAVA_NOT_CONFIGURED } from "../strava/client.js";
import { loadAllRuns } from "../helpers/run-store.js";
import { fetchAndSaveNewRuns } from "../helpers/run-sync.js";
import { buildTrainingReport, calculateSummaryStats } from "../helpers/report-builder.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

export function registerReportTool(server: McpServer) {
  server.registerTool(
    "get_training_report",
    {
      description: `${APP_CONTEXT}Comprehensive report of the athlete's running from the local mirror.

Returns:
- overall_summary: total runs, distance, time, elevation, average pace and heart rate
- weekly_summaries: per ISO week (most recent first) with its date range
- individual_runs: every run with distance, pace, heart rate and lap splits

With refresh (default true) new runs are synced from Strava first. Pass refresh: false to report on stored data only.`,
      inputSchema: {
        refresh: z.boolean().optional().describe("Sync from Strava before reporting. Defaults to true"),
      },
      annotations: { readOnlyHint: false, openWorldHint: true, destructiveHint: false },
    },
    safeHandler("get_training_report", async ({ refresh }) => {
      const shouldRefresh = refresh ?? true;
      let newRunsFetched: number | undefined;

      if (shouldRefresh) {
        const client = getStravaClient();
        if (!client) return toolResponse({ error: STRAVA_NOT_CONFIGURED }, true);
        const sync = await fetchAndSaveNewRuns(client);
        newRunsFetched = sync.new_runs;
      }

      const runs = await loadAllRuns();
      const refreshInfo = newRunsFetched !== undefined ? { new_runs_fetched: newRunsFetched } : {};

      if (runs.length === 0) {
        return toolResponse({
          overall_summary: calculateSummaryStats([]),
          weekly_summaries: [],
          individual_runs: [],
          message: "No run data found. Make sure there are running activities on Strava, then sync.",
          ...refreshInfo,
        });
      }

      return toolResponse({ ...buildTrainingReport(runs), ...refreshInfo });
    })
  );
}
