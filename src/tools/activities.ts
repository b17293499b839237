import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { getStravaClient, STRAVA_NOT_CONFIGURED } from "../strava/client.js";
import { dateRangeToEpoch } from "../helpers/date-helpers.js";
import { parseListParam } from "../helpers/parse-helpers.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

const STREAM_TYPES = "heartrate, pace, altitude, cadence, distance, moving, temperature, time, watts";

/** Live Strava queries. Nothing here touches local storage. */
export function registerActivityTools(server: McpServer) {
  server.registerTool(
    "get_activities",
    {
      description: `${APP_CONTEXT}Get the athlete's most recent Strava activities (all sports), newest first.`,
      inputSchema: {
        limit: z.number().int().min(1).max(200).optional().describe("Max activities to return. Defaults to 10"),
      },
      annotations: { readOnlyHint: true, openWorldHint: true },
    },
    safeHandler("get_activities", async ({ limit }) => {
      const client = getStravaClient();
      if (!client) return toolResponse({ error: STRAVA_NOT_CONFIGURED }, true);

      const activities = await client.getActivities({ limit: limit ?? 10 });
      return toolResponse({ activities, count: activities.length });
    })
  );

  server.registerTool(
    "get_activities_by_date_range",
    {
      description: `${APP_CONTEXT}Get Strava activities between two dates, inclusive (UTC days).

Example: "what did I run in the first week of March?" → start_date: "2025-03-01", end_date: "2025-03-07"`,
      inputSchema: {
        start_date: z.string().describe("First day, YYYY-MM-DD"),
        end_date: z.string().describe("Last day, YYYY-MM-DD"),
        limit: z.number().int().min(1).max(200).optional().describe("Max activities to return. Defaults to 30"),
      },
      annotations: { readOnlyHint: true, openWorldHint: true },
    },
    safeHandler("get_activities_by_date_range", async ({ start_date, end_date, limit }) => {
      const client = getStravaClient();
      if (!client) return toolResponse({ error: STRAVA_NOT_CONFIGURED }, true);

      let range: { after: number; before: number };
      try {
        range = dateRangeToEpoch(start_date, end_date);
      } catch (err) {
        return toolResponse({ error: err instanceof Error ? err.message : String(err) }, true);
      }

      const activities = await client.getActivities({ limit: limit ?? 30, ...range });
      return toolResponse({ activities, count: activities.length, start_date, end_date });
    })
  );

  server.registerTool(
    "get_activity_by_id",
    {
      description: `${APP_CONTEXT}Get the summary of one Strava activity by its id.`,
      inputSchema: {
        activity_id: z.number().int().positive(),
      },
      annotations: { readOnlyHint: true, openWorldHint: true },
    },
    safeHandler("get_activity_by_id", async ({ activity_id }) => {
      const client = getStravaClient();
      if (!client) return toolResponse({ error: STRAVA_NOT_CONFIGURED }, true);

      const activity = await client.getActivity(activity_id);
      return toolResponse({ activity });
    })
  );

  server.registerTool(
    "get_recent_activities",
    {
      description: `${APP_CONTEXT}Get Strava activities from the past N days.

Example: "how was my week?" → days: 7`,
      inputSchema: {
        days: z.number().int().min(1).max(365).optional().describe("Days to look back. Defaults to 7"),
        limit: z.number().int().min(1).max(200).optional().describe("Max activities to return. Defaults to 10"),
      },
      annotations: { readOnlyHint: true, openWorldHint: true },
    },
    safeHandler("get_recent_activities", async ({ days, limit }) => {
      const client = getStravaClient();
      if (!client) return toolResponse({ error: STRAVA_NOT_CONFIGURED }, true);

      const lookbackDays = days ?? 7;
      const after = Math.floor((Date.now() - lookbackDays * 86_400_000) / 1000);
      const activities = await client.getActivities({ limit: limit ?? 10, after });
      return toolResponse({ activities, count: activities.length, days: lookbackDays });
    })
  );

  server.registerTool(
    "get_activity_streams",
    {
      description: `${APP_CONTEXT}Get time-series data for one Strava activity, keyed by stream type.
Available types: ${STREAM_TYPES}.`,
      inputSchema: {
        activity_id: z.number().int().positive(),
        stream_types: z
          .union([z.string(), z.array(z.string())])
          .optional()
          .describe('Comma-separated stream types. Defaults to "heartrate,pace"'),
      },
      annotations: { readOnlyHint: true, openWorldHint: true },
    },
    safeHandler("get_activity_streams", async ({ activity_id, stream_types }) => {
      const client = getStravaClient();
      if (!client) return toolResponse({ error: STRAVA_NOT_CONFIGURED }, true);

      const keys = parseListParam(stream_types ?? "heartrate,pace");
      if (keys.length === 0) {
        return toolResponse({ error: "stream_types must name at least one stream" }, true);
      }

      const streams = await client.getActivityStreams(activity_id, keys);
      return toolResponse({ activity_id, streams });
    })
  );
}
