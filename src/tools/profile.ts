import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { getAthleteProfile, updateAthleteProfile } from "../helpers/coaching-store.js";
import { athleteProfileUpdateSchema, normalizeProfileData, MAX_PROFILE_SIZE_BYTES } from "../helpers/profile-helpers.js";
import { formatZodIssues } from "../helpers/plan-helpers.js";
import { parseJsonObjectParam } from "../helpers/parse-helpers.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";

export function registerProfileTool(server: McpServer) {
  server.registerTool(
    "manage_athlete_profile",
    {
      description: `${APP_CONTEXT}Read or update the athlete profile.
Use action "get" to retrieve it (get_coaching_context also includes it).
Use action "update" to save what the athlete tells you. The data field merges into the profile:
objects merge key by key, lists are appended to, anything else is replaced.

Standard fields (always use these exact keys):
- name: string
- training_preferences: object, e.g. { "days_per_week": 5, "long_run_day": "sunday", "max_weekly_km": 60 }
- goals: list, e.g. ["sub-4 marathon"]
- injury_history: list, e.g. ["left achilles tendinopathy 2024"]
- notes: string
- timezone: IANA name, e.g. "Europe/Madrid" (used to decide what "today" is)

Example: athlete says "I prefer long runs on Saturday" → update with { "training_preferences": { "long_run_day": "saturday" } }`,
      inputSchema: {
        action: z.enum(["get", "update"]),
        data: z.union([z.string(), z.record(z.unknown())]).optional().describe("Fields to merge, for update"),
      },
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: false },
    },
    safeHandler("manage_athlete_profile", async ({ action, data }) => {
      if (action === "get") {
        const profile = await getAthleteProfile();
        return toolResponse({ profile });
      }

      if (data == null) return toolResponse({ error: "No data provided" }, true);
      const input = parseJsonObjectParam(data, "data");
      if (!input.ok) return toolResponse({ error: input.error }, true);
      if (Object.keys(input.value).length === 0) return toolResponse({ error: "No data provided" }, true);

      const normalized = normalizeProfileData(input.value);
      if (JSON.stringify(normalized).length > MAX_PROFILE_SIZE_BYTES) {
        return toolResponse({ error: "Profile data exceeds maximum size limit" }, true);
      }

      const parsed = athleteProfileUpdateSchema.safeParse(normalized);
      if (!parsed.success) {
        return toolResponse({ error: "Invalid profile data", details: formatZodIssues(parsed.error) }, true);
      }

      const profile = await updateAthleteProfile(parsed.data);
      return toolResponse({ profile });
    })
  );
}
