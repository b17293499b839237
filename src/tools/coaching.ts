import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  addPlanAdjustment,
  addSessionNote,
  getAthleteProfile,
  getPersona,
  getPlanAdjustments,
  getSessionNotes,
  MAX_SESSION_NOTES,
  NOTE_TYPES,
  savePersona,
} from "../helpers/coaching-store.js";
import { getActivePlanSummary } from "../helpers/plan-store.js";
import { parseJsonObjectParam } from "../helpers/parse-helpers.js";
import { toolResponse, safeHandler, APP_CONTEXT } from "../helpers/tool-response.js";
import type { NoteType } from "../db/types.js";

const RECENT_NOTES = 10;
const RECENT_ADJUSTMENTS = 5;
const MAX_PERSONA_LENGTH = 20_000;

function isNoteType(value: string): value is NoteType {
  return NOTE_TYPES.some((t) => t === value);
}

export function registerCoachingTools(server: McpServer) {
  server.registerTool(
    "get_coaching_context",
    {
      description: `${APP_CONTEXT}MANDATORY at the start of a coaching conversation. Loads everything needed to continue where the last session left off:
- coaching_persona: how to behave as a coach (adopt it)
- athlete_profile: preferences, goals, injury history
- recent_notes: the ${RECENT_NOTES} latest session notes
- recent_adjustments: the ${RECENT_ADJUSTMENTS} latest plan adjustments
- active_plan: summary of the active training plan, or null`,
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    safeHandler("get_coaching_context", async () => {
      const [persona, profile, notes, adjustments, activePlan] = await Promise.all([
        getPersona(),
        getAthleteProfile(),
        getSessionNotes(RECENT_NOTES),
        getPlanAdjustments(RECENT_ADJUSTMENTS),
        getActivePlanSummary(),
      ]);

      return toolResponse({
        coaching_persona: persona,
        athlete_profile: profile,
        recent_notes: notes,
        recent_adjustments: adjustments,
        active_plan: activePlan
          ? {
              plan_id: activePlan.id,
              plan_name: activePlan.plan_name,
              race_name: activePlan.race_name,
              race_date: activePlan.race_date,
            }
          : null,
      });
    })
  );

  server.registerTool(
    "save_coaching_note",
    {
      description: `${APP_CONTEXT}Save a coaching note so insights persist across conversations. Only the newest ${MAX_SESSION_NOTES} notes are kept.

Types:
- "session_summary": summary of a coaching conversation
- "insight": an observation about the athlete's training
- "adjustment": a change agreed with the athlete

content_json holds the note body, e.g. { "summary": "...", "key_points": ["..."] }`,
      inputSchema: {
        note_type: z.string().describe(`One of: ${NOTE_TYPES.join(", ")}`),
        content_json: z.union([z.string(), z.record(z.unknown())]).describe("Note content, as an object or a JSON string"),
      },
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: false },
    },
    safeHandler("save_coaching_note", async ({ note_type, content_json }) => {
      if (!isNoteType(note_type)) {
        return toolResponse({ error: `Invalid note_type. Must be one of: ${NOTE_TYPES.join(", ")}` }, true);
      }

      const content = parseJsonObjectParam(content_json, "content_json");
      if (!content.ok) return toolResponse({ error: content.error }, true);

      const note = await addSessionNote(note_type, content.value);
      return toolResponse({ saved: true, note });
    })
  );

  server.registerTool(
    "list_coaching_notes",
    {
      description: `${APP_CONTEXT}List saved coaching notes, newest first. Optionally filter by note_type.`,
      inputSchema: {
        note_type: z.enum(NOTE_TYPES).optional().describe("Only notes of this type"),
        limit: z.number().int().min(1).max(MAX_SESSION_NOTES).optional().describe(`Defaults to ${MAX_SESSION_NOTES}`),
      },
      annotations: { readOnlyHint: true },
    },
    safeHandler("list_coaching_notes", async ({ note_type, limit }) => {
      const all = await getSessionNotes(MAX_SESSION_NOTES);
      const notes = (note_type ? all.filter((n) => n.note_type === note_type) : all).slice(0, limit ?? MAX_SESSION_NOTES);
      return toolResponse({ notes, count: notes.length });
    })
  );

  server.registerTool(
    "record_plan_adjustment",
    {
      description: `${APP_CONTEXT}Record why a training plan was changed, so later sessions know the history.
Call after update_training_plan when the change reflects a coaching decision (injury, missed week, race moved, ...).`,
      inputSchema: {
        plan_id: z.string().min(1),
        change_description: z.string().min(1).max(2000).describe("What was changed"),
        reason: z.string().min(1).max(2000).describe("Why it was changed"),
      },
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: false },
    },
    safeHandler("record_plan_adjustment", async ({ plan_id, change_description, reason }) => {
      const adjustment = await addPlanAdjustment(plan_id, change_description.trim(), reason.trim());
      return toolResponse({ saved: true, adjustment });
    })
  );

  server.registerTool(
    "set_coaching_persona",
    {
      description: `${APP_CONTEXT}Replace the coaching persona: markdown describing how the coach should talk and decide
(tone, philosophy, how hard to push). Returned by get_coaching_context at the start of each conversation.`,
      inputSchema: {
        content: z.string().min(1).max(MAX_PERSONA_LENGTH),
      },
      annotations: { readOnlyHint: false, openWorldHint: false, destructiveHint: false },
    },
    safeHandler("set_coaching_persona", async ({ content }) => {
      await savePersona(content);
      return toolResponse({ saved: true, length: content.length });
    })
  );
}
