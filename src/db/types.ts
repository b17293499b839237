/**
 * Database row types for run-coach.
 * Document columns (JSONB) are typed with the domain types they hold.
 */

import type { StoredRun } from "../strava/types.js";
import type { TrainingPlan } from "../helpers/plan-helpers.js";
import type { AthleteProfile } from "../helpers/profile-helpers.js";

// ─── Users & Auth ──────────────────────────────────────────────────────────

export interface UserRow {
  id: number;
  display_name: string | null;
  created_at: Date;
  last_seen_at: Date | null;
}

export interface ApiTokenRow {
  token_hash: string;
  user_id: number;
  label: string | null;
  created_at: Date;
  expires_at: Date | null;
  revoked_at: Date | null;
}

// ─── Activity Mirror ───────────────────────────────────────────────────────

export interface RunRow {
  user_id: number;
  /** BIGINT: node-postgres returns it as a string */
  activity_id: string;
  start_date: Date | null;
  sport_type: string | null;
  data: StoredRun;
  fetched_at: Date;
}

// ─── Plans ─────────────────────────────────────────────────────────────────

export interface TrainingPlanRow {
  user_id: number;
  id: string;
  data: TrainingPlan;
}

// ─── Coaching Memory ───────────────────────────────────────────────────────

export type NoteType = "session_summary" | "insight" | "adjustment";

export interface CoachingPersonaRow {
  user_id: number;
  content: string;
  updated_at: Date;
}

export interface AthleteProfileRow {
  user_id: number;
  data: AthleteProfile;
}

export interface SessionNoteRow {
  id: number;
  user_id: number;
  note_type: NoteType;
  content: Record<string, unknown>;
  created_at: Date;
}

export interface PlanAdjustmentRow {
  id: number;
  user_id: number;
  plan_id: string;
  change_description: string;
  reason: string;
  created_at: Date;
}
