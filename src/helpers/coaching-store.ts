import pool from "../db/connection.js";
import { getUserId } from "../context/user-context.js";
import type {
  AthleteProfileRow,
  CoachingPersonaRow,
  NoteType,
  PlanAdjustmentRow,
  SessionNoteRow,
} from "../db/types.js";
import { emptyProfile, mergeProfile, type AthleteProfile } from "./profile-helpers.js";

/** Only the newest N session notes are kept per athlete */
export const MAX_SESSION_NOTES = 50;

export const NOTE_TYPES = ["session_summary", "insight", "adjustment"] as const;

export interface SessionNote {
  id: number;
  timestamp: string;
  athlete_id: number;
  note_type: NoteType;
  [key: string]: unknown;
}

export interface PlanAdjustment {
  id: number;
  timestamp: string;
  athlete_id: number;
  plan_id: string;
  change_description: string;
  reason: string;
}

function toSessionNote(row: SessionNoteRow): SessionNote {
  return {
    ...row.content,
    id: row.id,
    timestamp: row.created_at.toISOString(),
    athlete_id: row.user_id,
    note_type: row.note_type,
  };
}

function toPlanAdjustment(row: PlanAdjustmentRow): PlanAdjustment {
  return {
    id: row.id,
    timestamp: row.created_at.toISOString(),
    athlete_id: row.user_id,
    plan_id: row.plan_id,
    change_description: row.change_description,
    reason: row.reason,
  };
}

// ─── Persona ───────────────────────────────────────────────────────────────

export async function getPersona(): Promise<string | null> {
  const { rows } = await pool.query<Pick<CoachingPersonaRow, "content">>(
    "SELECT content FROM coaching_personas WHERE user_id = $1",
    [getUserId()]
  );
  return rows[0]?.content ?? null;
}

export async function savePersona(content: string): Promise<void> {
  await pool.query(
    `INSERT INTO coaching_personas (user_id, content, updated_at)
     VALUES ($1, $2, NOW())
     ON CONFLICT (user_id) DO UPDATE SET content = EXCLUDED.content, updated_at = NOW()`,
    [getUserId(), content]
  );
}

// ─── Athlete profile ───────────────────────────────────────────────────────

export async function getAthleteProfile(): Promise<AthleteProfile | null> {
  const { rows } = await pool.query<Pick<AthleteProfileRow, "data">>(
    "SELECT data FROM athlete_profiles WHERE user_id = $1",
    [getUserId()]
  );
  return rows[0]?.data ?? null;
}

/**
 * Read-modify-write of the profile under a row lock, so concurrent updates
 * that append to the same list don't lose entries. The row is created empty
 * first so there is always something to lock.
 */
export async function updateAthleteProfile(updates: Record<string, unknown>): Promise<AthleteProfile> {
  const userId = getUserId();
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    await client.query(
      "INSERT INTO athlete_profiles (user_id) VALUES ($1) ON CONFLICT (user_id) DO NOTHING",
      [userId]
    );
    const { rows } = await client.query<Pick<AthleteProfileRow, "data">>(
      "SELECT data FROM athlete_profiles WHERE user_id = $1 FOR UPDATE",
      [userId]
    );

    const now = new Date().toISOString();
    // A freshly created row holds {}
    const stored = rows[0]?.data;
    const existing = stored && Object.keys(stored).length > 0 ? stored : undefined;
    const profile: AthleteProfile = {
      ...mergeProfile(existing ?? emptyProfile(userId), updates),
      athlete_id: userId,
      created_at: existing?.created_at ?? now,
      updated_at: now,
    };

    await client.query(
      "UPDATE athlete_profiles SET data = $2::jsonb WHERE user_id = $1",
      [userId, JSON.stringify(profile)]
    );
    await client.query("COMMIT");
    return profile;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

// ─── Session notes ─────────────────────────────────────────────────────────

/** Newest first. */
export async function getSessionNotes(limit: number = MAX_SESSION_NOTES): Promise<SessionNote[]> {
  const { rows } = await pool.query<SessionNoteRow>(
    `SELECT id, user_id, note_type, content, created_at FROM session_notes
     WHERE user_id = $1 ORDER BY created_at DESC, id DESC LIMIT $2`,
    [getUserId(), limit]
  );
  return rows.map(toSessionNote);
}

/** Stores a note and prunes everything past the newest MAX_SESSION_NOTES. */
export async function addSessionNote(noteType: NoteType, content: Record<string, unknown>): Promise<SessionNote> {
  const userId = getUserId();
  const { rows } = await pool.query<SessionNoteRow>(
    `INSERT INTO session_notes (user_id, note_type, content)
     VALUES ($1, $2, $3::jsonb)
     RETURNING id, user_id, note_type, content, created_at`,
    [userId, noteType, JSON.stringify(content)]
  );

  await pool.query(
    `DELETE FROM session_notes WHERE user_id = $1 AND id NOT IN (
       SELECT id FROM session_notes WHERE user_id = $1
       ORDER BY created_at DESC, id DESC LIMIT $2
     )`,
    [userId, MAX_SESSION_NOTES]
  );

  return toSessionNote(rows[0]);
}

// ─── Plan adjustments ──────────────────────────────────────────────────────

/** Newest first. */
export async function getPlanAdjustments(limit?: number): Promise<PlanAdjustment[]> {
  const params: unknown[] = [getUserId()];
  let sql = `SELECT id, user_id, plan_id, change_description, reason, created_at FROM plan_adjustments
     WHERE user_id = $1 ORDER BY created_at DESC, id DESC`;
  if (limit != null) {
    params.push(limit);
    sql += " LIMIT $2";
  }
  const { rows } = await pool.query<PlanAdjustmentRow>(sql, params);
  return rows.map(toPlanAdjustment);
}

export async function addPlanAdjustment(
  planId: string,
  changeDescription: string,
  reason: string,
): Promise<PlanAdjustment> {
  const { rows } = await pool.query<PlanAdjustmentRow>(
    `INSERT INTO plan_adjustments (user_id, plan_id, change_description, reason)
     VALUES ($1, $2, $3, $4)
     RETURNING id, user_id, plan_id, change_description, reason, created_at`,
    [getUserId(), planId, changeDescription, reason]
  );
  return toPlanAdjustment(rows[0]);
}
