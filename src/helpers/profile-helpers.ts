import { z } from "zod";
import { isPlainObject } from "./plan-helpers.js";

/** Maximum size of the profile JSONB in bytes */
export const MAX_PROFILE_SIZE_BYTES = 65536;

/** Common patterns that indicate "no injuries" */
const NONE_PATTERNS = [
  /^none$/i,
  /^n\/a$/i,
  /^na$/i,
  /^no$/i,
  /^nothing$/i,
  /^nada$/i,
  /^-$/,
];

/**
 * Zod schema for athlete profile updates.
 * Uses .passthrough() to allow extra fields beyond the standard ones.
 */
export const athleteProfileUpdateSchema = z
  .object({
    name: z.string().max(100).optional(),
    training_preferences: z.record(z.unknown()).optional(),
    goals: z.array(z.union([z.string().max(200), z.record(z.unknown())])).max(50).optional(),
    injury_history: z.array(z.union([z.string().max(200), z.record(z.unknown())])).max(100).optional(),
    notes: z.string().max(10000).optional(),
    timezone: z.string().max(64).optional(),
  })
  .passthrough();

export type AthleteProfileUpdate = z.infer<typeof athleteProfileUpdateSchema>;

export interface AthleteProfile {
  athlete_id: number;
  name?: string;
  training_preferences: Record<string, unknown>;
  goals: unknown[];
  injury_history: unknown[];
  notes: string;
  timezone?: string;
  created_at?: string;
  updated_at?: string;
  [key: string]: unknown;
}

export function emptyProfile(athleteId: number): AthleteProfile {
  return {
    athlete_id: athleteId,
    training_preferences: {},
    goals: [],
    injury_history: [],
    notes: "",
  };
}

/**
 * Normalizes profile updates by trimming strings and dropping empty or
 * "none" entries from injury_history.
 */
export function normalizeProfileData(data: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (typeof value === "string") {
      normalized[key] = value.trim();
    } else if (key === "injury_history" && Array.isArray(value)) {
      normalized[key] = value
        .map((v) => (typeof v === "string" ? v.trim() : v))
        .filter((v) => {
          if (typeof v !== "string") return v != null;
          if (v === "") return false;
          return !NONE_PATTERNS.some((pattern) => pattern.test(v));
        });
    } else {
      normalized[key] = value;
    }
  }

  return normalized;
}

/**
 * Merges updates into a profile: objects merge one level deep, arrays are
 * appended to, anything else replaces. `athlete_id` and the timestamps are
 * not updatable.
 */
export function mergeProfile(profile: AthleteProfile, updates: Record<string, unknown>): AthleteProfile {
  const merged: AthleteProfile = { ...profile };

  for (const [key, value] of Object.entries(updates)) {
    if (key === "athlete_id" || key === "created_at" || key === "updated_at") continue;

    const current = merged[key];
    if (isPlainObject(current) && isPlainObject(value)) {
      merged[key] = { ...current, ...value };
    } else if (Array.isArray(current) && Array.isArray(value)) {
      merged[key] = [...current, ...value];
    } else {
      merged[key] = value;
    }
  }

  return merged;
}
