import { z } from "zod";

const latLng = z.array(z.number());

/**
 * Activity as returned by the Strava API. Only the fields we keep are
 * declared; everything else passes through untouched and is dropped by
 * filterActivity.
 */
export const stravaActivitySchema = z
  .object({
    id: z.number().optional(),
    name: z.string().optional(),
    calories: z.number().optional(),
    distance: z.number().optional(),
    elapsed_time: z.number().optional(),
    elev_high: z.number().optional(),
    elev_low: z.number().optional(),
    end_latlng: latLng.nullable().optional(),
    average_speed: z.number().optional(),
    max_speed: z.number().optional(),
    moving_time: z.number().optional(),
    sport_type: z.string().optional(),
    start_date: z.string().optional(),
    start_latlng: latLng.nullable().optional(),
    total_elevation_gain: z.number().optional(),
  })
  .passthrough();

export type StravaActivity = z.infer<typeof stravaActivitySchema>;

export const stravaLapSchema = z
  .object({
    distance: z.number().optional(),
    average_speed: z.number().optional(),
    average_heartrate: z.number().optional(),
    moving_time: z.number().optional(),
  })
  .passthrough();

export type StravaLap = z.infer<typeof stravaLapSchema>;

/** Streams keyed by type (`key_by_type=true`), e.g. { heartrate: { data: [...] } } */
export const streamSetSchema = z.record(z.unknown());

export type StreamSet = z.infer<typeof streamSetSchema>;

export const tokenResponseSchema = z.object({
  access_token: z.string(),
  expires_at: z.number(),
  refresh_token: z.string().optional(),
});

/** Activity reduced to the kept fields, renamed with their units. */
export interface ActivitySummary {
  id?: number;
  name?: string;
  calories?: number;
  distance_metres?: number;
  elapsed_time_seconds?: number;
  elev_high_metres?: number;
  elev_low_metres?: number;
  end_latlng?: number[] | null;
  average_speed_mps?: number;
  max_speed_mps?: number;
  moving_time_seconds?: number;
  sport_type?: string;
  start_date?: string;
  start_latlng?: number[] | null;
  total_elevation_gain_metres?: number;
}

/** A mirrored run: the summary plus the detail fetched at sync time. */
export interface StoredRun extends ActivitySummary {
  streams?: StreamSet | null;
  laps?: StravaLap[];
}

export interface ActivityQuery {
  limit?: number;
  /** Epoch seconds */
  before?: number;
  /** Epoch seconds */
  after?: number;
}
