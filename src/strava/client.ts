import { z } from "zod";
import {
  stravaActivitySchema,
  stravaLapSchema,
  streamSetSchema,
  tokenResponseSchema,
  type ActivityQuery,
  type ActivitySummary,
  type StravaActivity,
  type StravaLap,
  type StreamSet,
} from "./types.js";

export const STRAVA_API_URL = "https://www.strava.com/api/v3";
export const STRAVA_TOKEN_URL = "https://www.strava.com/oauth/token";

const REQUEST_TIMEOUT_MS = 30_000;

export const STRAVA_NOT_CONFIGURED =
  "Strava client not initialized. Please set STRAVA_REFRESH_TOKEN, STRAVA_CLIENT_ID, and STRAVA_CLIENT_SECRET.";

export class StravaApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = "StravaApiError";
  }
}

/**
 * Keeps the fields we store and renames them with their units
 * (distance → distance_metres, moving_time → moving_time_seconds, ...).
 */
export function filterActivity(activity: StravaActivity): ActivitySummary {
  return {
    id: activity.id,
    calories: activity.calories,
    distance_metres: activity.distance,
    elapsed_time_seconds: activity.elapsed_time,
    elev_high_metres: activity.elev_high,
    elev_low_metres: activity.elev_low,
    end_latlng: activity.end_latlng,
    average_speed_mps: activity.average_speed,
    max_speed_mps: activity.max_speed,
    moving_time_seconds: activity.moving_time,
    sport_type: activity.sport_type,
    start_date: activity.start_date,
    start_latlng: activity.start_latlng,
    total_elevation_gain_metres: activity.total_elevation_gain,
    name: activity.name,
  };
}

export interface StravaCredentials {
  refreshToken: string;
  clientId: string;
  clientSecret: string;
}

/**
 * Read-only client for the authenticated athlete's Strava data.
 * Exchanges the refresh token for an access token on first use and again
 * once the access token's `expires_at` has passed.
 */
export class StravaClient {
  private accessToken: string | null = null;
  private expiresAt = 0;
  private refreshToken: string;

  constructor(
    private readonly credentials: StravaCredentials,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.refreshToken = credentials.refreshToken;
  }

  private async ensureValidToken(): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    if (!this.accessToken || now >= this.expiresAt) {
      return this.refreshAccessToken();
    }
    return this.accessToken;
  }

  private async refreshAccessToken(): Promise<string> {
    const body = new URLSearchParams({
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
      refresh_token: this.refreshToken,
      grant_type: "refresh_token",
    });

    const response = await this.fetchImpl(STRAVA_TOKEN_URL, {
      method: "POST",
      body,
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (response.status !== 200) {
      throw new StravaApiError(`Error ${response.status}: ${await response.text()}`, response.status);
    }

    const token = tokenResponseSchema.parse(await response.json());
    this.accessToken = token.access_token;
    this.expiresAt = token.expires_at;
    // Strava may rotate the refresh token
    if (token.refresh_token) this.refreshToken = token.refresh_token;
    console.log("[strava] Token refreshed");
    return token.access_token;
  }

  private async request<T>(
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params?: Record<string, string | number>,
  ): Promise<T> {
    const token = await this.ensureValidToken();

    const url = new URL(`${STRAVA_API_URL}/${endpoint}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const response = await this.fetchImpl(url, {
      headers: { Authorization: `Bearer ${token}` },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (response.status !== 200) {
      throw new StravaApiError(`Error ${response.status}: ${await response.text()}`, response.status);
    }

    return schema.parse(await response.json());
  }

  async getActivities({ limit = 10, before, after }: ActivityQuery = {}): Promise<ActivitySummary[]> {
    const params: Record<string, number> = { per_page: limit };
    if (before) params.before = before;
    if (after) params.after = after;

    const activities = await this.request("athlete/activities", z.array(stravaActivitySchema), params);
    return activities.map(filterActivity);
  }

  async getActivity(activityId: number): Promise<ActivitySummary> {
    const activity = await this.request(`activities/${activityId}`, stravaActivitySchema);
    return filterActivity(activity);
  }

  async getActivityStreams(activityId: number, keys: string[]): Promise<StreamSet> {
    return this.request(`activities/${activityId}/streams`, streamSetSchema, {
      keys: keys.join(","),
      key_by_type: "true",
    });
  }

  async getActivityLaps(activityId: number): Promise<StravaLap[]> {
    return this.request(`activities/${activityId}/laps`, z.array(stravaLapSchema));
  }
}

let sharedClient: StravaClient | null | undefined;

/**
 * Returns the process-wide client built from STRAVA_* env vars,
 * or null when any credential is missing.
 */
export function getStravaClient(): StravaClient | null {
  if (sharedClient !== undefined) return sharedClient;

  const refreshToken = process.env.STRAVA_REFRESH_TOKEN;
  const clientId = process.env.STRAVA_CLIENT_ID;
  const clientSecret = process.env.STRAVA_CLIENT_SECRET;

  if (!refreshToken || !clientId || !clientSecret) {
    console.warn("[strava] Credentials not set; remote activity tools are disabled.");
    sharedClient = null;
  } else {
    sharedClient = new StravaClient({ refreshToken, clientId, clientSecret });
  }
  return sharedClient;
}
