import { describe, it, expect, vi, beforeEach } from "vitest";
import { StravaApiError, StravaClient, filterActivity, STRAVA_TOKEN_URL } from "../client.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

const credentials = { refreshToken: "test-refresh", clientId: "123", clientSecret: "test-secret" };

const rawActivity = {
  id: 42,
  name: "Morning Run",
  distance: 10000,
  moving_time: 3000,
  elapsed_time: 3100,
  average_speed: 3.33,
  sport_type: "Run",
  start_date: "2024-03-04T07:00:00Z",
  total_elevation_gain: 55,
  kudos_count: 3,
};

describe("StravaClient", () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  let client: StravaClient;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    fetchMock = vi.fn();
    client = new StravaClient(credentials, fetchMock as unknown as typeof fetch);
  });

  function tokenResponse(expiresAt = Math.floor(Date.now() / 1000) + 3600, refreshToken?: string) {
    return jsonResponse({ access_token: "test-access", expires_at: expiresAt, refresh_token: refreshToken });
  }

  it("refreshes the token before the first request", async () => {
    fetchMock.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(jsonResponse([rawActivity]));

    await client.getActivities({ limit: 5 });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [tokenUrl, tokenInit] = fetchMock.mock.calls[0];
    expect(tokenUrl).toBe(STRAVA_TOKEN_URL);
    expect(tokenInit.method).toBe("POST");
    expect(String(tokenInit.body)).toBe(
      "client_id=123&client_secret=test-secret&refresh_token=test-refresh&grant_type=refresh_token"
    );

    const [url, init] = fetchMock.mock.calls[1];
    expect(String(url)).toBe("https://www.strava.com/api/v3/athlete/activities?per_page=5");
    expect(init.headers).toEqual({ Authorization: "Bearer test-access" });
  });

  it("reuses a valid token", async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(jsonResponse([]))
      .mockResolvedValueOnce(jsonResponse([]));

    await client.getActivities();
    await client.getActivities();

    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("refreshes again once the token has expired, with the rotated refresh token", async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse(Math.floor(Date.now() / 1000) - 10, "test-refresh-2"))
      .mockResolvedValueOnce(jsonResponse([]))
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(jsonResponse([]));

    await client.getActivities();
    await client.getActivities();

    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(String(fetchMock.mock.calls[2][1].body)).toContain("refresh_token=test-refresh-2");
  });

  it("filters and renames activity fields", async () => {
    fetchMock.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(jsonResponse([rawActivity]));

    const [activity] = await client.getActivities();

    expect(activity).toMatchObject({
      id: 42,
      name: "Morning Run",
      distance_metres: 10000,
      moving_time_seconds: 3000,
      elapsed_time_seconds: 3100,
      average_speed_mps: 3.33,
      sport_type: "Run",
      total_elevation_gain_metres: 55,
    });
    expect(activity).not.toHaveProperty("kudos_count");
  });

  it("sends before/after only when set", async () => {
    fetchMock.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(jsonResponse([]));

    await client.getActivities({ limit: 30, after: 1704067200, before: 1704153599 });

    const url = new URL(String(fetchMock.mock.calls[1][0]));
    expect(url.searchParams.get("per_page")).toBe("30");
    expect(url.searchParams.get("after")).toBe("1704067200");
    expect(url.searchParams.get("before")).toBe("1704153599");
  });

  it("requests streams keyed by type", async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(jsonResponse({ heartrate: { data: [140, 142] } }));

    const streams = await client.getActivityStreams(42, ["heartrate", "pace"]);

    const url = new URL(String(fetchMock.mock.calls[1][0]));
    expect(url.pathname).toBe("/api/v3/activities/42/streams");
    expect(url.searchParams.get("keys")).toBe("heartrate,pace");
    expect(url.searchParams.get("key_by_type")).toBe("true");
    expect(streams).toEqual({ heartrate: { data: [140, 142] } });
  });

  it("returns laps", async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(jsonResponse([{ distance: 1000, average_speed: 3.2, lap_index: 1 }]));

    const laps = await client.getActivityLaps(42);
    expect(laps).toEqual([{ distance: 1000, average_speed: 3.2, lap_index: 1 }]);
  });

  it("throws StravaApiError with the status on non-200 responses", async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(new Response("Record Not Found", { status: 404 }));

    const err = await client.getActivity(1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StravaApiError);
    expect(err).toMatchObject({ status: 404, message: "Error 404: Record Not Found" });
  });

  it("fails when the token exchange is rejected", async () => {
    fetchMock.mockResolvedValueOnce(new Response("Bad Request", { status: 400 }));

    await expect(client.getActivities()).rejects.toMatchObject({ status: 400, message: "Error 400: Bad Request" });
  });
});

describe("filterActivity", () => {
  it("leaves missing fields undefined", () => {
    const summary = filterActivity({ id: 1 });
    expect(summary.id).toBe(1);
    expect(summary.distance_metres).toBeUndefined();
  });
});
