import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { mockQuery } = vi.hoisted(() => ({
  mockQuery: vi.fn(),
}));

vi.mock("../../db/connection.js", () => ({
  default: { query: mockQuery },
}));

vi.mock("../../context/user-context.js", () => ({
  getUserId: vi.fn().mockReturnValue(1),
}));

import {
  addDays,
  dateRangeToEpoch,
  daysBetween,
  formatDateInZone,
  getUserCurrentDate,
  getUserTimezone,
  getWeekDateRange,
  isoWeekKey,
  isValidIsoDate,
  parseIsoDate,
  toDateKey,
} from "../date-helpers.js";

describe("date-helpers", () => {
  beforeEach(() => {
    mockQuery.mockReset();
  });

  describe("getUserTimezone", () => {
    it("reads the timezone from the athlete profile", async () => {
      mockQuery.mockResolvedValueOnce({ rows: [{ timezone: "Europe/Madrid" }] });
      expect(await getUserTimezone()).toBe("Europe/Madrid");
      expect(mockQuery).toHaveBeenCalledWith(expect.stringContaining("athlete_profiles"), [1]);
    });

    it("defaults to UTC without a profile", async () => {
      mockQuery.mockResolvedValueOnce({ rows: [] });
      expect(await getUserTimezone()).toBe("UTC");
    });
  });

  describe("getUserCurrentDate", () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2024-03-10T23:30:00Z"));
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("returns today in the athlete's timezone", async () => {
      mockQuery.mockResolvedValueOnce({ rows: [{ timezone: "Asia/Tokyo" }] });
      expect(await getUserCurrentDate()).toBe("2024-03-11");
    });

    it("falls back to UTC for an unknown timezone", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      mockQuery.mockResolvedValueOnce({ rows: [{ timezone: "Not/A_Zone" }] });
      expect(await getUserCurrentDate()).toBe("2024-03-10");
      expect(warn).toHaveBeenCalled();
      warn.mockRestore();
    });
  });

  describe("formatDateInZone", () => {
    it("formats as YYYY-MM-DD", () => {
      expect(formatDateInZone(new Date("2024-03-10T23:30:00Z"), "UTC")).toBe("2024-03-10");
    });
  });

  describe("parseIsoDate", () => {
    it("parses to UTC midnight", () => {
      expect(parseIsoDate("2024-02-29").toISOString()).toBe("2024-02-29T00:00:00.000Z");
    });

    it("rejects impossible dates and other formats", () => {
      expect(() => parseIsoDate("2024-02-30")).toThrow("Invalid date format: 2024-02-30. Expected format: YYYY-MM-DD");
      expect(() => parseIsoDate("10/03/2024")).toThrow("Invalid date format");
    });
  });

  describe("isValidIsoDate", () => {
    it("accepts real calendar days only", () => {
      expect(isValidIsoDate("2024-02-29")).toBe(true);
      expect(isValidIsoDate("2023-02-29")).toBe(false);
      expect(isValidIsoDate("2024-13-45")).toBe(false);
      expect(isValidIsoDate("2024-3-1")).toBe(false);
    });
  });

  describe("toDateKey", () => {
    it("takes the UTC calendar date of a timestamp", () => {
      expect(toDateKey("2024-03-10T07:15:00Z")).toBe("2024-03-10");
      expect(toDateKey("2024-03-10")).toBe("2024-03-10");
    });

    it("returns null for missing or unparseable values", () => {
      expect(toDateKey(undefined)).toBeNull();
      expect(toDateKey("yesterday")).toBeNull();
    });
  });

  describe("daysBetween / addDays", () => {
    it("counts calendar days across a leap day", () => {
      expect(daysBetween("2024-02-27", "2024-03-01")).toBe(3);
      expect(daysBetween("2024-03-01", "2024-02-27")).toBe(-3);
    });

    it("adds days across a year boundary", () => {
      expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
      expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
    });
  });

  describe("dateRangeToEpoch", () => {
    it("covers whole UTC days", () => {
      expect(dateRangeToEpoch("2024-01-01", "2024-01-01")).toEqual({
        after: 1704067200,
        before: 1704153599,
      });
    });

    it("rejects a start after the end", () => {
      expect(() => dateRangeToEpoch("2024-01-02", "2024-01-01")).toThrow(
        "Invalid date range: start_date 2024-01-02 must be on or before end_date 2024-01-01"
      );
    });
  });

  describe("isoWeekKey / getWeekDateRange", () => {
    it("puts a Sunday in the week that started on the Monday before", () => {
      expect(isoWeekKey("2024-03-10T07:15:00Z")).toEqual({ year: 2024, week: 10 });
      expect(getWeekDateRange(2024, 10)).toBe("2024-03-04 to 2024-03-10");
    });

    it("assigns early January days to the previous ISO year", () => {
      expect(isoWeekKey("2021-01-03")).toEqual({ year: 2020, week: 53 });
      expect(getWeekDateRange(2020, 53)).toBe("2020-12-28 to 2021-01-03");
    });

    it("returns null for an unparseable timestamp", () => {
      expect(isoWeekKey("not a date")).toBeNull();
    });
  });
});
