import { isPlainObject } from "./plan-helpers.js";

export type JsonObjectParam =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; error: string };

/**
 * Normalizes a parameter that should be a JSON object.
 * MCP clients sometimes serialize objects as JSON strings instead of
 * passing them as structured data; both forms are accepted here.
 */
export function parseJsonObjectParam(value: unknown, paramName: string): JsonObjectParam {
  let parsed: unknown = value;
  if (typeof value === "string") {
    try {
      parsed = JSON.parse(value);
    } catch (err) {
      console.warn(`[parseJsonObjectParam] Failed to parse ${paramName}:`, err instanceof Error ? err.message : err);
      return { ok: false, error: `Invalid JSON in ${paramName}: ${err instanceof Error ? err.message : String(err)}` };
    }
  }
  if (!isPlainObject(parsed)) {
    return { ok: false, error: `${paramName} must be a JSON object` };
  }
  return { ok: true, value: parsed };
}

/**
 * Splits a comma-separated list ("heartrate, pace") into trimmed, non-empty items.
 * Arrays pass through with the same cleanup.
 */
export function parseListParam(value: string | string[] | undefined): string[] {
  if (value == null) return [];
  const items = Array.isArray(value) ? value : value.split(",");
  return items.map((s) => s.trim()).filter(Boolean);
}

/** Command-line argument that must be a positive integer, e.g. a user id. */
export function parsePositiveIntArg(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}
