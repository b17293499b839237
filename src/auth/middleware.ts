import type { Request } from "express";
import crypto from "node:crypto";
import pool from "../db/connection.js";
import type { ApiTokenRow } from "../db/types.js";

export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthError";
  }
}

interface CachedToken {
  userId: number;
  expiresAt: number;
  lastAccess: number;
}

const tokenCache = new Map<string, CachedToken>();
const TOKEN_CACHE_TTL = 60_000; // 1 minute
const TOKEN_CACHE_MAX = 1000;

/** Tokens are stored and cached by their SHA-256 hex digest only. */
export function hashToken(token: string): string {
  return crypto.createHash("sha256").update(token).digest("hex");
}

export function clearTokenCache(): void {
  tokenCache.clear();
}

/**
 * Authenticates a Bearer token from the request and returns the user ID.
 * Valid tokens are cached for a minute (max 1000 entries) so most MCP
 * requests skip the database. On a miss the hash is looked up in api_tokens;
 * expired or revoked tokens are rejected.
 *
 * When the cache is full the least recently used 25% is evicted, not
 * everything, so concurrent requests don't all miss at once.
 */
export async function authenticateToken(req: Request): Promise<number> {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith("Bearer ")) {
    throw new AuthError("Missing or invalid Authorization header");
  }

  const token = authHeader.slice(7).trim();
  if (!token) {
    throw new AuthError("Missing or invalid Authorization header");
  }
  const key = hashToken(token);

  const cached = tokenCache.get(key);
  if (cached && cached.expiresAt > Date.now()) {
    cached.lastAccess = Date.now();
    return cached.userId;
  }
  if (cached) {
    tokenCache.delete(key);
  }

  const { rows } = await pool.query<Pick<ApiTokenRow, "user_id">>(
    `SELECT user_id FROM api_tokens
     WHERE token_hash = $1 AND revoked_at IS NULL AND (expires_at IS NULL OR expires_at > NOW())`,
    [key]
  );
  if (rows.length === 0) {
    throw new AuthError("Invalid or expired token");
  }

  const userId = rows[0].user_id;

  // Only touch last_seen_at when stale by more than an hour
  await pool.query(
    `UPDATE users SET last_seen_at = NOW()
     WHERE id = $1 AND (last_seen_at IS NULL OR last_seen_at < NOW() - INTERVAL '1 hour')`,
    [userId]
  );

  if (tokenCache.size >= TOKEN_CACHE_MAX) {
    const toDelete = Math.floor(TOKEN_CACHE_MAX * 0.25);
    const entries = Array.from(tokenCache.entries())
      .sort((a, b) => a[1].lastAccess - b[1].lastAccess);
    for (let i = 0; i < toDelete && i < entries.length; i++) {
      tokenCache.delete(entries[i][0]);
    }
  }

  const now = Date.now();
  tokenCache.set(key, {
    userId,
    expiresAt: now + TOKEN_CACHE_TTL,
    lastAccess: now,
  });

  return userId;
}
