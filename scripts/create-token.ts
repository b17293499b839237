#!/usr/bin/env npx tsx
/**
 * Creates an API token for the MCP endpoint and prints it once.
 * Run with: npm run create-token -- [user_id] [label]
 *
 * Without a user_id a new user is created. Only the token's hash is stored.
 */

import "dotenv/config";
import crypto from "node:crypto";
import pool from "../src/db/connection.js";
import { hashToken } from "../src/auth/middleware.js";
import { parsePositiveIntArg } from "../src/helpers/parse-helpers.js";
import type { UserRow } from "../src/db/types.js";

async function main() {
  const [userArg, label] = process.argv.slice(2);

  try {
    let userId: number;
    if (userArg) {
      userId = parsePositiveIntArg(userArg, "user_id");
      const { rows } = await pool.query<Pick<UserRow, "id">>("SELECT id FROM users WHERE id = $1", [userId]);
      if (rows.length === 0) throw new Error(`User not found: ${userArg}`);
    } else {
      const { rows } = await pool.query<Pick<UserRow, "id">>(
        "INSERT INTO users (display_name) VALUES ($1) RETURNING id",
        [label ?? null]
      );
      userId = rows[0].id;
      console.log(`Created user ${userId}`);
    }

    const token = crypto.randomBytes(32).toString("base64url");
    await pool.query(
      "INSERT INTO api_tokens (token_hash, user_id, label) VALUES ($1, $2, $3)",
      [hashToken(token), userId, label ?? null]
    );

    console.log(`Token for user ${userId} (shown once):\n${token}`);
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error("Could not create token:", err instanceof Error ? err.message : err);
  process.exit(1);
});
