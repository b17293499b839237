import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import pool from "./connection.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const MIGRATIONS_DIR = path.join(__dirname, "migrations");

/**
 * Applies every pending .sql file in MIGRATIONS_DIR in name order, each in its
 * own transaction. Applied names are tracked in `_migrations`.
 * Returns the names applied by this call.
 */
export async function runMigrations(migrationsDir: string = MIGRATIONS_DIR): Promise<string[]> {
  const client = await pool.connect();
  const appliedNow: string[] = [];
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id SERIAL PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        applied_at TIMESTAMPTZ DEFAULT NOW()
      )
    `);

    const files = (await fs.readdir(migrationsDir)).filter((f) => f.endsWith(".sql")).sort();

    const { rows: applied } = await client.query<{ name: string }>(
      "SELECT name FROM _migrations"
    );
    const appliedSet = new Set(applied.map((r) => r.name));

    for (const file of files) {
      if (appliedSet.has(file)) continue;

      const sql = await fs.readFile(path.join(migrationsDir, file), "utf-8");
      console.log(`[migrations] Applying ${file}`);

      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO _migrations (name) VALUES ($1)", [file]);
        await client.query("COMMIT");
        appliedNow.push(file);
      } catch (err) {
        await client.query("ROLLBACK");
        console.error(`[migrations] Failed on ${file}:`, err);
        throw err;
      }
    }

    return appliedNow;
  } finally {
    client.release();
  }
}
