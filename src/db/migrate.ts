import "dotenv/config";
import pool from "./connection.js";
import { runMigrations } from "./run-migrations.js";

async function migrate() {
  try {
    const applied = await runMigrations();
    console.log(applied.length > 0 ? `Applied ${applied.length} migration(s).` : "Database is up to date.");
  } finally {
    await pool.end();
  }
}

migrate().catch((err) => {
  console.error("Migration failed:", err);
  process.exit(1);
});
