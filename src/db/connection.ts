import pg from "pg";

if (!process.env.DATABASE_URL) {
  throw new Error("DATABASE_URL environment variable is required");
}

const pool = new pg.Pool({
  connectionString: process.env.DATABASE_URL,
  ssl: process.env.DATABASE_URL.includes("localhost")
    ? false
    : { rejectUnauthorized: true },
  max: 5,
  application_name: "run-coach-mcp",
});

// An 'error' event on an idle client with no listener crashes the process
pool.on("error", (err) => {
  console.error("[db] Idle client error:", err.message);
});

export default pool;
