import "dotenv/config";
import express from "express";
import cors from "cors";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { runMigrations } from "./src/db/run-migrations.js";

import { registerActivityTools } from "./src/tools/activities.js";
import { registerRunTools } from "./src/tools/runs.js";
import { registerReportTool } from "./src/tools/reports.js";
import { registerTrainingPlanTools } from "./src/tools/training-plans.js";
import { registerAdherenceTools } from "./src/tools/adherence.js";
import { registerCoachingTools } from "./src/tools/coaching.js";
import { registerProfileTool } from "./src/tools/profile.js";

import { authenticateToken, AuthError } from "./src/auth/middleware.js";
import { runWithUser } from "./src/context/user-context.js";
import pool from "./src/db/connection.js";

function getAllowedOrigins(): string[] {
  if (process.env.ALLOWED_ORIGINS) {
    return process.env.ALLOWED_ORIGINS.split(",").map(s => s.trim()).filter(Boolean);
  }
  if (!process.env.NODE_ENV || process.env.NODE_ENV === "development") {
    return ["http://localhost:3000", "http://localhost:3001", "http://localhost:5173", "http://localhost:5174", "http://localhost:8080"];
  }
  return [];
}

const app = express();
// Deployed behind one reverse proxy hop
app.set("trust proxy", 1);
app.use(cors({
  origin: getAllowedOrigins(),
  methods: ["GET", "POST", "DELETE", "OPTIONS"],
  allowedHeaders: ["Content-Type", "Authorization"],
}));
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: false }));

// Health check
app.get("/health", (_req, res) => {
  res.json({ status: "ok" });
});

// New McpServer per request: stateless, no session affinity.
function createConfiguredServer(): McpServer {
  const server = new McpServer(
    { name: "run-coach", version: "1.0.0" },
    {
      instructions: `You are a running coach. The athlete talks naturally and you call tools to read their Strava training, manage their training plans and remember what you learned about them.

First message of every conversation:
1. Call get_coaching_context BEFORE responding.
2. Adopt the coaching_persona it returns. Use the athlete_profile, recent_notes and recent_adjustments to continue where the last session left off.
3. If active_plan is set and the athlete asks how training is going, call analyze_plan_adherence (after sync_runs if they ran since the last sync).

Before the conversation ends, save a session_summary with save_coaching_note.
When you change a plan with update_training_plan, record why with record_plan_adjustment.`,
    }
  );

  registerActivityTools(server);
  registerRunTools(server);
  registerReportTool(server);
  registerTrainingPlanTools(server);
  registerAdherenceTools(server);
  registerCoachingTools(server);
  registerProfileTool(server);

  return server;
}

// MCP endpoint
app.all("/mcp", async (req, res) => {
  try {
    let userId: number;

    if (process.env.DEV_USER_ID && process.env.NODE_ENV !== "production") {
      userId = Number(process.env.DEV_USER_ID);
      if (Number.isNaN(userId)) {
        throw new Error("DEV_USER_ID must be a valid number");
      }
    } else {
      userId = await authenticateToken(req);
    }

    await runWithUser(userId, async () => {
      const server = createConfiguredServer();

      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
      });

      res.on("close", () => {
        Promise.all([transport.close(), server.close()]).catch((err) => {
          console.error("MCP close error:", err);
        });
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    });
  } catch (err) {
    if (err instanceof AuthError) {
      res.setHeader("WWW-Authenticate", 'Bearer realm="run-coach"');
      res.status(401).json({
        error: "unauthorized",
        message: err.message,
      });
      return;
    }
    console.error("MCP endpoint error:", err instanceof Error ? err.stack : err);
    if (!res.headersSent) {
      res.status(500).json({ error: "internal_error", message: "An unexpected error occurred" });
    }
  }
});

// Start
const PORT = Number(process.env.PORT) || 3001;

async function start() {
  try {
    await runMigrations();
    const server = app.listen(PORT, () => {
      console.log(`Run Coach MCP server running on port ${PORT}`);
    });

    // Graceful shutdown handling
    const shutdown = (signal: string) => {
      console.log(`\n${signal} received. Shutting down gracefully...`);
      server.close(() => {
        console.log("HTTP server closed.");
        pool.end().then(
          () => {
            console.log("Database pool closed.");
            process.exit(0);
          },
          (err: unknown) => {
            console.error("Error closing database pool:", err);
            process.exit(1);
          },
        );
      });

      // Force close after 10 seconds
      setTimeout(() => {
        console.error("Forced shutdown after timeout.");
        process.exit(1);
      }, 10_000).unref();
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  } catch (err) {
    console.error("Failed to start:", err);
    process.exit(1);
  }
}

void start();
