import "dotenv/config";
import express from "express";
import { createServer } from "http";
import net from "net";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { sql } from "drizzle-orm";
import { appRouter } from "../routers";
import { createContext } from "./context";
import { ENV } from "./env";
import { validateEnvironment } from "./envValidation";
import { withTimeout } from "./withTimeout";
import { getDb } from "../db";
import { isGremlinConfigured } from "../gremlin/gremlinClient";
import { isJiraConfigured } from "../jira/jiraClient";
import { isSshConfigured } from "../ssh/sshClient";

const HEALTH_CHECK_TIMEOUT = 5_000;

type CheckResult = {
  status: "connected" | "disconnected" | "not_configured" | "error";
  latencyMs?: number;
  details?: Record<string, unknown>;
  error?: string;
};

function isPortAvailable(port: number): Promise<boolean> {
  return new Promise(resolve => {
    const server = net.createServer();
    server.listen(port, () => {
      server.close(() => resolve(true));
    });
    server.on("error", () => resolve(false));
  });
}

async function findAvailablePort(startPort: number = 3000): Promise<number> {
  for (let port = startPort; port < startPort + 20; port++) {
    if (await isPortAvailable(port)) {
      return port;
    }
  }
  throw new Error(`No available port found starting from ${startPort}`);
}

async function checkDatabase(): Promise<CheckResult> {
  if (!ENV.databaseUrl) return { status: "not_configured" };
  try {
    const start = Date.now();
    const db = await getDb();
    if (!db) return { status: "disconnected", error: "Database instance not available" };
    await db.execute(sql`SELECT 1`);
    return { status: "connected", latencyMs: Date.now() - start };
  } catch (err) {
    return { status: "error", error: (err as Error).message.substring(0, 200) };
  }
}

/** TCP reachability of a configured service; no credentials are exchanged. */
function checkTcp(host: string, port: number): Promise<CheckResult> {
  const start = Date.now();
  return new Promise(resolve => {
    const socket = net.createConnection({ host, port, timeout: HEALTH_CHECK_TIMEOUT });
    socket.on("connect", () => {
      socket.destroy();
      resolve({ status: "connected", latencyMs: Date.now() - start, details: { host, port } });
    });
    socket.on("timeout", () => {
      socket.destroy();
      resolve({ status: "error", error: `Cannot reach ${host}:${port} (timeout)` });
    });
    socket.on("error", err => {
      socket.destroy();
      resolve({ status: "error", error: err.message.substring(0, 200) });
    });
  });
}

function endpointOf(url: string, defaultPort: number): { host: string; port: number } | null {
  try {
    const parsed = new URL(url);
    return { host: parsed.hostname, port: parsed.port ? parseInt(parsed.port, 10) : defaultPort };
  } catch {
    return null;
  }
}

async function checkConfigured(configured: boolean, target: { host: string; port: number } | null): Promise<CheckResult> {
  if (!configured) return { status: "not_configured" };
  if (!target) return { status: "error", error: "Endpoint URL is not valid" };
  return checkTcp(target.host, target.port);
}

async function startServer() {
  const { errors: envErrors } = validateEnvironment();
  if (envErrors.length > 0) {
    console.error("\n[FATAL] Cannot start — fix the missing environment variables above.\n");
    process.exit(1);
  }

  const app = express();
  const server = createServer(app);
  app.use(express.json({ limit: "5mb" }));
  app.use(express.urlencoded({ limit: "5mb", extended: true }));

  app.get("/api/health", (_req, res) => {
    res.json({ status: "healthy", timestamp: new Date().toISOString() });
  });

  // Reachability of every configured collaborator, checked in parallel
  app.get("/api/status", async (_req, res) => {
    const startTime = Date.now();
    const guarded = (check: Promise<CheckResult>) =>
      withTimeout(check, HEALTH_CHECK_TIMEOUT).catch(
        (err): CheckResult => ({ status: "error", error: (err as Error).message.substring(0, 200) })
      );

    const [database, ssh, jira, gremlin] = await Promise.all([
      guarded(checkDatabase()),
      guarded(checkConfigured(isSshConfigured(), { host: ENV.sshHostname, port: ENV.sshPort })),
      guarded(checkConfigured(isJiraConfigured(), endpointOf(ENV.jiraUrl, 443))),
      guarded(checkConfigured(isGremlinConfigured(), endpointOf(ENV.gremlinEndpoint, 443))),
    ]);
    const checks = { database, ssh, jira, gremlin };

    const statuses = Object.values(checks).map(c => c.status);
    const overallStatus = statuses.every(s => s === "connected" || s === "not_configured")
      ? "healthy"
      : statuses.some(s => s === "connected")
        ? "degraded"
        : "unhealthy";

    res.json({
      status: overallStatus,
      timestamp: new Date().toISOString(),
      totalLatencyMs: Date.now() - startTime,
      version: process.env.npm_package_version || "dev",
      nodeEnv: process.env.NODE_ENV || "development",
      checkpointStore: ENV.databaseUrl ? "mysql" : "memory",
      checks,
    });
  });

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext,
    })
  );

  const port = await findAvailablePort(ENV.port);
  if (port !== ENV.port) {
    console.log(`Port ${ENV.port} is busy, using port ${port} instead`);
  }

  server.listen(port, () => {
    console.log(`Server running on http://localhost:${port}/`);
  });
}

startServer().catch(console.error);
