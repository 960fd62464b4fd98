import Fastify from "fastify";
import cors from "@fastify/cors";
import { createLogger, nullOracle, type Oracle } from "@parley/engine-session";
import { registerMcpRoutes } from "./mcp/router.js";
import { registerNegotiationRoutes } from "./routes/negotiations.js";
import { registerStrategyRoutes } from "./routes/strategies.js";
import { NegotiationService } from "./services/negotiation.service.js";

export interface ServerOptions {
  /** Language-model oracle for the analysis modules. Defaults to one that never answers. */
  oracle?: Oracle;
  logLevel?: string;
}

export async function createServer(options: ServerOptions = {}) {
  const level = options.logLevel ?? (process.env.LOG_LEVEL || "info");
  const app = Fastify({
    logger: {
      level,
    },
  });

  // ─── Negotiations ────────────────────────────────────────
  const service = new NegotiationService(
    options.oracle ?? nullOracle,
    createLogger("parley-api", level),
  );

  // ─── CORS ────────────────────────────────────────────────
  await app.register(cors, {
    origin: [/^http:\/\/localhost:\d+$/, /^http:\/\/127\.0\.0\.1:\d+$/],
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "mcp-session-id"],
    credentials: true,
  });

  // ─── Health Check ────────────────────────────────────────
  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  // ─── Routes ──────────────────────────────────────────────
  registerNegotiationRoutes(app, service);
  registerStrategyRoutes(app, service);
  registerMcpRoutes(app, service);

  return app;
}
