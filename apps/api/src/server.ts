import Fastify from "fastify";
import type { FastifyError } from "fastify";
import cors from "@fastify/cors";
import { ZodError } from "zod";
import { ConfigurationError, EngineFailure } from "@shoal/engine-core";
import { createEngine } from "@shoal/engine";
import type { EngineConfig } from "@shoal/engine";
import type { AppConfig } from "./config.js";
import { NotFoundError } from "./errors.js";
import { registerMcpRoutes } from "./mcp/router.js";
import { registerProposalRoutes } from "./routes/proposals.js";
import { registerScenarioRoutes } from "./routes/scenarios.js";
import { registerSimulationRoutes } from "./routes/simulations.js";
import type { ScenarioRegistry } from "./scenarios/registry.js";
import { createMediationService } from "./services/mediation.service.js";

export interface ServerOptions {
  config: Pick<AppConfig, "LOG_LEVEL">;
  scenarios: ScenarioRegistry;
  engineConfig?: EngineConfig;
}

export async function createServer({ config, scenarios, engineConfig }: ServerOptions) {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
  });

  // ─── Engine ────────────────────────────────────────────────
  // Bad thresholds fail here, before the server listens.
  const engine = createEngine(engineConfig);
  const service = createMediationService({ engine, scenarios, log: app.log });

  // ─── CORS ────────────────────────────────────────────────
  await app.register(cors, {
    origin: [/^http:\/\/localhost:\d+$/, /^http:\/\/127\.0\.0\.1:\d+$/],
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "mcp-session-id"],
    credentials: true,
  });

  // ─── Errors ──────────────────────────────────────────────
  app.setErrorHandler<FastifyError>((err, request, reply) => {
    if (err instanceof ZodError) {
      return reply.status(400).send({
        error: "INVALID_REQUEST",
        issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
    }
    if (err instanceof NotFoundError) {
      return reply.status(404).send(err.toJSON());
    }
    if (err instanceof ConfigurationError) {
      request.log.error({ err }, "engine configuration error");
      return reply.status(500).send(err.toJSON());
    }
    if (err instanceof EngineFailure) {
      return reply.status(400).send(err.toJSON());
    }
    const status = typeof err.statusCode === "number" && err.statusCode >= 400 ? err.statusCode : 500;
    if (status >= 500) request.log.error({ err }, "request failed");
    return reply.status(status).send({ error: status >= 500 ? "INTERNAL" : err.code, message: err.message });
  });

  // ─── Health Check ────────────────────────────────────────
  app.get("/health", async () => ({
    status: "ok",
    scenarios: scenarios.size,
    active_runs: engine.activeRuns().length,
    timestamp: new Date().toISOString(),
  }));

  // ─── Routes ──────────────────────────────────────────────
  registerScenarioRoutes(app, service);
  registerProposalRoutes(app, service);
  registerSimulationRoutes(app, service);

  // ─── MCP Routes ──────────────────────────────────────────
  registerMcpRoutes(app, service);

  app.addHook("onClose", async () => {
    for (const handle of engine.activeRuns()) {
      engine.cancelSimulation(handle, "server shutting down");
    }
  });

  return app;
}
