import type { FastifyInstance } from "fastify";
import type { MediationService } from "../services/mediation.service.js";
import {
  calibrateRequestSchema,
  exploreRequestSchema,
  runParamsSchema,
  sensitivityRequestSchema,
  simulateRequestSchema,
} from "../schemas.js";

export function registerSimulationRoutes(app: FastifyInstance, service: MediationService) {
  // ─── POST /simulations — start a run (or wait for it) ──────
  app.post("/simulations", async (request, reply) => {
    const body = simulateRequestSchema.parse(request.body);
    const run = await service.startRun(body);
    return reply.status(run.status === "running" ? 202 : 200).send(run);
  });

  app.get("/simulations/:run_id", async (request) => {
    const { run_id } = runParamsSchema.parse(request.params);
    return service.getRun(run_id);
  });

  // ─── DELETE /simulations/:run_id — cooperative cancellation ─
  app.delete("/simulations/:run_id", async (request) => {
    const { run_id } = runParamsSchema.parse(request.params);
    return service.cancelRun(run_id);
  });

  // ─── POST /simulations/explore — Monte Carlo over seeds ─────
  app.post("/simulations/explore", async (request) => {
    const body = exploreRequestSchema.parse(request.body);
    return service.explore(body);
  });

  // ─── POST /simulations/calibrate — fit to historical counts ─
  app.post("/simulations/calibrate", async (request) => {
    const body = calibrateRequestSchema.parse(request.body);
    return service.calibrate(body);
  });

  // ─── POST /simulations/sensitivity — one-at-a-time parameter sweep ─
  app.post("/simulations/sensitivity", async (request) => {
    const body = sensitivityRequestSchema.parse(request.body);
    return service.analyzeSensitivity(body);
  });
}
