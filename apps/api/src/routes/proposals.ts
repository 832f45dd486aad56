import type { FastifyInstance } from "fastify";
import type { MediationService } from "../services/mediation.service.js";
import { evaluateRequestSchema, rankRequestSchema } from "../schemas.js";

export function registerProposalRoutes(app: FastifyInstance, service: MediationService) {
  // ─── POST /proposals/evaluate — per-party utility + acceptance ─
  app.post("/proposals/evaluate", async (request) => {
    const body = evaluateRequestSchema.parse(request.body);
    return service.evaluate(body);
  });

  // ─── POST /proposals/rank — rank candidate proposals ───────
  app.post("/proposals/rank", async (request) => {
    const body = rankRequestSchema.parse(request.body);
    return service.rank(body);
  });
}
