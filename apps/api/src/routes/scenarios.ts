import type { FastifyInstance } from "fastify";
import type { MediationService } from "../services/mediation.service.js";
import { scenarioParamsSchema } from "../schemas.js";

export function registerScenarioRoutes(app: FastifyInstance, service: MediationService) {
  app.get("/scenarios", async () => ({ scenarios: service.listScenarios() }));

  app.get("/scenarios/:scenario_id", async (request) => {
    const { scenario_id } = scenarioParamsSchema.parse(request.params);
    return { scenario: service.getScenario(scenario_id) };
  });
}
