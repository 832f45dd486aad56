import { z, ZodError } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { EngineFailure } from "@shoal/engine-core";
import { NotFoundError } from "../../errors.js";
import type { MediationService, RunView } from "../../services/mediation.service.js";
import { proposalInputSchema, seedSchema, sensitivityRequestSchema } from "../../schemas.js";

function ok(data: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(data),
      },
    ],
  };
}

/** Engine, lookup and input failures become tool errors; anything else propagates. */
function fail(err: unknown) {
  let body: Record<string, unknown>;
  if (err instanceof EngineFailure || err instanceof NotFoundError) {
    body = err.toJSON();
  } else if (err instanceof ZodError) {
    body = { error: "INVALID_REQUEST", issues: err.issues.map((i) => `${i.path.join(".")}: ${i.message}`) };
  } else {
    throw err;
  }
  return {
    isError: true,
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(body),
      },
    ],
  };
}

/** Run view without the bulky parts: incident log and agent states only on request. */
function describeRun(view: RunView, includeIncidents: boolean) {
  return {
    run_id: view.run_id,
    scenario_id: view.scenario_id,
    proposal_id: view.proposal_id,
    status: view.status,
    seed: view.seed,
    duration: view.duration,
    steps_completed: view.steps_completed,
    summary: view.run?.summary ?? null,
    interruption: view.run?.interruption ?? null,
    error: view.error,
    ...(includeIncidents && view.run && { incident_log: view.run.incident_log }),
  };
}

/**
 * Register all MCP tools with the server.
 * Every tool answers with a single JSON text block.
 */
export function registerTools(server: McpServer, service: MediationService) {
  // ─── mediator_list_scenarios ───────────────────────────────
  server.tool(
    "mediator_list_scenarios",
    "List the training scenarios: their issue dimensions and parties.",
    {},
    async () => ok({ scenarios: service.listScenarios() }),
  );

  // ─── mediator_evaluate_proposal ────────────────────────────
  server.tool(
    "mediator_evaluate_proposal",
    "Score a proposal for every party of a scenario: per-dimension utility, acceptance probability, overall agreement probability and bargaining analysis.",
    { scenario_id: z.string().min(1), proposal: proposalInputSchema },
    async ({ scenario_id, proposal }) => {
      try {
        return ok(service.evaluate({ scenario_id, proposal }));
      } catch (err) {
        return fail(err);
      }
    },
  );

  // ─── mediator_rank_proposals ───────────────────────────────
  server.tool(
    "mediator_rank_proposals",
    "Rank candidate proposals by overall agreement probability. Invalid candidates are reported, not ranked.",
    { scenario_id: z.string().min(1), candidates: z.array(proposalInputSchema).min(1).max(100) },
    async ({ scenario_id, candidates }) => {
      try {
        return ok(service.rank({ scenario_id, candidates }));
      } catch (err) {
        return fail(err);
      }
    },
  );

  // ─── mediator_simulate_agreement ───────────────────────────
  server.tool(
    "mediator_simulate_agreement",
    "Simulate how an agreement holds up at sea for a number of steps. Returns the incident summary; pass wait=false to start it in the background and poll with mediator_get_simulation.",
    {
      scenario_id: z.string().min(1),
      proposal: proposalInputSchema,
      duration: z.number().int().min(1).max(100_000),
      seed: seedSchema.optional(),
      wait: z.boolean().default(true),
    },
    async ({ scenario_id, proposal, duration, seed, wait }) => {
      try {
        const view = await service.startRun({ scenario_id, proposal, duration, seed, wait });
        return ok(describeRun(view, false));
      } catch (err) {
        return fail(err);
      }
    },
  );

  // ─── mediator_get_simulation ───────────────────────────────
  server.tool(
    "mediator_get_simulation",
    "Fetch a simulation run by id: status, progress and, once finished, its summary.",
    { run_id: z.string().min(1), include_incidents: z.boolean().default(false) },
    async ({ run_id, include_incidents }) => {
      try {
        return ok(describeRun(service.getRun(run_id), include_incidents));
      } catch (err) {
        return fail(err);
      }
    },
  );

  // ─── mediator_analyze_sensitivity ──────────────────────────
  server.tool(
    "mediator_analyze_sensitivity",
    "Sweep simulation parameters one at a time around the engine defaults and rank them by how strongly they move an outcome metric.",
    sensitivityRequestSchema.shape,
    async (args) => {
      try {
        const result = service.analyzeSensitivity(args);
        return ok(result);
      } catch (err) {
        return fail(err);
      }
    },
  );

  // ─── mediator_cancel_simulation ────────────────────────────
  server.tool(
    "mediator_cancel_simulation",
    "Cancel a running simulation. It stops at the next step boundary and is reported as interrupted.",
    { run_id: z.string().min(1) },
    async ({ run_id }) => {
      try {
        const { cancelled, run } = await service.cancelRun(run_id);
        return ok({ cancelled, ...describeRun(run, false) });
      } catch (err) {
        return fail(err);
      }
    },
  );
}
