import type { FastifyBaseLogger } from "fastify";
import { EngineFailure, createProposal } from "@shoal/engine-core";
import type { Proposal, ProposalEvaluation, ProposalRankingResult, ScenarioContext } from "@shoal/engine-core";
import type { MediationEngine } from "@shoal/engine";
import type { CalibrationResult, SeedExploration, SensitivityAnalysis, SimulationRun } from "@shoal/engine-sim";
import { NotFoundError } from "../errors.js";
import type { ScenarioRegistry, ScenarioSummary } from "../scenarios/registry.js";
import { toContext } from "../scenarios/registry.js";
import type {
  CalibrateRequest,
  EvaluateRequest,
  ExploreRequest,
  ProposalInput,
  RankRequest,
  ScenarioDefinition,
  SensitivityRequest,
  SimulateRequest,
} from "../schemas.js";

export type RunStatus = "running" | "completed" | "interrupted" | "failed";

/** Client-facing view of a simulation run. */
export interface RunView {
  run_id: string;
  scenario_id: string;
  proposal_id: string;
  seed: number;
  duration: number;
  status: RunStatus;
  steps_completed: number;
  started_at: string;
  finished_at: string | null;
  run: SimulationRun | null;
  error: { error: string; message: string } | null;
}

interface TrackedRun {
  view: RunView;
  /** Resolves once the view holds the outcome. Never rejects. */
  settled: Promise<void>;
}

export interface MediationServiceDeps {
  engine: MediationEngine;
  scenarios: ScenarioRegistry;
  log: FastifyBaseLogger;
  /** Finished runs kept for lookup; the oldest are dropped first. */
  maxStoredRuns?: number;
}

const DEFAULT_MAX_STORED_RUNS = 200;

function toProposal(input: ProposalInput): Proposal {
  return createProposal({
    id: input.id,
    values: input.values,
    round_number: input.round_number,
    proposer: input.proposer,
  });
}

function snapshot(view: RunView): RunView {
  return { ...view, error: view.error ? { ...view.error } : null };
}

/**
 * Scenario-aware operations over the engine, plus the run store behind the
 * simulation routes and MCP tools.
 */
export function createMediationService(deps: MediationServiceDeps) {
  const { engine, scenarios, log } = deps;
  const maxStored = deps.maxStoredRuns ?? DEFAULT_MAX_STORED_RUNS;
  const runs = new Map<string, TrackedRun>();

  function requireScenario(id: string): ScenarioDefinition {
    const scenario = scenarios.get(id);
    if (!scenario) throw new NotFoundError("scenario", id);
    return scenario;
  }

  function contextFor(scenario: ScenarioDefinition, profiles?: ScenarioContext["party_profiles"]): ScenarioContext {
    const base = toContext(scenario);
    return profiles ? { ...base, party_profiles: profiles } : base;
  }

  function requireRun(id: string): TrackedRun {
    const tracked = runs.get(id);
    if (!tracked) throw new NotFoundError("run", id);
    return tracked;
  }

  function evictFinished(): void {
    if (runs.size <= maxStored) return;
    for (const [id, tracked] of runs) {
      if (runs.size <= maxStored) break;
      if (tracked.view.status !== "running") runs.delete(id);
    }
  }

  return {
    listScenarios(): ScenarioSummary[] {
      return scenarios.list();
    },

    getScenario(id: string): ScenarioDefinition {
      return requireScenario(id);
    },

    evaluate(request: EvaluateRequest): ProposalEvaluation {
      const scenario = requireScenario(request.scenario_id);
      const evaluation = engine.evaluateProposal(contextFor(scenario, request.party_profiles), toProposal(request.proposal));
      log.debug(
        { scenario_id: scenario.id, proposal_id: evaluation.proposal_id, overall: evaluation.overall_probability },
        "proposal evaluated",
      );
      return evaluation;
    },

    rank(request: RankRequest): ProposalRankingResult {
      const scenario = requireScenario(request.scenario_id);
      return engine.rankProposals(contextFor(scenario, request.party_profiles), request.candidates.map(toProposal));
    },

    /**
     * Start a background run. With `wait` the returned view holds the finished
     * (or interrupted) run; otherwise it reports the run as running.
     */
    async startRun(request: SimulateRequest): Promise<RunView> {
      const scenario = requireScenario(request.scenario_id);
      const proposal = toProposal(request.proposal);
      // The first chunk of steps runs before startSimulation returns.
      let view: RunView | null = null;
      let stepsCompleted = 0;
      const start = engine.startSimulation({
        context: contextFor(scenario, request.party_profiles),
        proposal,
        duration: request.duration,
        seed: request.seed,
        environment: { ...scenario.environment, ...request.environment },
      }, {
        onStep: (progress) => {
          stepsCompleted = progress.steps_completed;
          if (view) view.steps_completed = stepsCompleted;
        },
      });

      const current: RunView = {
        run_id: start.handle,
        scenario_id: scenario.id,
        proposal_id: proposal.id,
        seed: start.seed,
        duration: request.duration,
        status: "running",
        steps_completed: stepsCompleted,
        started_at: new Date().toISOString(),
        finished_at: null,
        run: null,
        error: null,
      };
      view = current;
      log.info({ run_id: current.run_id, scenario_id: scenario.id, seed: current.seed, duration: current.duration }, "simulation started");

      const settled = start.done.then(
        (run) => {
          current.status = run.status;
          current.steps_completed = run.steps_completed;
          current.run = run;
          current.finished_at = new Date().toISOString();
          if (run.interruption) {
            log.info({ run_id: current.run_id, at_step: run.interruption.at_step }, "simulation interrupted");
          } else {
            log.info(
              { run_id: current.run_id, incidents: run.summary.total_incidents, assessment: run.summary.assessment },
              "simulation completed",
            );
          }
        },
        (err: unknown) => {
          current.status = "failed";
          current.finished_at = new Date().toISOString();
          current.error =
            err instanceof EngineFailure
              ? { error: err.code, message: err.message }
              : { error: "INTERNAL", message: err instanceof Error ? err.message : String(err) };
          log.error({ run_id: current.run_id, err }, "simulation failed");
        },
      );

      runs.set(current.run_id, { view: current, settled });
      evictFinished();

      if (request.wait) await settled;
      return snapshot(current);
    },

    getRun(runId: string): RunView {
      return snapshot(requireRun(runId).view);
    },

    /** Request cancellation; resolves with the run once it has stopped. */
    async cancelRun(runId: string): Promise<{ cancelled: boolean; run: RunView }> {
      const tracked = requireRun(runId);
      const cancelled = engine.cancelSimulation(runId, "cancelled by facilitator");
      if (cancelled) log.info({ run_id: runId }, "simulation cancellation requested");
      await tracked.settled;
      return { cancelled, run: snapshot(tracked.view) };
    },

    async explore(request: ExploreRequest): Promise<SeedExploration> {
      const scenario = requireScenario(request.scenario_id);
      const result = await engine.exploreSeeds({
        context: contextFor(scenario, request.party_profiles),
        proposal: toProposal(request.proposal),
        duration: request.duration,
        seeds: request.seeds,
        environment: { ...scenario.environment, ...request.environment },
      });
      for (const failure of result.failed) {
        log.warn({ scenario_id: scenario.id, seed: failure.seed, error: failure.error.error }, "seed run failed");
      }
      return result;
    },

    calibrate(request: CalibrateRequest): CalibrationResult {
      const scenario = requireScenario(request.scenario_id);
      const result = engine.calibrate({
        context: toContext(scenario),
        proposal: toProposal(request.proposal),
        duration: request.duration,
        historical: request.historical,
        bucket: request.bucket,
        seeds: request.seeds,
        aggression_scales: request.aggression_scales,
        initial_tensions: request.initial_tensions,
        environment: { ...scenario.environment, ...request.environment },
      });
      log.info({ scenario_id: scenario.id, best: result.best }, "calibration finished");
      return result;
    },

    analyzeSensitivity(request: SensitivityRequest): SensitivityAnalysis {
      const scenario = requireScenario(request.scenario_id);
      const result = engine.analyzeSensitivity({
        context: toContext(scenario),
        proposal: toProposal(request.proposal),
        duration: request.duration,
        parameters: request.parameters,
        metric: request.metric,
        points: request.points,
        seeds: request.seeds,
        environment: { ...scenario.environment, ...request.environment },
      });
      log.info(
        { scenario_id: scenario.id, metric: result.metric, ranking: result.parameters.map((p) => p.parameter) },
        "sensitivity analysis finished",
      );
      return result;
    },
  };
}

export type MediationService = ReturnType<typeof createMediationService>;
