import { randomUUID } from 'node:crypto';
import {
  ConfigurationError,
  evaluateProposal,
  rankProposals,
  resolveBargainingConfig,
  validateBargainingConfig,
} from '@shoal/engine-core';
import {
  analyzeSensitivity,
  calibrate,
  exploreSeeds,
  generateSeed,
  resolveSimulationConfig,
  runSimulation,
  runSimulationAsync,
  validateSimulationConfig,
  validateSimulationInput,
} from '@shoal/engine-sim';
import type { SimulationInput } from '@shoal/engine-sim';
import type {
  EngineConfig,
  MediationEngine,
  ResolvedEngineConfig,
  RunStart,
  SimulationRequest,
  StartOptions,
} from './types.js';

const DEFAULT_YIELD_EVERY = 25;

/** Merge overrides onto the defaults and check them. Throws ConfigurationError. */
export function resolveEngineConfig(overrides: EngineConfig = {}): ResolvedEngineConfig {
  const resolved: ResolvedEngineConfig = {
    bargaining: resolveBargainingConfig(overrides.bargaining),
    simulation: resolveSimulationConfig(overrides.simulation),
    yield_every: overrides.yield_every ?? DEFAULT_YIELD_EVERY,
  };
  validateBargainingConfig(resolved.bargaining);
  validateSimulationConfig(resolved.simulation);
  if (!Number.isInteger(resolved.yield_every) || resolved.yield_every < 1) {
    throw new ConfigurationError('yield_every must be a positive integer', { detail: 'yield_every' });
  }
  return resolved;
}

function toInput(request: SimulationRequest): SimulationInput {
  return {
    context: request.context,
    proposal: request.proposal,
    duration: request.duration,
    seed: request.seed ?? generateSeed(),
    environment: request.environment,
  };
}

/**
 * Create a mediation engine.
 *
 * Configuration is resolved and validated here, so a bad threshold fails at
 * construction rather than mid-run. Background runs are tracked per engine.
 */
export function createEngine(overrides: EngineConfig = {}): MediationEngine {
  const config = resolveEngineConfig(overrides);
  const runs = new Map<string, AbortController>();

  return {
    config,

    evaluateProposal(context, proposal) {
      return evaluateProposal(context, proposal, config.bargaining);
    },

    rankProposals(context, candidates) {
      return rankProposals(context, candidates, config.bargaining);
    },

    simulateAgreement(request) {
      return runSimulation(toInput(request), { config: config.simulation });
    },

    startSimulation(request: SimulationRequest, options: StartOptions = {}): RunStart {
      const input = toInput(request);
      validateSimulationInput(input);

      const handle = `run-${randomUUID()}`;
      const controller = new AbortController();
      runs.set(handle, controller);

      const done = runSimulationAsync(input, {
        config: config.simulation,
        signal: controller.signal,
        yield_every: config.yield_every,
        onStep: options.onStep,
      }).finally(() => {
        runs.delete(handle);
      });
      return { handle, seed: input.seed, done };
    },

    cancelSimulation(handle, reason = 'cancelled') {
      const controller = runs.get(handle);
      if (!controller || controller.signal.aborted) return false;
      controller.abort(reason);
      return true;
    },

    activeRuns() {
      return [...runs.keys()];
    },

    exploreSeeds(request) {
      const { seeds, ...input } = request;
      return exploreSeeds(input, seeds, { config: config.simulation, yield_every: config.yield_every });
    },

    calibrate(request) {
      return calibrate(request, config.simulation);
    },

    analyzeSensitivity(request) {
      return analyzeSensitivity(request, config.simulation);
    },
  };
}
