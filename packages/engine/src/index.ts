export type {
  EngineConfig,
  ResolvedEngineConfig,
  SimulationRequest,
  ExplorationRequest,
  RunStart,
  StartOptions,
  MediationEngine,
} from './types.js';
export { createEngine, resolveEngineConfig } from './engine.js';
