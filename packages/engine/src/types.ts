import type {
  BargainingConfig,
  DeepPartial,
  Proposal,
  ProposalEvaluation,
  ProposalRankingResult,
  ScenarioContext,
} from '@shoal/engine-core';
import type {
  CalibrationRequest,
  CalibrationResult,
  SeedExploration,
  SensitivityAnalysis,
  SensitivityRequest,
  SimulationConfig,
  SimulationEnvironment,
  SimulationRun,
  StepProgress,
} from '@shoal/engine-sim';

/** Overrides applied on top of the engine defaults. */
export interface EngineConfig {
  bargaining?: DeepPartial<BargainingConfig>;
  simulation?: DeepPartial<SimulationConfig>;
  /** Steps a background run executes between yields to the event loop. */
  yield_every?: number;
}

export interface ResolvedEngineConfig {
  bargaining: BargainingConfig;
  simulation: SimulationConfig;
  yield_every: number;
}

export interface SimulationRequest {
  context: ScenarioContext;
  proposal: Proposal;
  duration: number;
  /** Generated and returned on the run when omitted. */
  seed?: number;
  environment?: SimulationEnvironment;
}

export interface ExplorationRequest extends Omit<SimulationRequest, 'seed'> {
  seeds: number[];
}

/** A background run. `done` settles with the run, interrupted or not. */
export interface RunStart {
  handle: string;
  seed: number;
  done: Promise<SimulationRun>;
}

export interface StartOptions {
  onStep?: (progress: StepProgress) => void;
}

export interface MediationEngine {
  readonly config: ResolvedEngineConfig;
  evaluateProposal(context: ScenarioContext, proposal: Proposal): ProposalEvaluation;
  rankProposals(context: ScenarioContext, candidates: readonly Proposal[]): ProposalRankingResult;
  simulateAgreement(request: SimulationRequest): SimulationRun;
  startSimulation(request: SimulationRequest, options?: StartOptions): RunStart;
  /** Best effort: the run stops at its next step boundary. false for an unknown or finished handle. */
  cancelSimulation(handle: string, reason?: string): boolean;
  activeRuns(): string[];
  exploreSeeds(request: ExplorationRequest): Promise<SeedExploration>;
  calibrate(request: CalibrationRequest): CalibrationResult;
  /** One-at-a-time parameter sweep around the engine's simulation config. */
  analyzeSensitivity(request: SensitivityRequest): SensitivityAnalysis;
}
