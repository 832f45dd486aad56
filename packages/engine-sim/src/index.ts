// Types
export type {
  AgentRole,
  Posture,
  ActivityKind,
  Zone,
  WeatherState,
  Visibility,
  IncidentType,
  DeEscalationMechanism,
  Trend,
  Assessment,
  MemoryEntry,
  AgentState,
  RosterEntry,
  SimulationEnvironment,
  AgreementTerms,
  TermKey,
  Incident,
  PartyActivity,
  Summary,
  Interruption,
  SimulationRun,
  SimulationInput,
  StepProgress,
} from './types.js';

// Config
export type {
  MechanismConfig,
  WeatherConfig,
  TensionConfig,
  BehaviorConfig,
  TrendConfig,
  AssessmentConfig,
  SimulationConfig,
} from './config.js';
export { DEFAULT_SIMULATION_CONFIG, resolveSimulationConfig, validateSimulationConfig } from './config.js';

// Randomness
export { SeededRandom, generateSeed, isValidSeed, MAX_SEED } from './random.js';

// Agreement terms
export { readAgreementTerms, NO_TERMS } from './terms.js';

// Agents
export type { PostureEvent } from './agents/posture.js';
export { transition, POSTURE_INTENSITY } from './agents/posture.js';
export type { RoleProfile } from './agents/roster.js';
export { ROLE_PROFILES, defaultRoster, createAgents } from './agents/roster.js';

// Environment
export { WeatherProcess } from './environment/weather.js';

// Simulation
export { IncidentLog } from './incident-log.js';
export type { SimulationOptions, AsyncSimulationOptions } from './simulator.js';
export { SimulationRunner, runSimulation, runSimulationAsync, validateSimulationInput } from './simulator.js';

// Analysis
export type { RunRecord } from './trend.js';
export { summarize, classifyTrend, splitHalves, bucketCounts, complianceRates, assess } from './trend.js';
export type { SeedOutcome, SeedFailure, SeedExploration } from './monte-carlo.js';
export { exploreSeeds, aggregateOutcomes } from './monte-carlo.js';
export type { CalibrationRequest, CalibrationPoint, CalibrationResult } from './calibration.js';
export {
  calibrate,
  bucketError,
  DEFAULT_AGGRESSION_SCALES,
  DEFAULT_INITIAL_TENSIONS,
  DEFAULT_CALIBRATION_SEEDS,
} from './calibration.js';
export type {
  SensitivityParameter,
  SensitivityMetric,
  ParameterRange,
  SensitivityRequest,
  ParameterSensitivity,
  SensitivityAnalysis,
} from './sensitivity.js';
export {
  analyzeSensitivity,
  sensitivityIndex,
  testValues,
  withParameter,
  readParameter,
  metricOf,
  SENSITIVITY_PARAMETERS,
  SENSITIVITY_METRICS,
} from './sensitivity.js';
