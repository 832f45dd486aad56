// Types
export type {
  DimensionKind,
  DimensionValue,
  Dimension,
  IssueSpace,
  MinimumAcceptable,
  PartyProfile,
  Proposal,
  DimensionScore,
  UtilityScore,
  AcceptanceStatus,
  AcceptanceResult,
  ScenarioContext,
} from './types.js';
export { EngineError } from './types.js';

// Errors
export type { ErrorBound, EngineFailureOptions, ValidationIssue } from './errors.js';
export { EngineFailure, ValidationError, ConfigurationError, SimulationError, raise } from './errors.js';

// Config
export type {
  FalloffShape,
  AcceptanceCurve,
  FalloffConfig,
  AcceptanceConfig,
  StatusThresholds,
  BargainingConfig,
  DeepPartial,
} from './config.js';
export { DEFAULT_BARGAINING_CONFIG, resolveBargainingConfig, validateBargainingConfig } from './config.js';

// Proposal
export type { ProposalInput } from './proposal.js';
export { createProposal } from './proposal.js';

// Utility
export type { Satisfaction } from './utility/falloff.js';
export { scoreProposal } from './utility/index.js';
export { continuousSatisfaction, discreteSatisfaction, remainingShare } from './utility/falloff.js';

// Acceptance
export { evaluateAcceptance, aggregateAcceptance, acceptanceCurve, statusFor } from './acceptance/index.js';

// Analysis + evaluation
export type { AgreementAnalysis } from './analysis/agreement.js';
export { analyzeAgreement } from './analysis/agreement.js';
export type { ProposalEvaluation } from './evaluate.js';
export { evaluateProposal } from './evaluate.js';

// Batch
export type { RankedProposal, RejectedProposal, ProposalRankingResult } from './batch/types.js';
export { rankProposals } from './batch/evaluator.js';

// Validation
export {
  findDimension,
  validateIssueSpace,
  validatePartyProfile,
  validateProposal,
  validateScenario,
  validateValue,
  validateWeights,
  assertScenario,
  assertProposal,
} from './validation.js';

// Utils
export { clamp, isFiniteNumber } from './utils.js';
