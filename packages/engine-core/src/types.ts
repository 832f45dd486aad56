/** Kind of negotiable dimension. */
export type DimensionKind = 'continuous' | 'categorical' | 'boolean';

/** A value a proposal may assign to a dimension. */
export type DimensionValue = number | string | boolean;

/** One negotiable dimension of an issue space. */
export interface Dimension {
  id: string;
  kind: DimensionKind;
  /** Inclusive [min, max]. Required for continuous dimensions. */
  range?: [number, number];
  /** Allowed values. Required for categorical dimensions. */
  values?: string[];
  unit?: string;
  /** Agreement term this dimension drives in the simulator. Defaults to the id. */
  term?: string;
}

/** Ordered set of dimensions negotiable in a scenario. */
export interface IssueSpace {
  id: string;
  name?: string;
  dimensions: Dimension[];
}

/**
 * Minimum acceptable outcome on one dimension.
 * Continuous: a bound, its side relative to the ideal gives the direction.
 * Categorical: the acceptable values. Boolean: the least-preferred acceptable value.
 */
export type MinimumAcceptable = number | string[] | boolean;

/** Stakeholder model: interests, constraints, BATNA and risk tolerance. */
export interface PartyProfile {
  party_id: string;
  /** Dimension id → weight. Must sum to 1.0 (±1e-6). All non-negative. */
  interests: Record<string, number>;
  ideal_value: Record<string, DimensionValue>;
  minimum_acceptable: Record<string, MinimumAcceptable>;
  /** Dimensions whose minimum is a hard constraint. */
  red_lines: string[];
  batna_utility: number;
  /** 0 = fully risk averse, 1 = fully risk tolerant. */
  risk_tolerance: number;
}

/** Agreement terms under evaluation. Immutable once created. */
export interface Proposal {
  readonly id: string;
  readonly values: Readonly<Record<string, DimensionValue>>;
  readonly round_number: number;
  readonly proposer: string;
}

/** Per-dimension contribution to a party's utility. */
export interface DimensionScore {
  dimension: string;
  weight: number;
  value: DimensionValue;
  satisfaction: number;
  weighted: number;
  /** Value lies strictly past the party's minimum on the unfavorable side. */
  beyond_minimum: boolean;
  red_line: boolean;
}

/** Utility of one proposal for one party. Derived, never mutated. */
export interface UtilityScore {
  party_id: string;
  proposal_id: string;
  score: number;
  breakdown: DimensionScore[];
  /** Weighted sum before any red-line veto. */
  raw_score: number;
  vetoed: boolean;
  red_line_violations: string[];
  /** score < batna_utility: the party is worse off accepting than walking away. */
  below_batna: boolean;
  batna_margin: number;
}

export type AcceptanceStatus = 'strong' | 'marginal' | 'weak';

/** Acceptance estimate for one party. */
export interface AcceptanceResult {
  party_id: string;
  proposal_id: string;
  probability: number;
  status: AcceptanceStatus;
  /** utility − batna_utility */
  margin: number;
}

/** Explicit scenario context passed into every engine call. */
export interface ScenarioContext {
  issue_space: IssueSpace;
  party_profiles: PartyProfile[];
}

/** Engine error codes. */
export enum EngineError {
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  OUT_OF_RANGE = 'OUT_OF_RANGE',
  INVALID_ISSUE_SPACE = 'INVALID_ISSUE_SPACE',
  INVALID_PARTY_PROFILE = 'INVALID_PARTY_PROFILE',
  INVALID_WEIGHTS = 'INVALID_WEIGHTS',
  INVALID_PROPOSAL = 'INVALID_PROPOSAL',
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_SIMULATION_REQUEST = 'INVALID_SIMULATION_REQUEST',
  RNG_EXHAUSTED = 'RNG_EXHAUSTED',
  SIMULATION_INTERRUPTED = 'SIMULATION_INTERRUPTED',
}
