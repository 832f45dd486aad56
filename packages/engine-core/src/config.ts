import { ConfigurationError } from './errors.js';
import { isFiniteNumber } from './utils.js';

export type FalloffShape = 'linear' | 'quadratic' | 'logarithmic';
export type AcceptanceCurve = 'logistic' | 'linear';

export interface FalloffConfig {
  shape: FalloffShape;
  /** Satisfaction exactly at minimum_acceptable. Past it on the unfavorable side it is 0. */
  floor_at_minimum: number;
  /** Satisfaction of an acceptable but non-ideal categorical or boolean value. */
  categorical_partial: number;
}

export interface AcceptanceConfig {
  curve: AcceptanceCurve;
  steepness: number;
  /** Extra margin above BATNA a fully risk-averse party needs to reach p = 0.5. */
  risk_premium: number;
}

export interface StatusThresholds {
  strong: number;
  marginal: number;
}

/** Tunables of the utility and acceptance stages. */
export interface BargainingConfig {
  falloff: FalloffConfig;
  red_line_veto: boolean;
  acceptance: AcceptanceConfig;
  status_thresholds: StatusThresholds;
}

export const DEFAULT_BARGAINING_CONFIG: BargainingConfig = {
  falloff: { shape: 'linear', floor_at_minimum: 0.5, categorical_partial: 0.5 },
  red_line_veto: true,
  acceptance: { curve: 'logistic', steepness: 10, risk_premium: 0.2 },
  status_thresholds: { strong: 0.7, marginal: 0.4 },
};

/** Recursive partial used for config overrides. */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

const FALLOFF_SHAPES: readonly FalloffShape[] = ['linear', 'quadratic', 'logarithmic'];
const ACCEPTANCE_CURVES: readonly AcceptanceCurve[] = ['logistic', 'linear'];

function inUnit(value: unknown): boolean {
  return isFiniteNumber(value) && value >= 0 && value <= 1;
}

/** Merge overrides over the defaults. Does not validate. */
export function resolveBargainingConfig(overrides: DeepPartial<BargainingConfig> = {}): BargainingConfig {
  const base = DEFAULT_BARGAINING_CONFIG;
  return {
    falloff: { ...base.falloff, ...overrides.falloff },
    red_line_veto: overrides.red_line_veto ?? base.red_line_veto,
    acceptance: { ...base.acceptance, ...overrides.acceptance },
    status_thresholds: { ...base.status_thresholds, ...overrides.status_thresholds },
  };
}

/** Throws ConfigurationError on the first missing or inconsistent setting. */
export function validateBargainingConfig(config: BargainingConfig): void {
  const { falloff, acceptance, status_thresholds } = config;

  if (!FALLOFF_SHAPES.includes(falloff.shape)) {
    throw new ConfigurationError(`unknown falloff shape "${falloff.shape}"`, { detail: 'falloff.shape' });
  }
  if (!inUnit(falloff.floor_at_minimum)) {
    throw new ConfigurationError('falloff.floor_at_minimum must be in [0, 1]', { detail: 'falloff.floor_at_minimum' });
  }
  if (!inUnit(falloff.categorical_partial)) {
    throw new ConfigurationError('falloff.categorical_partial must be in [0, 1]', {
      detail: 'falloff.categorical_partial',
    });
  }
  if (typeof config.red_line_veto !== 'boolean') {
    throw new ConfigurationError('red_line_veto must be a boolean', { detail: 'red_line_veto' });
  }
  if (!ACCEPTANCE_CURVES.includes(acceptance.curve)) {
    throw new ConfigurationError(`unknown acceptance curve "${acceptance.curve}"`, { detail: 'acceptance.curve' });
  }
  if (!isFiniteNumber(acceptance.steepness) || acceptance.steepness <= 0) {
    throw new ConfigurationError('acceptance.steepness must be > 0', { detail: 'acceptance.steepness' });
  }
  if (!inUnit(acceptance.risk_premium)) {
    throw new ConfigurationError('acceptance.risk_premium must be in [0, 1]', { detail: 'acceptance.risk_premium' });
  }
  if (!inUnit(status_thresholds.strong) || !inUnit(status_thresholds.marginal)) {
    throw new ConfigurationError('status thresholds must be in [0, 1]', { detail: 'status_thresholds' });
  }
  if (status_thresholds.marginal > status_thresholds.strong) {
    throw new ConfigurationError(
      `status_thresholds.marginal (${status_thresholds.marginal}) exceeds strong (${status_thresholds.strong})`,
      { detail: 'status_thresholds' },
    );
  }
}
