import { ConfigurationError, isFiniteNumber } from '@shoal/engine-core';
import type { DeepPartial } from '@shoal/engine-core';

export interface MechanismConfig {
  /** Success probability of on-scene CUES procedures. */
  cues_success: number;
  /** Success probability of a hotline call. */
  hotline_success: number;
}

export interface WeatherConfig {
  /** Probability the weather state holds for another step. */
  persistence: number;
  /** Approach-distance and accident perturbation at the roughest state. */
  perturbation: number;
  /** Per-activity accident probability at the roughest state. */
  accident_rate: number;
}

/** Escalation memory. tension ← tension · (1 − decay) each step, capped at max. */
export interface TensionConfig {
  gain: number;
  decay: number;
  max: number;
  /** Tension shed by a safe encounter. */
  relief: number;
  /** Share of the gain applied when the incident was de-escalated. */
  de_escalated_factor: number;
  calm_threshold: number;
  alert_threshold: number;
}

export interface BehaviorConfig {
  encounter_rate: number;
  approach_range_nm: number;
  unsafe_distance_nm: number;
  /** Approach-distance widening per media visibility level. */
  media_restraint: number;
  /** Remembered incidents kept per agent. */
  memory_window: number;
  /** Share of rule-following lost per remembered incident that was not de-escalated. */
  grievance_weight: number;
}

export interface TrendConfig {
  /** second/first ratio (or its inverse) that counts as a material change. */
  ratio: number;
}

/** good when both metrics are at or under the good limits; concerning when either reaches a concerning limit. */
export interface AssessmentConfig {
  good_max_rate: number;
  concerning_min_rate: number;
  good_max_severity: number;
  concerning_min_severity: number;
}

export interface SimulationConfig {
  mechanisms: MechanismConfig;
  weather: WeatherConfig;
  tension: TensionConfig;
  behavior: BehaviorConfig;
  trend: TrendConfig;
  assessment: AssessmentConfig;
  max_rng_draws: number;
}

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  mechanisms: { cues_success: 0.9, hotline_success: 0.85 },
  weather: { persistence: 0.9, perturbation: 0.3, accident_rate: 0.02 },
  tension: {
    gain: 0.3,
    decay: 0.15,
    max: 1,
    relief: 0.05,
    de_escalated_factor: 0.5,
    calm_threshold: 0.1,
    alert_threshold: 0.5,
  },
  behavior: {
    encounter_rate: 0.35,
    approach_range_nm: 8,
    unsafe_distance_nm: 0.5,
    media_restraint: 0.1,
    memory_window: 10,
    grievance_weight: 0.05,
  },
  trend: { ratio: 1.5 },
  assessment: {
    good_max_rate: 10,
    concerning_min_rate: 25,
    good_max_severity: 0.35,
    concerning_min_severity: 0.6,
  },
  max_rng_draws: 50_000_000,
};

export function resolveSimulationConfig(overrides: DeepPartial<SimulationConfig> = {}): SimulationConfig {
  const base = DEFAULT_SIMULATION_CONFIG;
  return {
    mechanisms: { ...base.mechanisms, ...overrides.mechanisms },
    weather: { ...base.weather, ...overrides.weather },
    tension: { ...base.tension, ...overrides.tension },
    behavior: { ...base.behavior, ...overrides.behavior },
    trend: { ...base.trend, ...overrides.trend },
    assessment: { ...base.assessment, ...overrides.assessment },
    max_rng_draws: overrides.max_rng_draws ?? base.max_rng_draws,
  };
}

function requireUnit(value: number, path: string): void {
  if (!isFiniteNumber(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`${path} must be in [0, 1]`, { detail: path });
  }
}

function requirePositive(value: number, path: string): void {
  if (!isFiniteNumber(value) || value <= 0) {
    throw new ConfigurationError(`${path} must be > 0`, { detail: path });
  }
}

/** Throws ConfigurationError on the first missing or inconsistent setting. */
export function validateSimulationConfig(config: SimulationConfig): void {
  requireUnit(config.mechanisms.cues_success, 'mechanisms.cues_success');
  requireUnit(config.mechanisms.hotline_success, 'mechanisms.hotline_success');

  requireUnit(config.weather.persistence, 'weather.persistence');
  requireUnit(config.weather.perturbation, 'weather.perturbation');
  requireUnit(config.weather.accident_rate, 'weather.accident_rate');

  const t = config.tension;
  requireUnit(t.gain, 'tension.gain');
  requireUnit(t.relief, 'tension.relief');
  requireUnit(t.de_escalated_factor, 'tension.de_escalated_factor');
  requirePositive(t.max, 'tension.max');
  if (!isFiniteNumber(t.decay) || t.decay <= 0 || t.decay >= 1) {
    throw new ConfigurationError('tension.decay must be in (0, 1)', { detail: 'tension.decay' });
  }
  if (!(t.calm_threshold >= 0 && t.calm_threshold < t.alert_threshold && t.alert_threshold <= t.max)) {
    throw new ConfigurationError('tension thresholds must satisfy 0 ≤ calm < alert ≤ max', {
      detail: 'tension.calm_threshold',
    });
  }

  const b = config.behavior;
  requireUnit(b.encounter_rate, 'behavior.encounter_rate');
  requirePositive(b.approach_range_nm, 'behavior.approach_range_nm');
  requirePositive(b.unsafe_distance_nm, 'behavior.unsafe_distance_nm');
  requireUnit(b.media_restraint, 'behavior.media_restraint');
  requireUnit(b.grievance_weight, 'behavior.grievance_weight');
  if (!Number.isInteger(b.memory_window) || b.memory_window < 1) {
    throw new ConfigurationError('behavior.memory_window must be a positive integer', {
      detail: 'behavior.memory_window',
    });
  }

  if (!isFiniteNumber(config.trend.ratio) || config.trend.ratio < 1) {
    throw new ConfigurationError('trend.ratio must be ≥ 1', { detail: 'trend.ratio' });
  }

  const a = config.assessment;
  if (!(a.good_max_rate >= 0 && a.good_max_rate < a.concerning_min_rate)) {
    throw new ConfigurationError('assessment.good_max_rate must be below concerning_min_rate', {
      detail: 'assessment.good_max_rate',
    });
  }
  requireUnit(a.good_max_severity, 'assessment.good_max_severity');
  requireUnit(a.concerning_min_severity, 'assessment.concerning_min_severity');
  if (a.good_max_severity >= a.concerning_min_severity) {
    throw new ConfigurationError('assessment.good_max_severity must be below concerning_min_severity', {
      detail: 'assessment.good_max_severity',
    });
  }

  requirePositive(config.max_rng_draws, 'max_rng_draws');
}
