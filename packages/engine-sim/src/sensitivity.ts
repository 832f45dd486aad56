import { ConfigurationError, EngineError, ValidationError, isFiniteNumber } from '@shoal/engine-core';
import { DEFAULT_CALIBRATION_SEEDS } from './calibration.js';
import type { SimulationConfig } from './config.js';
import { DEFAULT_SIMULATION_CONFIG, validateSimulationConfig } from './config.js';
import { MAX_SEED, isValidSeed } from './random.js';
import { runSimulation } from './simulator.js';
import type { SimulationInput, Summary } from './types.js';

export const SENSITIVITY_PARAMETERS = [
  'tension.gain',
  'tension.decay',
  'tension.relief',
  'mechanisms.cues_success',
  'mechanisms.hotline_success',
  'weather.perturbation',
  'weather.accident_rate',
  'behavior.encounter_rate',
  'behavior.grievance_weight',
] as const;

export type SensitivityParameter = (typeof SENSITIVITY_PARAMETERS)[number];

export const SENSITIVITY_METRICS = ['incident_count', 'avg_severity', 'max_severity', 'violations'] as const;

export type SensitivityMetric = (typeof SENSITIVITY_METRICS)[number];

export interface ParameterRange {
  parameter: SensitivityParameter;
  min: number;
  max: number;
}

export interface SensitivityRequest extends Omit<SimulationInput, 'seed'> {
  parameters: readonly ParameterRange[];
  metric?: SensitivityMetric;
  /** Evenly spaced test values per parameter, both ends included. */
  points?: number;
  /** Replications: every test value runs once per seed. */
  seeds?: readonly number[];
}

export interface ParameterSensitivity {
  parameter: SensitivityParameter;
  baseline: number;
  values: number[];
  /** Metric mean and population standard deviation across seeds, per test value. */
  means: number[];
  stddevs: number[];
  /** |least-squares slope of mean against value| · (max − min). */
  index: number;
}

export interface SensitivityAnalysis {
  metric: SensitivityMetric;
  seeds: number[];
  points: number;
  /** Most influential first; equal indices keep request order. */
  parameters: ParameterSensitivity[];
}

function rejectRequest(detail: string): never {
  throw new ValidationError(EngineError.INVALID_SIMULATION_REQUEST, `${EngineError.INVALID_SIMULATION_REQUEST}: ${detail}`, {
    detail,
  });
}

export function readParameter(config: SimulationConfig, parameter: SensitivityParameter): number {
  switch (parameter) {
    case 'tension.gain':
      return config.tension.gain;
    case 'tension.decay':
      return config.tension.decay;
    case 'tension.relief':
      return config.tension.relief;
    case 'mechanisms.cues_success':
      return config.mechanisms.cues_success;
    case 'mechanisms.hotline_success':
      return config.mechanisms.hotline_success;
    case 'weather.perturbation':
      return config.weather.perturbation;
    case 'weather.accident_rate':
      return config.weather.accident_rate;
    case 'behavior.encounter_rate':
      return config.behavior.encounter_rate;
    case 'behavior.grievance_weight':
      return config.behavior.grievance_weight;
  }
}

/** Copy of `config` with one parameter replaced. */
export function withParameter(config: SimulationConfig, parameter: SensitivityParameter, value: number): SimulationConfig {
  switch (parameter) {
    case 'tension.gain':
      return { ...config, tension: { ...config.tension, gain: value } };
    case 'tension.decay':
      return { ...config, tension: { ...config.tension, decay: value } };
    case 'tension.relief':
      return { ...config, tension: { ...config.tension, relief: value } };
    case 'mechanisms.cues_success':
      return { ...config, mechanisms: { ...config.mechanisms, cues_success: value } };
    case 'mechanisms.hotline_success':
      return { ...config, mechanisms: { ...config.mechanisms, hotline_success: value } };
    case 'weather.perturbation':
      return { ...config, weather: { ...config.weather, perturbation: value } };
    case 'weather.accident_rate':
      return { ...config, weather: { ...config.weather, accident_rate: value } };
    case 'behavior.encounter_rate':
      return { ...config, behavior: { ...config.behavior, encounter_rate: value } };
    case 'behavior.grievance_weight':
      return { ...config, behavior: { ...config.behavior, grievance_weight: value } };
  }
}

export function metricOf(summary: Summary, metric: SensitivityMetric): number {
  switch (metric) {
    case 'incident_count':
      return summary.total_incidents;
    case 'avg_severity':
      return summary.avg_severity;
    case 'max_severity':
      return summary.max_severity;
    case 'violations':
      return summary.violations;
  }
}

/** min + (max − min) · i / (points − 1) for i in 0..points−1. */
export function testValues(min: number, max: number, points: number): number[] {
  return Array.from({ length: points }, (_, i) => min + ((max - min) * i) / (points - 1));
}

/** Sensitivity index from a sweep: |slope| of the least-squares line times the tested range. */
export function sensitivityIndex(values: readonly number[], means: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const meanX = values.reduce((a, b) => a + b, 0) / n;
  const meanY = means.reduce((a, b) => a + b, 0) / n;
  let covariance = 0;
  let spread = 0;
  for (let i = 0; i < n; i++) {
    covariance += (values[i] - meanX) * (means[i] - meanY);
    spread += (values[i] - meanX) ** 2;
  }
  if (spread === 0) return 0;
  return Math.abs((covariance / spread) * (Math.max(...values) - Math.min(...values)));
}

function configAt(config: SimulationConfig, parameter: SensitivityParameter, value: number): SimulationConfig {
  const varied = withParameter(config, parameter, value);
  try {
    validateSimulationConfig(varied);
  } catch (err) {
    if (err instanceof ConfigurationError) rejectRequest(`${parameter}=${value}: ${err.message}`);
    throw err;
  }
  return varied;
}

/**
 * One-at-a-time sensitivity analysis.
 * Each parameter is swept across its range with every other setting held at
 * `config`; each test value runs once per seed and the metric is averaged.
 */
export function analyzeSensitivity(
  request: SensitivityRequest,
  config: SimulationConfig = DEFAULT_SIMULATION_CONFIG,
): SensitivityAnalysis {
  const metric = request.metric ?? 'incident_count';
  const points = request.points ?? 5;
  const seeds = request.seeds ?? DEFAULT_CALIBRATION_SEEDS;

  if (request.parameters.length === 0) rejectRequest('at least one parameter is required');
  if (!Number.isInteger(points) || points < 2) rejectRequest(`points must be an integer ≥ 2, got ${points}`);
  if (seeds.length === 0) rejectRequest('at least one seed is required');
  const badSeed = seeds.find((seed) => !isValidSeed(seed));
  if (badSeed !== undefined) rejectRequest(`seed must be an integer in [0, ${MAX_SEED}], got ${badSeed}`);
  const seen = new Set<SensitivityParameter>();
  for (const range of request.parameters) {
    if (seen.has(range.parameter)) rejectRequest(`${range.parameter} is listed twice`);
    seen.add(range.parameter);
    if (!isFiniteNumber(range.min) || !isFiniteNumber(range.max) || range.min >= range.max) {
      rejectRequest(`${range.parameter} range must satisfy min < max`);
    }
  }

  // Every varied config is checked before the first run.
  const sweeps = request.parameters.map((range) => {
    const values = testValues(range.min, range.max, points);
    return { range, values, configs: values.map((value) => configAt(config, range.parameter, value)) };
  });

  const results: ParameterSensitivity[] = sweeps.map(({ range, values, configs }) => {
    const means: number[] = [];
    const stddevs: number[] = [];

    for (const varied of configs) {
      const outputs = seeds.map((seed) => {
        const run = runSimulation(
          {
            context: request.context,
            proposal: request.proposal,
            duration: request.duration,
            seed,
            environment: request.environment,
          },
          { config: varied },
        );
        return metricOf(run.summary, metric);
      });
      const mean = outputs.reduce((a, b) => a + b, 0) / outputs.length;
      means.push(mean);
      stddevs.push(Math.sqrt(outputs.reduce((acc, o) => acc + (o - mean) ** 2, 0) / outputs.length));
    }

    return {
      parameter: range.parameter,
      baseline: readParameter(config, range.parameter),
      values,
      means,
      stddevs,
      index: sensitivityIndex(values, means),
    };
  });

  results.sort((a, b) => b.index - a.index);
  return { metric, seeds: [...seeds], points, parameters: results };
}
