import { EngineError, ValidationError, isFiniteNumber } from '@shoal/engine-core';
import type { SimulationConfig } from './config.js';
import { DEFAULT_SIMULATION_CONFIG } from './config.js';
import { runSimulation } from './simulator.js';
import { bucketCounts } from './trend.js';
import type { SimulationInput } from './types.js';

export const DEFAULT_AGGRESSION_SCALES: readonly number[] = [0.6, 0.8, 1.0, 1.2, 1.4];
export const DEFAULT_INITIAL_TENSIONS: readonly number[] = [0.1, 0.2, 0.25, 0.3, 0.35];
export const DEFAULT_CALIBRATION_SEEDS: readonly number[] = [42, 1337, 7];

export interface CalibrationRequest extends Omit<SimulationInput, 'seed'> {
  /** Observed incident counts keyed by the first step of each bucket. */
  historical: Record<number, number>;
  bucket?: number;
  seeds?: readonly number[];
  aggression_scales?: readonly number[];
  initial_tensions?: readonly number[];
}

export interface CalibrationPoint {
  aggression_scale: number;
  initial_tension: number;
  /** Sum over seeds and buckets of squared count differences. */
  score: number;
}

export interface CalibrationResult {
  best: CalibrationPoint;
  grid: CalibrationPoint[];
  seeds: number[];
  bucket: number;
}

function rejectRequest(detail: string): never {
  throw new ValidationError(EngineError.INVALID_SIMULATION_REQUEST, `${EngineError.INVALID_SIMULATION_REQUEST}: ${detail}`, {
    detail,
  });
}

/** Squared error between two bucketed count maps over the union of their buckets. */
export function bucketError(simulated: Record<number, number>, historical: Record<number, number>): number {
  const keys = new Set([...Object.keys(simulated), ...Object.keys(historical)].map(Number));
  let error = 0;
  for (const key of keys) {
    error += ((simulated[key] ?? 0) - (historical[key] ?? 0)) ** 2;
  }
  return error;
}

function validateRequest(request: CalibrationRequest, bucket: number, seeds: readonly number[]): void {
  if (!Number.isInteger(bucket) || bucket < 1) rejectRequest(`bucket must be a positive integer, got ${bucket}`);
  if (seeds.length === 0) rejectRequest('at least one seed is required');
  for (const [key, count] of Object.entries(request.historical)) {
    const step = Number(key);
    if (!Number.isInteger(step) || step < 0 || step % bucket !== 0) {
      rejectRequest(`historical bucket ${key} is not a multiple of ${bucket}`);
    }
    if (!Number.isInteger(count) || count < 0) rejectRequest(`historical count for bucket ${key} must be ≥ 0`);
  }
  for (const scale of request.aggression_scales ?? []) {
    if (!isFiniteNumber(scale) || scale <= 0) rejectRequest('aggression_scales must be > 0');
  }
  for (const tension of request.initial_tensions ?? []) {
    if (!isFiniteNumber(tension) || tension < 0) rejectRequest('initial_tensions must be ≥ 0');
  }
}

/**
 * Grid search over aggression scale × initial tension.
 * Each grid point runs every seed and scores the bucketed incident counts
 * against the historical ones; the lowest total squared error wins, ties
 * going to the earlier point.
 */
export function calibrate(request: CalibrationRequest, config: SimulationConfig = DEFAULT_SIMULATION_CONFIG): CalibrationResult {
  const bucket = request.bucket ?? 20;
  const seeds = request.seeds ?? DEFAULT_CALIBRATION_SEEDS;
  validateRequest(request, bucket, seeds);

  const scales = request.aggression_scales ?? DEFAULT_AGGRESSION_SCALES;
  const tensions = request.initial_tensions ?? DEFAULT_INITIAL_TENSIONS;
  const grid: CalibrationPoint[] = [];

  for (const aggression_scale of scales) {
    for (const initial_tension of tensions) {
      let score = 0;
      for (const seed of seeds) {
        const run = runSimulation(
          {
            context: request.context,
            proposal: request.proposal,
            duration: request.duration,
            seed,
            environment: { ...request.environment, aggression_scale, initial_tension },
          },
          { config },
        );
        score += bucketError(bucketCounts(run.incident_log, bucket), request.historical);
      }
      grid.push({ aggression_scale, initial_tension, score });
    }
  }

  if (grid.length === 0) rejectRequest('calibration grid is empty');
  const best = grid.reduce((b, p) => (p.score < b.score ? p : b));
  return { best, grid, seeds: [...seeds], bucket };
}
