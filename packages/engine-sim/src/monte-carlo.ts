import { EngineError, EngineFailure, ValidationError } from '@shoal/engine-core';
import { MAX_SEED, isValidSeed } from './random.js';
import { runSimulationAsync } from './simulator.js';
import type { AsyncSimulationOptions } from './simulator.js';
import type { Assessment, SimulationInput, Summary, Trend } from './types.js';

export interface SeedOutcome {
  seed: number;
  complete: boolean;
  summary: Summary;
}

/** A seed whose run failed part-way; the other seeds are unaffected. */
export interface SeedFailure {
  seed: number;
  error: ReturnType<EngineFailure['toJSON']>;
}

export interface SeedExploration {
  /** Runs that finished, in seed order. Statistics cover these only. */
  runs: SeedOutcome[];
  failed: SeedFailure[];
  mean_incidents: number;
  stddev_incidents: number;
  min_incidents: number;
  max_incidents: number;
  mean_avg_severity: number;
  max_severity: number;
  trend_counts: Record<Trend, number>;
  assessment_counts: Record<Assessment, number>;
  /** Share of runs whose trend is escalating. */
  escalation_share: number;
}

/** Aggregate statistics over per-seed outcomes. Order of `runs` is preserved. */
export function aggregateOutcomes(runs: SeedOutcome[], failed: SeedFailure[] = []): SeedExploration {
  const counts = runs.map((r) => r.summary.total_incidents);
  const n = runs.length;
  const mean = n === 0 ? 0 : counts.reduce((a, b) => a + b, 0) / n;
  const variance = n === 0 ? 0 : counts.reduce((acc, c) => acc + (c - mean) ** 2, 0) / n;

  const trend_counts: Record<Trend, number> = { declining: 0, stable: 0, escalating: 0 };
  const assessment_counts: Record<Assessment, number> = { good: 0, mixed: 0, concerning: 0 };
  let severity = 0;
  let maxSeverity = 0;
  for (const run of runs) {
    trend_counts[run.summary.trend]++;
    assessment_counts[run.summary.assessment]++;
    severity += run.summary.avg_severity;
    maxSeverity = Math.max(maxSeverity, run.summary.max_severity);
  }

  return {
    runs,
    failed,
    mean_incidents: mean,
    stddev_incidents: Math.sqrt(variance),
    min_incidents: n === 0 ? 0 : Math.min(...counts),
    max_incidents: n === 0 ? 0 : Math.max(...counts),
    mean_avg_severity: n === 0 ? 0 : severity / n,
    max_severity: maxSeverity,
    trend_counts,
    assessment_counts,
    escalation_share: n === 0 ? 0 : trend_counts.escalating / n,
  };
}

/**
 * Run the same proposal once per seed and merge the outcomes.
 * Each run owns its own generator, agents and log; results are combined only
 * after every run has settled. A run that fails with an engine error is
 * reported under `failed` and left out of the statistics.
 */
export async function exploreSeeds(
  input: Omit<SimulationInput, 'seed'>,
  seeds: readonly number[],
  options: AsyncSimulationOptions = {},
): Promise<SeedExploration> {
  if (seeds.length === 0) {
    throw new ValidationError(EngineError.INVALID_SIMULATION_REQUEST, 'exploreSeeds needs at least one seed', {
      detail: 'seeds',
    });
  }
  const invalidSeed = seeds.find((seed) => !isValidSeed(seed));
  if (invalidSeed !== undefined) {
    throw new ValidationError(
      EngineError.INVALID_SIMULATION_REQUEST,
      `${EngineError.INVALID_SIMULATION_REQUEST}: seed must be an integer in [0, ${MAX_SEED}], got ${invalidSeed}`,
      { detail: 'seeds' },
    );
  }
  const runOptions: AsyncSimulationOptions = {
    config: options.config,
    signal: options.signal,
    yield_every: options.yield_every,
  };
  const settled = await Promise.allSettled(
    seeds.map(async (seed): Promise<SeedOutcome> => {
      const run = await runSimulationAsync({ ...input, seed }, runOptions);
      return { seed, complete: run.complete, summary: run.summary };
    }),
  );

  const runs: SeedOutcome[] = [];
  const failed: SeedFailure[] = [];
  settled.forEach((result, i) => {
    if (result.status === 'fulfilled') {
      runs.push(result.value);
      return;
    }
    const reason: unknown = result.reason;
    if (!(reason instanceof EngineFailure)) throw reason;
    failed.push({ seed: seeds[i], error: reason.toJSON() });
  });
  return aggregateOutcomes(runs, failed);
}
