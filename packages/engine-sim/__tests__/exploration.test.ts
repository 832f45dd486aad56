import { describe, expect, it } from 'vitest';
import { EngineError, ValidationError } from '@shoal/engine-core';
import { aggregateOutcomes, exploreSeeds } from '../src/monte-carlo.js';
import { bucketError, calibrate } from '../src/calibration.js';
import { runSimulation } from '../src/simulator.js';
import { bucketCounts } from '../src/trend.js';
import { resolveSimulationConfig } from '../src/config.js';
import type { SimulationEnvironment } from '../src/types.js';
import { makeContext, makeAgreement, makeSummary } from './fixtures.js';

const TOL = 0.001;

function expectClose(actual: number, expected: number) {
  expect(Math.abs(actual - expected)).toBeLessThanOrEqual(TOL);
}

describe('aggregateOutcomes', () => {
  it('computes population statistics over the per-seed totals', () => {
    const result = aggregateOutcomes([
      { seed: 1, complete: true, summary: makeSummary({ total_incidents: 2, avg_severity: 0.2, max_severity: 0.5 }) },
      {
        seed: 2,
        complete: true,
        summary: makeSummary({ total_incidents: 4, avg_severity: 0.4, max_severity: 0.9, trend: 'escalating' }),
      },
      {
        seed: 3,
        complete: true,
        summary: makeSummary({ total_incidents: 6, avg_severity: 0.3, max_severity: 0.7, assessment: 'mixed' }),
      },
    ]);

    expect(result.runs.map((r) => r.seed)).toEqual([1, 2, 3]);
    expect(result.mean_incidents).toBe(4);
    // sqrt(8 / 3)
    expectClose(result.stddev_incidents, 1.633);
    expect(result.min_incidents).toBe(2);
    expect(result.max_incidents).toBe(6);
    expectClose(result.mean_avg_severity, 0.3);
    expect(result.max_severity).toBe(0.9);
    expect(result.trend_counts).toEqual({ declining: 0, stable: 2, escalating: 1 });
    expect(result.assessment_counts).toEqual({ good: 2, mixed: 1, concerning: 0 });
    expectClose(result.escalation_share, 0.3333);
  });

  it('is all zeros for no runs', () => {
    const result = aggregateOutcomes([]);
    expect(result.mean_incidents).toBe(0);
    expect(result.stddev_incidents).toBe(0);
    expect(result.escalation_share).toBe(0);
  });
});

describe('exploreSeeds', () => {
  const base = { context: makeContext(), proposal: makeAgreement(), duration: 60 };

  it('runs each seed independently and in the given order', async () => {
    const result = await exploreSeeds(base, [11, 12, 13]);
    expect(result.runs.map((r) => r.seed)).toEqual([11, 12, 13]);
    for (const run of result.runs) {
      expect(run.complete).toBe(true);
      expect(run.summary).toEqual(runSimulation({ ...base, seed: run.seed }).summary);
    }
  });

  it('rejects an empty seed list', async () => {
    await expect(exploreSeeds(base, [])).rejects.toThrow(ValidationError);
  });

  it('rejects a seed outside 32 bits before running anything', async () => {
    await expect(exploreSeeds(base, [1, 2 ** 32])).rejects.toThrow(ValidationError);
  });

  it('keeps finished runs when another seed exhausts its draw budget', async () => {
    // Smallest draw budget under which the seed's run completes.
    const drawsNeeded = (seed: number): number => {
      let lo = 1;
      let hi = 1_000_000;
      while (lo < hi) {
        const mid = Math.floor((lo + hi) / 2);
        try {
          runSimulation({ ...base, seed }, { config: resolveSimulationConfig({ max_rng_draws: mid }) });
          hi = mid;
        } catch {
          lo = mid + 1;
        }
      }
      return lo;
    };
    const needs = [11, 12].map(drawsNeeded);
    expect(needs[0]).not.toBe(needs[1]);

    const budget = Math.min(...needs);
    const [cheap, costly] = needs[0] === budget ? [11, 12] : [12, 11];
    const config = resolveSimulationConfig({ max_rng_draws: budget });
    const result = await exploreSeeds(base, [11, 12], { config });

    expect(result.runs.map((r) => r.seed)).toEqual([cheap]);
    expect(result.runs[0].summary).toEqual(runSimulation({ ...base, seed: cheap }, { config }).summary);
    expect(result.failed).toEqual([
      {
        seed: costly,
        error: { error: EngineError.RNG_EXHAUSTED, message: `random draw budget of ${budget} exhausted` },
      },
    ]);
    expect(result.mean_incidents).toBe(result.runs[0].summary.total_incidents);
  });
});

describe('bucketError', () => {
  it('sums squared differences over the union of buckets', () => {
    // (3 − 1)² + (1 − 0)² + (0 − 2)²
    expect(bucketError({ 0: 3, 20: 1 }, { 0: 1, 40: 2 })).toBe(9);
    expect(bucketError({}, {})).toBe(0);
  });
});

describe('calibrate', () => {
  const base = { context: makeContext(), proposal: makeAgreement(), duration: 40 };

  it('scores every grid point and picks the lowest error', () => {
    const result = calibrate({
      ...base,
      historical: { 0: 3, 20: 2 },
      aggression_scales: [1],
      initial_tensions: [0.1, 0.3],
      seeds: [42],
    });

    expect(result.grid.map((p) => [p.aggression_scale, p.initial_tension])).toEqual([
      [1, 0.1],
      [1, 0.3],
    ]);
    expect(result.best.score).toBe(Math.min(...result.grid.map((p) => p.score)));
    expect(result.seeds).toEqual([42]);
    expect(result.bucket).toBe(20);

    const environment: SimulationEnvironment = {
      aggression_scale: result.best.aggression_scale,
      initial_tension: result.best.initial_tension,
    };
    const replay = runSimulation({ ...base, seed: 42, environment });
    expect(bucketError(bucketCounts(replay.incident_log, 20), { 0: 3, 20: 2 })).toBe(result.best.score);
  });

  it('breaks ties in favour of the earlier grid point', () => {
    // A single party never meets anyone, so every point scores the same.
    const result = calibrate(
      {
        ...base,
        environment: { roster: [{ party_id: 'PartyA', role: 'coast_guard', count: 2 }] },
        historical: { 0: 2 },
        aggression_scales: [0.8, 1.2],
        initial_tensions: [0.1, 0.3],
        seeds: [1, 2],
      },
      resolveSimulationConfig({ weather: { accident_rate: 0 } }),
    );
    expect(result.grid).toHaveLength(4);
    expect(result.grid.every((p) => p.score === 8)).toBe(true);
    expect(result.best).toEqual({ aggression_scale: 0.8, initial_tension: 0.1, score: 8 });
  });

  const rejected: { label: string; historical: Record<number, number> }[] = [
    { label: 'a bucket key off the bucket grid', historical: { 15: 1 } },
    { label: 'a negative count', historical: { 0: -1 } },
  ];

  it.each(rejected)('rejects $label', ({ historical }) => {
    expect(() => calibrate({ ...base, historical, seeds: [1] })).toThrow(ValidationError);
  });

  it('rejects an empty seed list', () => {
    expect(() => calibrate({ ...base, historical: {}, seeds: [] })).toThrow(ValidationError);
  });
});
