import { describe, expect, it } from 'vitest';
import { ConfigurationError, ValidationError, createProposal } from '@shoal/engine-core';
import type { PartyProfile, ScenarioContext } from '@shoal/engine-core';
import { runSimulation } from '@shoal/engine-sim';
import { createEngine, resolveEngineConfig } from '../src/engine.js';

const TOL = 0.001;

function expectClose(actual: number, expected: number) {
  expect(Math.abs(actual - expected)).toBeLessThanOrEqual(TOL);
}

function makeParty(party_id: string, overrides: Partial<PartyProfile>): PartyProfile {
  return {
    party_id,
    interests: { standoff_nm: 0.4, escorts: 0.3, notice_hours: 0.3 },
    ideal_value: { standoff_nm: 5, escorts: 2, notice_hours: 12 },
    minimum_acceptable: { standoff_nm: 2, escorts: 1, notice_hours: 48 },
    red_lines: [],
    batna_utility: 0.4,
    risk_tolerance: 0.5,
    ...overrides,
  };
}

const context: ScenarioContext = {
  issue_space: {
    id: 'standoff-escort-notice',
    dimensions: [
      { id: 'standoff_nm', kind: 'continuous', range: [0, 10] },
      { id: 'escorts', kind: 'continuous', range: [0, 5] },
      { id: 'notice_hours', kind: 'continuous', range: [0, 48] },
    ],
  },
  party_profiles: [
    makeParty('PartyA', {}),
    makeParty('PartyB', {
      interests: { standoff_nm: 0.5, escorts: 0.2, notice_hours: 0.3 },
      ideal_value: { standoff_nm: 2, escorts: 0, notice_hours: 72 },
      minimum_acceptable: { standoff_nm: 4, escorts: 1, notice_hours: 24 },
      batna_utility: 0.45,
      risk_tolerance: 0.4,
    }),
  ],
};

const draft = createProposal({ id: 'draft', values: { standoff_nm: 3, escorts: 1, notice_hours: 24 } });

describe('createEngine — configuration', () => {
  it('resolves defaults', () => {
    const config = resolveEngineConfig();
    expect(config.yield_every).toBe(25);
    expect(config.bargaining.falloff.shape).toBe('linear');
    expect(config.simulation.tension.decay).toBe(0.15);
  });

  it.each([
    { label: 'marginal above strong', overrides: { bargaining: { status_thresholds: { strong: 0.2, marginal: 0.5 } } } },
    { label: 'a decay of 0', overrides: { simulation: { tension: { decay: 0 } } } },
    { label: 'a zero yield interval', overrides: { yield_every: 0 } },
  ])('fails at construction on $label', ({ overrides }) => {
    expect(() => createEngine(overrides)).toThrow(ConfigurationError);
  });
});

describe('createEngine — evaluation', () => {
  it('evaluates with the configured falloff', () => {
    expectClose(createEngine().evaluateProposal(context, draft).overall_probability, 0.5334);
    const quadratic = createEngine({ bargaining: { falloff: { shape: 'quadratic' } } });
    expectClose(quadratic.evaluateProposal(context, draft).overall_probability, 0.703);
  });

  it('ranks candidates', () => {
    const result = createEngine().rankProposals(context, [
      draft,
      createProposal({ id: 'hard-line', values: { standoff_nm: 5, escorts: 2, notice_hours: 12 } }),
    ]);
    expect(result.rankings.map((r) => r.proposal_id)).toEqual(['draft', 'hard-line']);
  });
});

describe('createEngine — simulation', () => {
  const engine = createEngine({ yield_every: 25 });

  it('reuses a given seed and generates one when absent', () => {
    const seeded = engine.simulateAgreement({ context, proposal: draft, duration: 50, seed: 9 });
    expect(seeded.seed).toBe(9);
    expect(JSON.stringify(seeded)).toBe(JSON.stringify(runSimulation({ context, proposal: draft, duration: 50, seed: 9 })));

    const generated = engine.simulateAgreement({ context, proposal: draft, duration: 5 });
    expect(Number.isInteger(generated.seed)).toBe(true);
    expect(generated.seed).toBeGreaterThan(0);
  });

  it('validates a background run before starting it', () => {
    expect(() => engine.startSimulation({ context, proposal: draft, duration: 0 })).toThrow(ValidationError);
    expect(engine.activeRuns()).toEqual([]);
  });

  it('runs in the background and forgets the handle once done', async () => {
    let steps = 0;
    const start = engine.startSimulation({ context, proposal: draft, duration: 60, seed: 4 }, { onStep: () => steps++ });
    expect(start.handle).toMatch(/^run-/);
    expect(engine.activeRuns()).toContain(start.handle);

    const run = await start.done;
    expect(run.status).toBe('completed');
    expect(steps).toBe(60);
    expect(engine.activeRuns()).not.toContain(start.handle);
    expect(engine.cancelSimulation(start.handle)).toBe(false);
  });

  it('cancels a background run at the next step boundary', async () => {
    const start = engine.startSimulation({ context, proposal: draft, duration: 1000, seed: 4 });
    // the first 25 steps run before the first yield
    expect(engine.cancelSimulation(start.handle, 'superseded')).toBe(true);
    expect(engine.cancelSimulation(start.handle)).toBe(false);

    const run = await start.done;
    expect(run.status).toBe('interrupted');
    expect(run.steps_completed).toBe(25);
    expect(run.interruption?.reason).toBe('superseded');
    expect(engine.activeRuns()).toEqual([]);
  });

  it('returns false for an unknown handle', () => {
    expect(engine.cancelSimulation('run-missing')).toBe(false);
  });

  it('explores seeds with the engine configuration', async () => {
    const result = await engine.exploreSeeds({ context, proposal: draft, duration: 40, seeds: [1, 2] });
    expect(result.runs.map((r) => r.seed)).toEqual([1, 2]);
  });
});

describe('createEngine — sensitivity', () => {
  const engine = createEngine({ simulation: { tension: { gain: 0.5 } } });
  const request = {
    context,
    proposal: draft,
    duration: 30,
    seeds: [1],
    points: 2,
  };

  it('sweeps around the engine configuration', () => {
    const result = engine.analyzeSensitivity({
      ...request,
      parameters: [
        { parameter: 'tension.gain', min: 0, max: 1 },
        { parameter: 'tension.relief', min: 0, max: 0.1 },
      ],
    });
    const gain = result.parameters.find((p) => p.parameter === 'tension.gain');
    const relief = result.parameters.find((p) => p.parameter === 'tension.relief');
    expect(gain?.baseline).toBe(0.5);
    expect(relief?.baseline).toBe(0.05);
    expect(gain?.values).toEqual([0, 1]);

    const base = engine.config.simulation;
    const replay = runSimulation(
      { context, proposal: draft, duration: 30, seed: 1 },
      { config: { ...base, tension: { ...base.tension, gain: 0 } } },
    );
    expect(gain?.means[0]).toBe(replay.summary.total_incidents);
  });

  it('rejects a sweep that leaves the valid configuration', () => {
    expect(() =>
      engine.analyzeSensitivity({ ...request, parameters: [{ parameter: 'tension.decay', min: 0.5, max: 1 }] }),
    ).toThrow(ValidationError);
  });
});
