import { describe, expect, it } from 'vitest';
import { evaluateProposal } from '../src/evaluate.js';
import { analyzeAgreement } from '../src/analysis/agreement.js';
import { createProposal } from '../src/proposal.js';
import { resolveBargainingConfig } from '../src/config.js';
import { ValidationError } from '../src/errors.js';
import type { UtilityScore } from '../src/types.js';
import { makeContext, makePartyA, makePartyB } from './fixtures.js';

const TOL = 0.001;

function expectClose(actual: number, expected: number) {
  expect(Math.abs(actual - expected)).toBeLessThanOrEqual(TOL);
}

describe('evaluateProposal — standoff / escorts / notice scenario', () => {
  const proposal = createProposal({ id: 'draft-1', values: { standoff_nm: 3, escorts: 1, notice_hours: 24 } });

  it('reproduces the documented example with linear falloff', () => {
    const result = evaluateProposal(makeContext(), proposal);

    const [a, b] = result.scores;
    expectClose(a.score, 0.6667);
    expectClose(b.score, 0.625);

    const [pa, pb] = result.acceptance;
    expectClose(pa.probability, 0.8411);
    expectClose(pb.probability, 0.6341);
    expect(pa.status).toBe('strong');
    expect(pb.status).toBe('marginal');

    expectClose(result.overall_probability, pa.probability * pb.probability);
    expectClose(result.overall_probability, 0.5334);
  });

  it('reproduces the example under quadratic and logarithmic falloff', () => {
    const quadratic = evaluateProposal(makeContext(), proposal, resolveBargainingConfig({ falloff: { shape: 'quadratic' } }));
    expectClose(quadratic.scores[0].score, 0.7444);
    expectClose(quadratic.scores[1].score, 0.6875);
    expectClose(quadratic.overall_probability, 0.703);

    const logarithmic = evaluateProposal(
      makeContext(),
      proposal,
      resolveBargainingConfig({ falloff: { shape: 'logarithmic' } }),
    );
    expectClose(logarithmic.scores[0].score, 0.7337);
    expectClose(logarithmic.scores[1].score, 0.6577);
    expectClose(logarithmic.overall_probability, 0.6441);
  });

  it('reports the bargaining analysis', () => {
    const { analysis } = evaluateProposal(makeContext(), proposal);
    expectClose(analysis.surplus.PartyA, 0.2667);
    expectClose(analysis.surplus.PartyB, 0.175);
    expect(analysis.zopa_exists).toBe(true);
    expect(analysis.parties_below_batna).toEqual([]);
    expectClose(analysis.zopa_range[0], 0.4);
    expectClose(analysis.zopa_range[1], 0.6667);
    expectClose(analysis.nash_product, 0.0467);
  });

  it('is pure: evaluating twice gives equal results', () => {
    const ctx = makeContext();
    expect(evaluateProposal(ctx, proposal)).toEqual(evaluateProposal(ctx, proposal));
  });

  it('scores nothing when one profile is malformed', () => {
    const ctx = makeContext([makePartyA(), makePartyB({ risk_tolerance: 3 })]);
    expect(() => evaluateProposal(ctx, proposal)).toThrow(ValidationError);
  });
});

describe('evaluateProposal — more than two parties', () => {
  const proposal = createProposal({ id: 'draft-1', values: { standoff_nm: 3, escorts: 1, notice_hours: 24 } });
  const partyC = makePartyA({ party_id: 'PartyC', risk_tolerance: 0.8, batna_utility: 0.3 });
  const partyD = makePartyB({ party_id: 'PartyD', interests: { standoff_nm: 0.2, escorts: 0.4, notice_hours: 0.4 } });

  it.each([
    { label: 'three', parties: [makePartyA(), makePartyB(), partyC] },
    { label: 'four', parties: [makePartyA(), makePartyB(), partyC, partyD] },
  ])('overall probability is the product over $label parties', ({ parties }) => {
    const result = evaluateProposal(makeContext(parties), proposal);
    expect(result.acceptance.map((a) => a.party_id)).toEqual(parties.map((p) => p.party_id));
    expect(result.overall_probability).toBe(result.acceptance.reduce((product, a) => product * a.probability, 1));
    expect(result.overall_probability).toBeLessThan(Math.min(...result.acceptance.map((a) => a.probability)));
  });
});

describe('analyzeAgreement', () => {
  function makeScore(party_id: string, score: number): UtilityScore {
    return {
      party_id,
      proposal_id: 'p',
      score,
      breakdown: [],
      raw_score: score,
      vetoed: false,
      red_line_violations: [],
      below_batna: false,
      batna_margin: 0,
    };
  }

  it('finds no ZOPA when a party is below its BATNA', () => {
    const analysis = analyzeAgreement(
      [makeScore('PartyA', 0.3), makeScore('PartyB', 0.9)],
      [makePartyA(), makePartyB()],
    );
    expect(analysis.zopa_exists).toBe(false);
    expect(analysis.parties_below_batna).toEqual(['PartyA']);
    // only PartyB gains: 0.9 − 0.45
    expectClose(analysis.nash_product, 0.45);
  });

  it('has a zero Nash product when nobody gains', () => {
    const analysis = analyzeAgreement(
      [makeScore('PartyA', 0.1), makeScore('PartyB', 0.2)],
      [makePartyA(), makePartyB()],
    );
    expect(analysis.nash_product).toBe(0);
  });
});
