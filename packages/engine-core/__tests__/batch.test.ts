import { describe, expect, it } from 'vitest';
import { rankProposals } from '../src/batch/evaluator.js';
import { createProposal } from '../src/proposal.js';
import { EngineError } from '../src/types.js';
import { makeContext } from './fixtures.js';

describe('rankProposals', () => {
  const ctx = makeContext();

  it('ranks candidates by overall probability descending', () => {
    const result = rankProposals(ctx, [
      createProposal({ id: 'A-favoured', values: { standoff_nm: 5, escorts: 2, notice_hours: 12 } }),
      createProposal({ id: 'middle', values: { standoff_nm: 3, escorts: 1, notice_hours: 24 } }),
      createProposal({ id: 'B-favoured', values: { standoff_nm: 2, escorts: 0, notice_hours: 48 } }),
    ]);

    expect(result.evaluated).toBe(3);
    expect(result.errors).toBe(0);
    expect(result.rankings.map((r) => r.rank)).toEqual([1, 2, 3]);
    expect(result.rankings[0].proposal_id).toBe('middle');
    for (let i = 0; i < result.rankings.length - 1; i++) {
      expect(result.rankings[i].overall_probability).toBeGreaterThanOrEqual(result.rankings[i + 1].overall_probability);
    }
  });

  it('skips invalid candidates and reports them', () => {
    const result = rankProposals(ctx, [
      createProposal({ id: 'ok', values: { standoff_nm: 3, escorts: 1, notice_hours: 24 } }),
      createProposal({ id: 'too-far', values: { standoff_nm: 30 } }),
      createProposal({ id: 'unknown', values: { curfew: true } }),
    ]);

    expect(result.evaluated).toBe(1);
    expect(result.errors).toBe(2);
    expect(result.rejected).toEqual([
      { proposal_id: 'too-far', error: EngineError.OUT_OF_RANGE, detail: 'standoff_nm=30 outside [0, 10]' },
      { proposal_id: 'unknown', error: EngineError.DIMENSION_MISMATCH, detail: 'proposal unknown references unknown dimension curfew' },
    ]);
  });

  it('recommends REFINE when the best candidate is only marginal', () => {
    // best overall ≈ 0.533 (0.8411 × 0.6341)
    const result = rankProposals(ctx, [
      createProposal({ id: 'middle', values: { standoff_nm: 3, escorts: 1, notice_hours: 24 } }),
    ]);
    expect(result.recommended_action).toBe('REFINE');
  });

  it('recommends RETHINK when nothing could be evaluated', () => {
    const result = rankProposals(ctx, [createProposal({ id: 'bad', values: { standoff_nm: -1 } })]);
    expect(result.rankings).toEqual([]);
    expect(result.recommended_action).toBe('RETHINK');
  });
});
