import { describe, expect, it } from 'vitest';
import {
  assertScenario,
  validateIssueSpace,
  validatePartyProfile,
  validateProposal,
  validateScenario,
  validateValue,
  validateWeights,
} from '../src/validation.js';
import { createProposal } from '../src/proposal.js';
import { ValidationError } from '../src/errors.js';
import { EngineError } from '../src/types.js';
import type { IssueSpace } from '../src/types.js';
import { MIXED_SPACE, STANDOFF_SPACE, makeContext, makeMixedParty, makePartyA, makePartyB } from './fixtures.js';

describe('validateIssueSpace', () => {
  it('accepts a well-formed issue space', () => {
    expect(validateIssueSpace(STANDOFF_SPACE)).toBeNull();
    expect(validateIssueSpace(MIXED_SPACE)).toBeNull();
  });

  it('rejects an empty issue space', () => {
    expect(validateIssueSpace({ id: 'empty', dimensions: [] })?.error).toBe(EngineError.INVALID_ISSUE_SPACE);
  });

  it('rejects duplicate dimension ids', () => {
    const space: IssueSpace = {
      id: 'dup',
      dimensions: [
        { id: 'a', kind: 'boolean' },
        { id: 'a', kind: 'boolean' },
      ],
    };
    expect(validateIssueSpace(space)).toMatchObject({ error: EngineError.INVALID_ISSUE_SPACE, dimension: 'a' });
  });

  it('rejects a continuous dimension without a proper range', () => {
    const space: IssueSpace = { id: 's', dimensions: [{ id: 'x', kind: 'continuous', range: [5, 5] }] };
    expect(validateIssueSpace(space)?.error).toBe(EngineError.INVALID_ISSUE_SPACE);
  });

  it('rejects a categorical dimension without values', () => {
    const space: IssueSpace = { id: 's', dimensions: [{ id: 'c', kind: 'categorical', values: [] }] };
    expect(validateIssueSpace(space)?.error).toBe(EngineError.INVALID_ISSUE_SPACE);
  });
});

describe('validateValue', () => {
  const standoff = STANDOFF_SPACE.dimensions[0];
  const inspection = MIXED_SPACE.dimensions[2];
  const hotline = MIXED_SPACE.dimensions[1];

  it('accepts the inclusive range bounds', () => {
    expect(validateValue(standoff, 0)).toBeNull();
    expect(validateValue(standoff, 10)).toBeNull();
  });

  it('reports the bound of an out-of-range value', () => {
    expect(validateValue(standoff, -0.5)).toMatchObject({
      error: EngineError.OUT_OF_RANGE,
      dimension: 'standoff_nm',
      bound: { min: 0, max: 10 },
    });
  });

  it('rejects a value of the wrong kind', () => {
    expect(validateValue(standoff, 'far')?.error).toBe(EngineError.OUT_OF_RANGE);
    expect(validateValue(hotline, 1)?.error).toBe(EngineError.OUT_OF_RANGE);
  });

  it('reports allowed values of a categorical dimension', () => {
    expect(validateValue(inspection, 'naval')).toMatchObject({
      error: EngineError.OUT_OF_RANGE,
      bound: { allowed: ['none', 'joint', 'third_party'] },
    });
  });
});

describe('validateWeights', () => {
  it('accepts weights summing to 1 within 1e-6', () => {
    expect(validateWeights({ a: 0.3333333, b: 0.3333333, c: 0.3333334 })).toBeNull();
  });

  it('rejects weights not summing to 1', () => {
    expect(validateWeights({ a: 0.5, b: 0.4 })?.error).toBe(EngineError.INVALID_WEIGHTS);
  });

  it('rejects negative weights', () => {
    expect(validateWeights({ a: 1.2, b: -0.2 })?.error).toBe(EngineError.INVALID_WEIGHTS);
  });
});

describe('validatePartyProfile', () => {
  it('accepts both example profiles', () => {
    expect(validatePartyProfile(makePartyA(), STANDOFF_SPACE)).toBeNull();
    expect(validatePartyProfile(makePartyB(), STANDOFF_SPACE)).toBeNull();
    expect(validatePartyProfile(makeMixedParty(), MIXED_SPACE)).toBeNull();
  });

  it('allows an ideal outside the range as long as the minimum is feasible', () => {
    // PartyB wants 72h notice on a 0-48h dimension
    expect(makePartyB().ideal_value.notice_hours).toBe(72);
    expect(validatePartyProfile(makePartyB(), STANDOFF_SPACE)).toBeNull();
  });

  it('rejects a minimum outside the range', () => {
    const party = makePartyA({ minimum_acceptable: { standoff_nm: 12, escorts: 1, notice_hours: 48 } });
    expect(validatePartyProfile(party, STANDOFF_SPACE)).toMatchObject({
      error: EngineError.INVALID_PARTY_PROFILE,
      party_id: 'PartyA',
      dimension: 'standoff_nm',
    });
  });

  it('rejects interests on an unknown dimension', () => {
    const party = makePartyA({ interests: { standoff_nm: 0.4, escorts: 0.3, fishing_days: 0.3 } });
    expect(validatePartyProfile(party, STANDOFF_SPACE)).toMatchObject({
      error: EngineError.DIMENSION_MISMATCH,
      dimension: 'fishing_days',
    });
  });

  it('rejects a red line outside the interests', () => {
    const party = makePartyA({ red_lines: ['hotline'] });
    expect(validatePartyProfile(party, STANDOFF_SPACE)?.error).toBe(EngineError.INVALID_PARTY_PROFILE);
  });

  it('rejects a categorical minimum listing an unknown value', () => {
    const party = makeMixedParty({
      minimum_acceptable: { notice_hours: 12, hotline: false, inspection: ['joint', 'naval'] },
    });
    expect(validatePartyProfile(party, MIXED_SPACE)).toMatchObject({
      error: EngineError.INVALID_PARTY_PROFILE,
      dimension: 'inspection',
    });
  });

  it('rejects batna_utility and risk_tolerance outside [0, 1]', () => {
    expect(validatePartyProfile(makePartyA({ batna_utility: 1.2 }), STANDOFF_SPACE)?.error).toBe(
      EngineError.INVALID_PARTY_PROFILE,
    );
    expect(validatePartyProfile(makePartyA({ risk_tolerance: -0.1 }), STANDOFF_SPACE)?.error).toBe(
      EngineError.INVALID_PARTY_PROFILE,
    );
  });
});

describe('validateProposal', () => {
  it('accepts a proposal inside every range', () => {
    const p = createProposal({ id: 'p', values: { standoff_nm: 3, escorts: 1, notice_hours: 24 } });
    expect(validateProposal(p, STANDOFF_SPACE)).toBeNull();
  });

  it('rejects a negative round number', () => {
    const p = createProposal({ id: 'p', values: {}, round_number: -1 });
    expect(validateProposal(p, STANDOFF_SPACE)?.error).toBe(EngineError.INVALID_PROPOSAL);
  });
});

describe('validateScenario / assertScenario', () => {
  it('accepts the two-party scenario', () => {
    expect(validateScenario(makeContext())).toBeNull();
  });

  it('rejects duplicate parties', () => {
    expect(validateScenario(makeContext([makePartyA(), makePartyA()]))).toMatchObject({
      error: EngineError.INVALID_PARTY_PROFILE,
      party_id: 'PartyA',
    });
  });

  it('throws a ValidationError carrying the code and party', () => {
    try {
      assertScenario(makeContext([makePartyA({ batna_utility: 2 })]));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.code).toBe(EngineError.INVALID_PARTY_PROFILE);
        expect(err.party_id).toBe('PartyA');
        expect(err.toJSON()).toMatchObject({ error: EngineError.INVALID_PARTY_PROFILE, party_id: 'PartyA' });
      }
    }
  });
});
