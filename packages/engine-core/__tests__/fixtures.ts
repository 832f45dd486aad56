import type { IssueSpace, PartyProfile, ScenarioContext } from '../src/types.js';

/** standoff / escorts / notice issue space used across the engine tests. */
export const STANDOFF_SPACE: IssueSpace = {
  id: 'standoff-escort-notice',
  dimensions: [
    { id: 'standoff_nm', kind: 'continuous', range: [0, 10], unit: 'nm' },
    { id: 'escorts', kind: 'continuous', range: [0, 5] },
    { id: 'notice_hours', kind: 'continuous', range: [0, 48], unit: 'hours' },
  ],
};

export function makePartyA(overrides?: Partial<PartyProfile>): PartyProfile {
  return {
    party_id: 'PartyA',
    interests: { standoff_nm: 0.4, escorts: 0.3, notice_hours: 0.3 },
    ideal_value: { standoff_nm: 5, escorts: 2, notice_hours: 12 },
    minimum_acceptable: { standoff_nm: 2, escorts: 1, notice_hours: 48 },
    red_lines: [],
    batna_utility: 0.4,
    risk_tolerance: 0.5,
    ...overrides,
  };
}

export function makePartyB(overrides?: Partial<PartyProfile>): PartyProfile {
  return {
    party_id: 'PartyB',
    interests: { standoff_nm: 0.5, escorts: 0.2, notice_hours: 0.3 },
    ideal_value: { standoff_nm: 2, escorts: 0, notice_hours: 72 },
    minimum_acceptable: { standoff_nm: 4, escorts: 1, notice_hours: 24 },
    red_lines: [],
    batna_utility: 0.45,
    risk_tolerance: 0.4,
    ...overrides,
  };
}

export function makeContext(parties: PartyProfile[] = [makePartyA(), makePartyB()]): ScenarioContext {
  return { issue_space: STANDOFF_SPACE, party_profiles: parties };
}

/** Mixed-kind issue space for categorical and boolean scoring. */
export const MIXED_SPACE: IssueSpace = {
  id: 'mixed',
  dimensions: [
    { id: 'notice_hours', kind: 'continuous', range: [0, 72] },
    { id: 'hotline', kind: 'boolean' },
    { id: 'inspection', kind: 'categorical', values: ['none', 'joint', 'third_party'] },
  ],
};

export function makeMixedParty(overrides?: Partial<PartyProfile>): PartyProfile {
  return {
    party_id: 'Mixed',
    interests: { notice_hours: 0.5, hotline: 0.2, inspection: 0.3 },
    ideal_value: { notice_hours: 48, hotline: true, inspection: 'third_party' },
    minimum_acceptable: { notice_hours: 12, hotline: false, inspection: ['joint', 'third_party'] },
    red_lines: [],
    batna_utility: 0.3,
    risk_tolerance: 0.5,
    ...overrides,
  };
}
