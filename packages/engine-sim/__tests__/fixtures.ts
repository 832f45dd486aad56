import { createProposal } from '@shoal/engine-core';
import type { IssueSpace, PartyProfile, Proposal, ScenarioContext } from '@shoal/engine-core';
import type { AgentState, Incident, SimulationInput, Summary } from '../src/types.js';

/** Issue space whose dimensions all bind to simulator terms. */
export const SIM_SPACE: IssueSpace = {
  id: 'standoff-hotline',
  dimensions: [
    { id: 'standoff_nm', kind: 'continuous', range: [0, 10], unit: 'nm' },
    { id: 'escorts', kind: 'continuous', range: [0, 5], term: 'escort_limit' },
    { id: 'notice_hours', kind: 'continuous', range: [0, 72], unit: 'hours' },
    { id: 'hotline', kind: 'boolean' },
    { id: 'cues', kind: 'boolean' },
  ],
};

export function makePartyA(overrides?: Partial<PartyProfile>): PartyProfile {
  return {
    party_id: 'PartyA',
    interests: { standoff_nm: 0.3, escorts: 0.2, notice_hours: 0.2, hotline: 0.15, cues: 0.15 },
    ideal_value: { standoff_nm: 5, escorts: 2, notice_hours: 12, hotline: true, cues: true },
    minimum_acceptable: { standoff_nm: 2, escorts: 1, notice_hours: 48, hotline: false, cues: false },
    red_lines: [],
    batna_utility: 0.4,
    risk_tolerance: 0.5,
    ...overrides,
  };
}

export function makePartyB(overrides?: Partial<PartyProfile>): PartyProfile {
  return {
    party_id: 'PartyB',
    interests: { standoff_nm: 0.4, escorts: 0.2, notice_hours: 0.2, hotline: 0.1, cues: 0.1 },
    ideal_value: { standoff_nm: 2, escorts: 0, notice_hours: 72, hotline: true, cues: true },
    minimum_acceptable: { standoff_nm: 4, escorts: 1, notice_hours: 24, hotline: false, cues: false },
    red_lines: [],
    batna_utility: 0.45,
    risk_tolerance: 0.4,
    ...overrides,
  };
}

export function makeContext(): ScenarioContext {
  return { issue_space: SIM_SPACE, party_profiles: [makePartyA(), makePartyB()] };
}

export function makeAgreement(overrides?: Record<string, number | boolean>): Proposal {
  return createProposal({
    id: 'agreement',
    values: { standoff_nm: 3, escorts: 1, notice_hours: 24, hotline: true, cues: true, ...overrides },
  });
}

/** An agreement that binds no simulator term. */
export const NO_AGREEMENT: Proposal = createProposal({ id: 'none', values: {} });

export function makeInput(overrides?: Partial<SimulationInput>): SimulationInput {
  return {
    context: makeContext(),
    proposal: makeAgreement(),
    duration: 120,
    seed: 42,
    ...overrides,
  };
}

export function makeAgent(overrides?: Partial<AgentState>): AgentState {
  return {
    agent_id: 'PartyA:coast_guard-1',
    party_id: 'PartyA',
    role: 'coast_guard',
    zone: 'shoal',
    posture: 'routine',
    base_aggression: 0.15,
    aggression_level: 0.15,
    compliance_bias: 0.7,
    tension: 0,
    memory: [],
    interactions: 0,
    ...overrides,
  };
}

export function makeIncident(step: number, overrides?: Partial<Incident>): Incident {
  return {
    id: `inc-${step}-1`,
    step,
    actors: ['PartyA:militia-1', 'PartyB:coast_guard-1'],
    party_id: 'PartyA',
    type: 'warning',
    severity: 0.3,
    agreement_violation: false,
    violated_terms: [],
    de_escalated: false,
    mechanisms_attempted: [],
    cause: 'deliberate',
    weather: 'calm',
    ...overrides,
  };
}

export function makeSummary(overrides?: Partial<Summary>): Summary {
  return {
    total_incidents: 0,
    avg_severity: 0,
    max_severity: 0,
    trend: 'stable',
    first_half_incidents: 0,
    second_half_incidents: 0,
    compliance_rate_per_party: {},
    hotline_effectiveness: null,
    violations: 0,
    de_escalated: 0,
    accidental: 0,
    incidents_per_100_steps: 0,
    incidents_by_type: {},
    assessment: 'good',
    ...overrides,
  };
}
