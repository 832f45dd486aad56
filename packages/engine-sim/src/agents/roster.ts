import type { PartyProfile } from '@shoal/engine-core';
import { clamp } from '@shoal/engine-core';
import type { ActivityKind, AgentRole, AgentState, RosterEntry, SimulationEnvironment, Zone } from '../types.js';

export interface RoleProfile {
  base_aggression: number;
  /** Rule-following: chance of honouring a tested term. */
  compliance_bias: number;
  /** Per-step base rate of each activity. */
  activity_rates: Partial<Record<ActivityKind, number>>;
  home_zone: Zone;
}

/** Behavior table per role. */
export const ROLE_PROFILES: Record<AgentRole, RoleProfile> = {
  coast_guard: {
    base_aggression: 0.15,
    compliance_bias: 0.7,
    activity_rates: { patrol: 0.35, resupply: 0.05 },
    home_zone: 'shoal',
  },
  navy: {
    base_aggression: 0.1,
    compliance_bias: 0.8,
    activity_rates: { patrol: 0.2, resupply: 0.1 },
    home_zone: 'approaches',
  },
  militia: {
    base_aggression: 0.2,
    compliance_bias: 0.5,
    activity_rates: { patrol: 0.25, resupply: 0.15, fishing: 0.05 },
    home_zone: 'shoal',
  },
  fishing: {
    base_aggression: 0.05,
    compliance_bias: 0.6,
    activity_rates: { fishing: 0.4 },
    home_zone: 'fishing_grounds',
  },
};

/** Fixed order in which an agent's activities are tried each step. */
export const ACTIVITY_ORDER: readonly ActivityKind[] = ['resupply', 'patrol', 'fishing'];

/**
 * Roster used when a scenario brings none: the first party fields a coast guard
 * and militia-heavy presence, every other party a coast guard and fishing fleet.
 */
export function defaultRoster(parties: readonly PartyProfile[]): RosterEntry[] {
  return parties.flatMap((p, i): RosterEntry[] =>
    i === 0
      ? [
          { party_id: p.party_id, role: 'coast_guard', count: 3 },
          { party_id: p.party_id, role: 'militia', count: 4 },
          { party_id: p.party_id, role: 'fishing', count: 2 },
        ]
      : [
          { party_id: p.party_id, role: 'coast_guard', count: 2 },
          { party_id: p.party_id, role: 'fishing', count: 4 },
        ],
  );
}

/** Instantiate agent states for one run, in roster order. */
export function createAgents(parties: readonly PartyProfile[], environment: SimulationEnvironment = {}): AgentState[] {
  const roster = environment.roster ?? defaultRoster(parties);
  const scale = environment.aggression_scale ?? 1;
  const tension = environment.initial_tension ?? 0;
  const agents: AgentState[] = [];

  for (const entry of roster) {
    const profile = ROLE_PROFILES[entry.role];
    const base = clamp(profile.base_aggression * scale, 0.01, 0.95);
    for (let n = 1; n <= entry.count; n++) {
      agents.push({
        agent_id: `${entry.party_id}:${entry.role}-${n}`,
        party_id: entry.party_id,
        role: entry.role,
        zone: entry.zone ?? profile.home_zone,
        posture: 'routine',
        base_aggression: base,
        aggression_level: clamp(base * (1 + tension), 0.01, 0.95),
        compliance_bias: profile.compliance_bias,
        tension,
        memory: [],
        interactions: 0,
      });
    }
  }
  return agents;
}

/** Base rate of an activity for a role, honouring scenario overrides. */
export function activityRate(role: AgentRole, kind: ActivityKind, environment: SimulationEnvironment): number {
  return environment.activity_rates?.[role]?.[kind] ?? ROLE_PROFILES[role].activity_rates[kind] ?? 0;
}
