import { clamp } from '@shoal/engine-core';
import { ACTIVITY_ORDER, activityRate } from '../agents/roster.js';
import { POSTURE_INTENSITY } from '../agents/posture.js';
import { unresolvedIncidents } from '../agents/memory.js';
import type { BehaviorConfig } from '../config.js';
import type { SeededRandom } from '../random.js';
import type { ActivityKind, AgentState, AgreementTerms, SimulationEnvironment, TermKey, Zone } from '../types.js';

const PATROL_ZONES: readonly Zone[] = ['shoal', 'approaches', 'fishing_grounds'];

/** One agent's activity in one step. */
export interface Activity {
  agent: AgentState;
  kind: ActivityKind;
  zone: Zone;
  /** Terms broken by how the activity was carried out (before any encounter). */
  violations: TermKey[];
}

/**
 * Chance the agent honours a tested term.
 * compliance = bias · (1 − 0.5·tension) · (1 − grievance_weight · unresolved remembered incidents)
 */
export function complianceOf(agent: AgentState, behavior: BehaviorConfig): number {
  const grievance = 1 - behavior.grievance_weight * unresolvedIncidents(agent);
  return clamp(agent.compliance_bias * (1 - 0.5 * agent.tension) * grievance, 0, 1);
}

function zoneFor(kind: ActivityKind, rng: SeededRandom): Zone {
  switch (kind) {
    case 'resupply':
      return 'shoal';
    case 'fishing':
      return 'fishing_grounds';
    case 'patrol':
      return rng.choice(PATROL_ZONES);
  }
}

/**
 * Gate an activity against the agreement.
 * resupply: notice period filed? escorts within the limit?
 * patrol:   AIS broadcasting kept on?
 * fishing:  stayed inside the fisheries corridor?
 */
function gate(
  agent: AgentState,
  kind: ActivityKind,
  terms: AgreementTerms,
  behavior: BehaviorConfig,
  rng: SeededRandom,
): TermKey[] {
  const violations: TermKey[] = [];
  const compliance = complianceOf(agent, behavior);

  switch (kind) {
    case 'resupply': {
      if (terms.notice_hours !== null && !rng.chance(compliance)) {
        violations.push('notice_hours');
      }
      if (terms.escort_limit !== null) {
        const desired = Math.floor(rng.next() * (2 + agent.aggression_level * 6));
        if (desired > terms.escort_limit && !rng.chance(compliance)) {
          violations.push('escort_limit');
        }
      }
      break;
    }
    case 'patrol':
      if (terms.ais_transparency && !rng.chance(compliance)) violations.push('ais_transparency');
      break;
    case 'fishing':
      if (terms.fisheries_corridor && !rng.chance(compliance)) violations.push('fisheries_corridor');
      break;
  }
  return violations;
}

/**
 * Stochastically pick at most one activity per agent, in roster order.
 * Rates are the role's base rates scaled by posture. Moves the agent to the activity's zone.
 */
export function selectActivities(
  agents: readonly AgentState[],
  terms: AgreementTerms,
  environment: SimulationEnvironment,
  behavior: BehaviorConfig,
  rng: SeededRandom,
): Activity[] {
  const activities: Activity[] = [];

  for (const agent of agents) {
    for (const kind of ACTIVITY_ORDER) {
      const rate = activityRate(agent.role, kind, environment) * POSTURE_INTENSITY[agent.posture];
      if (rate <= 0) continue;
      if (!rng.chance(clamp(rate, 0, 1))) continue;

      const zone = zoneFor(kind, rng);
      agent.zone = zone;
      activities.push({ agent, kind, zone, violations: gate(agent, kind, terms, behavior, rng) });
      break;
    }
  }
  return activities;
}
