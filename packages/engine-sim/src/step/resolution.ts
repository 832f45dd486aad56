import { clamp } from '@shoal/engine-core';
import type { MechanismConfig } from '../config.js';
import type { SeededRandom } from '../random.js';
import type { AgentState, AgreementTerms, DeEscalationMechanism, IncidentType } from '../types.js';

/** Incident types per severity band, lower bound inclusive. */
const SEVERITY_BANDS: readonly { from: number; types: readonly IncidentType[] }[] = [
  { from: 0.85, types: ['collision'] },
  { from: 0.6, types: ['blocking', 'water-cannon', 'detention-attempt'] },
  { from: 0.3, types: ['warning', 'blocking'] },
  { from: 0, types: ['close-approach', 'warning'] },
];

/**
 * severity = 0.45·closeness + 0.3·aggression + 0.15·tension + 0.1·U(0,1), clamped to [0, 1]
 * closeness = how far inside the reference distance (standoff, or the unsafe distance) the approach came.
 */
export function sampleSeverity(
  agent: AgentState,
  distanceNm: number,
  referenceNm: number,
  rng: SeededRandom,
): number {
  const closeness = clamp((referenceNm - distanceNm) / referenceNm, 0, 1);
  const tension = clamp(agent.tension, 0, 1);
  return clamp(0.45 * closeness + 0.3 * agent.aggression_level + 0.15 * tension + 0.1 * rng.next(), 0, 1);
}

export function classifyIncident(severity: number, rng: SeededRandom): IncidentType {
  const band = SEVERITY_BANDS.find((b) => severity >= b.from) ?? SEVERITY_BANDS[SEVERITY_BANDS.length - 1];
  return rng.choice(band.types);
}

/** Accidents are mostly near misses; some are collisions. */
export function sampleAccident(rng: SeededRandom): { type: IncidentType; severity: number } {
  if (rng.chance(0.15)) {
    return { type: 'collision', severity: rng.uniform(0.5, 0.9) };
  }
  return { type: 'near-miss', severity: rng.uniform(0.1, 0.4) };
}

export interface Resolution {
  attempted: DeEscalationMechanism[];
  de_escalated: boolean;
}

/** On-scene CUES first, then the hotline, each only when the agreement provides it. */
export function attemptDeEscalation(terms: AgreementTerms, mechanisms: MechanismConfig, rng: SeededRandom): Resolution {
  const attempted: DeEscalationMechanism[] = [];
  if (terms.cues) {
    attempted.push('cues');
    if (rng.chance(mechanisms.cues_success)) return { attempted, de_escalated: true };
  }
  if (terms.hotline) {
    attempted.push('hotline');
    if (rng.chance(mechanisms.hotline_success)) return { attempted, de_escalated: true };
  }
  return { attempted, de_escalated: false };
}
