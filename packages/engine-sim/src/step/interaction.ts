import { clamp } from '@shoal/engine-core';
import type { BehaviorConfig } from '../config.js';
import type { WeatherProcess } from '../environment/weather.js';
import type { SeededRandom } from '../random.js';
import type { AgentState, AgreementTerms } from '../types.js';
import type { Activity } from './activity.js';
import { complianceOf } from './activity.js';

export interface Encounter {
  counterpart: AgentState;
  distance_nm: number;
  /** Closer than the agreed standoff. */
  distance_violation: boolean;
  /** Closer than the unsafe distance, agreement or not. */
  unsafe: boolean;
}

/**
 * Does the activity bring its agent close to a unit of another party, and how close?
 *
 * distance = U(0,1) · range · (1 − 0.6·aggression) · (1 − 0.4·tension)
 *            · (1 + media_restraint · media_visibility) / weather perturbation
 *
 * A compliant agent holds the agreed standoff. Returns null when no encounter happens.
 */
export function checkEncounter(
  activity: Activity,
  agents: readonly AgentState[],
  terms: AgreementTerms,
  weather: WeatherProcess,
  mediaVisibility: number,
  behavior: BehaviorConfig,
  rng: SeededRandom,
): Encounter | null {
  const { agent } = activity;
  const candidates = agents.filter((a) => a.party_id !== agent.party_id && a.zone === activity.zone);
  if (candidates.length === 0) return null;
  if (!rng.chance(behavior.encounter_rate)) return null;

  const counterpart = rng.choice(candidates);
  const tension = clamp(agent.tension, 0, 1);
  let distance =
    (rng.next() *
      behavior.approach_range_nm *
      (1 - 0.6 * agent.aggression_level) *
      (1 - 0.4 * tension) *
      (1 + behavior.media_restraint * mediaVisibility)) /
    weather.perturbation;

  if (terms.standoff_nm !== null && rng.chance(complianceOf(agent, behavior))) {
    distance = Math.max(distance, terms.standoff_nm);
  }

  return {
    counterpart,
    distance_nm: distance,
    distance_violation: terms.standoff_nm !== null && distance < terms.standoff_nm,
    unsafe: distance < behavior.unsafe_distance_nm,
  };
}
