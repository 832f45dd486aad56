import { clamp } from '@shoal/engine-core';
import type { TensionConfig } from '../config.js';
import type { AgentState, Incident } from '../types.js';
import { POSTURE_INTENSITY, transition } from './posture.js';
import type { PostureEvent } from './posture.js';

function applyPosture(agent: AgentState, event: PostureEvent): void {
  agent.posture = transition(agent.posture, event) ?? agent.posture;
}

/** Remember an incident the agent took part in and raise its tension. */
export function rememberIncident(agent: AgentState, incident: Incident, tension: TensionConfig, window: number): void {
  const gain = incident.severity * tension.gain * (incident.de_escalated ? tension.de_escalated_factor : 1);
  agent.tension = clamp(agent.tension + gain, 0, tension.max);
  agent.interactions++;
  agent.memory.push({
    step: incident.step,
    incident_id: incident.id,
    severity: incident.severity,
    de_escalated: incident.de_escalated,
  });
  if (agent.memory.length > window) {
    agent.memory.splice(0, agent.memory.length - window);
  }
  applyPosture(agent, incident.de_escalated ? 'de_escalated' : 'incident');
}

/** Remembered incidents that no mechanism de-escalated. */
export function unresolvedIncidents(agent: AgentState): number {
  return agent.memory.filter((m) => !m.de_escalated).length;
}

/** An encounter that ended without an incident sheds some tension. */
export function rememberSafeEncounter(agent: AgentState, tension: TensionConfig): void {
  agent.interactions++;
  agent.tension = clamp(agent.tension - tension.relief, 0, tension.max);
}

/**
 * End-of-step update: exponential tension decay, posture drift and the
 * aggression level derived from base aggression, posture and tension.
 */
export function settleAgent(agent: AgentState, tension: TensionConfig, hadIncident: boolean): void {
  agent.tension = clamp(agent.tension * (1 - tension.decay), 0, tension.max);

  if (agent.tension >= tension.alert_threshold) {
    applyPosture(agent, 'tension_high');
  } else if (!hadIncident && agent.tension < tension.calm_threshold) {
    applyPosture(agent, 'calm');
  }

  agent.aggression_level = clamp(
    agent.base_aggression * POSTURE_INTENSITY[agent.posture] * (1 + agent.tension),
    0.01,
    0.95,
  );
}
