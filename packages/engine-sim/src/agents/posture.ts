import type { Posture } from '../types.js';

/** Events that move an agent between postures. */
export type PostureEvent = 'incident' | 'de_escalated' | 'tension_high' | 'calm';

/**
 * Valid posture transitions.
 * Key: current posture → Map of event → next posture. Missing entries keep the posture.
 */
const TRANSITIONS: Record<Posture, Partial<Record<PostureEvent, Posture>>> = {
  routine: {
    incident: 'assertive',
    tension_high: 'assertive',
  },
  assertive: {
    incident: 'confrontational',
    tension_high: 'confrontational',
    de_escalated: 'routine',
    calm: 'routine',
  },
  confrontational: {
    de_escalated: 'standing_down',
    calm: 'assertive',
  },
  standing_down: {
    incident: 'assertive',
    calm: 'routine',
  },
};

/** Multiplier on activity rates and aggression per posture. */
export const POSTURE_INTENSITY: Record<Posture, number> = {
  routine: 1,
  assertive: 1.2,
  confrontational: 1.5,
  standing_down: 0.6,
};

/**
 * Attempt a posture transition. Returns the new posture if valid, or null if the
 * event does not move an agent in this posture.
 */
export function transition(current: Posture, event: PostureEvent): Posture | null {
  return TRANSITIONS[current][event] ?? null;
}
