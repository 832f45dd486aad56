import { EngineError, SimulationError } from '@shoal/engine-core';
import type { Incident } from './types.js';

/** Append-only, step-ordered incident record of one run. */
export class IncidentLog {
  private readonly entries: Incident[] = [];

  append(incident: Incident): Incident {
    const last = this.entries[this.entries.length - 1];
    if (last && incident.step < last.step) {
      throw new SimulationError(
        EngineError.INVALID_SIMULATION_REQUEST,
        `incident ${incident.id} at step ${incident.step} after step ${last.step}`,
      );
    }
    const frozen = Object.freeze({
      ...incident,
      actors: Object.freeze([...incident.actors]),
      violated_terms: Object.freeze([...incident.violated_terms]),
      mechanisms_attempted: Object.freeze([...incident.mechanisms_attempted]),
    });
    this.entries.push(frozen);
    return frozen;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Incidents in step order. */
  toArray(): Incident[] {
    return [...this.entries];
  }
}
