import type { EngineError, Proposal, ScenarioContext } from '@shoal/engine-core';

/** Simulated unit type. */
export type AgentRole = 'coast_guard' | 'navy' | 'militia' | 'fishing';

/** Behavioral state of an agent; see agents/posture.ts for the transition table. */
export type Posture = 'routine' | 'assertive' | 'confrontational' | 'standing_down';

export type ActivityKind = 'patrol' | 'resupply' | 'fishing';

export type Zone = 'shoal' | 'approaches' | 'fishing_grounds';

export type WeatherState = 'calm' | 'moderate' | 'rough';

export type Visibility = 'good' | 'reduced' | 'poor';

export type IncidentType =
  | 'close-approach'
  | 'warning'
  | 'blocking'
  | 'water-cannon'
  | 'detention-attempt'
  | 'collision'
  | 'near-miss';

export type DeEscalationMechanism = 'cues' | 'hotline';

export type Trend = 'declining' | 'stable' | 'escalating';

export type Assessment = 'good' | 'mixed' | 'concerning';

/** One remembered incident in an agent's memory window. */
export interface MemoryEntry {
  step: number;
  incident_id: string;
  severity: number;
  de_escalated: boolean;
}

/** Mutable per-agent state. Owned by exactly one run. */
export interface AgentState {
  agent_id: string;
  party_id: string;
  role: AgentRole;
  zone: Zone;
  posture: Posture;
  base_aggression: number;
  aggression_level: number;
  /** Probability the agent follows an agreed rule when it is tested. */
  compliance_bias: number;
  /** Escalation memory: raised by incidents, decays every step, bounded by tension.max. */
  tension: number;
  memory: MemoryEntry[];
  interactions: number;
}

/** Roster line: `count` agents of `role` belonging to `party_id`. */
export interface RosterEntry {
  party_id: string;
  role: AgentRole;
  count: number;
  zone?: Zone;
}

/** Scenario-level conditions of a run (not tuning knobs). */
export interface SimulationEnvironment {
  initial_weather?: WeatherState;
  /** 0 (none) … 3 (heavy press presence). Restrains close approaches. */
  media_visibility?: number;
  roster?: RosterEntry[];
  /** Multiplies every role's base aggression. */
  aggression_scale?: number;
  /** Tension every agent starts with. */
  initial_tension?: number;
  /** Per-role override of activity base rates. */
  activity_rates?: Partial<Record<AgentRole, Partial<Record<ActivityKind, number>>>>;
}

/** Agreement terms the simulator reacts to, read from a proposal. */
export interface AgreementTerms {
  standoff_nm: number | null;
  escort_limit: number | null;
  notice_hours: number | null;
  hotline: boolean;
  cues: boolean;
  fisheries_corridor: boolean;
  ais_transparency: boolean;
}

export type TermKey = keyof AgreementTerms;

/** A recorded adverse interaction. Immutable once emitted. */
export interface Incident {
  readonly id: string;
  readonly step: number;
  readonly actors: readonly string[];
  /** Party of the initiating agent. */
  readonly party_id: string;
  readonly type: IncidentType;
  readonly severity: number;
  readonly agreement_violation: boolean;
  readonly violated_terms: readonly TermKey[];
  readonly de_escalated: boolean;
  readonly mechanisms_attempted: readonly DeEscalationMechanism[];
  readonly cause: 'deliberate' | 'accidental';
  readonly weather: WeatherState;
}

export interface PartyActivity {
  activities: number;
  violations: number;
}

export interface Summary {
  total_incidents: number;
  avg_severity: number;
  max_severity: number;
  trend: Trend;
  first_half_incidents: number;
  second_half_incidents: number;
  compliance_rate_per_party: Record<string, number>;
  /** De-escalated / incidents where a mechanism was tried. null when none was tried. */
  hotline_effectiveness: number | null;
  violations: number;
  de_escalated: number;
  accidental: number;
  incidents_per_100_steps: number;
  incidents_by_type: Partial<Record<IncidentType, number>>;
  assessment: Assessment;
}

export interface Interruption {
  code: EngineError.SIMULATION_INTERRUPTED;
  at_step: number;
  reason: string;
}

/** Fully materialized result of one run. Frozen once returned. */
export interface SimulationRun {
  proposal: Proposal;
  issue_space_id: string;
  duration: number;
  seed: number;
  status: 'completed' | 'interrupted';
  complete: boolean;
  steps_completed: number;
  incident_log: Incident[];
  party_activity: Record<string, PartyActivity>;
  final_agents: AgentState[];
  summary: Summary;
  interruption?: Interruption;
}

/** What a run needs besides tuning. */
export interface SimulationInput {
  context: ScenarioContext;
  proposal: Proposal;
  duration: number;
  seed: number;
  environment?: SimulationEnvironment;
}

/** Progress callback payload, delivered after each completed step. */
export interface StepProgress {
  step: number;
  steps_completed: number;
  incidents: number;
  weather: WeatherState;
}
