import { setImmediate as nextTick } from 'node:timers/promises';
import { EngineError, ValidationError, assertProposal, assertScenario, isFiniteNumber } from '@shoal/engine-core';
import { createAgents } from './agents/roster.js';
import { rememberIncident, rememberSafeEncounter, settleAgent } from './agents/memory.js';
import type { SimulationConfig } from './config.js';
import { DEFAULT_SIMULATION_CONFIG } from './config.js';
import { WeatherProcess } from './environment/weather.js';
import { IncidentLog } from './incident-log.js';
import { MAX_SEED, SeededRandom, isValidSeed } from './random.js';
import { selectActivities } from './step/activity.js';
import type { Activity } from './step/activity.js';
import { checkEncounter } from './step/interaction.js';
import type { Encounter } from './step/interaction.js';
import { attemptDeEscalation, classifyIncident, sampleAccident, sampleSeverity } from './step/resolution.js';
import { readAgreementTerms } from './terms.js';
import { summarize } from './trend.js';
import type {
  AgentState,
  AgreementTerms,
  Incident,
  IncidentType,
  Interruption,
  PartyActivity,
  SimulationInput,
  SimulationRun,
  StepProgress,
  TermKey,
} from './types.js';

export interface SimulationOptions {
  config?: SimulationConfig;
  /** Checked before every step; an aborted run is returned as interrupted. */
  signal?: AbortSignal;
  onStep?: (progress: StepProgress) => void;
}

export interface AsyncSimulationOptions extends SimulationOptions {
  /** Steps between yields to the event loop. */
  yield_every?: number;
}

const MAX_MEDIA_VISIBILITY = 3;

function invalid(detail: string): never {
  throw new ValidationError(EngineError.INVALID_SIMULATION_REQUEST, `${EngineError.INVALID_SIMULATION_REQUEST}: ${detail}`, {
    detail,
  });
}

/** Throws ValidationError before any step runs. */
export function validateSimulationInput(input: SimulationInput): void {
  assertScenario(input.context);
  assertProposal(input.proposal, input.context.issue_space);

  if (!Number.isInteger(input.duration) || input.duration < 1) {
    invalid(`duration must be a positive integer, got ${input.duration}`);
  }
  if (!isValidSeed(input.seed)) {
    invalid(`seed must be an integer in [0, ${MAX_SEED}], got ${input.seed}`);
  }

  const env = input.environment ?? {};
  if (env.media_visibility !== undefined) {
    if (!isFiniteNumber(env.media_visibility) || env.media_visibility < 0 || env.media_visibility > MAX_MEDIA_VISIBILITY) {
      invalid(`media_visibility must be in [0, ${MAX_MEDIA_VISIBILITY}]`);
    }
  }
  if (env.aggression_scale !== undefined && !(isFiniteNumber(env.aggression_scale) && env.aggression_scale > 0)) {
    invalid('aggression_scale must be > 0');
  }
  if (env.initial_tension !== undefined && !(isFiniteNumber(env.initial_tension) && env.initial_tension >= 0)) {
    invalid('initial_tension must be ≥ 0');
  }
  if (env.roster) {
    const parties = new Set(input.context.party_profiles.map((p) => p.party_id));
    for (const entry of env.roster) {
      if (!parties.has(entry.party_id)) invalid(`roster names unknown party ${entry.party_id}`);
      if (!Number.isInteger(entry.count) || entry.count < 0) {
        invalid(`roster count for ${entry.party_id}/${entry.role} must be a non-negative integer`);
      }
    }
  }
}

/**
 * One simulation run, advanced a step at a time.
 *
 * Owns its RNG, agent states, weather and incident log; nothing is shared with
 * other runs. Every stochastic choice draws from the run's generator in a fixed
 * order, so a seed reproduces the run exactly.
 */
export class SimulationRunner {
  private readonly rng: SeededRandom;
  private readonly weather: WeatherProcess;
  private readonly agents: AgentState[];
  private readonly terms: AgreementTerms;
  private readonly log = new IncidentLog();
  private readonly activity: Record<string, PartyActivity> = {};
  private readonly mediaVisibility: number;
  private completed = 0;

  constructor(
    private readonly input: SimulationInput,
    private readonly config: SimulationConfig = DEFAULT_SIMULATION_CONFIG,
  ) {
    validateSimulationInput(input);
    const env = input.environment ?? {};

    this.rng = new SeededRandom(input.seed, config.max_rng_draws);
    this.weather = new WeatherProcess(env.initial_weather ?? 'calm', config.weather);
    this.agents = createAgents(input.context.party_profiles, env);
    this.terms = readAgreementTerms(input.proposal, input.context.issue_space);
    this.mediaVisibility = env.media_visibility ?? 0;

    for (const party of input.context.party_profiles) {
      this.activity[party.party_id] = { activities: 0, violations: 0 };
    }
  }

  get stepsCompleted(): number {
    return this.completed;
  }

  get finished(): boolean {
    return this.completed >= this.input.duration;
  }

  get agreementTerms(): AgreementTerms {
    return { ...this.terms };
  }

  /**
   * Run one step:
   * 1. Advance the weather
   * 2. Select activities, gated by the agreement
   * 3. Interaction check per activity; violations or unsafe approaches raise incidents
   * 4. Resolve incidents (severity, type, CUES / hotline)
   * 5. Weather accidents
   * 6. Settle every agent (tension decay, posture, aggression)
   */
  step(): StepProgress {
    if (this.finished) {
      invalid(`run already completed ${this.completed} steps`);
    }
    const step = this.completed;
    const { behavior, tension, mechanisms } = this.config;
    const before = this.log.size;
    const involved = new Set<string>();
    let seq = 0;
    const nextId = (): string => `inc-${step}-${++seq}`;

    this.weather.advance(this.rng);
    const activities = selectActivities(this.agents, this.terms, this.input.environment ?? {}, behavior, this.rng);

    for (const activity of activities) {
      const encounter = checkEncounter(
        activity,
        this.agents,
        this.terms,
        this.weather,
        this.mediaVisibility,
        behavior,
        this.rng,
      );
      this.tally(activity, encounter);
      if (!encounter) continue;

      const raises = encounter.distance_violation || encounter.unsafe || activity.violations.length > 0;
      if (!raises) {
        rememberSafeEncounter(activity.agent, tension);
        rememberSafeEncounter(encounter.counterpart, tension);
        continue;
      }

      const reference = this.terms.standoff_nm ?? behavior.unsafe_distance_nm;
      const severity = sampleSeverity(activity.agent, encounter.distance_nm, reference, this.rng);
      const type = classifyIncident(severity, this.rng);
      const violated: TermKey[] = encounter.distance_violation
        ? [...activity.violations, 'standoff_nm']
        : [...activity.violations];

      const incident = this.record(nextId(), step, [activity.agent, encounter.counterpart], type, severity, violated, 'deliberate');
      for (const agent of [activity.agent, encounter.counterpart]) {
        rememberIncident(agent, incident, tension, behavior.memory_window);
        involved.add(agent.agent_id);
      }
    }

    const accidentP = this.weather.accidentProbability;
    if (accidentP > 0) {
      for (const activity of activities) {
        if (involved.has(activity.agent.agent_id)) continue;
        if (!this.rng.chance(accidentP)) continue;
        const accident = sampleAccident(this.rng);
        const incident = this.record(nextId(), step, [activity.agent], accident.type, accident.severity, [], 'accidental');
        rememberIncident(activity.agent, incident, tension, behavior.memory_window);
        involved.add(activity.agent.agent_id);
      }
    }

    for (const agent of this.agents) {
      settleAgent(agent, tension, involved.has(agent.agent_id));
    }

    this.completed++;
    return {
      step,
      steps_completed: this.completed,
      incidents: this.log.size - before,
      weather: this.weather.state,
    };
  }

  /** Materialize the run as it stands. Frozen; later steps do not affect it. */
  result(interruption?: Interruption): SimulationRun {
    const incidentLog = this.log.toArray();
    const partyActivity: Record<string, PartyActivity> = {};
    for (const [party, tally] of Object.entries(this.activity)) {
      partyActivity[party] = { ...tally };
    }
    const complete = interruption === undefined && this.finished;

    const run: SimulationRun = {
      proposal: this.input.proposal,
      issue_space_id: this.input.context.issue_space.id,
      duration: this.input.duration,
      seed: this.input.seed,
      status: complete ? 'completed' : 'interrupted',
      complete,
      steps_completed: this.completed,
      incident_log: incidentLog,
      party_activity: partyActivity,
      final_agents: this.agents.map((a) => ({ ...a, memory: a.memory.map((m) => ({ ...m })) })),
      summary: summarize({ steps_completed: this.completed, incident_log: incidentLog, party_activity: partyActivity }, this.config),
      ...(interruption && { interruption }),
    };
    Object.freeze(run.incident_log);
    return Object.freeze(run);
  }

  private tally(activity: Activity, encounter: Encounter | null): void {
    const party = activity.agent.party_id;
    const tally = (this.activity[party] ??= { activities: 0, violations: 0 });
    tally.activities++;
    if (activity.violations.length > 0 || encounter?.distance_violation) tally.violations++;
  }

  private record(
    id: string,
    step: number,
    actors: AgentState[],
    type: IncidentType,
    severity: number,
    violated: TermKey[],
    cause: Incident['cause'],
  ): Incident {
    const resolution = attemptDeEscalation(this.terms, this.config.mechanisms, this.rng);
    return this.log.append({
      id,
      step,
      actors: actors.map((a) => a.agent_id),
      party_id: actors[0].party_id,
      type,
      severity,
      agreement_violation: violated.length > 0,
      violated_terms: violated,
      de_escalated: resolution.de_escalated,
      mechanisms_attempted: resolution.attempted,
      cause,
      weather: this.weather.state,
    });
  }
}

function interruptionAt(runner: SimulationRunner, signal: AbortSignal): Interruption {
  const reason: unknown = signal.reason;
  return {
    code: EngineError.SIMULATION_INTERRUPTED,
    at_step: runner.stepsCompleted,
    reason: reason instanceof Error ? reason.message : typeof reason === 'string' ? reason : 'cancelled',
  };
}

/**
 * Run a simulation to completion on the calling thread.
 * A signal aborted from `onStep` stops the run at the next step boundary.
 */
export function runSimulation(input: SimulationInput, options: SimulationOptions = {}): SimulationRun {
  const runner = new SimulationRunner(input, options.config);
  while (!runner.finished) {
    if (options.signal?.aborted) return runner.result(interruptionAt(runner, options.signal));
    const progress = runner.step();
    options.onStep?.(progress);
  }
  return runner.result();
}

/**
 * Same run as runSimulation, yielding to the event loop every `yield_every`
 * steps so a cancellation request can land between steps.
 */
export async function runSimulationAsync(
  input: SimulationInput,
  options: AsyncSimulationOptions = {},
): Promise<SimulationRun> {
  const runner = new SimulationRunner(input, options.config);
  const yieldEvery = options.yield_every ?? 25;
  if (!Number.isInteger(yieldEvery) || yieldEvery < 1) {
    invalid(`yield_every must be a positive integer, got ${yieldEvery}`);
  }

  while (!runner.finished) {
    if (options.signal?.aborted) return runner.result(interruptionAt(runner, options.signal));
    const progress = runner.step();
    options.onStep?.(progress);
    if (progress.steps_completed % yieldEvery === 0) await nextTick();
  }
  return runner.result();
}
