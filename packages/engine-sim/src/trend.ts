import type { AssessmentConfig, SimulationConfig } from './config.js';
import { DEFAULT_SIMULATION_CONFIG } from './config.js';
import type { Assessment, Incident, IncidentType, PartyActivity, Summary, Trend } from './types.js';

/** The parts of a run the analyzer reads. */
export interface RunRecord {
  steps_completed: number;
  incident_log: readonly Incident[];
  party_activity: Readonly<Record<string, PartyActivity>>;
}

/**
 * Compare incident counts of the two halves of a run.
 * A change counts only when one half exceeds the other by at least `ratio`.
 */
export function classifyTrend(first: number, second: number, ratio: number): Trend {
  if (first > second && second * ratio <= first) return 'declining';
  if (second > first && second >= first * ratio) return 'escalating';
  return 'stable';
}

/** Incidents before and from the midpoint step. Steps are 0-based. */
export function splitHalves(incidents: readonly Incident[], stepsCompleted: number): [number, number] {
  const mid = stepsCompleted / 2;
  let first = 0;
  for (const incident of incidents) {
    if (incident.step < mid) first++;
  }
  return [first, incidents.length - first];
}

export function assess(ratePer100: number, avgSeverity: number, cfg: AssessmentConfig): Assessment {
  if (ratePer100 >= cfg.concerning_min_rate || avgSeverity >= cfg.concerning_min_severity) return 'concerning';
  if (ratePer100 <= cfg.good_max_rate && avgSeverity <= cfg.good_max_severity) return 'good';
  return 'mixed';
}

/** 1 − violating / total activities per party; 1 for a party with no activity. */
export function complianceRates(activity: Readonly<Record<string, PartyActivity>>): Record<string, number> {
  const rates: Record<string, number> = {};
  for (const [party, tally] of Object.entries(activity)) {
    rates[party] = tally.activities === 0 ? 1 : 1 - tally.violations / tally.activities;
  }
  return rates;
}

/**
 * Incident counts per bucket of `bucket` steps, keyed by the bucket's first step.
 * Buckets without incidents are absent.
 */
export function bucketCounts(incidents: readonly Incident[], bucket: number): Record<number, number> {
  if (!Number.isInteger(bucket) || bucket < 1) {
    throw new RangeError(`bucket must be a positive integer, got ${bucket}`);
  }
  const counts: Record<number, number> = {};
  for (const incident of incidents) {
    const key = Math.floor(incident.step / bucket) * bucket;
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

export function summarize(run: RunRecord, config: SimulationConfig = DEFAULT_SIMULATION_CONFIG): Summary {
  const incidents = run.incident_log;
  const total = incidents.length;

  let severitySum = 0;
  let maxSeverity = 0;
  let violations = 0;
  let deEscalated = 0;
  let accidental = 0;
  let mediated = 0;
  let mediatedResolved = 0;
  const byType: Partial<Record<IncidentType, number>> = {};

  for (const incident of incidents) {
    severitySum += incident.severity;
    maxSeverity = Math.max(maxSeverity, incident.severity);
    if (incident.agreement_violation) violations++;
    if (incident.de_escalated) deEscalated++;
    if (incident.cause === 'accidental') accidental++;
    if (incident.mechanisms_attempted.length > 0) {
      mediated++;
      if (incident.de_escalated) mediatedResolved++;
    }
    byType[incident.type] = (byType[incident.type] ?? 0) + 1;
  }

  const avgSeverity = total === 0 ? 0 : severitySum / total;
  const rate = run.steps_completed === 0 ? 0 : (total / run.steps_completed) * 100;
  const [first, second] = splitHalves(incidents, run.steps_completed);

  return {
    total_incidents: total,
    avg_severity: avgSeverity,
    max_severity: maxSeverity,
    trend: classifyTrend(first, second, config.trend.ratio),
    first_half_incidents: first,
    second_half_incidents: second,
    compliance_rate_per_party: complianceRates(run.party_activity),
    hotline_effectiveness: mediated === 0 ? null : mediatedResolved / mediated,
    violations,
    de_escalated: deEscalated,
    accidental,
    incidents_per_100_steps: rate,
    incidents_by_type: byType,
    assessment: assess(rate, avgSeverity, config.assessment),
  };
}
