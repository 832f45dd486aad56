import type { ValidationIssue } from './errors.js';
import { raise } from './errors.js';
import type { Dimension, DimensionValue, IssueSpace, PartyProfile, Proposal, ScenarioContext } from './types.js';
import { EngineError } from './types.js';
import { isFiniteNumber } from './utils.js';

const WEIGHT_TOLERANCE = 1e-6;

export function findDimension(space: IssueSpace, id: string): Dimension | undefined {
  return space.dimensions.find((d) => d.id === id);
}

export function validateDimension(dim: Dimension): ValidationIssue | null {
  switch (dim.kind) {
    case 'continuous': {
      const range = dim.range;
      if (!range || !isFiniteNumber(range[0]) || !isFiniteNumber(range[1]) || range[0] >= range[1]) {
        return { error: EngineError.INVALID_ISSUE_SPACE, detail: `dimension ${dim.id} needs range [min, max] with min < max`, dimension: dim.id };
      }
      return null;
    }
    case 'categorical': {
      if (!dim.values || dim.values.length === 0) {
        return { error: EngineError.INVALID_ISSUE_SPACE, detail: `dimension ${dim.id} needs a non-empty values list`, dimension: dim.id };
      }
      if (new Set(dim.values).size !== dim.values.length) {
        return { error: EngineError.INVALID_ISSUE_SPACE, detail: `dimension ${dim.id} has duplicate values`, dimension: dim.id };
      }
      return null;
    }
    case 'boolean':
      return null;
    default:
      return { error: EngineError.INVALID_ISSUE_SPACE, detail: `dimension ${String(dim.id)} has unknown kind`, dimension: dim.id };
  }
}

export function validateIssueSpace(space: IssueSpace): ValidationIssue | null {
  if (!space.id) {
    return { error: EngineError.INVALID_ISSUE_SPACE, detail: 'issue space id is required' };
  }
  if (space.dimensions.length === 0) {
    return { error: EngineError.INVALID_ISSUE_SPACE, detail: `issue space ${space.id} has no dimensions` };
  }
  const seen = new Set<string>();
  for (const dim of space.dimensions) {
    if (seen.has(dim.id)) {
      return { error: EngineError.INVALID_ISSUE_SPACE, detail: `duplicate dimension ${dim.id}`, dimension: dim.id };
    }
    seen.add(dim.id);
    const issue = validateDimension(dim);
    if (issue) return issue;
  }
  return null;
}

/** Check a single value against its dimension's declared kind and range. */
export function validateValue(dim: Dimension, value: DimensionValue): ValidationIssue | null {
  switch (dim.kind) {
    case 'continuous': {
      const [min, max] = dim.range ?? [Number.NEGATIVE_INFINITY, Number.POSITIVE_INFINITY];
      if (!isFiniteNumber(value) || value < min || value > max) {
        return {
          error: EngineError.OUT_OF_RANGE,
          detail: `${dim.id}=${String(value)} outside [${min}, ${max}]`,
          dimension: dim.id,
          bound: { min, max },
        };
      }
      return null;
    }
    case 'categorical': {
      const allowed = dim.values ?? [];
      if (typeof value !== 'string' || !allowed.includes(value)) {
        return {
          error: EngineError.OUT_OF_RANGE,
          detail: `${dim.id}=${String(value)} not one of ${allowed.join('|')}`,
          dimension: dim.id,
          bound: { allowed },
        };
      }
      return null;
    }
    case 'boolean':
      if (typeof value !== 'boolean') {
        return { error: EngineError.OUT_OF_RANGE, detail: `${dim.id} expects a boolean`, dimension: dim.id };
      }
      return null;
  }
}

export function validateWeights(interests: Record<string, number>): ValidationIssue | null {
  const weights = Object.values(interests);
  if (weights.some((w) => !isFiniteNumber(w) || w < 0)) {
    return { error: EngineError.INVALID_WEIGHTS, detail: 'negative weight' };
  }
  const total = weights.reduce((acc, w) => acc + w, 0);
  if (Math.abs(total - 1.0) > WEIGHT_TOLERANCE) {
    return { error: EngineError.INVALID_WEIGHTS, detail: `sum=${total}` };
  }
  return null;
}

function profileIssue(profile: PartyProfile, detail: string, dimension?: string): ValidationIssue {
  return { error: EngineError.INVALID_PARTY_PROFILE, detail, dimension, party_id: profile.party_id };
}

/**
 * Validate a party profile against the issue space it is scored in.
 * Minimum acceptable values must be feasible; a continuous ideal may lie outside
 * the range as an aspiration.
 */
export function validatePartyProfile(profile: PartyProfile, space: IssueSpace): ValidationIssue | null {
  if (!profile.party_id) {
    return { error: EngineError.INVALID_PARTY_PROFILE, detail: 'party_id is required' };
  }

  for (const dimId of Object.keys(profile.interests)) {
    if (!findDimension(space, dimId)) {
      return {
        error: EngineError.DIMENSION_MISMATCH,
        detail: `party ${profile.party_id} weights unknown dimension ${dimId}`,
        dimension: dimId,
        party_id: profile.party_id,
      };
    }
  }

  const wErr = validateWeights(profile.interests);
  if (wErr) return { ...wErr, party_id: profile.party_id };

  for (const dimId of Object.keys(profile.interests)) {
    const dim = findDimension(space, dimId);
    if (!dim) continue;
    const ideal = profile.ideal_value[dimId];
    const minimum = profile.minimum_acceptable[dimId];
    if (ideal === undefined || minimum === undefined) {
      return profileIssue(profile, `ideal_value and minimum_acceptable required for ${dimId}`, dimId);
    }

    switch (dim.kind) {
      case 'continuous': {
        if (!isFiniteNumber(ideal) || !isFiniteNumber(minimum)) {
          return profileIssue(profile, `${dimId} expects numeric ideal and minimum`, dimId);
        }
        const rangeErr = validateValue(dim, minimum);
        if (rangeErr) {
          return { ...rangeErr, error: EngineError.INVALID_PARTY_PROFILE, party_id: profile.party_id, detail: `minimum_acceptable ${rangeErr.detail}` };
        }
        break;
      }
      case 'categorical': {
        const allowed = dim.values ?? [];
        if (typeof ideal !== 'string' || !allowed.includes(ideal)) {
          return profileIssue(profile, `${dimId} ideal must be one of ${allowed.join('|')}`, dimId);
        }
        if (!Array.isArray(minimum) || minimum.some((v) => !allowed.includes(v))) {
          return profileIssue(profile, `${dimId} minimum_acceptable must list values of ${allowed.join('|')}`, dimId);
        }
        break;
      }
      case 'boolean':
        if (typeof ideal !== 'boolean' || typeof minimum !== 'boolean') {
          return profileIssue(profile, `${dimId} expects boolean ideal and minimum`, dimId);
        }
        break;
    }
  }

  for (const dimId of profile.red_lines) {
    if (!(dimId in profile.interests)) {
      return profileIssue(profile, `red line ${dimId} is not among the party's interests`, dimId);
    }
  }

  if (!isFiniteNumber(profile.batna_utility) || profile.batna_utility < 0 || profile.batna_utility > 1) {
    return profileIssue(profile, 'batna_utility must be in [0, 1]');
  }
  if (!isFiniteNumber(profile.risk_tolerance) || profile.risk_tolerance < 0 || profile.risk_tolerance > 1) {
    return profileIssue(profile, 'risk_tolerance must be in [0, 1]');
  }
  return null;
}

export function validateProposal(proposal: Proposal, space: IssueSpace): ValidationIssue | null {
  if (!proposal.id) {
    return { error: EngineError.INVALID_PROPOSAL, detail: 'proposal id is required' };
  }
  if (!Number.isInteger(proposal.round_number) || proposal.round_number < 0) {
    return { error: EngineError.INVALID_PROPOSAL, detail: `round_number=${proposal.round_number}` };
  }
  for (const [dimId, value] of Object.entries(proposal.values)) {
    const dim = findDimension(space, dimId);
    if (!dim) {
      return {
        error: EngineError.DIMENSION_MISMATCH,
        detail: `proposal ${proposal.id} references unknown dimension ${dimId}`,
        dimension: dimId,
      };
    }
    const issue = validateValue(dim, value);
    if (issue) return issue;
  }
  return null;
}

/** Validate the whole scenario context. Returns first error found, or null. */
export function validateScenario(ctx: ScenarioContext): ValidationIssue | null {
  const spaceErr = validateIssueSpace(ctx.issue_space);
  if (spaceErr) return spaceErr;

  const ids = new Set<string>();
  for (const profile of ctx.party_profiles) {
    if (ids.has(profile.party_id)) {
      return { error: EngineError.INVALID_PARTY_PROFILE, detail: `duplicate party ${profile.party_id}`, party_id: profile.party_id };
    }
    ids.add(profile.party_id);
    const issue = validatePartyProfile(profile, ctx.issue_space);
    if (issue) return issue;
  }
  return null;
}

/** Throwing variants used by the public entry points. */
export function assertScenario(ctx: ScenarioContext): void {
  const issue = validateScenario(ctx);
  if (issue) raise(issue);
}

export function assertProposal(proposal: Proposal, space: IssueSpace): void {
  const issue = validateProposal(proposal, space);
  if (issue) raise(issue);
}
