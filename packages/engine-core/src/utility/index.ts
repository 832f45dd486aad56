import type { BargainingConfig } from '../config.js';
import { DEFAULT_BARGAINING_CONFIG } from '../config.js';
import { raise } from '../errors.js';
import type { DimensionScore, IssueSpace, PartyProfile, Proposal, UtilityScore } from '../types.js';
import { clamp } from '../utils.js';
import { validateIssueSpace, validatePartyProfile, validateProposal } from '../validation.js';
import { continuousSatisfaction, discreteSatisfaction } from './falloff.js';
import type { Satisfaction } from './falloff.js';

/**
 * Score a proposal against one party.
 * U = Σ weight_d * satisfaction_d over dimensions present in both the proposal
 * and the party's interests. A red-lined dimension past its minimum forces U = 0
 * while red_line_veto is on.
 *
 * Pure function: no side effects, deterministic. Throws ValidationError before
 * scoring anything when the issue space, profile or proposal is invalid.
 */
export function scoreProposal(
  proposal: Proposal,
  profile: PartyProfile,
  space: IssueSpace,
  config: BargainingConfig = DEFAULT_BARGAINING_CONFIG,
): UtilityScore {
  const spaceErr = validateIssueSpace(space);
  if (spaceErr) raise(spaceErr);
  const profileErr = validatePartyProfile(profile, space);
  if (profileErr) raise(profileErr);
  const proposalErr = validateProposal(proposal, space);
  if (proposalErr) raise(proposalErr);

  return scoreValidated(proposal, profile, space, config);
}

/** Scoring without the validation pass. Callers must have validated all three inputs. */
export function scoreValidated(
  proposal: Proposal,
  profile: PartyProfile,
  space: IssueSpace,
  config: BargainingConfig,
): UtilityScore {
  const redLines = new Set(profile.red_lines);
  const breakdown: DimensionScore[] = [];
  const violations: string[] = [];
  let raw = 0;

  for (const dim of space.dimensions) {
    const weight = profile.interests[dim.id];
    const value = proposal.values[dim.id];
    if (weight === undefined || value === undefined) continue;

    const ideal = profile.ideal_value[dim.id];
    const minimum = profile.minimum_acceptable[dim.id];
    let result: Satisfaction;
    if (dim.kind === 'continuous' && typeof value === 'number' && typeof ideal === 'number' && typeof minimum === 'number') {
      result = continuousSatisfaction(value, ideal, minimum, config.falloff);
    } else {
      result = discreteSatisfaction(value, ideal, minimum, config.falloff);
    }

    const isRedLine = redLines.has(dim.id);
    if (isRedLine && result.beyond_minimum) {
      violations.push(dim.id);
    }

    const weighted = weight * result.satisfaction;
    raw += weighted;
    breakdown.push({
      dimension: dim.id,
      weight,
      value,
      satisfaction: result.satisfaction,
      weighted,
      beyond_minimum: result.beyond_minimum,
      red_line: isRedLine,
    });
  }

  const rawScore = clamp(raw, 0, 1);
  const vetoed = config.red_line_veto && violations.length > 0;
  const score = vetoed ? 0 : rawScore;

  return {
    party_id: profile.party_id,
    proposal_id: proposal.id,
    score,
    breakdown,
    raw_score: rawScore,
    vetoed,
    red_line_violations: violations,
    below_batna: score < profile.batna_utility,
    batna_margin: score - profile.batna_utility,
  };
}
