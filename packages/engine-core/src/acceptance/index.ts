import type { AcceptanceConfig, BargainingConfig, StatusThresholds } from '../config.js';
import { DEFAULT_BARGAINING_CONFIG } from '../config.js';
import type { AcceptanceResult, AcceptanceStatus, PartyProfile, UtilityScore } from '../types.js';
import { clamp } from '../utils.js';

/**
 * Map a risk-adjusted margin to a probability.
 * logistic: 1 / (1 + e^(-k·x))
 * linear:   0.5 + (k / 4)·x, the logistic's tangent at x = 0
 */
export function acceptanceCurve(x: number, acceptance: AcceptanceConfig): number {
  const k = acceptance.steepness;
  switch (acceptance.curve) {
    case 'logistic':
      return clamp(1 / (1 + Math.exp(-k * x)), 0, 1);
    case 'linear':
      return clamp(0.5 + (k / 4) * x, 0, 1);
  }
}

export function statusFor(probability: number, thresholds: StatusThresholds): AcceptanceStatus {
  if (probability >= thresholds.strong) return 'strong';
  if (probability >= thresholds.marginal) return 'marginal';
  return 'weak';
}

/**
 * Acceptance probability for one party.
 *
 * margin  = utility - batna_utility
 * shifted = margin - (1 - risk_tolerance) * risk_premium
 * p       = curve(shifted), clamped to [0, 1]
 *
 * A risk-averse party needs a larger margin above BATNA to reach the same p.
 * A vetoed score (red line crossed) is never accepted.
 */
export function evaluateAcceptance(
  utility: UtilityScore,
  profile: PartyProfile,
  config: BargainingConfig = DEFAULT_BARGAINING_CONFIG,
): AcceptanceResult {
  const margin = utility.score - profile.batna_utility;
  const shifted = margin - (1 - profile.risk_tolerance) * config.acceptance.risk_premium;
  const probability = utility.vetoed ? 0 : acceptanceCurve(shifted, config.acceptance);

  return {
    party_id: profile.party_id,
    proposal_id: utility.proposal_id,
    probability,
    status: statusFor(probability, config.status_thresholds),
    margin,
  };
}

/**
 * Overall agreement probability = Π p_i.
 * Parties are treated as deciding independently; this is a modeling
 * simplification, not a joint distribution. An empty list yields 1.
 */
export function aggregateAcceptance(results: readonly AcceptanceResult[]): number {
  let product = 1;
  for (const r of results) product *= r.probability;
  return clamp(product, 0, 1);
}
