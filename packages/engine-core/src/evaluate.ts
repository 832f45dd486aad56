import { aggregateAcceptance, evaluateAcceptance } from './acceptance/index.js';
import type { AgreementAnalysis } from './analysis/agreement.js';
import { analyzeAgreement } from './analysis/agreement.js';
import type { BargainingConfig } from './config.js';
import { DEFAULT_BARGAINING_CONFIG } from './config.js';
import type { AcceptanceResult, Proposal, ScenarioContext, UtilityScore } from './types.js';
import { scoreValidated } from './utility/index.js';
import { assertProposal, assertScenario } from './validation.js';

/** Per-party scores and acceptance for one proposal. */
export interface ProposalEvaluation {
  proposal_id: string;
  scores: UtilityScore[];
  acceptance: AcceptanceResult[];
  overall_probability: number;
  analysis: AgreementAnalysis;
}

/**
 * Evaluate a proposal against every party in the scenario.
 *
 * Pipeline:
 * 1. Validate issue space, every profile and the proposal (nothing is scored on failure)
 * 2. Score utility per party
 * 3. Convert each score to an acceptance probability
 * 4. Aggregate: overall = Π p_i
 * 5. Bargaining analysis (surplus, ZOPA, Nash product)
 */
export function evaluateProposal(
  ctx: ScenarioContext,
  proposal: Proposal,
  config: BargainingConfig = DEFAULT_BARGAINING_CONFIG,
): ProposalEvaluation {
  assertScenario(ctx);
  assertProposal(proposal, ctx.issue_space);

  const scores = ctx.party_profiles.map((p) => scoreValidated(proposal, p, ctx.issue_space, config));
  const acceptance = scores.map((s, i) => evaluateAcceptance(s, ctx.party_profiles[i], config));

  return {
    proposal_id: proposal.id,
    scores,
    acceptance,
    overall_probability: aggregateAcceptance(acceptance),
    analysis: analyzeAgreement(scores, ctx.party_profiles),
  };
}
