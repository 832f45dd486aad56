import type { BargainingConfig } from '../config.js';
import { DEFAULT_BARGAINING_CONFIG } from '../config.js';
import { EngineFailure } from '../errors.js';
import { evaluateProposal } from '../evaluate.js';
import type { Proposal, ScenarioContext } from '../types.js';
import type { ProposalRankingResult, RankedProposal, RejectedProposal } from './types.js';

/**
 * Evaluate N candidate proposals in one scenario, rank by overall probability descending.
 * Candidates that fail validation are skipped and reported, not thrown.
 *
 * Recommendation follows the best candidate's status thresholds:
 * best ≥ strong → PROPOSE_BEST, best ≥ marginal → REFINE, else RETHINK.
 */
export function rankProposals(
  ctx: ScenarioContext,
  candidates: readonly Proposal[],
  config: BargainingConfig = DEFAULT_BARGAINING_CONFIG,
): ProposalRankingResult {
  const results: RankedProposal[] = [];
  const rejected: RejectedProposal[] = [];

  for (const proposal of candidates) {
    try {
      const evaluation = evaluateProposal(ctx, proposal, config);
      results.push({
        proposal_id: proposal.id,
        rank: 0, // assigned after sort
        overall_probability: evaluation.overall_probability,
        evaluation,
      });
    } catch (err) {
      if (!(err instanceof EngineFailure)) throw err;
      rejected.push({ proposal_id: proposal.id, error: err.code, detail: err.detail });
    }
  }

  results.sort((a, b) => b.overall_probability - a.overall_probability);
  for (let i = 0; i < results.length; i++) {
    results[i].rank = i + 1;
  }

  const best = results[0]?.overall_probability ?? 0;
  let recommendedAction: ProposalRankingResult['recommended_action'];
  if (results.length > 0 && best >= config.status_thresholds.strong) {
    recommendedAction = 'PROPOSE_BEST';
  } else if (results.length > 0 && best >= config.status_thresholds.marginal) {
    recommendedAction = 'REFINE';
  } else {
    recommendedAction = 'RETHINK';
  }

  return {
    rankings: results,
    evaluated: results.length,
    errors: rejected.length,
    rejected,
    recommended_action: recommendedAction,
  };
}
