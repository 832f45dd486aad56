import type { ProposalEvaluation } from '../evaluate.js';
import type { EngineError } from '../types.js';

export interface RankedProposal {
  proposal_id: string;
  rank: number;
  overall_probability: number;
  evaluation: ProposalEvaluation;
}

export interface RejectedProposal {
  proposal_id: string;
  error: EngineError;
  detail?: string;
}

export interface ProposalRankingResult {
  rankings: RankedProposal[];
  evaluated: number;
  errors: number;
  rejected: RejectedProposal[];
  recommended_action: 'PROPOSE_BEST' | 'REFINE' | 'RETHINK';
}
