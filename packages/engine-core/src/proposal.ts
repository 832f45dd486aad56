import type { DimensionValue, Proposal } from './types.js';

export interface ProposalInput {
  id: string;
  values: Record<string, DimensionValue>;
  round_number?: number;
  proposer?: string;
}

/** Build a frozen Proposal. The values map is copied so later edits to the input cannot leak in. */
export function createProposal(input: ProposalInput): Proposal {
  return Object.freeze({
    id: input.id,
    values: Object.freeze({ ...input.values }),
    round_number: input.round_number ?? 0,
    proposer: input.proposer ?? 'mediator',
  });
}
