import type { DimensionValue, IssueSpace, Proposal } from '@shoal/engine-core';
import type { AgreementTerms, TermKey } from './types.js';

/** Dimension ids recognised as agreement terms when a dimension declares no `term`. */
const TERM_ALIASES: Partial<Record<string, TermKey>> = {
  standoff_nm: 'standoff_nm',
  standoff: 'standoff_nm',
  escort_limit: 'escort_limit',
  escorts: 'escort_limit',
  escort_count: 'escort_limit',
  notice_hours: 'notice_hours',
  pre_notification_hours: 'notice_hours',
  hotline: 'hotline',
  cues: 'cues',
  fisheries_corridor: 'fisheries_corridor',
  ais_transparency: 'ais_transparency',
};

const OFF_VALUES = new Set(['none', 'off', 'no', 'false']);

export const NO_TERMS: AgreementTerms = {
  standoff_nm: null,
  escort_limit: null,
  notice_hours: null,
  hotline: false,
  cues: false,
  fisheries_corridor: false,
  ais_transparency: false,
};

function asEnabled(value: DimensionValue): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value > 0;
  return !OFF_VALUES.has(value.toLowerCase());
}

/**
 * Read the simulator-relevant terms out of a proposal.
 * Dimensions bind to a term through `term`, or through their id. A standoff or
 * notice period of 0 means the agreement sets none; an escort limit of 0 forbids escorts.
 */
export function readAgreementTerms(proposal: Proposal, space: IssueSpace): AgreementTerms {
  const terms: AgreementTerms = { ...NO_TERMS };

  for (const dim of space.dimensions) {
    const value = proposal.values[dim.id];
    if (value === undefined) continue;
    const key = TERM_ALIASES[dim.term ?? dim.id];
    if (!key) continue;

    switch (key) {
      case 'standoff_nm':
      case 'notice_hours':
        if (typeof value === 'number' && value > 0) terms[key] = value;
        break;
      case 'escort_limit':
        if (typeof value === 'number' && value >= 0) terms.escort_limit = value;
        break;
      case 'hotline':
      case 'cues':
      case 'fisheries_corridor':
      case 'ais_transparency':
        terms[key] = asEnabled(value);
        break;
    }
  }
  return terms;
}
