import type { PartyProfile, UtilityScore } from '../types.js';

/** Bargaining-theory view of one proposal across all parties. */
export interface AgreementAnalysis {
  /** utility − batna per party. */
  surplus: Record<string, number>;
  parties_below_batna: string[];
  /** Every party is at or above its BATNA. */
  zopa_exists: boolean;
  /** [lowest BATNA, highest utility] across parties. */
  zopa_range: [number, number];
  /** Π of positive surpluses; 0 when no party gains over walking away. */
  nash_product: number;
}

export function analyzeAgreement(scores: readonly UtilityScore[], profiles: readonly PartyProfile[]): AgreementAnalysis {
  const batna = new Map(profiles.map((p) => [p.party_id, p.batna_utility]));
  const surplus: Record<string, number> = {};
  const below: string[] = [];
  let nash = 1;
  let positive = 0;
  let minBatna = Number.POSITIVE_INFINITY;
  let maxUtility = Number.NEGATIVE_INFINITY;

  for (const s of scores) {
    const b = batna.get(s.party_id) ?? 0;
    const gain = s.score - b;
    surplus[s.party_id] = gain;
    if (gain < 0) below.push(s.party_id);
    if (gain > 0) {
      nash *= gain;
      positive++;
    }
    minBatna = Math.min(minBatna, b);
    maxUtility = Math.max(maxUtility, s.score);
  }

  return {
    surplus,
    parties_below_batna: below,
    zopa_exists: scores.length > 0 && below.length === 0,
    zopa_range: scores.length > 0 ? [minBatna, maxUtility] : [0, 0],
    nash_product: positive > 0 ? nash : 0,
  };
}
