import type { RankedRecord, ScoredRecord } from "@/lib/domain/types";
import { averageScore } from "@/lib/score/formula";
import { classifyTier } from "./tiers";

/**
 * Orders records by score (highest first) and assigns rank and tier.
 *
 * Equal scores keep their input order. Tiers are relative to the batch
 * average, which is computed over the whole input before any tier is set.
 */
export function rankRecords(scored: readonly ScoredRecord[]): RankedRecord[] {
  if (scored.length === 0) return [];

  // pass 1: batch average, before any tier is set
  const average = averageScore(scored);

  // pass 2: stable order, then rank + tier
  return scored
    .map((rec, idx) => ({ rec, idx }))
    .sort((a, b) => b.rec.score - a.rec.score || a.idx - b.idx)
    .map(({ rec }, i) =>
      Object.freeze({ ...rec, rank: i + 1, tier: classifyTier(rec.score, average) })
    );
}
