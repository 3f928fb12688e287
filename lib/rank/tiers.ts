import type { Tier } from "@/lib/domain/types";

// Inclusive lower bounds as multiples of the batch average, checked top-down
export const TIER_THRESHOLDS: ReadonlyArray<{ tier: Exclude<Tier, "Developing">; factor: number }> = [
  { tier: "Elite", factor: 1.25 },
  { tier: "Strong", factor: 1.05 },
  { tier: "Average", factor: 0.85 },
];

export function classifyTier(score: number, average: number): Tier {
  // every bound collapses to 0; a score equal to the average stays Average
  if (average === 0) return score > 0 ? "Elite" : score === 0 ? "Average" : "Developing";
  for (const { tier, factor } of TIER_THRESHOLDS) {
    if (score >= factor * average) return tier;
  }
  return "Developing";
}
