import { METRICS, type Metric, type PlayerRecord, type ScoredRecord } from "@/lib/domain/types";

// Turnovers carry a negative weight
export const WEIGHTS: Readonly<Record<Metric, number>> = Object.freeze({
  points: 1.0,
  assists: 1.5,
  rebounds: 1.2,
  steals: 2.0,
  turnovers: -1.0,
});

/**
 * Weighted performance score. Not rounded; display code formats it.
 */
export function scorePlayer(p: PlayerRecord): number {
  let s = 0;
  for (const m of METRICS) s += p[m] * WEIGHTS[m];
  return s;
}

export function scoreRecords(records: readonly PlayerRecord[]): ScoredRecord[] {
  return records.map((r) => Object.freeze({ ...r, score: scorePlayer(r) }));
}

/**
 * Batch average score. Sums each raw stat first and applies the weights
 * once, so stats that cancel out give an average of exactly 0.
 */
export function averageScore(records: readonly PlayerRecord[]): number {
  if (records.length === 0) return 0;
  let s = 0;
  for (const m of METRICS) {
    let total = 0;
    for (const r of records) total += r[m];
    s += total * WEIGHTS[m];
  }
  return s / records.length;
}
