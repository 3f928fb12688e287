import {
  mapMetrics,
  type BatchSummary,
  type Metric,
  type MetricStats,
  type PlayerRecord,
  type RankedRecord,
} from "@/lib/domain/types";
import { averageScore } from "@/lib/score/formula";

export function metricLeader(records: readonly PlayerRecord[], metric: Metric): PlayerRecord | undefined {
  let best: PlayerRecord | undefined;
  for (const r of records) {
    if (!best || r[metric] > best[metric]) best = r;
  }
  return best;
}

// Sample standard deviation, 0 for a single value
export function describeValues(values: readonly number[]): MetricStats {
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    sum += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  const mean = sum / values.length;
  let sq = 0;
  for (const v of values) sq += (v - mean) ** 2;
  const std = values.length > 1 ? Math.sqrt(sq / (values.length - 1)) : 0;
  return { mean, std, min, max };
}

/**
 * Batch aggregates over a ranked list. Never mutates the records.
 *
 * Leader tie-breaks follow input order (the `row` field), not rank order.
 * The average is the same one the ranker tiered against.
 */
export function summarize(ranked: readonly RankedRecord[]): BatchSummary {
  const first = ranked[0];
  const last = ranked[ranked.length - 1];
  if (!first || !last) return { status: "no_data", count: 0 };

  const byInput = [...ranked].sort((a, b) => a.row - b.row);

  return {
    status: "ok",
    count: ranked.length,
    average_score: averageScore(byInput),
    max_score: first.score,
    min_score: last.score,
    top_performer: first.name,
    per_metric_leader: mapMetrics((m) => metricLeader(byInput, m)?.name ?? ""),
    metric_stats: mapMetrics((m) => describeValues(byInput.map((r) => r[m]))),
    score_stats: describeValues(byInput.map((r) => r.score)),
  };
}
