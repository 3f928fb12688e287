import {
  METRICS,
  METRIC_COLUMN,
  type BatchSummary,
  type MetricStats,
  type RankedRecord,
} from "@/lib/domain/types";
import { formatScore } from "@/lib/csv/exportRanked";

const RULE_WIDTH = 50;

export function formatLeaderboard(ranked: readonly RankedRecord[]): string[] {
  const lines = [
    "=".repeat(RULE_WIDTH),
    "PLAYER PERFORMANCE LEADERBOARD",
    "=".repeat(RULE_WIDTH),
    `${"Rank".padEnd(6)}${"Name".padEnd(22)}${"Score".padStart(10)}  Tier`,
    "-".repeat(RULE_WIDTH),
  ];
  for (const r of ranked) {
    lines.push(
      `${String(r.rank).padEnd(6)}${r.name.padEnd(22)}${formatScore(r.score).padStart(10)}  ${r.tier}`
    );
  }
  lines.push("=".repeat(RULE_WIDTH));
  return lines;
}

export function formatSummary(summary: BatchSummary): string[] {
  if (summary.status === "no_data") return ["No data: the batch has no valid player rows."];

  const lines = [
    `Players        : ${summary.count}`,
    `Top performer  : ${summary.top_performer} (${formatScore(summary.max_score)})`,
    `Average score  : ${formatScore(summary.average_score)}`,
    `Highest score  : ${formatScore(summary.max_score)}`,
    `Lowest score   : ${formatScore(summary.min_score)}`,
    "",
    `${"Metric".padEnd(12)}${"Leader".padEnd(22)}${["Mean", "Std", "Min", "Max"].map((h) => h.padStart(8)).join("")}`,
  ];
  for (const m of METRICS) {
    lines.push(
      `${METRIC_COLUMN[m].padEnd(12)}${summary.per_metric_leader[m].padEnd(22)}${statColumns(summary.metric_stats[m])}`
    );
  }
  lines.push(`${"Score".padEnd(12)}${summary.top_performer.padEnd(22)}${statColumns(summary.score_stats)}`);
  return lines;
}

function statColumns(st: MetricStats): string {
  return [st.mean, st.std, st.min, st.max].map((v) => formatScore(v).padStart(8)).join("");
}
