import Papa from "papaparse";
import type { RankedRecord } from "@/lib/domain/types";
import { SCORE_DECIMALS } from "@/lib/config";

export const EXPORT_COLUMNS = [
  "Rank",
  "Name",
  "Points",
  "Assists",
  "Rebounds",
  "Steals",
  "Turnovers",
  "Performance Score",
] as const;

export type ExportOptions = {
  includeTier?: boolean;
};

/**
 * Formats a score for display or export. Stored scores are never rounded.
 */
export function formatScore(score: number, decimals = SCORE_DECIMALS): string {
  const s = score.toFixed(decimals);
  // avoid "-0.0" for tiny negatives
  return Number(s) === 0 ? (0).toFixed(decimals) : s;
}

/**
 * Serializes ranked records to CSV, in rank order
 */
export function exportRankedToCSV(ranked: readonly RankedRecord[], options: ExportOptions = {}): string {
  const fields: string[] = [...EXPORT_COLUMNS];
  if (options.includeTier) fields.push("Tier");

  const data = [...ranked]
    .sort((a, b) => a.rank - b.rank)
    .map((r) => {
      const row: (string | number)[] = [
        r.rank,
        r.name,
        r.points,
        r.assists,
        r.rebounds,
        r.steals,
        r.turnovers,
        formatScore(r.score),
      ];
      if (options.includeTier) row.push(r.tier);
      return row;
    });

  return Papa.unparse({ fields, data }, { newline: "\n" });
}
