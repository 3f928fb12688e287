// Domain models for the scoring pipeline

export const COLUMNS = ["Name", "Points", "Assists", "Rebounds", "Steals", "Turnovers"] as const;
export type Column = (typeof COLUMNS)[number];

export const METRICS = ["points", "assists", "rebounds", "steals", "turnovers"] as const;
export type Metric = (typeof METRICS)[number];

export const METRIC_COLUMN: Record<Metric, Exclude<Column, "Name">> = {
  points: "Points",
  assists: "Assists",
  rebounds: "Rebounds",
  steals: "Steals",
  turnovers: "Turnovers",
};

export function mapMetrics<T>(fn: (metric: Metric) => T): Record<Metric, T> {
  return {
    points: fn("points"),
    assists: fn("assists"),
    rebounds: fn("rebounds"),
    steals: fn("steals"),
    turnovers: fn("turnovers"),
  };
}

// Loose input cell, tagged once at the ingest boundary
export type RawField =
  | { kind: "missing" }
  | { kind: "number"; value: number }
  | { kind: "text"; value: string };

export type RawRow = {
  row: number; // 1-based data row in the source
  fields: Partial<Record<Column, RawField>>;
};

export type PlayerRecord = {
  row: number;
  name: string;
  points: number;
  assists: number;
  rebounds: number;
  steals: number;
  turnovers: number;
};

export type ScoredRecord = PlayerRecord & { score: number };

export const TIERS = ["Elite", "Strong", "Average", "Developing"] as const;
export type Tier = (typeof TIERS)[number];

export type RankedRecord = ScoredRecord & {
  rank: number; // 1 = highest score
  tier: Tier;
};

export type MetricStats = { mean: number; std: number; min: number; max: number };

export type BatchSummary =
  | {
      status: "ok";
      count: number;
      average_score: number;
      max_score: number;
      min_score: number;
      top_performer: string;
      per_metric_leader: Record<Metric, string>;
      metric_stats: Record<Metric, MetricStats>;
      score_stats: MetricStats;
    }
  | { status: "no_data"; count: 0 };

export type ValidationWarning = {
  row_identifier: number;
  player_name: string;
  field: Exclude<Column, "Name">;
  original_value: string | number | null;
  reason: WarningReason;
};

export type WarningReason = "missing/invalid, defaulted to 0" | "negative, clipped to 0";

export type RowSkipped = {
  row_identifier: number;
  reason: "row skipped: missing name";
};

export type PipelineEvent =
  | { type: "started"; rows: number }
  | { type: "warning"; warning: ValidationWarning }
  | { type: "row_skipped"; skipped: RowSkipped }
  | { type: "done"; records: number; warnings: number; skipped: number };

// Per-run state; one per batch, never shared
export type RunContext = {
  warnings: ValidationWarning[];
  skipped: RowSkipped[];
  onEvent?: (event: PipelineEvent) => void;
};

export function createRunContext(onEvent?: (event: PipelineEvent) => void): RunContext {
  return { warnings: [], skipped: [], onEvent };
}
