import {
  METRIC_COLUMN,
  type Metric,
  type PlayerRecord,
  type RawRow,
  type RowSkipped,
  type RunContext,
  type ValidationWarning,
  type WarningReason,
} from "@/lib/domain/types";
import { PlayerNameSchema, StatValueSchema, fieldValue } from "./schemas";

export type ValidatedRow =
  | { kind: "record"; record: PlayerRecord }
  | { kind: "skipped"; skipped: RowSkipped };

export function* validateRows(
  rows: Iterable<RawRow>,
  ctx: RunContext
): Generator<ValidatedRow, void, undefined> {
  for (const raw of rows) {
    yield validateRow(raw, ctx);
  }
}

export function validateRow(raw: RawRow, ctx: RunContext): ValidatedRow {
  const name = PlayerNameSchema.safeParse(fieldValue(raw.fields.Name));
  if (!name.success) {
    const skipped: RowSkipped = { row_identifier: raw.row, reason: "row skipped: missing name" };
    ctx.skipped.push(skipped);
    ctx.onEvent?.({ type: "row_skipped", skipped });
    return { kind: "skipped", skipped };
  }

  const playerName = name.data;
  const clean = (metric: Metric): number => {
    const field = METRIC_COLUMN[metric];
    const original = fieldValue(raw.fields[field]);
    const parsed = StatValueSchema.safeParse(original);
    let reason: WarningReason;
    if (!parsed.success) {
      reason = "missing/invalid, defaulted to 0";
    } else if (parsed.data < 0) {
      reason = "negative, clipped to 0";
    } else {
      return parsed.data === 0 ? 0 : parsed.data; // folds -0
    }
    const warning: ValidationWarning = {
      row_identifier: raw.row,
      player_name: playerName,
      field,
      original_value: original,
      reason,
    };
    ctx.warnings.push(warning);
    ctx.onEvent?.({ type: "warning", warning });
    return 0;
  };

  const record: PlayerRecord = {
    row: raw.row,
    name: playerName,
    points: clean("points"),
    assists: clean("assists"),
    rebounds: clean("rebounds"),
    steals: clean("steals"),
    turnovers: clean("turnovers"),
  };
  return { kind: "record", record: Object.freeze(record) };
}
