import {
  METRICS,
  METRIC_COLUMN,
  type Column,
  type PlayerRecord,
  type RawField,
  type RawRow,
} from "@/lib/domain/types";
import type { ColumnMap } from "./aliases";

export function toRawField(value: unknown): RawField {
  if (value === null || value === undefined) return { kind: "missing" };
  if (typeof value === "number") return { kind: "number", value };
  const s = String(value);
  if (s.trim() === "") return { kind: "missing" };
  return { kind: "text", value: s };
}

export function toRawRows(
  records: readonly Record<string, unknown>[],
  { columns }: ColumnMap
): RawRow[] {
  return records.map((rec, idx) => {
    const fields: Partial<Record<Column, RawField>> = {};
    for (const [source, column] of columns) {
      fields[column] = toRawField(rec[source]);
    }
    return { row: idx + 1, fields };
  });
}

// Feeds an already-clean record back through validation
export function recordToRawRow(record: PlayerRecord): RawRow {
  const fields: Partial<Record<Column, RawField>> = { Name: toRawField(record.name) };
  for (const m of METRICS) fields[METRIC_COLUMN[m]] = toRawField(record[m]);
  return { row: record.row, fields };
}
