import { describe, it, expect } from "vitest";
import { createRunContext, type PipelineEvent, type RawRow } from "@/lib/domain/types";
import { resolveColumns } from "@/lib/ingest/aliases";
import { recordToRawRow, toRawRows } from "@/lib/ingest/rows";
import { validateRow, validateRows } from "@/lib/ingest/validate";

const HEADER = ["Name", "Points", "Assists", "Rebounds", "Steals", "Turnovers"];

function rows(records: Record<string, unknown>[]): RawRow[] {
  return toRawRows(records, resolveColumns(HEADER));
}

const clean = { Name: "Ali Hassan", Points: 22, Assists: 7, Rebounds: 10, Steals: 3, Turnovers: 2 };

describe("record validator", () => {
  it("passes clean numeric values through unchanged", () => {
    const ctx = createRunContext();
    const [v] = [...validateRows(rows([clean]), ctx)];
    expect(v).toEqual({
      kind: "record",
      record: { row: 1, name: "Ali Hassan", points: 22, assists: 7, rebounds: 10, steals: 3, turnovers: 2 },
    });
    expect(ctx.warnings).toEqual([]);
    expect(ctx.skipped).toEqual([]);
  });

  it("parses numeric strings and trims the name", () => {
    const ctx = createRunContext();
    const v = validateRow(
      rows([{ Name: "  Sara Malik ", Points: " 30 ", Assists: "2.5", Rebounds: "0", Steals: "1e1", Turnovers: "4" }])[0],
      ctx
    );
    expect(v).toEqual({
      kind: "record",
      record: { row: 1, name: "Sara Malik", points: 30, assists: 2.5, rebounds: 0, steals: 10, turnovers: 4 },
    });
    expect(ctx.warnings).toHaveLength(0);
  });

  it("clips a negative value to 0 with exactly one warning for that field", () => {
    const ctx = createRunContext();
    const v = validateRow(rows([{ ...clean, Points: -5 }])[0], ctx);
    expect(v.kind === "record" && v.record.points).toBe(0);
    expect(ctx.warnings).toEqual([
      {
        row_identifier: 1,
        player_name: "Ali Hassan",
        field: "Points",
        original_value: -5,
        reason: "negative, clipped to 0",
      },
    ]);
  });

  it("defaults missing and non-numeric values to 0 with a warning each", () => {
    const ctx = createRunContext();
    const v = validateRow(rows([{ ...clean, Assists: "abc", Rebounds: "", Steals: undefined, Turnovers: "Infinity" }])[0], ctx);
    expect(v).toEqual({
      kind: "record",
      record: { row: 1, name: "Ali Hassan", points: 22, assists: 0, rebounds: 0, steals: 0, turnovers: 0 },
    });
    expect(ctx.warnings.map((w) => [w.field, w.original_value, w.reason])).toEqual([
      ["Assists", "abc", "missing/invalid, defaulted to 0"],
      ["Rebounds", null, "missing/invalid, defaulted to 0"],
      ["Steals", null, "missing/invalid, defaulted to 0"],
      ["Turnovers", "Infinity", "missing/invalid, defaulted to 0"],
    ]);
  });

  it("rejects hex, binary and octal literals as invalid", () => {
    const ctx = createRunContext();
    const v = validateRow(rows([{ ...clean, Points: "0x10", Assists: "0b11", Rebounds: "0o7" }])[0], ctx);
    expect(v.kind === "record" && [v.record.points, v.record.assists, v.record.rebounds]).toEqual([0, 0, 0]);
    expect(ctx.warnings.map((w) => [w.field, w.original_value, w.reason])).toEqual([
      ["Points", "0x10", "missing/invalid, defaulted to 0"],
      ["Assists", "0b11", "missing/invalid, defaulted to 0"],
      ["Rebounds", "0o7", "missing/invalid, defaulted to 0"],
    ]);
  });

  it("accepts signed, fractional and exponent decimals", () => {
    const ctx = createRunContext();
    const v = validateRow(rows([{ ...clean, Points: "+4", Assists: ".5", Rebounds: "3.", Steals: "2E0" }])[0], ctx);
    expect(v.kind === "record" && [v.record.points, v.record.assists, v.record.rebounds, v.record.steals]).toEqual([
      4, 0.5, 3, 2,
    ]);
    expect(ctx.warnings).toHaveLength(0);
  });

  it("skips a row with a blank name and records why", () => {
    const events: PipelineEvent[] = [];
    const ctx = createRunContext((e) => events.push(e));
    const v = validateRow(rows([{ ...clean, Name: "   ", Points: -1 }])[0], ctx);
    expect(v).toEqual({ kind: "skipped", skipped: { row_identifier: 1, reason: "row skipped: missing name" } });
    expect(ctx.warnings).toEqual([]);
    expect(ctx.skipped).toHaveLength(1);
    expect(events).toEqual([
      { type: "row_skipped", skipped: { row_identifier: 1, reason: "row skipped: missing name" } },
    ]);
  });

  it("drops only the nameless row out of five", () => {
    const batch = [1, 2, 3, 4, 5].map((i) => ({ ...clean, Name: i === 3 ? "" : `Player ${i}` }));
    const out = [...validateRows(rows(batch), createRunContext())];
    const records = out.flatMap((v) => (v.kind === "record" ? [v.record] : []));
    expect(records).toHaveLength(4);
    expect(records.map((r) => r.row)).toEqual([1, 2, 4, 5]);
  });

  it("is idempotent on already-clean records", () => {
    const first = validateRow(rows([clean])[0], createRunContext());
    if (first.kind !== "record") throw new Error("expected a record");
    const ctx = createRunContext();
    const again = validateRow(recordToRawRow(first.record), ctx);
    expect(again).toEqual(first);
    expect(ctx.warnings).toHaveLength(0);
  });

  it("yields lazily and cannot be restarted", () => {
    const ctx = createRunContext();
    const gen = validateRows(rows([{ ...clean, Points: -1 }, { ...clean, Points: -2 }]), ctx);
    expect(ctx.warnings).toHaveLength(0);
    gen.next();
    expect(ctx.warnings).toHaveLength(1);
    expect([...gen]).toHaveLength(1);
    expect([...gen]).toHaveLength(0);
  });

  it("returns frozen records", () => {
    const v = validateRow(rows([clean])[0], createRunContext());
    expect(v.kind === "record" && Object.isFrozen(v.record)).toBe(true);
  });
});
