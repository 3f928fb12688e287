import {
  createRunContext,
  type BatchSummary,
  type PipelineEvent,
  type PlayerRecord,
  type RankedRecord,
  type RowSkipped,
  type ValidationWarning,
} from "@/lib/domain/types";
import { toPipelineError, type PipelineError } from "@/lib/errors";
import { resolveColumns } from "@/lib/ingest/aliases";
import type { SourceTable } from "@/lib/ingest/parse";
import { toRawRows } from "@/lib/ingest/rows";
import { validateRows } from "@/lib/ingest/validate";
import { rankRecords } from "@/lib/rank/ranker";
import { scoreRecords } from "@/lib/score/formula";
import { summarize } from "@/lib/summary/aggregate";

export type RunOptions = {
  onEvent?: (event: PipelineEvent) => void;
};

export type BatchResult = {
  ranked: RankedRecord[];
  summary: BatchSummary;
  warnings: ValidationWarning[];
  skipped: RowSkipped[];
  rowCount: number;
  unknownColumns: string[];
};

export type RunOutcome = { ok: true; result: BatchResult } | { ok: false; error: PipelineError };

/**
 * Runs one batch: header check → validate → score → rank → summarize.
 *
 * A missing table or header is "no input available" and fails as a schema
 * error. Every failure comes back as a categorized PipelineError.
 */
export function runBatch(table: SourceTable | null | undefined, options: RunOptions = {}): RunOutcome {
  try {
    const columns = resolveColumns(table?.header);
    const rawRows = toRawRows(table?.records ?? [], columns);
    const ctx = createRunContext(options.onEvent);
    ctx.onEvent?.({ type: "started", rows: rawRows.length });

    const records: PlayerRecord[] = [];
    for (const v of validateRows(rawRows, ctx)) {
      if (v.kind === "record") records.push(v.record);
    }

    const ranked = rankRecords(scoreRecords(records));
    const summary = summarize(ranked);
    ctx.onEvent?.({
      type: "done",
      records: ranked.length,
      warnings: ctx.warnings.length,
      skipped: ctx.skipped.length,
    });

    return {
      ok: true,
      result: {
        ranked,
        summary,
        warnings: ctx.warnings,
        skipped: ctx.skipped,
        rowCount: rawRows.length,
        unknownColumns: columns.unknownColumns,
      },
    };
  } catch (e) {
    return { ok: false, error: toPipelineError(e) };
  }
}
