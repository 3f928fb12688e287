import Papa from "papaparse";
import { SchemaError } from "@/lib/errors";

export type SourceTable = {
  header: string[];
  records: Record<string, unknown>[];
};

export type ParseReport = SourceTable & {
  errors: { row: number; message: string }[];
  rowCount: number;
};

// CSV text → header + raw records. Cells stay strings; typing happens in validation.
export function parseCsvText(text: string): ParseReport {
  if (text.trim() === "") {
    throw new SchemaError("No input available: the source is empty.");
  }

  const result = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true, // blank lines only; rows of empty cells reach validation
  });

  const header = result.meta.fields ?? [];
  const errors = result.errors.map((e) => ({
    row: typeof e.row === "number" ? e.row + 1 : -1,
    message: e.message,
  }));

  return {
    header,
    records: result.data,
    errors,
    rowCount: result.data.length,
  };
}

// JSON array of objects; header is the union of keys in first-seen order.
// A non-object entry keeps its position as an empty record, so validation
// reports it as a skipped row.
export function tableFromObjects(objects: readonly unknown[]): SourceTable {
  const header: string[] = [];
  const seen = new Set<string>();
  const records: Record<string, unknown>[] = [];
  for (const obj of objects) {
    if (!isPlainRecord(obj)) {
      records.push({});
      continue;
    }
    for (const key of Object.keys(obj)) {
      if (seen.has(key)) continue;
      seen.add(key);
      header.push(key);
    }
    records.push(obj);
  }
  return { header, records };
}

export function parseJsonText(text: string): SourceTable {
  if (text.trim() === "") {
    throw new SchemaError("No input available: the source is empty.");
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new SchemaError(`Invalid JSON input: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!Array.isArray(data)) {
    throw new SchemaError("JSON input must be an array of player objects.");
  }
  return tableFromObjects(data);
}

function isPlainRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
