import { COLUMNS, type Column } from "@/lib/domain/types";
import { SchemaError } from "@/lib/errors";

// Header aliases, keyed by lowercased header text
export const HEADER_ALIASES: Record<string, Column> = {
  name: "Name",
  player: "Name",
  player_name: "Name",
  "player name": "Name",
  points: "Points",
  pts: "Points",
  assists: "Assists",
  ast: "Assists",
  rebounds: "Rebounds",
  reb: "Rebounds",
  steals: "Steals",
  stl: "Steals",
  turnovers: "Turnovers",
  tov: "Turnovers",
  to: "Turnovers",
};

export type ColumnMap = {
  // source header → canonical column; first match wins on duplicates
  columns: Map<string, Column>;
  unknownColumns: string[];
};

export function normalizeHeaderKey(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, " ");
}

export function resolveColumns(header: readonly string[] | null | undefined): ColumnMap {
  if (!header || header.every((h) => h.trim() === "")) {
    throw new SchemaError("No input available: the source has no header row.", [...COLUMNS]);
  }

  const columns = new Map<string, Column>();
  const seen = new Set<Column>();
  const unknownColumns: string[] = [];
  for (const h of header) {
    const key = normalizeHeaderKey(h);
    const target = Object.hasOwn(HEADER_ALIASES, key) ? HEADER_ALIASES[key] : undefined;
    if (!target) {
      if (h.trim() !== "") unknownColumns.push(h.trim());
      continue;
    }
    if (seen.has(target)) continue;
    seen.add(target);
    columns.set(h, target);
  }

  const missing = COLUMNS.filter((c) => !seen.has(c));
  if (missing.length > 0) {
    throw new SchemaError(`Input is missing required columns: ${missing.join(", ")}`, missing);
  }
  return { columns, unknownColumns };
}
