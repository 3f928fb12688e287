import { promises as fs } from "fs";
import path from "path";
import { SourceNotFoundError, UnsupportedSourceError } from "@/lib/errors";
import { parseCsvText, parseJsonText, type SourceTable } from "./parse";

export type LoadedSource = SourceTable & {
  path: string;
  format: "csv" | "json";
  parseErrors: { row: number; message: string }[];
};

export async function loadSource(filePath: string): Promise<LoadedSource> {
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".csv" && ext !== ".json") throw new UnsupportedSourceError(filePath);

  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (e) {
    if (isErrnoException(e) && (e.code === "ENOENT" || e.code === "EISDIR")) {
      throw new SourceNotFoundError(filePath);
    }
    throw e;
  }
  // strip a UTF-8 BOM left by spreadsheet exports
  if (text.charCodeAt(0) === 0xfeff) text = text.slice(1);

  if (ext === ".json") return { ...parseJsonText(text), path: filePath, format: "json", parseErrors: [] };
  const rep = parseCsvText(text);
  return {
    header: rep.header,
    records: rep.records,
    path: filePath,
    format: "csv",
    parseErrors: rep.errors,
  };
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
