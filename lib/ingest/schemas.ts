import { z } from "zod";
import type { RawField } from "@/lib/domain/types";

// Helpers
const toStr = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.string().min(1));

const toNum = z
  .union([z.number(), z.string()])
  .transform((v) => (typeof v === "number" ? v : Number(v.trim())))
  .pipe(z.number().finite());

export const PlayerNameSchema = z.union([z.string(), z.number().finite().transform(String)]).pipe(toStr);

// Plain decimal only; Number() would also take "0x10", "0b11" or "Infinity"
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Strings must be non-blank: Number("") is 0, which would hide a missing cell
export const StatValueSchema = z
  .union([z.number(), toStr.pipe(z.string().regex(DECIMAL))])
  .pipe(toNum);

export function fieldValue(field: RawField | undefined): string | number | null {
  if (!field || field.kind === "missing") return null;
  return field.value;
}

export function issuesToMessage(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "value"}: ${i.message}`).join("; ");
}
