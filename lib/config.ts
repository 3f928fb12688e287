import { z } from "zod";
import { ConfigError } from "@/lib/errors";
import { issuesToMessage } from "@/lib/ingest/schemas";

export const DEFAULT_INPUT_FILE = "players.csv";
export const DEFAULT_OUTPUT_FILE = "ranked_players.csv";
export const SCORE_DECIMALS = 1; // export + display only

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

const optPath = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.string().min(1))
  .optional();

const EnvSchema = z.object({
  PERF_INPUT: optPath,
  PERF_OUTPUT: optPath,
  PERF_LOG_LEVEL: z
    .string()
    .transform((s) => s.trim().toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .optional(),
});

export type AnalyzerConfig = {
  inputPath: string;
  outputPath: string;
  logLevel: LogLevel;
};

// Precedence: overrides (CLI flags) > environment > defaults
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<AnalyzerConfig> = {}
): AnalyzerConfig {
  const parsed = EnvSchema.safeParse({
    PERF_INPUT: env.PERF_INPUT,
    PERF_OUTPUT: env.PERF_OUTPUT,
    PERF_LOG_LEVEL: env.PERF_LOG_LEVEL,
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${issuesToMessage(parsed.error)}`);
  }
  const e = parsed.data;
  return {
    inputPath: overrides.inputPath ?? e.PERF_INPUT ?? DEFAULT_INPUT_FILE,
    outputPath: overrides.outputPath ?? e.PERF_OUTPUT ?? DEFAULT_OUTPUT_FILE,
    logLevel: overrides.logLevel ?? e.PERF_LOG_LEVEL ?? DEFAULT_LOG_LEVEL,
  };
}
