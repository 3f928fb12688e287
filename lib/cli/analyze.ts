import { promises as fs } from "fs";
import { parseArgs } from "util";
import { loadConfig, type AnalyzerConfig } from "@/lib/config";
import { exportRankedToCSV } from "@/lib/csv/exportRanked";
import { toPipelineError } from "@/lib/errors";
import { loadSource } from "@/lib/ingest/source";
import { createLogger } from "@/lib/log";
import { runBatch } from "@/lib/pipeline/run";
import { formatLeaderboard, formatSummary } from "@/lib/report/leaderboard";

export const USAGE = "Usage: analyze [input.csv|input.json] [--out ranked.csv] [--tier] [--quiet]";

export const EXIT_OK = 0;
export const EXIT_DATA_ERROR = 1;
export const EXIT_USAGE = 2;

type CliArgs = { overrides: Partial<AnalyzerConfig>; includeTier: boolean };

function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: "string", short: "o" },
      tier: { type: "boolean", default: false },
      quiet: { type: "boolean", short: "q", default: false },
    },
  });
  if (positionals.length > 1) throw new Error(`Expected at most one input file, got ${positionals.length}`);
  const overrides: Partial<AnalyzerConfig> = {};
  if (positionals[0]) overrides.inputPath = positionals[0];
  if (values.out) overrides.outputPath = values.out;
  if (values.quiet) overrides.logLevel = "warn";
  return { overrides, includeTier: values.tier === true };
}

/**
 * Reads a stats file, ranks it, writes the ranked CSV and prints the
 * leaderboard. Resolves to the process exit code.
 */
export async function runCli(
  argv: string[],
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (e) {
    console.error(`[analyze] ${e instanceof Error ? e.message : String(e)}`);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  let config: AnalyzerConfig;
  try {
    config = loadConfig(env, args.overrides);
  } catch (e) {
    console.error(`[analyze] ${toPipelineError(e).message}`);
    return EXIT_USAGE;
  }
  const log = createLogger("analyze", config.logLevel);
  const ingestLog = createLogger("ingest", config.logLevel);

  try {
    log.info(`Reading data from '${config.inputPath}'`);
    const source = await loadSource(config.inputPath);
    for (const pe of source.parseErrors) ingestLog.debug(`row ${pe.row}: ${pe.message}`);

    const outcome = runBatch(source, {
      onEvent: (ev) => {
        if (ev.type === "row_skipped") {
          ingestLog.info(`row ${ev.skipped.row_identifier}: ${ev.skipped.reason}`);
        } else if (ev.type === "warning") {
          const w = ev.warning;
          ingestLog.warn(
            `row ${w.row_identifier} '${w.player_name}' ${w.field}=${JSON.stringify(w.original_value)}: ${w.reason}`
          );
        }
      },
    });
    if (!outcome.ok) throw outcome.error;

    const { ranked, summary, unknownColumns } = outcome.result;
    if (unknownColumns.length > 0) ingestLog.debug(`ignored columns: ${unknownColumns.join(", ")}`);
    log.info(`Loaded ${ranked.length} player(s) from ${outcome.result.rowCount} row(s)`);

    const csv = exportRankedToCSV(ranked, { includeTier: args.includeTier });
    await fs.writeFile(config.outputPath, csv + "\n", "utf8");

    if (config.logLevel === "debug" || config.logLevel === "info") {
      for (const line of [...formatLeaderboard(ranked), "", ...formatSummary(summary)]) console.log(line);
    }
    log.info(`Ranked results exported to '${config.outputPath}'`);
    return EXIT_OK;
  } catch (e) {
    const err = toPipelineError(e);
    const label = err.code === "source_not_found" ? "FILE ERROR" : "DATA ERROR";
    log.error(`${label} (${err.code}): ${err.message}`);
    return EXIT_DATA_ERROR;
  }
}
