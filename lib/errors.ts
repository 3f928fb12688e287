export type PipelineErrorCode =
  | "schema"
  | "source_not_found"
  | "unsupported_source"
  | "config"
  | "internal";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

export class SchemaError extends PipelineError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super("schema", message);
    this.name = "SchemaError";
    this.missing = missing;
  }
}

export class SourceNotFoundError extends PipelineError {
  readonly path: string;

  constructor(path: string) {
    super("source_not_found", `Input file '${path}' was not found.`);
    this.name = "SourceNotFoundError";
    this.path = path;
  }
}

export class UnsupportedSourceError extends PipelineError {
  constructor(path: string) {
    super("unsupported_source", `Unsupported input '${path}': expected a .csv or .json file.`);
    this.name = "UnsupportedSourceError";
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

export function toPipelineError(e: unknown): PipelineError {
  if (e instanceof PipelineError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new PipelineError("internal", message, { cause: e });
}
