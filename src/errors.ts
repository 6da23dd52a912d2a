/**
 * Failure classes for one run.
 * ConfigError, SourceError and WriteError end the run; SummarizeError only skips an article.
 */

export class ConfigError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.missing = missing;
  }
}

export class SourceError extends Error {
  readonly status?: number;
  readonly code?: string;

  constructor(message: string, opts: { status?: number; code?: string; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "SourceError";
    this.status = opts.status;
    this.code = opts.code;
  }
}

// "malformed" = the model answered but the payload was not a usable JSON result
export type SummarizeFailure = "http" | "network" | "timeout" | "empty" | "malformed";

export class SummarizeError extends Error {
  readonly reason: SummarizeFailure;
  readonly status?: number;

  constructor(
    reason: SummarizeFailure,
    message: string,
    opts: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: opts.cause });
    this.name = "SummarizeError";
    this.reason = reason;
    this.status = opts.status;
  }
}

export class WriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write ${path}: ${describeError(cause)}`, { cause });
    this.name = "WriteError";
    this.path = path;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}
