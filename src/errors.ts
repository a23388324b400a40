import type { ApplyReport } from "./apply.js";

export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Config: 2,
  Scan: 3,
  Comparison: 4,
  Apply: 5,
  PartialFailure: 6,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export class SyncError extends Error {
  public readonly code: ExitCode;

  constructor(message: string, code: ExitCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad roots, unknown algorithm, invalid option values. Raised before any work. */
export class ConfigError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ExitCodes.Config, options);
  }
}

export class ScanError extends SyncError {
  public readonly root: string;

  constructor(root: string, cause: unknown) {
    super(`failed to scan '${root}': ${errorMessage(cause)}`, ExitCodes.Scan, {
      cause,
    });
    this.root = root;
  }
}

export class ComparisonError extends SyncError {
  public readonly relativePath: string;

  constructor(relativePath: string, cause: unknown) {
    super(
      `failed to compare '${relativePath}': ${errorMessage(cause)}`,
      ExitCodes.Comparison,
      { cause },
    );
    this.relativePath = relativePath;
  }
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

export function errorMessage(error: unknown): string {
  if (isErrnoException(error) && typeof error.code === "string") {
    return error.message.startsWith(`${error.code}:`)
      ? error.message
      : `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Raised only under fail-fast; carries whatever was applied before the failure. */
export class ApplyError extends SyncError {
  public readonly report: ApplyReport;

  constructor(relativePath: string, cause: unknown, report: ApplyReport) {
    super(
      `failed to apply '${relativePath}': ${errorMessage(cause)}`,
      ExitCodes.Apply,
      { cause },
    );
    this.report = report;
  }
}
