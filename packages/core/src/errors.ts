import type { StageKind } from "./types.js";

export type MurmurErrorCode =
  | "DEPENDENCY_UNAVAILABLE"
  | "INVALID_CONFIGURATION"
  | "PROCESS_LAUNCH_FAILED"
  | "STAGE_FAILED"
  | "JOB_ALREADY_RUNNING"
  | "CANCELLED"
  | "INTERNAL_ERROR";

export class MurmurError extends Error {
  constructor(
    message: string,
    public readonly code: MurmurErrorCode,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "MurmurError";
  }
}

export class DependencyUnavailableError extends MurmurError {
  constructor(
    public readonly dependency: string,
    reason: string,
    cause?: Error,
  ) {
    super(
      `Dependency "${dependency}" is unavailable: ${reason}`,
      "DEPENDENCY_UNAVAILABLE",
      cause,
    );
    this.name = "DependencyUnavailableError";
  }
}

export interface ConfigurationIssue {
  /** Dotted path of the offending field, e.g. `vad.threshold` */
  path: string;
  message: string;
}

export class InvalidConfigurationError extends MurmurError {
  constructor(public readonly issues: readonly ConfigurationIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join("; ")}`,
      "INVALID_CONFIGURATION",
    );
    this.name = "InvalidConfigurationError";
  }

  get fields(): string[] {
    return [...new Set(this.issues.map((issue) => issue.path))];
  }
}

export class ProcessLaunchError extends MurmurError {
  constructor(
    public readonly executable: string,
    reason: string,
    cause?: Error,
  ) {
    super(
      `Failed to start ${executable}: ${reason}`,
      "PROCESS_LAUNCH_FAILED",
      cause,
    );
    this.name = "ProcessLaunchError";
  }
}

export class StageFailedError extends MurmurError {
  constructor(
    public readonly stage: StageKind,
    public readonly exitCode: number | null,
    public readonly signal: string | null = null,
    detail?: string,
  ) {
    super(
      detail ??
        (signal
          ? `Stage ${stage} was terminated by ${signal}`
          : `Stage ${stage} exited with code ${exitCode}`),
      "STAGE_FAILED",
    );
    this.name = "StageFailedError";
  }
}

export class JobAlreadyRunningError extends MurmurError {
  constructor(public readonly activeRunId: string) {
    super(
      `Job ${activeRunId} is still running; cancel it before submitting another`,
      "JOB_ALREADY_RUNNING",
    );
    this.name = "JobAlreadyRunningError";
  }
}

export class CancelledError extends MurmurError {
  constructor(message: string = "Cancelled by user") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
