import type { MurmurErrorCode } from "./errors.js";
import type { TranscriptionConfig } from "./options.js";

export type StageKind = "download" | "transcribe";

/** Everything the supervisor may run; `unpack` extracts tool archives */
export type ProcessKind = StageKind | "unpack";

export type StageState =
  | "not-started"
  | "running"
  | "succeeded"
  | "failed"
  | "cancelled";

export type StageTerminalState = Extract<
  StageState,
  "succeeded" | "failed" | "cancelled"
>;

export interface ToolDependency {
  name: string;
  version: string;
  /** Hex SHA-256 of the downloaded file; skipped when absent */
  sha256?: string;
  url: string;
  installDir: string;
  /** Executable path relative to `installDir` */
  executable: string;
  /** @default "none" */
  archive?: "none" | "7z";
  /** Files (relative to `installDir`) that must exist and be non-empty */
  requiredFiles?: string[];
  /** The install directory also carries an ffmpeg build usable by the downloader */
  bundlesFfmpeg?: boolean;
  /**
   * GitHub "latest release" API endpoint. With `version: "latest"` the
   * provisioner pins the dependency to the current release tag, so a newer
   * release replaces the install.
   */
  releaseApi?: string;
  /**
   * Installs older than this are refreshed; the old install is kept when
   * the refresh fails
   */
  maxAgeMs?: number;
}

export interface Toolchain {
  readonly engine: string;
  readonly downloader?: string;
  readonly ffmpegDir?: string;
}

export interface ProcessSpec {
  readonly kind: ProcessKind;
  readonly executable: string;
  readonly args: readonly string[];
  readonly cwd: string;
  /** Added on top of the parent environment */
  readonly env: Readonly<Record<string, string>>;
  /** Quoted rendering for display only; never handed to a shell */
  readonly commandLine: string;
}

export interface StageSpec extends ProcessSpec {
  readonly kind: StageKind;
  /** A failed non-fatal stage is logged and the pipeline moves on */
  readonly fatal: boolean;
}

export type OutputStream = "stdout" | "stderr";

export type StageEvent =
  | {
      type: "output";
      text: string;
      stream: OutputStream;
      /** The line ended with a bare carriage return and will be overwritten */
      transient: boolean;
    }
  | { type: "progress"; percent: number | null }
  | {
      type: "terminal";
      state: StageTerminalState;
      exitCode: number | null;
      signal: string | null;
    };

export interface ProcessHandle {
  readonly pid: number | undefined;
  readonly state: StageState;
  /** Single-consumer stream; ends after the `terminal` event */
  events(): AsyncIterable<StageEvent>;
  /** Resolves once the process is gone */
  cancel(): Promise<void>;
}

export interface ProcessRunnerPort {
  /** Rejects with `ProcessLaunchError` when the process cannot start */
  start(spec: ProcessSpec): Promise<ProcessHandle>;
}

export interface InstallProgress {
  /** Bytes downloaded so far */
  bytes: number;
  /** Size announced by the server, when it sent one */
  total?: number;
}

export interface EnsureOptions {
  signal?: AbortSignal;
  /** Called while the dependency downloads; never called for a reused install */
  onProgress?: (progress: InstallProgress) => void;
}

export interface ProvisionerPort {
  /** Resolves to the absolute path of the dependency's executable */
  ensure(dependency: ToolDependency, options?: EnsureOptions): Promise<string>;
}

export interface StageRecord {
  kind: StageKind;
  state: StageState;
  exitCode: number | null;
  startedAt?: Date;
  finishedAt?: Date;
}

export type JobResult =
  | { status: "pending" }
  | { status: "succeeded"; outputs: string[] }
  | { status: "failed"; reason: string; code: MurmurErrorCode }
  | { status: "cancelled" };

export type JobStatus = "running" | Exclude<JobResult["status"], "pending">;

export interface JobRun {
  id: string;
  config: TranscriptionConfig;
  stages: StageRecord[];
  currentStage: number;
  log: string[];
  result: JobResult;
  createdAt: Date;
  updatedAt: Date;
}

export interface JobRunHandle {
  readonly id: string;
  /** Copy of the run's current state */
  snapshot(): JobRun;
  /** Resolves once the run has reached a terminal state */
  cancel(): Promise<void>;
  readonly done: Promise<JobResult>;
}

export type JobEvent =
  | { type: "run-started"; runId: string; stages: StageKind[] }
  | {
      type: "stage-started";
      runId: string;
      stage: StageKind;
      index: number;
      commandLine: string;
    }
  | {
      type: "output";
      runId: string;
      stage: StageKind;
      text: string;
      stream: OutputStream;
      transient: boolean;
    }
  | { type: "progress"; runId: string; stage: StageKind; percent: number | null }
  | {
      type: "provisioning";
      runId: string;
      dependency: string;
      bytes: number;
      total: number | null;
      percent: number | null;
    }
  | {
      type: "stage-finished";
      runId: string;
      stage: StageKind;
      state: StageState;
      exitCode: number | null;
    }
  | { type: "run-finished"; runId: string; result: JobResult };

export interface EventSinkPort {
  emit(event: JobEvent): void;
}

export interface JobRunRecord {
  id: string;
  status: JobStatus;
  input: string;
  outputDir: string;
  stages: StageRecord[];
  outputs: string[];
  error?: string;
  errorCode?: MurmurErrorCode;
  createdAt: Date;
  updatedAt: Date;
}

export interface JobHistoryPort {
  createRun(
    run: Omit<JobRunRecord, "createdAt" | "updatedAt">,
  ): Promise<JobRunRecord>;
  updateRun(
    id: string,
    update: Partial<Omit<JobRunRecord, "id" | "createdAt" | "updatedAt">>,
  ): Promise<JobRunRecord>;
  getRun(id: string): Promise<JobRunRecord | null>;
  listRuns(limit?: number): Promise<JobRunRecord[]>;
  close(): Promise<void>;
}

export interface LoggerPort {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}
