import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { listFinishedMedia, moveFile, publishFiles } from "./artifacts.js";
import { compile, validateConfig } from "./compiler.js";
import {
  CancelledError,
  DependencyUnavailableError,
  InvalidConfigurationError,
  JobAlreadyRunningError,
  MurmurError,
  StageFailedError,
  toError,
} from "./errors.js";
import { isRemoteInput, type TranscriptionConfig } from "./options.js";
import type {
  EventSinkPort,
  JobEvent,
  JobHistoryPort,
  JobResult,
  JobRun,
  JobRunHandle,
  JobRunRecord,
  LoggerPort,
  ProcessHandle,
  ProcessRunnerPort,
  ProvisionerPort,
  StageEvent,
  StageKind,
  StageSpec,
  ToolDependency,
  Toolchain,
} from "./types.js";

export interface JobPipelineDependencies {
  provisioner: ProvisionerPort;
  processRunner: ProcessRunnerPort;
  dependencies: {
    engine: ToolDependency;
    /** Needed only for URL inputs */
    downloader?: ToolDependency;
  };
  history?: JobHistoryPort;
  /** @default console */
  logger?: LoggerPort;
  /**
   * Parent directory of the per-run scratch directories
   * @default os.tmpdir()
   */
  workRoot?: string;
  /**
   * Lines of process output kept on a run; older lines are dropped
   * @default 10000
   */
  maxLogLines?: number;
}

export interface JobPipeline {
  /**
   * Starts a run. Throws `JobAlreadyRunningError` while another run is active
   * and `InvalidConfigurationError` before anything is touched.
   */
  submit(config: TranscriptionConfig, sink?: EventSinkPort): JobRunHandle;
  getActiveRun(): JobRunHandle | undefined;
  /**
   * Snapshot of the active or most recent run. Earlier runs are not kept in
   * memory; read them from the `JobHistoryPort` instead.
   */
  getRun(id: string): JobRun | null;
  waitForRun(id: string): Promise<void>;
}

interface RunState {
  run: JobRun;
  controller: AbortController;
  sink?: EventSinkPort;
  activeProcess?: ProcessHandle;
  lastLineTransient: boolean;
  handle?: JobRunHandle;
}

const DEFAULT_MAX_LOG_LINES = 10000;

const TRANSCRIPTS_DIR = "transcripts";

const snapshotRun = (run: JobRun): JobRun => ({
  ...run,
  stages: run.stages.map((stage) => ({ ...stage })),
  log: [...run.log],
  result:
    run.result.status === "succeeded"
      ? { ...run.result, outputs: [...run.result.outputs] }
      : { ...run.result },
});

const toFailure = (error: unknown): JobResult => {
  if (error instanceof MurmurError) {
    return { status: "failed", reason: error.message, code: error.code };
  }
  return {
    status: "failed",
    reason: toError(error).message,
    code: "INTERNAL_ERROR",
  };
};

export const createJobPipeline = (deps: JobPipelineDependencies): JobPipeline => {
  const logger = deps.logger ?? console;
  const workRoot = deps.workRoot ?? os.tmpdir();
  const maxLogLines = deps.maxLogLines ?? DEFAULT_MAX_LOG_LINES;

  let active: RunState | undefined;
  let latest: RunState | undefined;
  // Keep track of runs that have not settled yet
  const pendingRuns = new Map<string, Promise<JobResult>>();

  const emit = (state: RunState, event: JobEvent): void => {
    if (!state.sink) return;
    try {
      state.sink.emit(event);
    } catch (error) {
      logger.error(`Event sink failed for run ${state.run.id}:`, error);
    }
  };

  const touch = (state: RunState): void => {
    state.run.updatedAt = new Date();
  };

  const appendLog = (state: RunState, text: string, transient: boolean) => {
    const { log } = state.run;
    // A carriage-return line replaces the previous carriage-return line
    if (state.lastLineTransient && log.length > 0) {
      log[log.length - 1] = text;
    } else {
      log.push(text);
    }
    state.lastLineTransient = transient;
    if (log.length > maxLogLines) {
      log.splice(0, log.length - maxLogLines);
    }
  };

  const recordHistory = async (
    state: RunState,
    update: Partial<Omit<JobRunRecord, "id" | "createdAt" | "updatedAt">>,
  ): Promise<void> => {
    if (!deps.history) return;
    try {
      await deps.history.updateRun(state.run.id, {
        stages: state.run.stages.map((stage) => ({ ...stage })),
        ...update,
      });
    } catch (error) {
      logger.error(`Failed to record history for run ${state.run.id}:`, error);
    }
  };

  const throwIfCancelled = (state: RunState): void => {
    if (state.controller.signal.aborted) {
      throw new CancelledError();
    }
  };

  const provision = async (state: RunState): Promise<Toolchain> => {
    const { signal } = state.controller;
    const { engine, downloader } = deps.dependencies;
    const remote = isRemoteInput(state.run.config.input);

    if (remote && !downloader) {
      throw new DependencyUnavailableError(
        "downloader",
        "URL inputs need a download helper, none is configured",
      );
    }

    const ensure = async (dependency: ToolDependency): Promise<string> => {
      try {
        return await deps.provisioner.ensure(dependency, {
          signal,
          onProgress: ({ bytes, total }) => {
            emit(state, {
              type: "provisioning",
              runId: state.run.id,
              dependency: dependency.name,
              bytes,
              total: total ?? null,
              percent: total
                ? Math.min(100, Math.floor((bytes / total) * 100))
                : null,
            });
          },
        });
      } catch (error) {
        if (signal.aborted) throw new CancelledError();
        if (error instanceof MurmurError) throw error;
        throw new DependencyUnavailableError(
          dependency.name,
          toError(error).message,
          toError(error),
        );
      }
    };

    logger.info(`Provisioning tools for run ${state.run.id}`);
    const [enginePath, downloaderPath] = await Promise.all([
      ensure(engine),
      remote && downloader ? ensure(downloader) : Promise.resolve(undefined),
    ]);

    return {
      engine: enginePath,
      downloader: downloaderPath,
      ffmpegDir: engine.bundlesFfmpeg ? path.dirname(enginePath) : undefined,
    };
  };

  const runStage = async (
    state: RunState,
    index: number,
    spec: StageSpec,
  ): Promise<void> => {
    const { run } = state;
    const record = run.stages[index];
    run.currentStage = index;
    record.state = "running";
    record.startedAt = new Date();
    touch(state);

    logger.info(`Starting ${spec.kind} stage for run ${run.id}`);
    appendLog(state, `$ ${spec.commandLine}`, false);
    emit(state, {
      type: "stage-started",
      runId: run.id,
      stage: spec.kind,
      index,
      commandLine: spec.commandLine,
    });
    await recordHistory(state, {});

    const finish = (
      stageState: "succeeded" | "failed" | "cancelled",
      exitCode: number | null,
    ) => {
      record.state = stageState;
      record.exitCode = exitCode;
      record.finishedAt = new Date();
      touch(state);
      emit(state, {
        type: "stage-finished",
        runId: run.id,
        stage: spec.kind,
        state: stageState,
        exitCode,
      });
    };

    let handle: ProcessHandle;
    try {
      handle = await deps.processRunner.start(spec);
    } catch (error) {
      finish("failed", null);
      throw error;
    }

    state.activeProcess = handle;
    // cancel() may have landed while the process was starting
    if (state.controller.signal.aborted) {
      await handle.cancel();
    }

    let terminal: Extract<StageEvent, { type: "terminal" }> | undefined;
    try {
      for await (const event of handle.events()) {
        switch (event.type) {
          case "output":
            appendLog(state, event.text, event.transient);
            emit(state, { ...event, runId: run.id, stage: spec.kind });
            break;
          case "progress":
            emit(state, { ...event, runId: run.id, stage: spec.kind });
            break;
          case "terminal":
            terminal = event;
            break;
        }
      }
    } finally {
      state.activeProcess = undefined;
      state.lastLineTransient = false;
    }

    if (!terminal) {
      finish("failed", null);
      throw new StageFailedError(
        spec.kind,
        null,
        null,
        `Stage ${spec.kind} ended without an exit status`,
      );
    }

    finish(terminal.state, terminal.exitCode);

    if (terminal.state === "cancelled") {
      throw new CancelledError();
    }
    if (terminal.state === "failed") {
      const error = new StageFailedError(
        spec.kind,
        terminal.exitCode,
        terminal.signal,
      );
      if (spec.fatal) throw error;
      logger.warn(`Continuing run ${run.id} after non-fatal failure:`, error);
    }
  };

  const executeRun = async (state: RunState): Promise<JobResult> => {
    const { run } = state;
    const { config } = run;
    let workDir: string | undefined;

    try {
      if (deps.history) {
        await deps.history
          .createRun({
            id: run.id,
            status: "running",
            input: config.input,
            outputDir: config.outputDir,
            stages: run.stages.map((stage) => ({ ...stage })),
            outputs: [],
          })
          .catch((error: unknown) => {
            logger.error(`Failed to record run ${run.id}:`, error);
          });
      }

      const toolchain = await provision(state);
      throwIfCancelled(state);

      try {
        await fs.mkdir(config.outputDir, { recursive: true });
      } catch (error) {
        throw new InvalidConfigurationError([
          {
            path: "outputDir",
            message: `cannot be created: ${toError(error).message}`,
          },
        ]);
      }

      workDir = await fs.mkdtemp(path.join(workRoot, "murmur-"));
      logger.debug(`Using work directory ${workDir} for run ${run.id}`);

      let mediaConfig: TranscriptionConfig = config;
      const outputs: string[] = [];

      for (const [index, record] of run.stages.entries()) {
        throwIfCancelled(state);

        if (record.kind === "download") {
          await runStage(
            state,
            index,
            compile(config, "download", { toolchain, workDir }),
          );

          const [media] = await listFinishedMedia(workDir);
          if (!media) {
            throw new StageFailedError(
              "download",
              0,
              null,
              "Download finished but no media file was produced",
            );
          }

          let mediaPath = media;
          if (config.keepDownloadedMedia) {
            mediaPath = path.join(config.outputDir, path.basename(media));
            await moveFile(media, mediaPath);
            outputs.push(mediaPath);
          }
          mediaConfig = { ...config, input: mediaPath };
          continue;
        }

        // The engine writes into a private directory; finished transcripts
        // are renamed into the output directory only after it exits cleanly
        const stagingDir = path.join(workDir, TRANSCRIPTS_DIR);
        await fs.mkdir(stagingDir, { recursive: true });

        await runStage(
          state,
          index,
          compile({ ...mediaConfig, outputDir: stagingDir }, "transcribe", {
            toolchain,
            workDir,
          }),
        );

        const transcripts = await publishFiles(stagingDir, config.outputDir);
        if (transcripts.length === 0) {
          throw new StageFailedError(
            "transcribe",
            0,
            null,
            "Transcription finished but no transcript was written",
          );
        }
        outputs.push(...transcripts);
      }

      return { status: "succeeded", outputs };
    } catch (error) {
      if (error instanceof CancelledError || state.controller.signal.aborted) {
        logger.info(`Run ${run.id} was cancelled`);
        return { status: "cancelled" };
      }
      logger.error(`Run ${run.id} failed:`, error);
      return toFailure(error);
    } finally {
      if (workDir) {
        logger.debug(`Cleaning up work directory for run ${run.id}`);
        await fs
          .rm(workDir, { recursive: true, force: true })
          .catch((error: unknown) => {
            logger.warn(`Failed to remove ${workDir}:`, error);
          });
      }
    }
  };

  const settle = async (
    state: RunState,
    result: JobResult,
  ): Promise<JobResult> => {
    state.run.result = result;
    touch(state);
    // Free the slot before anyone hears about the result
    if (active === state) {
      active = undefined;
    }

    await recordHistory(state, {
      status: result.status === "pending" ? "running" : result.status,
      outputs: result.status === "succeeded" ? result.outputs : [],
      error: result.status === "failed" ? result.reason : undefined,
      errorCode: result.status === "failed" ? result.code : undefined,
    });

    emit(state, { type: "run-finished", runId: state.run.id, result });
    return result;
  };

  const createHandle = (state: RunState, done: Promise<JobResult>) => {
    const handle: JobRunHandle = {
      id: state.run.id,
      snapshot: () => snapshotRun(state.run),
      cancel: async () => {
        if (!state.controller.signal.aborted && active === state) {
          logger.info(`Cancelling run ${state.run.id}`);
          state.controller.abort();
          await state.activeProcess?.cancel();
        }
        await done;
      },
      done,
    };
    return handle;
  };

  const submit = (
    config: TranscriptionConfig,
    sink?: EventSinkPort,
  ): JobRunHandle => {
    if (active) {
      throw new JobAlreadyRunningError(active.run.id);
    }
    validateConfig(config);

    const stageKinds: StageKind[] = isRemoteInput(config.input)
      ? ["download", "transcribe"]
      : ["transcribe"];
    const now = new Date();

    const state: RunState = {
      run: {
        id: randomUUID(),
        config,
        stages: stageKinds.map((kind) => ({
          kind,
          state: "not-started",
          exitCode: null,
        })),
        currentStage: 0,
        log: [],
        result: { status: "pending" },
        createdAt: now,
        updatedAt: now,
      },
      controller: new AbortController(),
      sink,
      lastLineTransient: false,
    };

    active = state;
    latest = state;
    logger.info(`Submitted run ${state.run.id} for ${config.input}`);
    emit(state, { type: "run-started", runId: state.run.id, stages: stageKinds });

    const done = executeRun(state)
      .then((result) => settle(state, result))
      .finally(() => {
        pendingRuns.delete(state.run.id);
      });
    pendingRuns.set(state.run.id, done);

    state.handle = createHandle(state, done);
    return state.handle;
  };

  const getActiveRun = (): JobRunHandle | undefined => active?.handle;

  const getRun = (id: string): JobRun | null =>
    latest && latest.run.id === id ? snapshotRun(latest.run) : null;

  const waitForRun = async (id: string): Promise<void> => {
    const pending = pendingRuns.get(id);
    if (pending) {
      await pending;
    }
  };

  return {
    submit,
    getActiveRun,
    getRun,
    waitForRun,
  };
};
