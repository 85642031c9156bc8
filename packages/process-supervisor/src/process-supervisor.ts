import { spawn, type ChildProcess } from "node:child_process";
import { once } from "node:events";
import { constants } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Readable } from "node:stream";
import {
  ProcessLaunchError,
  toError,
  type LoggerPort,
  type OutputStream,
  type ProcessHandle,
  type ProcessRunnerPort,
  type ProcessSpec,
  type StageEvent,
  type StageState,
} from "@murmur/core";
import { EventQueue } from "./event-queue.js";
import { LineSplitter } from "./line-splitter.js";
import { parseProgress } from "./progress.js";

export { EventQueue } from "./event-queue.js";
export { LineSplitter, type SplitLine } from "./line-splitter.js";
export { parseProgress } from "./progress.js";

export const DEFAULT_GRACE_PERIOD_MS = 2000;

export interface ProcessSupervisorOptions {
  /**
   * Time between SIGTERM and SIGKILL when cancelling
   * @default 2000
   */
  gracePeriodMs?: number;
  /** @default console */
  logger?: LoggerPort;
}

export interface ProcessSupervisor extends ProcessRunnerPort {
  /** Cancels every live process; resolves once all of them have exited */
  shutdown(): Promise<void>;
  activeCount(): number;
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

// POSIX children get their own process group so cancel reaches grandchildren
const USE_PROCESS_GROUP = process.platform !== "win32";

class SupervisedProcess implements ProcessHandle {
  private readonly queue = new EventQueue<StageEvent>();
  private readonly closed: Promise<ExitStatus>;
  private status: StageState = "running";
  private exited = false;
  private cancelRequested = false;
  private cancelling?: Promise<void>;
  private consumed = false;

  constructor(
    private readonly child: ChildProcess,
    private readonly spec: ProcessSpec,
    private readonly gracePeriodMs: number,
    private readonly logger: LoggerPort,
  ) {
    this.attach(child.stdout, "stdout");
    this.attach(child.stderr, "stderr");

    child.on("error", (error) => {
      this.logger.error(`Process ${child.pid ?? "?"} (${spec.kind}) error:`, error);
    });

    this.closed = new Promise((resolve) => {
      child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
        this.exited = true;
        this.finish({ code, signal });
        resolve({ code, signal });
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get state(): StageState {
    return this.status;
  }

  /** Resolves when the process has exited and its streams are closed */
  whenClosed(): Promise<ExitStatus> {
    return this.closed;
  }

  private attach(
    stream: Readable | null,
    name: OutputStream,
  ): void {
    if (!stream) return;
    const splitter = new LineSplitter();
    stream.setEncoding("utf8");
    stream.on("data", (chunk: string) => {
      for (const line of splitter.push(chunk)) {
        this.pushLine(line.text, name, line.transient);
      }
    });
    stream.on("end", () => {
      for (const line of splitter.flush()) {
        this.pushLine(line.text, name, line.transient);
      }
    });
  }

  private pushLine(text: string, stream: OutputStream, transient: boolean) {
    this.queue.push({ type: "output", text, stream, transient });
    const percent = parseProgress(text);
    if (percent !== undefined) {
      this.queue.push({ type: "progress", percent });
    }
  }

  private finish({ code, signal }: ExitStatus): void {
    const state = this.cancelRequested
      ? "cancelled"
      : code === 0
        ? "succeeded"
        : "failed";
    this.status = state;
    this.logger.debug(
      `Process ${this.child.pid ?? "?"} (${this.spec.kind}) ${state}`,
      { exitCode: code, signal },
    );
    this.queue.push({ type: "terminal", state, exitCode: code, signal });
    this.queue.end();
  }

  async *events(): AsyncGenerator<StageEvent> {
    if (this.consumed) {
      throw new Error("Process events can only be consumed once");
    }
    this.consumed = true;

    let sawTerminal = false;
    try {
      for await (const event of this.queue) {
        if (event.type === "terminal") sawTerminal = true;
        yield event;
      }
    } finally {
      // The consumer stopped listening; the process must not outlive it
      if (!sawTerminal) {
        await this.cancel();
      }
    }
  }

  async cancel(): Promise<void> {
    if (this.exited) return;
    this.cancelRequested = true;
    this.cancelling ??= this.terminate();
    await this.cancelling;
  }

  private async terminate(): Promise<void> {
    this.logger.info(
      `Stopping ${this.spec.kind} process ${this.child.pid ?? "?"}`,
    );
    this.sendSignal("SIGTERM");

    let timer: NodeJS.Timeout | undefined;
    const exitedInTime = await Promise.race([
      this.closed.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), this.gracePeriodMs);
      }),
    ]);
    clearTimeout(timer);

    if (!exitedInTime) {
      this.logger.warn(
        `Process ${this.child.pid ?? "?"} ignored SIGTERM for ${this.gracePeriodMs}ms, killing it`,
      );
      this.sendSignal("SIGKILL");
      await this.closed;
    }
  }

  private sendSignal(signal: NodeJS.Signals): void {
    const { pid } = this.child;
    if (pid === undefined) return;
    try {
      if (USE_PROCESS_GROUP) {
        process.kill(-pid, signal);
      } else {
        this.child.kill(signal);
      }
    } catch (error) {
      // Already gone
      if (!isErrnoException(error) || error.code !== "ESRCH") {
        throw error;
      }
    }
  }
}

const assertLaunchable = async (spec: ProcessSpec): Promise<void> => {
  // Bare command names are looked up on PATH by spawn itself
  if (path.isAbsolute(spec.executable) || spec.executable.includes(path.sep)) {
    try {
      await fs.access(spec.executable, constants.X_OK);
    } catch (error) {
      throw new ProcessLaunchError(
        spec.executable,
        "executable not found or not executable",
        toError(error),
      );
    }
  }

  const cwdStats = await fs.stat(spec.cwd).catch(() => undefined);
  if (!cwdStats?.isDirectory()) {
    throw new ProcessLaunchError(
      spec.executable,
      `working directory ${spec.cwd} does not exist`,
    );
  }
};

export const createProcessSupervisor = (
  options: ProcessSupervisorOptions = {},
): ProcessSupervisor => {
  const gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
  const logger = options.logger ?? console;
  const live = new Set<SupervisedProcess>();

  const start = async (spec: ProcessSpec): Promise<ProcessHandle> => {
    await assertLaunchable(spec);

    const child = spawn(spec.executable, [...spec.args], {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["ignore", "pipe", "pipe"],
      detached: USE_PROCESS_GROUP,
      windowsHide: true,
    });
    const handle = new SupervisedProcess(child, spec, gracePeriodMs, logger);

    try {
      await once(child, "spawn");
    } catch (error) {
      const cause = toError(error);
      throw new ProcessLaunchError(spec.executable, cause.message, cause);
    }

    live.add(handle);
    handle
      .whenClosed()
      .then(() => {
        live.delete(handle);
      })
      .catch((error: unknown) => {
        logger.error("Failed to release process handle:", error);
      });

    logger.debug(`Started ${spec.kind} process ${child.pid ?? "?"}`);
    return handle;
  };

  const shutdown = async (): Promise<void> => {
    await Promise.all([...live].map((handle) => handle.cancel()));
  };

  return {
    start,
    shutdown,
    activeCount: () => live.size,
  };
};
