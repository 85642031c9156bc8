import { randomBytes } from "node:crypto";
import { constants } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import PQueue from "p-queue";
import retry from "retry";
import { z } from "zod";
import {
  CancelledError,
  DependencyUnavailableError,
  MurmurError,
  formatCommandLine,
  toError,
  type EnsureOptions,
  type InstallProgress,
  type LoggerPort,
  type ProcessHandle,
  type ProcessRunnerPort,
  type ProvisionerPort,
  type StageEvent,
  type ToolDependency,
} from "@murmur/core";
import {
  createFileDownloader,
  FileDownloaderError,
  type FileDownloader,
} from "./file-downloader.js";
import { fetchLatestRelease } from "./release.js";

export const INSTALL_MARKER = ".murmur-install.json";

/** Version of a dependency that tracks its newest release */
export const LATEST_VERSION = "latest";

// Progress without a known size is reported once per MiB
const PROGRESS_STEP_BYTES = 1024 * 1024;

export interface ProvisionerOptions {
  /** Runs 7-Zip when unpacking archives */
  processRunner: ProcessRunnerPort;
  /** @default createFileDownloader() */
  downloader?: FileDownloader;
  /**
   * 7-Zip executable; looked up on PATH (and the usual Windows install
   * locations) when omitted
   */
  sevenZipPath?: string;
  /**
   * Fall back to an executable of the same name on PATH when nothing is
   * installed locally
   * @default false
   */
  searchSystemPath?: boolean;
  /**
   * Dependencies installed at the same time
   * @default 2
   */
  concurrency?: number;
  /**
   * Download retries after the first attempt
   * @default 3
   */
  maxRetries?: number;
  /**
   * Delay before the first retry in milliseconds
   * @default 1000
   */
  retryDelay?: number;
  /**
   * Timeout in milliseconds for release lookups
   * @default 10000
   */
  releaseTimeout?: number;
  /** @default console */
  logger?: LoggerPort;
}

export interface Provisioner extends ProvisionerPort {
  /** Ensures every dependency; resolves to executable paths keyed by name */
  ensureAll(
    dependencies: readonly ToolDependency[],
    options?: { signal?: AbortSignal },
  ): Promise<Record<string, string>>;
}

const installMarkerSchema = z.object({
  name: z.string(),
  version: z.string(),
  sha256: z.string().optional(),
  executable: z.string(),
  installedAt: z.string(),
});

type InstallMarker = z.infer<typeof installMarkerSchema>;

/** Failure that another download attempt cannot fix */
class PermanentInstallError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "PermanentInstallError";
  }
}

const DEFAULT_OPTIONS = {
  searchSystemPath: false,
  concurrency: 2,
  maxRetries: 3,
  retryDelay: 1000,
  releaseTimeout: 10000,
};

type ProgressListener = (progress: InstallProgress) => void;

type InstallState =
  | { state: "missing" }
  | { state: "current"; path: string }
  | { state: "stale"; path: string; reason: string };

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

const isNonEmptyFile = async (filePath: string): Promise<boolean> => {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() && stats.size > 0;
  } catch {
    return false;
  }
};

const isExecutable = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath, constants.X_OK);
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
};

/** Resolves `name` against PATH the way a shell would. */
export const findOnPath = async (
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string | undefined> => {
  const dirs = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  const extensions =
    process.platform === "win32"
      ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")]
      : [""];

  for (const dir of dirs) {
    for (const extension of extensions) {
      const candidate = path.join(dir, name + extension);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }
  return undefined;
};

const requiredFilesOf = (dependency: ToolDependency): string[] => [
  dependency.executable,
  ...(dependency.requiredFiles ?? []),
];

/** Rejects as soon as `signal` aborts; the underlying work carries on. */
const abortable = <T>(work: Promise<T>, signal?: AbortSignal): Promise<T> => {
  if (!signal) return work;
  if (signal.aborted) return Promise.reject(new CancelledError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
};

export const createProvisioner = (options: ProvisionerOptions): Provisioner => {
  const config = { ...DEFAULT_OPTIONS, ...options };
  const logger = options.logger ?? console;
  const downloader = options.downloader ?? createFileDownloader();

  const queue = new PQueue({ concurrency: config.concurrency });
  queue.on("error", (error) => {
    logger.error("Provisioning queue error:", error);
  });

  // One install at a time per dependency name
  const inFlight = new Map<
    string,
    { pending: Promise<string>; listeners: Set<ProgressListener> }
  >();

  const readMarker = async (
    installDir: string,
  ): Promise<InstallMarker | undefined> => {
    try {
      const raw: unknown = JSON.parse(
        await fs.readFile(path.join(installDir, INSTALL_MARKER), "utf8"),
      );
      const result = installMarkerSchema.safeParse(raw);
      return result.success ? result.data : undefined;
    } catch {
      return undefined;
    }
  };

  /**
   * Pins a dependency that follows its newest release to the current tag.
   * Without a reachable release API the dependency stays unpinned.
   */
  const pinRelease = async (
    dependency: ToolDependency,
  ): Promise<ToolDependency> => {
    if (dependency.version !== LATEST_VERSION || !dependency.releaseApi) {
      return dependency;
    }
    try {
      const release = await fetchLatestRelease(dependency.releaseApi, {
        timeout: config.releaseTimeout,
      });
      const asset = path.posix.basename(new URL(dependency.url).pathname);
      return {
        ...dependency,
        version: release.tag,
        url: release.assets[asset] ?? dependency.url,
      };
    } catch (error) {
      logger.warn(
        `Cannot look up the latest ${dependency.name} release:`,
        toError(error).message,
      );
      return dependency;
    }
  };

  const inspectInstall = async (
    dependency: ToolDependency,
    floating: boolean,
  ): Promise<InstallState> => {
    const marker = await readMarker(dependency.installDir);
    if (!marker) return { state: "missing" };
    if (
      dependency.sha256 &&
      marker.sha256 !== dependency.sha256.toLowerCase()
    ) {
      return { state: "missing" };
    }

    for (const file of requiredFilesOf(dependency)) {
      if (!(await isNonEmptyFile(path.join(dependency.installDir, file)))) {
        logger.warn(
          `Install of ${dependency.name} is missing ${file}; reinstalling`,
        );
        return { state: "missing" };
      }
    }

    const executable = path.join(dependency.installDir, dependency.executable);

    // An unpinned floating dependency accepts whatever release is installed
    if (
      marker.version !== dependency.version &&
      !(floating && dependency.version === LATEST_VERSION)
    ) {
      if (!floating) return { state: "missing" };
      return {
        state: "stale",
        path: executable,
        reason: `release ${dependency.version} replaces ${marker.version}`,
      };
    }

    if (dependency.maxAgeMs !== undefined) {
      const age = Date.now() - Date.parse(marker.installedAt);
      if (!(age <= dependency.maxAgeMs)) {
        return {
          state: "stale",
          path: executable,
          reason: `installed ${marker.installedAt}`,
        };
      }
    }

    return { state: "current", path: executable };
  };

  /** Fans download progress out to every waiting caller, once per percent */
  const createReporter = (listeners: ReadonlySet<ProgressListener>) => {
    let lastPercent = -1;
    let lastBytes = 0;

    return (bytes: number, total: number | undefined): void => {
      if (total) {
        const percent = Math.floor((bytes / total) * 100);
        if (percent === lastPercent) return;
        lastPercent = percent;
      } else {
        if (bytes - lastBytes < PROGRESS_STEP_BYTES) return;
        lastBytes = bytes;
      }

      for (const listener of listeners) {
        try {
          listener({ bytes, total });
        } catch (error) {
          logger.error("Progress listener failed:", error);
        }
      }
    };
  };

  const resolveSevenZip = async (): Promise<string> => {
    if (config.sevenZipPath) return config.sevenZipPath;

    const onPath = (await findOnPath("7z")) ?? (await findOnPath("7za"));
    if (onPath) return onPath;

    if (process.platform === "win32") {
      const candidates = [
        process.env.ProgramFiles,
        process.env["ProgramFiles(x86)"],
      ]
        .filter((dir): dir is string => Boolean(dir))
        .map((dir) => path.join(dir, "7-Zip", "7z.exe"));
      for (const candidate of candidates) {
        if (await isNonEmptyFile(candidate)) return candidate;
      }
    }

    throw new PermanentInstallError(
      "7-Zip was not found; install it (p7zip-full on Linux) and make sure it is on PATH",
    );
  };

  const unpack = async (
    archivePath: string,
    targetDir: string,
  ): Promise<void> => {
    const executable = await resolveSevenZip();
    const args = ["x", archivePath, `-o${targetDir}`, "-y"];

    let handle: ProcessHandle;
    try {
      handle = await config.processRunner.start({
        kind: "unpack",
        executable,
        args,
        cwd: path.dirname(archivePath),
        env: {},
        commandLine: formatCommandLine(executable, args),
      });
    } catch (error) {
      throw new PermanentInstallError(toError(error).message, toError(error));
    }

    const tail: string[] = [];
    let terminal: Extract<StageEvent, { type: "terminal" }> | undefined;
    for await (const event of handle.events()) {
      if (event.type === "output" && event.text.trim() !== "") {
        tail.push(event.text);
        if (tail.length > 5) tail.shift();
      } else if (event.type === "terminal") {
        terminal = event;
      }
    }

    if (terminal?.state !== "succeeded") {
      throw new PermanentInstallError(
        `7-Zip exited with code ${terminal?.exitCode ?? "unknown"}: ${tail.join(" | ")}`,
      );
    }
  };

  /** Where the unpacked files live: a lone top-level folder is looked into */
  const contentRoot = async (dir: string): Promise<string> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    if (entries.length === 1 && entries[0].isDirectory()) {
      return path.join(dir, entries[0].name);
    }
    return dir;
  };

  const swapIntoPlace = async (source: string, installDir: string) => {
    const previous = `${installDir}.old-${randomBytes(4).toString("hex")}`;
    let moved = false;
    try {
      await fs.rename(installDir, previous);
      moved = true;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "ENOENT") {
        throw error;
      }
    }

    try {
      await fs.rename(source, installDir);
    } catch (error) {
      if (moved) {
        await fs.rename(previous, installDir);
      }
      throw error;
    }

    if (moved) {
      await fs.rm(previous, { recursive: true, force: true });
    }
  };

  const installOnce = async (
    dependency: ToolDependency,
    staging: string,
    listeners: ReadonlySet<ProgressListener>,
  ): Promise<void> => {
    const contentDir = path.join(staging, "content");
    await fs.rm(staging, { recursive: true, force: true });
    await fs.mkdir(contentDir, { recursive: true });

    const isArchive = dependency.archive === "7z";
    const downloadPath = isArchive
      ? path.join(
          staging,
          path.basename(new URL(dependency.url).pathname) || "archive.7z",
        )
      : path.join(contentDir, dependency.executable);
    await fs.mkdir(path.dirname(downloadPath), { recursive: true });

    logger.info(`Downloading ${dependency.name} ${dependency.version}`);
    const { sha256, bytes } = await downloader.downloadFile(
      dependency.url,
      downloadPath,
      { onProgress: createReporter(listeners) },
    );

    if (dependency.sha256 && sha256 !== dependency.sha256.toLowerCase()) {
      throw new PermanentInstallError(
        `checksum mismatch: expected ${dependency.sha256}, got ${sha256}`,
      );
    }
    logger.debug(`Downloaded ${bytes} bytes for ${dependency.name}`);

    let root = contentDir;
    if (isArchive) {
      logger.info(`Unpacking ${dependency.name}`);
      await unpack(downloadPath, contentDir);
      await fs.rm(downloadPath, { force: true });
      root = await contentRoot(contentDir);
    }

    for (const file of requiredFilesOf(dependency)) {
      if (!(await isNonEmptyFile(path.join(root, file)))) {
        throw new PermanentInstallError(
          `${file} is missing or empty after installation`,
        );
      }
    }

    if (process.platform !== "win32") {
      await fs.chmod(path.join(root, dependency.executable), 0o755);
    }

    const marker: InstallMarker = {
      name: dependency.name,
      version: dependency.version,
      sha256,
      executable: dependency.executable,
      installedAt: new Date().toISOString(),
    };
    await fs.writeFile(
      path.join(root, INSTALL_MARKER),
      JSON.stringify(marker, null, 2),
    );

    await fs.mkdir(path.dirname(dependency.installDir), { recursive: true });
    await swapIntoPlace(root, dependency.installDir);
  };

  const install = async (
    dependency: ToolDependency,
    listeners: ReadonlySet<ProgressListener>,
  ): Promise<string> => {
    const parent = path.dirname(dependency.installDir);
    await fs.mkdir(parent, { recursive: true });
    const staging = path.join(
      parent,
      `.${path.basename(dependency.installDir)}-${randomBytes(4).toString("hex")}`,
    );

    const operation = retry.operation({
      retries: config.maxRetries,
      factor: 2,
      minTimeout: config.retryDelay,
      maxTimeout: config.retryDelay * 8,
      randomize: true,
    });

    try {
      await new Promise<void>((resolve, reject) => {
        operation.attempt(async (currentAttempt) => {
          try {
            await installOnce(dependency, staging, listeners);
            resolve();
          } catch (error) {
            // Don't retry what a new download cannot fix
            if (
              error instanceof PermanentInstallError ||
              (error instanceof FileDownloaderError &&
                error.code === "FILE_TOO_LARGE")
            ) {
              reject(error);
              return;
            }

            const cause = toError(error);
            if (operation.retry(cause)) {
              logger.warn(
                `Installing ${dependency.name} failed (attempt ${currentAttempt}/${config.maxRetries + 1}):`,
                cause.message,
              );
              return;
            }
            reject(operation.mainError() ?? cause);
          }
        });
      });
    } catch (error) {
      const cause = toError(error);
      throw new DependencyUnavailableError(dependency.name, cause.message, cause);
    } finally {
      await fs.rm(staging, { recursive: true, force: true });
    }

    logger.info(`Installed ${dependency.name} ${dependency.version}`);
    return path.join(dependency.installDir, dependency.executable);
  };

  const lookupOrInstall = async (
    dependency: ToolDependency,
    listeners: ReadonlySet<ProgressListener>,
  ): Promise<string> => {
    const floating = dependency.version === LATEST_VERSION;
    const target = await pinRelease(dependency);
    const installed = await inspectInstall(target, floating);
    if (installed.state === "current") return installed.path;

    if (installed.state === "missing" && config.searchSystemPath) {
      const onPath = await findOnPath(path.basename(dependency.executable));
      if (onPath) {
        logger.info(`Using ${dependency.name} from PATH: ${onPath}`);
        return onPath;
      }
    }

    if (installed.state === "stale") {
      logger.info(`Refreshing ${dependency.name}: ${installed.reason}`);
    }

    try {
      return await queue.add(() => install(target, listeners), {
        throwOnTimeout: true,
      });
    } catch (error) {
      if (installed.state !== "stale") throw error;
      logger.warn(
        `Refreshing ${dependency.name} failed, keeping the existing install:`,
        toError(error).message,
      );
      return installed.path;
    }
  };

  const ensure = async (
    dependency: ToolDependency,
    { signal, onProgress }: EnsureOptions = {},
  ): Promise<string> => {
    let entry = inFlight.get(dependency.name);
    if (!entry) {
      const listeners = new Set<ProgressListener>();
      const pending = lookupOrInstall(dependency, listeners)
        .catch((error: unknown) => {
          if (error instanceof MurmurError) throw error;
          const cause = toError(error);
          throw new DependencyUnavailableError(
            dependency.name,
            cause.message,
            cause,
          );
        })
        .finally(() => {
          inFlight.delete(dependency.name);
        });
      entry = { pending, listeners };
      inFlight.set(dependency.name, entry);
    }

    const { pending, listeners } = entry;
    const listener: ProgressListener | undefined =
      onProgress && ((progress) => onProgress(progress));
    if (listener) listeners.add(listener);
    try {
      // A cancelled caller stops waiting; other callers still get the install
      return await abortable(pending, signal);
    } finally {
      if (listener) listeners.delete(listener);
    }
  };

  const ensureAll = async (
    dependencies: readonly ToolDependency[],
    options: { signal?: AbortSignal } = {},
  ): Promise<Record<string, string>> => {
    const paths = await Promise.all(
      dependencies.map((dependency) => ensure(dependency, options)),
    );
    return Object.fromEntries(
      dependencies.map((dependency, index) => [dependency.name, paths[index]]),
    );
  };

  return { ensure, ensureAll };
};
