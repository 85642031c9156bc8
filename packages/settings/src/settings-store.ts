import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import {
  COMPUTE_TYPES,
  DEFAULT_TRANSCRIPTION_OPTIONS,
  DEVICES,
  OUTPUT_FORMATS,
  TASKS,
  VAD_METHODS,
  WHISPER_MODELS,
  createTranscriptionConfig,
  mergeOptions,
  toError,
  type CreateConfigOptions,
  type LoggerPort,
  type TranscriptionConfig,
  type TranscriptionOptions,
  type TranscriptionOptionsPatch,
} from "@murmur/core";

export const SETTINGS_VERSION = 1;

export interface Settings {
  /** Last chosen output directory; relative paths resolve when a job is built */
  outputDir?: string;
  options: TranscriptionOptions;
}

export interface SettingsPatch {
  outputDir?: string;
  options?: TranscriptionOptionsPatch;
}

export interface SettingsStoreOptions {
  path: string;
  /** @default console */
  logger?: LoggerPort;
}

export interface SettingsStore {
  /** Never throws; a missing, unreadable or invalid file yields the defaults */
  load(): Promise<Settings>;
  save(settings: Settings): Promise<void>;
  update(patch: SettingsPatch): Promise<Settings>;
}

export type SettingsErrorCode = "INVALID_SETTINGS" | "WRITE_FAILED";

export class SettingsError extends Error {
  constructor(
    message: string,
    public readonly code: SettingsErrorCode,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "SettingsError";
  }
}

// Ranges are checked when a job is submitted; the file only has to be well typed
const optionsSchema = z.object({
  model: z.enum(WHISPER_MODELS).optional(),
  task: z.enum(TASKS).optional(),
  language: z.string().optional(),
  computeType: z.enum(COMPUTE_TYPES).optional(),
  device: z.enum(DEVICES).optional(),
  temperature: z.number().optional(),
  beamSize: z.number().optional(),
  bestOf: z.number().optional(),
  patience: z.number().optional(),
  initialPrompt: z.string().optional(),
  outputFormats: z.array(z.enum(OUTPUT_FORMATS)).optional(),
  wordTimestamps: z.boolean().optional(),
  withoutTimestamps: z.boolean().optional(),
  verbose: z.boolean().optional(),
  printProgress: z.boolean().optional(),
  highlightWords: z.boolean().optional(),
  vad: z
    .object({
      enabled: z.boolean(),
      method: z.enum(VAD_METHODS),
      threshold: z.number(),
      minSpeechDurationMs: z.number(),
    })
    .partial()
    .optional(),
  audio: z
    .object({
      convertToMp3: z.boolean(),
      loudnessNormalization: z.boolean(),
      speechNormalization: z.boolean(),
      tempo: z.number(),
    })
    .partial()
    .optional(),
  download: z
    .object({
      audioOnly: z.boolean(),
      videoFormat: z.string(),
    })
    .partial()
    .optional(),
  keepDownloadedMedia: z.boolean().optional(),
});

const settingsFileSchema = z.object({
  version: z.literal(SETTINGS_VERSION).default(SETTINGS_VERSION),
  outputDir: z.string().optional(),
  options: optionsSchema.default({}),
});

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

const defaultSettings = (): Settings => ({
  options: DEFAULT_TRANSCRIPTION_OPTIONS,
});

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`)
    .join("; ");

export const createSettingsStore = (
  options: SettingsStoreOptions,
): SettingsStore => {
  const filePath = options.path;
  const logger = options.logger ?? console;
  // update() is read-modify-write; chain them so none is lost
  let pending: Promise<unknown> = Promise.resolve();

  const load = async (): Promise<Settings> => {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        logger.debug(`[settings] No settings at ${filePath}, using defaults`);
      } else {
        logger.warn(
          `[settings] Cannot read ${filePath}, using defaults:`,
          toError(error).message,
        );
      }
      return defaultSettings();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn(
        `[settings] ${filePath} is not valid JSON, using defaults:`,
        toError(error).message,
      );
      return defaultSettings();
    }

    const result = settingsFileSchema.safeParse(json);
    if (!result.success) {
      logger.warn(
        `[settings] ${filePath} is invalid, using defaults: ${describeIssues(result.error)}`,
      );
      return defaultSettings();
    }

    return {
      outputDir: result.data.outputDir,
      options: mergeOptions(DEFAULT_TRANSCRIPTION_OPTIONS, result.data.options),
    };
  };

  const save = async (settings: Settings): Promise<void> => {
    const result = settingsFileSchema.safeParse({
      version: SETTINGS_VERSION,
      outputDir: settings.outputDir,
      options: settings.options,
    });
    if (!result.success) {
      throw new SettingsError(
        `Invalid settings: ${describeIssues(result.error)}`,
        "INVALID_SETTINGS",
      );
    }

    try {
      await mkdir(path.dirname(filePath), { recursive: true });
    } catch (error) {
      throw new SettingsError(
        `Failed to create the settings directory for ${filePath}`,
        "WRITE_FAILED",
        toError(error),
      );
    }

    const tmpPath = `${filePath}.tmp`;
    try {
      await writeFile(tmpPath, `${JSON.stringify(result.data, null, 2)}\n`);
      await rename(tmpPath, filePath);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw new SettingsError(
        `Failed to write settings to ${filePath}`,
        "WRITE_FAILED",
        toError(error),
      );
    }
  };

  const update = (patch: SettingsPatch): Promise<Settings> => {
    const next = pending.then(async () => {
      const current = await load();
      const updated: Settings = {
        outputDir: patch.outputDir ?? current.outputDir,
        options: mergeOptions(current.options, patch.options),
      };
      await save(updated);
      return updated;
    });
    pending = next.catch(() => undefined);
    return next;
  };

  return { load, save, update };
};

/** Builds a job config for `input` from the stored options. */
export const toTranscriptionConfig = (
  settings: Settings,
  input: string,
  options?: CreateConfigOptions,
): TranscriptionConfig =>
  createTranscriptionConfig(
    input,
    { ...settings.options, outputDir: settings.outputDir },
    options,
  );
