import * as path from "node:path";
import { z } from "zod";
import {
  DependencyUnavailableError,
  InvalidConfigurationError,
  type ConfigurationIssue,
} from "./errors.js";
import {
  COMPUTE_TYPES,
  DEFAULT_TRANSCRIPTION_OPTIONS,
  DEVICES,
  OUTPUT_FORMATS,
  TASKS,
  VAD_METHODS,
  WHISPER_MODELS,
  isRemoteInput,
  type OutputFormat,
  type TranscriptionConfig,
} from "./options.js";
import type { StageKind, StageSpec, Toolchain } from "./types.js";

export const DEFAULT_VIDEO_FORMAT =
  "bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best";

/** yt-dlp output template; files are named after the source title */
export const DOWNLOAD_OUTPUT_TEMPLATE = "%(title)s.%(ext)s";

export interface CompileContext {
  toolchain: Toolchain;
  /** Per-run scratch directory; becomes the stage's working directory */
  workDir: string;
}

const configSchema = z
  .object({
    input: z
      .string()
      .min(1, "an input file or URL is required")
      .refine(
        (value) => isRemoteInput(value) || path.isAbsolute(value),
        "must be an absolute path or an http(s) URL",
      ),
    outputDir: z
      .string()
      .refine((value) => path.isAbsolute(value), "must be an absolute path"),
    model: z.enum(WHISPER_MODELS),
    task: z.enum(TASKS),
    language: z
      .string()
      .regex(/^(auto|[a-z]{2,3})$/, "must be `auto` or a language code"),
    computeType: z.enum(COMPUTE_TYPES),
    device: z.enum(DEVICES),
    temperature: z.number().min(0).max(1),
    beamSize: z.number().int().min(1).max(100),
    bestOf: z.number().int().min(1).max(100),
    patience: z.number().min(0).max(10),
    initialPrompt: z.string(),
    outputFormats: z
      .array(z.enum(OUTPUT_FORMATS))
      .min(1, "at least one output format must be selected"),
    wordTimestamps: z.boolean(),
    withoutTimestamps: z.boolean(),
    verbose: z.boolean(),
    printProgress: z.boolean(),
    highlightWords: z.boolean(),
    vad: z.object({
      enabled: z.boolean(),
      method: z.enum(VAD_METHODS),
      threshold: z.number().min(0).max(1),
      minSpeechDurationMs: z.number().int().min(0).max(10000),
    }),
    audio: z.object({
      convertToMp3: z.boolean(),
      loudnessNormalization: z.boolean(),
      speechNormalization: z.boolean(),
      tempo: z.number().min(0.5).max(2).optional(),
    }),
    download: z.object({
      audioOnly: z.boolean(),
      videoFormat: z.string().min(1).optional(),
    }),
    keepDownloadedMedia: z.boolean(),
  })
  .superRefine((config, ctx) => {
    const conflict = (field: string[], other: string) =>
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: field,
        message: `cannot be combined with ${other}`,
      });

    if (config.download.audioOnly && config.download.videoFormat) {
      conflict(["download", "videoFormat"], "download.audioOnly");
    }
    if (config.withoutTimestamps && config.wordTimestamps) {
      conflict(["withoutTimestamps"], "wordTimestamps");
    }
    if (config.withoutTimestamps && config.highlightWords) {
      conflict(["withoutTimestamps"], "highlightWords");
    }
  });

/** Throws `InvalidConfigurationError` listing every offending field. */
export const validateConfig = (config: TranscriptionConfig): void => {
  const result = configSchema.safeParse(config);
  if (result.success) return;

  const issues: ConfigurationIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.join(".") || "(root)",
    message: issue.message,
  }));
  throw new InvalidConfigurationError(issues);
};

const formatNumber = (value: number): string => String(value);

const selectFormats = (formats: readonly OutputFormat[]): OutputFormat[] => {
  if (formats.includes("all")) return ["all"];
  return OUTPUT_FORMATS.filter((format) => formats.includes(format));
};

const buildTranscribeArgs = (config: TranscriptionConfig): string[] => {
  const defaults = DEFAULT_TRANSCRIPTION_OPTIONS;
  const args: string[] = [config.input];

  const options: Array<[string, string | undefined]> = [
    ["-m", config.model],
    ["--task", config.task],
    ["-l", config.language !== "auto" ? config.language : undefined],
    ["--compute_type", config.computeType],
    ["--device", config.device],
    [
      "--temperature",
      config.temperature > 0 ? formatNumber(config.temperature) : undefined,
    ],
    [
      "--beam_size",
      config.beamSize !== defaults.beamSize
        ? formatNumber(config.beamSize)
        : undefined,
    ],
    [
      "--best_of",
      config.bestOf !== defaults.bestOf
        ? formatNumber(config.bestOf)
        : undefined,
    ],
    [
      "--patience",
      config.patience !== defaults.patience
        ? formatNumber(config.patience)
        : undefined,
    ],
    ["--initial_prompt", config.initialPrompt || undefined],
    ["--output_dir", config.outputDir],
    ["--vad_method", config.vad.enabled ? config.vad.method : undefined],
    [
      "--vad_threshold",
      config.vad.enabled ? formatNumber(config.vad.threshold) : undefined,
    ],
    [
      "--vad_min_speech_duration_ms",
      config.vad.enabled
        ? formatNumber(config.vad.minSpeechDurationMs)
        : undefined,
    ],
    [
      "--ff_tempo",
      config.audio.tempo !== undefined
        ? formatNumber(config.audio.tempo)
        : undefined,
    ],
  ];

  for (const [option, value] of options) {
    if (value !== undefined) {
      args.push(option, value);
    }
  }

  const flags: Array<[string, boolean]> = [
    ["--word_timestamps", config.wordTimestamps],
    ["--without_timestamps", config.withoutTimestamps],
    ["--verbose", config.verbose],
    ["--print_progress", config.printProgress],
    ["--highlight_words", config.highlightWords],
    ["--vad_filter", config.vad.enabled],
    ["--ff_mp3", config.audio.convertToMp3],
    ["--ff_loudnorm", config.audio.loudnessNormalization],
    ["--ff_speechnorm", config.audio.speechNormalization],
  ];

  for (const [flag, enabled] of flags) {
    if (enabled) {
      args.push(flag);
    }
  }

  args.push("--output_format", ...selectFormats(config.outputFormats));
  return args;
};

const buildDownloadArgs = (
  config: TranscriptionConfig,
  { toolchain, workDir }: CompileContext,
): string[] => {
  const args: string[] = config.download.audioOnly
    ? [
        "-f",
        "bestaudio/best",
        "-x",
        "--audio-format",
        "mp3",
        "--audio-quality",
        "192K",
      ]
    : ["-f", config.download.videoFormat ?? DEFAULT_VIDEO_FORMAT];

  if (toolchain.ffmpegDir) {
    args.push("--ffmpeg-location", toolchain.ffmpegDir);
  }

  // "--" keeps a URL that starts with a dash from being read as an option
  args.push(
    "-o",
    path.join(workDir, DOWNLOAD_OUTPUT_TEMPLATE),
    "--no-playlist",
    "--newline",
    "--",
    config.input,
  );
  return args;
};

const quoteArg = (arg: string): string =>
  /[\s"']/.test(arg) || arg === "" ? `"${arg.replace(/"/g, '\\"')}"` : arg;

/** Human-readable command line for logs and the console view. */
export const formatCommandLine = (
  executable: string,
  args: readonly string[],
): string => [executable, ...args].map(quoteArg).join(" ");

/**
 * Compiles a config into the invocation of one stage. Pure: the same config,
 * stage and context always produce the same spec.
 */
export const compile = (
  config: TranscriptionConfig,
  stage: StageKind,
  context: CompileContext,
): StageSpec => {
  validateConfig(config);
  const remote = isRemoteInput(config.input);

  if (stage === "download") {
    if (!remote) {
      throw new InvalidConfigurationError([
        { path: "input", message: "the download stage needs an http(s) URL" },
      ]);
    }
    const executable = context.toolchain.downloader;
    if (!executable) {
      throw new DependencyUnavailableError(
        "downloader",
        "no download helper was provisioned",
      );
    }
    const args = buildDownloadArgs(config, context);
    return {
      kind: stage,
      executable,
      args,
      cwd: context.workDir,
      env: {},
      fatal: true,
      commandLine: formatCommandLine(executable, args),
    };
  }

  if (remote) {
    throw new InvalidConfigurationError([
      {
        path: "input",
        message: "the transcribe stage needs a local file; download it first",
      },
    ]);
  }

  const executable = context.toolchain.engine;
  const args = buildTranscribeArgs(config);
  return {
    kind: stage,
    executable,
    args,
    cwd: context.workDir,
    // Unbuffered output so progress lines arrive as they are printed
    env: { PYTHONUNBUFFERED: "1" },
    fatal: true,
    commandLine: formatCommandLine(executable, args),
  };
};
