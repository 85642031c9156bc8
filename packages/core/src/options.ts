import * as path from "node:path";

export const WHISPER_MODELS = [
  "tiny",
  "base",
  "small",
  "medium",
  "large",
  "large-v2",
  "large-v3",
] as const;

export const TASKS = ["transcribe", "translate"] as const;

export const COMPUTE_TYPES = [
  "default",
  "auto",
  "int8",
  "int8_float16",
  "int8_float32",
  "int8_bfloat16",
  "int16",
  "float16",
  "float32",
  "bfloat16",
] as const;

export const DEVICES = ["cuda", "cpu"] as const;

export const VAD_METHODS = [
  "silero_v4_fw",
  "silero_v5_fw",
  "silero_v3",
  "silero_v4",
  "silero_v5",
  "pyannote_v3",
  "pyannote_onnx_v3",
  "auditok",
  "webrtc",
] as const;

/** Canonical order; `all` asks the engine for every format. */
export const OUTPUT_FORMATS = [
  "json",
  "vtt",
  "srt",
  "lrc",
  "txt",
  "tsv",
  "all",
] as const;

export type WhisperModel = (typeof WHISPER_MODELS)[number];
export type Task = (typeof TASKS)[number];
export type ComputeType = (typeof COMPUTE_TYPES)[number];
export type Device = (typeof DEVICES)[number];
export type VadMethod = (typeof VAD_METHODS)[number];
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface VadOptions {
  readonly enabled: boolean;
  readonly method: VadMethod;
  /** Speech probability threshold, 0-1 */
  readonly threshold: number;
  readonly minSpeechDurationMs: number;
}

export interface AudioOptions {
  readonly convertToMp3: boolean;
  readonly loudnessNormalization: boolean;
  readonly speechNormalization: boolean;
  /**
   * Playback tempo applied by the engine's ffmpeg filter (0.5-2.0).
   * Left out when the tempo should not be touched.
   */
  readonly tempo?: number;
}

export interface DownloadOptions {
  /** Extract the audio track as MP3 instead of keeping the video */
  readonly audioOnly: boolean;
  /** yt-dlp format selector for full-video downloads */
  readonly videoFormat?: string;
}

export interface TranscriptionOptions {
  readonly model: WhisperModel;
  readonly task: Task;
  /** ISO language code, or `auto` to let the engine detect it */
  readonly language: string;
  readonly computeType: ComputeType;
  readonly device: Device;
  readonly temperature: number;
  readonly beamSize: number;
  readonly bestOf: number;
  readonly patience: number;
  readonly initialPrompt: string;
  readonly outputFormats: readonly OutputFormat[];
  readonly wordTimestamps: boolean;
  readonly withoutTimestamps: boolean;
  readonly verbose: boolean;
  readonly printProgress: boolean;
  readonly highlightWords: boolean;
  readonly vad: VadOptions;
  readonly audio: AudioOptions;
  readonly download: DownloadOptions;
  /** Move downloaded media into the output directory instead of discarding it */
  readonly keepDownloadedMedia: boolean;
}

export type TranscriptionOptionsPatch = Partial<
  Omit<TranscriptionOptions, "vad" | "audio" | "download">
> & {
  vad?: Partial<VadOptions>;
  audio?: Partial<AudioOptions>;
  download?: Partial<DownloadOptions>;
};

export type TranscriptionOptionsInput = TranscriptionOptionsPatch & {
  /** Relative paths resolve against `cwd` */
  outputDir?: string;
};

export interface TranscriptionConfig extends TranscriptionOptions {
  /** Absolute path of a local media file, or an http(s) URL */
  readonly input: string;
  /** Absolute directory the transcripts are written to */
  readonly outputDir: string;
}

export const DEFAULT_OUTPUT_DIR_NAME = "output";

export const DEFAULT_TRANSCRIPTION_OPTIONS: TranscriptionOptions = {
  model: "large-v3",
  task: "transcribe",
  language: "auto",
  computeType: "float16",
  device: "cuda",
  temperature: 0,
  beamSize: 5,
  bestOf: 5,
  patience: 1,
  initialPrompt: "",
  outputFormats: ["srt"],
  wordTimestamps: false,
  withoutTimestamps: false,
  verbose: false,
  printProgress: false,
  highlightWords: false,
  vad: {
    enabled: false,
    method: "silero_v4_fw",
    threshold: 0.5,
    minSpeechDurationMs: 250,
  },
  audio: {
    convertToMp3: false,
    loudnessNormalization: false,
    speechNormalization: false,
  },
  download: {
    audioOnly: true,
  },
  keepDownloadedMedia: false,
};

export const isRemoteInput = (input: string): boolean => {
  if (!/^https?:\/\//i.test(input)) return false;
  try {
    new URL(input);
    return true;
  } catch {
    return false;
  }
};

const definedOnly = <T extends object>(value: T | undefined): Partial<T> => {
  const result: Partial<T> = {};
  if (!value) return result;
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
};

const deepFreeze = <T extends object>(value: T): T => {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === "object") {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
};

/** Applies the defined fields of `patch` over `base`, nested groups included. */
export const mergeOptions = (
  base: TranscriptionOptions,
  patch: TranscriptionOptionsPatch = {},
): TranscriptionOptions => {
  const { vad, audio, download, ...rest } = patch;
  const overrides = definedOnly(rest);

  return {
    ...base,
    ...overrides,
    outputFormats: [...(overrides.outputFormats ?? base.outputFormats)],
    vad: { ...base.vad, ...definedOnly(vad) },
    audio: { ...base.audio, ...definedOnly(audio) },
    download: { ...base.download, ...definedOnly(download) },
  };
};

export interface CreateConfigOptions {
  /**
   * Base directory for relative input and output paths
   * @default process.cwd()
   */
  cwd?: string;
}

/**
 * Merges user options over the defaults and returns a frozen config with
 * absolute paths. Does not validate; see `validateConfig`.
 */
export const createTranscriptionConfig = (
  input: string,
  options: TranscriptionOptionsInput = {},
  { cwd = process.cwd() }: CreateConfigOptions = {},
): TranscriptionConfig => {
  const { outputDir, ...patch } = options;
  const trimmed = input.trim();

  return deepFreeze({
    ...mergeOptions(DEFAULT_TRANSCRIPTION_OPTIONS, patch),
    input:
      trimmed === "" || isRemoteInput(trimmed)
        ? trimmed
        : path.resolve(cwd, trimmed),
    outputDir: path.resolve(cwd, outputDir || DEFAULT_OUTPUT_DIR_NAME),
  });
};
