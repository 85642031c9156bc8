import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import {
  DependencyUnavailableError,
  InvalidConfigurationError,
  toError,
  type ToolDependency,
} from "@murmur/core";
import { LATEST_VERSION } from "./provisioner.js";

export const ENGINE_NAME = "faster-whisper-xxl";
export const DOWNLOADER_NAME = "yt-dlp";

const ENGINE_VERSION = "r245.4";
const ENGINE_RELEASES =
  "https://github.com/Purfview/whisper-standalone-win/releases/download/Faster-Whisper-XXL";
const DOWNLOADER_RELEASES =
  "https://github.com/yt-dlp/yt-dlp/releases/latest/download";
export const DOWNLOADER_RELEASE_API =
  "https://api.github.com/repos/yt-dlp/yt-dlp/releases/latest";
// Refresh yt-dlp weekly even when the release API cannot be reached
const DOWNLOADER_MAX_AGE_MS = 7 * 24 * 60 * 60 * 1000;

export interface DependencyManifest {
  engine: ToolDependency;
  downloader: ToolDependency;
}

export interface DefaultManifestOptions {
  /** @default process.platform */
  platform?: NodeJS.Platform;
  /** Directory every tool is installed under, one subdirectory each */
  binDir: string;
}

/** The engine build and the yt-dlp binary published for `platform`. */
export const createDefaultManifest = ({
  platform = process.platform,
  binDir,
}: DefaultManifestOptions): DependencyManifest => {
  const exe = platform === "win32" ? ".exe" : "";

  const engineBuild =
    platform === "win32" ? "windows" : platform === "linux" ? "linux" : null;
  if (!engineBuild) {
    throw new DependencyUnavailableError(
      ENGINE_NAME,
      `no prebuilt engine is published for ${platform}`,
    );
  }

  const downloaderAsset =
    platform === "win32"
      ? "yt-dlp.exe"
      : platform === "darwin"
        ? "yt-dlp_macos"
        : "yt-dlp_linux";

  return {
    engine: {
      name: ENGINE_NAME,
      version: ENGINE_VERSION,
      url: `${ENGINE_RELEASES}/Faster-Whisper-XXL_${ENGINE_VERSION}_${engineBuild}.7z`,
      installDir: path.join(binDir, ENGINE_NAME),
      executable: `faster-whisper-xxl${exe}`,
      archive: "7z",
      requiredFiles: [`ffmpeg${exe}`],
      bundlesFfmpeg: true,
    },
    downloader: {
      name: DOWNLOADER_NAME,
      version: LATEST_VERSION,
      url: `${DOWNLOADER_RELEASES}/${downloaderAsset}`,
      installDir: path.join(binDir, DOWNLOADER_NAME),
      executable: `yt-dlp${exe}`,
      archive: "none",
      releaseApi: DOWNLOADER_RELEASE_API,
      maxAgeMs: DOWNLOADER_MAX_AGE_MS,
    },
  };
};

const manifestEntrySchema = z.object({
  url: z.string().url(),
  version: z.string().min(1),
  sha256: z
    .string()
    .regex(/^[a-f0-9]{64}$/i, "must be a hex SHA-256 digest")
    .optional(),
  executable: z.string().min(1),
  archive: z.enum(["none", "7z"]).default("none"),
  requiredFiles: z.array(z.string().min(1)).default([]),
  bundlesFfmpeg: z.boolean().default(false),
  releaseApi: z.string().url().optional(),
  maxAgeMs: z.number().int().positive().optional(),
});

const manifestSchema = z.record(
  z.string().regex(/^[a-z0-9][a-z0-9._-]*$/i, "invalid dependency name"),
  manifestEntrySchema,
);

/**
 * Reads a JSON manifest of `name -> entry`. Each dependency installs into
 * `<binDir>/<name>`; `binDir` defaults to the manifest's directory.
 */
export const loadDependencyManifest = async (
  manifestPath: string,
  { binDir = path.dirname(manifestPath) }: { binDir?: string } = {},
): Promise<Record<string, ToolDependency>> => {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(manifestPath, "utf8"));
  } catch (error) {
    throw new InvalidConfigurationError([
      {
        path: "manifest",
        message: `cannot read ${manifestPath}: ${toError(error).message}`,
      },
    ]);
  }

  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join(".") || "manifest",
        message: issue.message,
      })),
    );
  }

  const dependencies: Record<string, ToolDependency> = {};
  for (const [name, entry] of Object.entries(result.data)) {
    dependencies[name] = {
      name,
      ...entry,
      sha256: entry.sha256?.toLowerCase(),
      installDir: path.join(binDir, name),
    };
  }
  return dependencies;
};
