import * as fs from "node:fs/promises";
import * as path from "node:path";

/** Leftovers yt-dlp writes while a download or merge is in flight. */
const PARTIAL_SUFFIXES = [".part", ".ytdl", ".temp", ".tmp"];

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

/**
 * Renames `source` onto `destination`, replacing it. Falls back to
 * copy-then-rename when the two live on different filesystems.
 */
export const moveFile = async (
  source: string,
  destination: string,
): Promise<void> => {
  try {
    await fs.rename(source, destination);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "EXDEV") {
      throw error;
    }
    const staged = `${destination}.partial`;
    await fs.copyFile(source, staged);
    await fs.rename(staged, destination);
    await fs.unlink(source);
  }
};

/** Completed media files in `dir`, newest first. */
export const listFinishedMedia = async (dir: string): Promise<string[]> => {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const candidates = entries.filter(
    (entry) =>
      entry.isFile() &&
      !entry.name.startsWith(".") &&
      !PARTIAL_SUFFIXES.some((suffix) => entry.name.endsWith(suffix)),
  );

  const withTimes = await Promise.all(
    candidates.map(async (entry) => {
      const filePath = path.join(dir, entry.name);
      const stats = await fs.stat(filePath);
      return { filePath, mtimeMs: stats.mtimeMs };
    }),
  );

  return withTimes
    .sort((a, b) => b.mtimeMs - a.mtimeMs)
    .map(({ filePath }) => filePath);
};

/** Moves every file of `stagingDir` into `outputDir`; returns the new paths. */
export const publishFiles = async (
  stagingDir: string,
  outputDir: string,
): Promise<string[]> => {
  const entries = await fs.readdir(stagingDir, { withFileTypes: true });
  const published: string[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const destination = path.join(outputDir, entry.name);
    await moveFile(path.join(stagingDir, entry.name), destination);
    published.push(destination);
  }

  return published.sort();
};
