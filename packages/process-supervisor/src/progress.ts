// [download]  15.2% of 10.25MiB at 1.2MiB/s ETA 00:07
const DOWNLOAD_PROGRESS = /^\[download\]\s+(\d+(?:\.\d+)?)%/;

// tqdm bars printed by the engine:  45%|████▌     | 45/100
const BAR_PROGRESS = /(?:^|[\s:])(\d{1,3}(?:\.\d+)?)%\s?\|/;

// yt-dlp post-processors report no percentage
const POST_PROCESSING =
  /^\[(?:ExtractAudio|Merger|FixupM3u8|ffmpeg|Metadata|VideoConvertor|MoveFiles)\]/;

const clamp = (percent: number): number => Math.min(100, Math.max(0, percent));

/**
 * Reads a progress value out of one output line.
 *
 * @returns the percentage, `null` for indeterminate post-processing, or
 * `undefined` when the line carries no progress
 */
export const parseProgress = (line: string): number | null | undefined => {
  const text = line.trim();

  const download = DOWNLOAD_PROGRESS.exec(text);
  if (download) {
    return clamp(parseFloat(download[1]));
  }

  const bar = BAR_PROGRESS.exec(text);
  if (bar) {
    return clamp(parseFloat(bar[1]));
  }

  if (POST_PROCESSING.test(text)) {
    return null;
  }

  return undefined;
};
