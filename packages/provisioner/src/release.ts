import { fetch } from "undici";
import { z } from "zod";

export interface ReleaseLookupOptions {
  /**
   * Timeout in milliseconds for the API request
   * @default 10000
   */
  timeout?: number;
  /**
   * Additional headers to send with the request
   */
  headers?: Record<string, string>;
}

export interface LatestRelease {
  tag: string;
  /** Download URL of each release asset, keyed by file name */
  assets: Record<string, string>;
}

export class ReleaseLookupError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "ReleaseLookupError";
  }
}

const releaseSchema = z.object({
  tag_name: z.string().min(1),
  assets: z
    .array(
      z.object({
        name: z.string(),
        browser_download_url: z.string().url(),
      }),
    )
    .default([]),
});

/** Reads a GitHub `releases/latest` API response. */
export const fetchLatestRelease = async (
  apiUrl: string,
  { timeout = 10000, headers }: ReleaseLookupOptions = {},
): Promise<LatestRelease> => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(apiUrl, {
      signal: controller.signal,
      headers: {
        Accept: "application/vnd.github+json",
        "User-Agent": "murmur",
        ...headers,
      },
    });

    if (!response.ok) {
      throw new ReleaseLookupError(
        `HTTP error ${response.status}: ${response.statusText}`,
      );
    }

    const result = releaseSchema.safeParse(await response.json());
    if (!result.success) {
      throw new ReleaseLookupError(
        `Unexpected release response: ${result.error.issues[0]?.message ?? "invalid"}`,
      );
    }

    return {
      tag: result.data.tag_name,
      assets: Object.fromEntries(
        result.data.assets.map((asset) => [
          asset.name,
          asset.browser_download_url,
        ]),
      ),
    };
  } catch (error) {
    if (error instanceof ReleaseLookupError) throw error;
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ReleaseLookupError(
      controller.signal.aborted
        ? "Release lookup timed out"
        : `Release lookup failed: ${cause.message}`,
      cause,
    );
  } finally {
    clearTimeout(timeoutId);
  }
};
