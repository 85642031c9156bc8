import { createHash } from "node:crypto";
import { createWriteStream } from "node:fs";
import { unlink } from "node:fs/promises";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { fetch } from "undici";

export interface FileDownloaderOptions {
  /**
   * Timeout in milliseconds for the whole download
   * @default 600000
   */
  timeout?: number;
  /**
   * Maximum file size in bytes
   * @default 4 * 1024 * 1024 * 1024 (4GB)
   */
  maxFileSize?: number;
  /**
   * Additional headers to send with the request
   */
  headers?: Record<string, string>;
}

export type FileDownloaderErrorCode =
  | "HTTP_ERROR"
  | "FILE_TOO_LARGE"
  | "EMPTY_RESPONSE"
  | "TIMEOUT_ERROR"
  | "ABORTED"
  | "DOWNLOAD_FAILED";

export class FileDownloaderError extends Error {
  constructor(
    message: string,
    public readonly code: FileDownloaderErrorCode,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "FileDownloaderError";
  }
}

export interface DownloadedFile {
  bytes: number;
  /** Hex SHA-256 of the written file */
  sha256: string;
}

export interface DownloadFileOptions {
  signal?: AbortSignal;
  /** Called for every chunk written; `total` comes from content-length */
  onProgress?: (bytes: number, total: number | undefined) => void;
}

export interface FileDownloader {
  downloadFile(
    url: string,
    destPath: string,
    options?: DownloadFileOptions,
  ): Promise<DownloadedFile>;
}

const DEFAULT_OPTIONS: Required<Omit<FileDownloaderOptions, "headers">> = {
  timeout: 10 * 60 * 1000,
  maxFileSize: 4 * 1024 * 1024 * 1024, // 4GB
};

export const createFileDownloader = (
  options: FileDownloaderOptions = {},
): FileDownloader => {
  const config = { ...DEFAULT_OPTIONS, ...options };

  const downloadFile = async (
    url: string,
    destPath: string,
    { signal, onProgress }: DownloadFileOptions = {},
  ): Promise<DownloadedFile> => {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, config.timeout);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });
    if (signal?.aborted) controller.abort();

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: options.headers,
      });

      if (!response.ok) {
        throw new FileDownloaderError(
          `HTTP error ${response.status}: ${response.statusText}`,
          "HTTP_ERROR",
        );
      }

      // Check content length if available
      const contentLength = parseInt(
        response.headers.get("content-length") ?? "0",
        10,
      );
      if (contentLength > config.maxFileSize) {
        throw new FileDownloaderError(
          `File size ${contentLength} exceeds maximum size of ${config.maxFileSize}`,
          "FILE_TOO_LARGE",
        );
      }

      const total = contentLength > 0 ? contentLength : undefined;

      if (!response.body) {
        throw new FileDownloaderError("Empty response body", "EMPTY_RESPONSE");
      }

      const hash = createHash("sha256");
      let bytes = 0;
      const meter = new Transform({
        transform(chunk: Buffer, _encoding, callback) {
          bytes += chunk.length;
          if (bytes > config.maxFileSize) {
            callback(
              new FileDownloaderError(
                `File size exceeds maximum size of ${config.maxFileSize}`,
                "FILE_TOO_LARGE",
              ),
            );
            return;
          }
          hash.update(chunk);
          onProgress?.(bytes, total);
          callback(null, chunk);
        },
      });

      await pipeline(
        Readable.fromWeb(response.body),
        meter,
        createWriteStream(destPath),
        { signal: controller.signal },
      );

      if (bytes === 0) {
        throw new FileDownloaderError("Empty response body", "EMPTY_RESPONSE");
      }

      return { bytes, sha256: hash.digest("hex") };
    } catch (error) {
      // Clean up the partial file if it exists
      await unlink(destPath).catch(() => undefined);

      if (error instanceof FileDownloaderError) {
        throw error;
      }

      const cause = error instanceof Error ? error : new Error(String(error));

      if (signal?.aborted) {
        throw new FileDownloaderError("Download was aborted", "ABORTED", cause);
      }
      if (timedOut) {
        throw new FileDownloaderError(
          "Download timeout exceeded",
          "TIMEOUT_ERROR",
          cause,
        );
      }

      throw new FileDownloaderError(
        `Failed to download file: ${cause.message}`,
        "DOWNLOAD_FAILED",
        cause,
      );
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", forwardAbort);
    }
  };

  return { downloadFile };
};
