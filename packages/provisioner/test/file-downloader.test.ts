import t from "tap";
import { createHash } from "node:crypto";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MockAgent, setGlobalDispatcher, getGlobalDispatcher } from "undici";
import {
  createFileDownloader,
  FileDownloaderError,
} from "../src/file-downloader.js";

const BASE_URL = "https://example.com";

t.test("FileDownloader", async (t) => {
  let tempDir: string;
  let mockAgent: MockAgent;
  let mockPool: ReturnType<MockAgent["get"]>;
  const originalDispatcher = getGlobalDispatcher();

  const captureError = async (promise: Promise<unknown>): Promise<unknown> => {
    try {
      await promise;
    } catch (error) {
      return error;
    }
    return undefined;
  };

  t.beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "file-downloader-test-"));
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    setGlobalDispatcher(mockAgent);
    mockPool = mockAgent.get(BASE_URL);
  });

  t.afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    await mockPool.close();
    await mockAgent.close();
    setGlobalDispatcher(originalDispatcher);
  });

  t.test("should download a file and report its digest", async (t) => {
    const fileContent = "release asset";
    const destPath = join(tempDir, "yt-dlp");

    mockPool
      .intercept({ path: "/yt-dlp", method: "GET" })
      .reply(200, fileContent, {
        headers: { "Content-Length": fileContent.length.toString() },
      });

    const downloader = createFileDownloader();
    const result = await downloader.downloadFile(`${BASE_URL}/yt-dlp`, destPath);

    t.equal(await readFile(destPath, "utf-8"), fileContent);
    t.same(result, {
      bytes: fileContent.length,
      sha256: createHash("sha256").update(fileContent).digest("hex"),
    });
  });

  t.test("should report progress against the announced size", async (t) => {
    const fileContent = Buffer.alloc(500).fill("b");
    mockPool
      .intercept({ path: "/engine.7z", method: "GET" })
      .reply(200, fileContent, {
        headers: { "Content-Length": fileContent.length.toString() },
      });
    const updates: Array<[number, number | undefined]> = [];

    const downloader = createFileDownloader();
    await downloader.downloadFile(
      `${BASE_URL}/engine.7z`,
      join(tempDir, "engine.7z"),
      { onProgress: (bytes, total) => updates.push([bytes, total]) },
    );

    t.ok(updates.length > 0);
    t.same(updates.at(-1), [500, 500]);
    t.ok(updates.every(([, total]) => total === 500));
  });

  t.test("should handle HTTP errors", async (t) => {
    const destPath = join(tempDir, "yt-dlp");
    mockPool
      .intercept({ path: "/yt-dlp", method: "GET" })
      .reply(404, "Not Found");

    const downloader = createFileDownloader();
    const error = await captureError(
      downloader.downloadFile(`${BASE_URL}/yt-dlp`, destPath),
    );
    t.ok(error instanceof FileDownloaderError);
    t.match(error, { code: "HTTP_ERROR", message: /^HTTP error 404/ });
    t.same(await readdir(tempDir), [], "partial file is removed");
  });

  t.test("should enforce the size limit", async (t) => {
    const fileContent = Buffer.alloc(200).fill("a");
    const destPath = join(tempDir, "engine.7z");
    mockPool
      .intercept({ path: "/engine.7z", method: "GET" })
      .reply(200, fileContent, {
        headers: { "Content-Length": fileContent.length.toString() },
      });

    const downloader = createFileDownloader({ maxFileSize: 100 });
    const error = await captureError(
      downloader.downloadFile(`${BASE_URL}/engine.7z`, destPath),
    );
    t.ok(error instanceof FileDownloaderError);
    t.match(error, { code: "FILE_TOO_LARGE" });

    t.same(await readdir(tempDir), [], "partial file is removed");
  });

  t.test("should respect custom headers", async (t) => {
    const destPath = join(tempDir, "yt-dlp");
    mockPool
      .intercept({
        path: "/yt-dlp",
        method: "GET",
        headers: { "user-agent": "murmur-test" },
      })
      .reply(200, "release asset");

    const downloader = createFileDownloader({
      headers: { "User-Agent": "murmur-test" },
    });
    const result = await downloader.downloadFile(`${BASE_URL}/yt-dlp`, destPath);

    t.equal(result.bytes, 13);
  });

  t.test("should handle timeout", async (t) => {
    const destPath = join(tempDir, "yt-dlp");
    mockPool
      .intercept({ path: "/yt-dlp", method: "GET" })
      .reply(200, "release asset")
      .delay(2000);

    const downloader = createFileDownloader({ timeout: 100 });
    const error = await captureError(
      downloader.downloadFile(`${BASE_URL}/yt-dlp`, destPath),
    );
    t.ok(error instanceof FileDownloaderError);
    t.match(error, { code: "TIMEOUT_ERROR" });
  });

  t.test("should stop when the caller aborts", async (t) => {
    const destPath = join(tempDir, "yt-dlp");
    mockPool
      .intercept({ path: "/yt-dlp", method: "GET" })
      .reply(200, "release asset")
      .delay(2000);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const downloader = createFileDownloader();
    const error = await captureError(
      downloader.downloadFile(`${BASE_URL}/yt-dlp`, destPath, {
        signal: controller.signal,
      }),
    );
    t.ok(error instanceof FileDownloaderError);
    t.match(error, { code: "ABORTED" });
  });

  t.test("should handle empty response body", async (t) => {
    const destPath = join(tempDir, "yt-dlp");
    mockPool.intercept({ path: "/yt-dlp", method: "GET" }).reply(200, "");

    const downloader = createFileDownloader();
    const error = await captureError(
      downloader.downloadFile(`${BASE_URL}/yt-dlp`, destPath),
    );
    t.ok(error instanceof FileDownloaderError);
    t.match(error, { code: "EMPTY_RESPONSE" });
    t.same(await readdir(tempDir), []);
  });

  t.test("should handle write stream errors", async (t) => {
    const destPath = join(tempDir, "nonexistent/yt-dlp");
    mockPool
      .intercept({ path: "/yt-dlp", method: "GET" })
      .reply(200, "release asset");

    const downloader = createFileDownloader();
    const error = await captureError(
      downloader.downloadFile(`${BASE_URL}/yt-dlp`, destPath),
    );
    t.ok(error instanceof FileDownloaderError);
    t.match(error, { code: "DOWNLOAD_FAILED", message: /ENOENT/ });
  });
});
