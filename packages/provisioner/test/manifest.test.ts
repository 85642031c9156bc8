import t from "tap";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  DOWNLOADER_RELEASE_API,
  createDefaultManifest,
  loadDependencyManifest,
} from "../src/manifest.js";
import { LATEST_VERSION } from "../src/provisioner.js";

t.test("createDefaultManifest", async (t) => {
  await t.test("should describe the Linux builds", async (t) => {
    const { engine, downloader } = createDefaultManifest({
      platform: "linux",
      binDir: "/opt/murmur",
    });

    t.same(engine, {
      name: "faster-whisper-xxl",
      version: "r245.4",
      url: "https://github.com/Purfview/whisper-standalone-win/releases/download/Faster-Whisper-XXL/Faster-Whisper-XXL_r245.4_linux.7z",
      installDir: "/opt/murmur/faster-whisper-xxl",
      executable: "faster-whisper-xxl",
      archive: "7z",
      requiredFiles: ["ffmpeg"],
      bundlesFfmpeg: true,
    });
    t.equal(
      downloader.url,
      "https://github.com/yt-dlp/yt-dlp/releases/latest/download/yt-dlp_linux",
    );
    t.equal(downloader.executable, "yt-dlp");
    t.equal(downloader.archive, "none");
  });

  await t.test("should let yt-dlp follow its releases", async (t) => {
    const { downloader } = createDefaultManifest({
      platform: "linux",
      binDir: "/opt/murmur",
    });

    t.equal(downloader.version, LATEST_VERSION);
    t.equal(downloader.releaseApi, DOWNLOADER_RELEASE_API);
    t.equal(downloader.maxAgeMs, 7 * 24 * 60 * 60 * 1000);
  });

  await t.test("should use .exe names on Windows", async (t) => {
    const { engine, downloader } = createDefaultManifest({
      platform: "win32",
      binDir: "/opt/murmur",
    });

    t.match(engine.url, /_windows\.7z$/);
    t.equal(engine.executable, "faster-whisper-xxl.exe");
    t.same(engine.requiredFiles, ["ffmpeg.exe"]);
    t.equal(downloader.executable, "yt-dlp.exe");
    t.match(downloader.url, /\/yt-dlp\.exe$/);
  });

  await t.test("should refuse platforms without an engine build", async (t) => {
    t.throws(
      () => createDefaultManifest({ platform: "darwin", binDir: "/opt/murmur" }),
      { code: "DEPENDENCY_UNAVAILABLE", dependency: "faster-whisper-xxl" },
    );
  });
});

t.test("loadDependencyManifest", async (t) => {
  let tempDir: string;

  t.beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "manifest-test-"));
  });

  t.afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  await t.test("should read entries and apply defaults", async (t) => {
    const manifestPath = join(tempDir, "tools.json");
    await writeFile(
      manifestPath,
      JSON.stringify({
        "yt-dlp": {
          url: "https://example.com/yt-dlp",
          version: "2024.08.06",
          sha256: "AB".repeat(32),
          executable: "yt-dlp",
        },
      }),
    );

    const dependencies = await loadDependencyManifest(manifestPath);

    t.same(dependencies, {
      "yt-dlp": {
        name: "yt-dlp",
        url: "https://example.com/yt-dlp",
        version: "2024.08.06",
        sha256: "ab".repeat(32),
        executable: "yt-dlp",
        archive: "none",
        requiredFiles: [],
        bundlesFfmpeg: false,
        installDir: join(tempDir, "yt-dlp"),
      },
    });
  });

  await t.test("should list every invalid field", async (t) => {
    const manifestPath = join(tempDir, "tools.json");
    await writeFile(
      manifestPath,
      JSON.stringify({
        "yt-dlp": { url: "not a url", version: "", executable: "yt-dlp" },
      }),
    );

    try {
      await loadDependencyManifest(manifestPath);
      t.fail("Should have thrown an error");
    } catch (error) {
      t.match(error, {
        code: "INVALID_CONFIGURATION",
        fields: ["yt-dlp.url", "yt-dlp.version"],
      });
    }
  });

  await t.test("should report unreadable files", async (t) => {
    await t.rejects(loadDependencyManifest(join(tempDir, "missing.json")), {
      code: "INVALID_CONFIGURATION",
      fields: ["manifest"],
    });
  });
});
