import t from "tap";
import {
  DEFAULT_VIDEO_FORMAT,
  InvalidConfigurationError,
  compile,
  createTranscriptionConfig,
  formatCommandLine,
  isRemoteInput,
  validateConfig,
  type TranscriptionConfig,
} from "../src/index.js";

const ENGINE = "/opt/bin/faster-whisper-xxl";
const DOWNLOADER = "/opt/bin/yt-dlp";
const WORK_DIR = "/tmp/work";

const context = {
  toolchain: { engine: ENGINE, downloader: DOWNLOADER, ffmpegDir: "/opt/bin" },
  workDir: WORK_DIR,
};

const invalidFields = (config: TranscriptionConfig): string[] => {
  try {
    validateConfig(config);
  } catch (error) {
    if (error instanceof InvalidConfigurationError) return error.fields;
    throw error;
  }
  return [];
};

t.test("compile", async (t) => {
  await t.test("should build the default transcribe invocation", async (t) => {
    const config = createTranscriptionConfig("/media/talk.wav", {
      outputDir: "/out",
    });

    const spec = compile(config, "transcribe", context);

    t.equal(spec.kind, "transcribe");
    t.equal(spec.executable, ENGINE);
    t.same(spec.args, [
      "/media/talk.wav",
      "-m",
      "large-v3",
      "--task",
      "transcribe",
      "--compute_type",
      "float16",
      "--device",
      "cuda",
      "--output_dir",
      "/out",
      "--output_format",
      "srt",
    ]);
    t.equal(spec.cwd, WORK_DIR);
    t.same(spec.env, { PYTHONUNBUFFERED: "1" });
    t.equal(spec.fatal, true);
    t.equal(
      spec.commandLine,
      "/opt/bin/faster-whisper-xxl /media/talk.wav -m large-v3 --task transcribe " +
        "--compute_type float16 --device cuda --output_dir /out --output_format srt",
    );
  });

  await t.test("should be deterministic", async (t) => {
    const config = createTranscriptionConfig("/media/talk.wav", {
      outputDir: "/out",
      outputFormats: ["vtt", "srt"],
    });

    t.same(
      compile(config, "transcribe", context),
      compile(config, "transcribe", context),
    );
  });

  await t.test("should map every option to its engine flag", async (t) => {
    const config = createTranscriptionConfig("/media/talk.wav", {
      outputDir: "/out",
      model: "medium",
      task: "translate",
      language: "de",
      computeType: "int8",
      device: "cpu",
      temperature: 0.2,
      beamSize: 8,
      bestOf: 3,
      patience: 2,
      initialPrompt: "Glossary: Kubernetes",
      outputFormats: ["txt", "json", "srt"],
      wordTimestamps: true,
      verbose: true,
      printProgress: true,
      highlightWords: true,
      vad: {
        enabled: true,
        method: "silero_v5",
        threshold: 0.4,
        minSpeechDurationMs: 300,
      },
      audio: { convertToMp3: true, loudnessNormalization: true, tempo: 1.25 },
    });

    const spec = compile(config, "transcribe", context);

    t.same(spec.args, [
      "/media/talk.wav",
      "-m",
      "medium",
      "--task",
      "translate",
      "-l",
      "de",
      "--compute_type",
      "int8",
      "--device",
      "cpu",
      "--temperature",
      "0.2",
      "--beam_size",
      "8",
      "--best_of",
      "3",
      "--patience",
      "2",
      "--initial_prompt",
      "Glossary: Kubernetes",
      "--output_dir",
      "/out",
      "--vad_method",
      "silero_v5",
      "--vad_threshold",
      "0.4",
      "--vad_min_speech_duration_ms",
      "300",
      "--ff_tempo",
      "1.25",
      "--word_timestamps",
      "--verbose",
      "--print_progress",
      "--highlight_words",
      "--vad_filter",
      "--ff_mp3",
      "--ff_loudnorm",
      "--output_format",
      "json",
      "srt",
      "txt",
    ]);
    t.match(spec.commandLine, '--initial_prompt "Glossary: Kubernetes" ');
  });

  await t.test("should let `all` replace the other formats", async (t) => {
    const config = createTranscriptionConfig("/media/talk.wav", {
      outputDir: "/out",
      outputFormats: ["srt", "all"],
    });

    const { args } = compile(config, "transcribe", context);

    t.same(args.slice(-2), ["--output_format", "all"]);
  });

  await t.test("should build an audio-only download", async (t) => {
    const config = createTranscriptionConfig("https://youtu.be/abc", {
      outputDir: "/out",
    });

    const spec = compile(config, "download", context);

    t.equal(spec.executable, DOWNLOADER);
    t.same(spec.args, [
      "-f",
      "bestaudio/best",
      "-x",
      "--audio-format",
      "mp3",
      "--audio-quality",
      "192K",
      "--ffmpeg-location",
      "/opt/bin",
      "-o",
      "/tmp/work/%(title)s.%(ext)s",
      "--no-playlist",
      "--newline",
      "--",
      "https://youtu.be/abc",
    ]);
    t.same(spec.env, {});
    t.equal(spec.cwd, WORK_DIR);
  });

  await t.test("should build a video download", async (t) => {
    const config = createTranscriptionConfig("https://youtu.be/abc", {
      outputDir: "/out",
      download: { audioOnly: false },
    });

    const spec = compile(config, "download", {
      toolchain: { engine: ENGINE, downloader: DOWNLOADER },
      workDir: WORK_DIR,
    });

    t.same(spec.args, [
      "-f",
      DEFAULT_VIDEO_FORMAT,
      "-o",
      "/tmp/work/%(title)s.%(ext)s",
      "--no-playlist",
      "--newline",
      "--",
      "https://youtu.be/abc",
    ]);
  });

  await t.test("should refuse a stage that does not fit the input", async (t) => {
    const local = createTranscriptionConfig("/media/talk.wav", {
      outputDir: "/out",
    });
    const remote = createTranscriptionConfig("https://youtu.be/abc", {
      outputDir: "/out",
    });

    t.throws(() => compile(local, "download", context), {
      code: "INVALID_CONFIGURATION",
      fields: ["input"],
    });
    t.throws(() => compile(remote, "transcribe", context), {
      code: "INVALID_CONFIGURATION",
      fields: ["input"],
    });
  });

  await t.test("should require a downloader for URL inputs", async (t) => {
    const remote = createTranscriptionConfig("https://youtu.be/abc", {
      outputDir: "/out",
    });

    t.throws(
      () =>
        compile(remote, "download", {
          toolchain: { engine: ENGINE },
          workDir: WORK_DIR,
        }),
      { code: "DEPENDENCY_UNAVAILABLE", dependency: "downloader" },
    );
  });
});

t.test("validateConfig", async (t) => {
  const base = createTranscriptionConfig("/media/talk.wav", {
    outputDir: "/out",
  });

  await t.test("should accept the defaults", async (t) => {
    t.same(invalidFields(base), []);
  });

  await t.test("should reject an empty format selection", async (t) => {
    t.same(invalidFields({ ...base, outputFormats: [] }), ["outputFormats"]);
  });

  await t.test("should reject relative paths", async (t) => {
    t.same(invalidFields({ ...base, outputDir: "out" }), ["outputDir"]);
    t.same(invalidFields({ ...base, input: "talk.wav" }), ["input"]);
  });

  await t.test("should report every out-of-range field", async (t) => {
    const config = {
      ...base,
      beamSize: 0,
      vad: { ...base.vad, threshold: 1.5 },
    };

    t.same(invalidFields(config), ["beamSize", "vad.threshold"]);
  });

  await t.test("should reject a malformed language", async (t) => {
    t.same(invalidFields({ ...base, language: "english" }), ["language"]);
  });

  await t.test("should reject conflicting options", async (t) => {
    try {
      validateConfig({ ...base, withoutTimestamps: true, wordTimestamps: true });
      t.fail("Should have thrown an error");
    } catch (error) {
      t.ok(error instanceof InvalidConfigurationError);
      if (error instanceof InvalidConfigurationError) {
        t.equal(error.code, "INVALID_CONFIGURATION");
        t.equal(
          error.message,
          "Invalid configuration: withoutTimestamps: cannot be combined with wordTimestamps",
        );
      }
    }

    t.same(
      invalidFields({
        ...base,
        download: { audioOnly: true, videoFormat: "best" },
      }),
      ["download.videoFormat"],
    );
  });
});

t.test("createTranscriptionConfig", async (t) => {
  await t.test("should resolve relative paths against cwd", async (t) => {
    const config = createTranscriptionConfig("talk.wav", {}, {
      cwd: "/home/user",
    });

    t.equal(config.input, "/home/user/talk.wav");
    t.equal(config.outputDir, "/home/user/output");
  });

  await t.test("should keep URLs as given, minus whitespace", async (t) => {
    const config = createTranscriptionConfig("  https://youtu.be/abc  ");

    t.equal(config.input, "https://youtu.be/abc");
  });

  await t.test("should ignore undefined overrides", async (t) => {
    const config = createTranscriptionConfig("/media/talk.wav", {
      model: undefined,
      vad: { threshold: undefined },
    });

    t.equal(config.model, "large-v3");
    t.equal(config.vad.threshold, 0.5);
  });

  await t.test("should return a frozen config", async (t) => {
    const config = createTranscriptionConfig("/media/talk.wav");

    t.ok(Object.isFrozen(config));
    t.ok(Object.isFrozen(config.vad));
    t.ok(Object.isFrozen(config.outputFormats));
  });
});

t.test("isRemoteInput", async (t) => {
  t.equal(isRemoteInput("https://youtu.be/abc"), true);
  t.equal(isRemoteInput("HTTP://example.com/a.mp3"), true);
  t.equal(isRemoteInput("ftp://example.com/a.mp3"), false);
  t.equal(isRemoteInput("/media/a.mp3"), false);
  t.equal(isRemoteInput("https://"), false);
});

t.test("formatCommandLine", async (t) => {
  t.equal(
    formatCommandLine("yt-dlp", ["-o", "/tmp/a b/%(title)s.%(ext)s", "", 'say "hi"']),
    'yt-dlp -o "/tmp/a b/%(title)s.%(ext)s" "" "say \\"hi\\""',
  );
});
