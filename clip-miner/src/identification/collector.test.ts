import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { SignalCollector } from "./collector.js";
import { buildNormalizeArgs } from "./normalize.js";
import { acoustIdActive, createSignalCollector } from "./index.js";
import { DEFAULT_CONFIG, mergeConfig } from "../config/config.js";
import type { SignalSource, SignalContext, SignalKind } from "./types.js";
import type { CommandRunner, CommandOutput } from "../utils/exec.js";

function fakeSource(
  name: string,
  kind: SignalKind,
  identify: (context: SignalContext) => Promise<string | null>,
  requiresAudio = kind === "fingerprint"
): SignalSource {
  return { name, kind, requiresAudio, identify };
}

describe("buildNormalizeArgs", () => {
  it("converts to mono 16-bit PCM without video or tags", () => {
    expect(buildNormalizeArgs("in.mp4", "out.wav", 44_100)).toEqual([
      "-y", "-i", "in.mp4", "-vn", "-acodec", "pcm_s16le", "-ar", "44100", "-ac", "1", "-map_metadata", "-1", "out.wav",
    ]);
  });
});

describe("SignalCollector", () => {
  let tempDir: string;
  const run = vi.fn<[string, string[]], Promise<CommandOutput>>();
  const runner: CommandRunner = { run };

  function createCollector(): SignalCollector {
    return new SignalCollector(runner, { ffmpegPath: "/opt/ffmpeg", sampleRate: 44_100, tempDir });
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "clip-miner-collector-"));
    run.mockReset();
    // ffmpeg stand-in: writes the output file (last argument)
    run.mockImplementation(async (_command, args) => {
      await fs.writeFile(args[args.length - 1], "RIFF");
      return { stdout: "", stderr: "" };
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("returns one signal per source in registration order", async () => {
    const collector = createCollector();
    collector.registerSources([
      fakeSource("audd", "fingerprint", async () => "Artist A - Song X"),
      fakeSource("acoustid", "fingerprint", async () => null),
      fakeSource("platform-metadata", "metadata", async () => "Artist A - Song X (Official) #fyp"),
    ]);

    const signals = await collector.collect("/clips/ref.mp4");

    expect(signals).toEqual([
      { source: "audd", kind: "fingerprint", present: true, label: "Artist A - Song X" },
      { source: "acoustid", kind: "fingerprint", present: false },
      { source: "platform-metadata", kind: "metadata", present: true, label: "Artist A - Song X" },
    ]);
  });

  it("records a rejected source with its reason", async () => {
    const collector = createCollector();
    collector.registerSource(
      fakeSource("audd", "fingerprint", async () => {
        throw new Error("AudD refused the request: limit reached");
      })
    );

    const signals = await collector.collect("/clips/ref.mp4");

    expect(signals).toEqual([
      { source: "audd", kind: "fingerprint", present: false, reason: "AudD refused the request: limit reached" },
    ]);
  });

  it("treats a label that cleans to nothing as absent", async () => {
    const collector = createCollector();
    collector.registerSource(fakeSource("platform-metadata", "metadata", async () => "#fyp #viral 🔥"));

    const signals = await collector.collect("/clips/ref.mp4");

    expect(signals).toEqual([{ source: "platform-metadata", kind: "metadata", present: false }]);
  });

  it("hands the normalized file to audio sources and deletes it afterwards", async () => {
    const seen: SignalContext[] = [];
    const collector = createCollector();
    collector.registerSource(
      fakeSource("audd", "fingerprint", async (context) => {
        seen.push(context);
        await fs.access(context.normalizedPath ?? "");
        return "Artist A - Song X";
      })
    );

    await collector.collect("/clips/ref.mp4");

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0]).toBe("/opt/ffmpeg");
    expect(seen[0].mediaPath).toBe("/clips/ref.mp4");
    expect(path.basename(seen[0].normalizedPath ?? "")).toMatch(/^clean_ref_\d+_[0-9a-f]{6}\.wav$/);
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("uses the raw file when normalization fails", async () => {
    run.mockRejectedValue(new Error("ffmpeg: Invalid data found when processing input"));
    const seen: SignalContext[] = [];
    const collector = createCollector();
    collector.registerSource(
      fakeSource("audd", "fingerprint", async (context) => {
        seen.push(context);
        return null;
      })
    );

    await collector.collect("/clips/ref.mp4");

    expect(seen[0].normalizedPath).toBeUndefined();
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("skips normalization when no source needs audio", async () => {
    const collector = createCollector();
    collector.registerSource(fakeSource("platform-metadata", "metadata", async (context) => context.metadata?.title ?? null));

    const signals = await collector.collect("/clips/ref.mp4", { provider: "tikwm", title: "Song X" });

    expect(run).not.toHaveBeenCalled();
    expect(signals).toEqual([{ source: "platform-metadata", kind: "metadata", present: true, label: "Song X" }]);
  });
});

describe("createSignalCollector", () => {
  const runner: CommandRunner = { run: vi.fn<[string, string[]], Promise<CommandOutput>>() };

  it("registers AcoustID only with an API key", () => {
    expect(createSignalCollector(DEFAULT_CONFIG, runner).getSourceNames()).toEqual(["audd", "platform-metadata"]);
    expect(acoustIdActive(DEFAULT_CONFIG)).toBe(false);

    const withKey = mergeConfig(DEFAULT_CONFIG, { recognition: { acoustid: { apiKey: "test-secret" } } });
    expect(acoustIdActive(withKey)).toBe(true);
    expect(createSignalCollector(withKey, runner).getSourceNames()).toEqual(["audd", "acoustid", "platform-metadata"]);
  });

  it("leaves out disabled recognizers", () => {
    const config = mergeConfig(DEFAULT_CONFIG, {
      recognition: { audd: { enabled: false }, acoustid: { enabled: false, apiKey: "test-secret" } },
    });
    expect(createSignalCollector(config, runner).getSourceNames()).toEqual(["platform-metadata"]);
  });
});
