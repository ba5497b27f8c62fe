import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { FfmpegTagger, buildTagArgs } from "./tagger.js";
import type { CommandRunner, CommandOutput } from "../utils/exec.js";

describe("buildTagArgs", () => {
  it("copies streams and sets artist and title", () => {
    expect(buildTagArgs("in.mp3", "out.mp3", { artist: "Artist A", title: "Song X" })).toEqual([
      "-y", "-i", "in.mp3", "-map", "0", "-c", "copy",
      "-metadata", "artist=Artist A",
      "-metadata", "title=Song X",
      "out.mp3",
    ]);
  });

  it("omits a missing artist", () => {
    expect(buildTagArgs("in.mp3", "out.mp3", { title: "Song X" })).toEqual([
      "-y", "-i", "in.mp3", "-map", "0", "-c", "copy", "-metadata", "title=Song X", "out.mp3",
    ]);
  });
});

describe("FfmpegTagger", () => {
  const run = vi.fn<[string, string[]], Promise<CommandOutput>>();
  const runner: CommandRunner = { run };
  let tempDir: string;
  let audioPath: string;

  beforeEach(async () => {
    run.mockReset();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "clip-miner-tagger-"));
    audioPath = path.join(tempDir, "Artist A - Song X.mp3");
    await fs.writeFile(audioPath, "untagged");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("replaces the file with the tagged copy", async () => {
    run.mockImplementation(async (_command, args) => {
      await fs.writeFile(args[args.length - 1], "tagged");
      return { stdout: "", stderr: "" };
    });

    await new FfmpegTagger(runner, "ffmpeg").tag(audioPath, { artist: "Artist A", title: "Song X" });

    expect(await fs.readFile(audioPath, "utf-8")).toBe("tagged");
    expect(await fs.readdir(tempDir)).toEqual(["Artist A - Song X.mp3"]);
  });

  it("keeps the original and removes the temp file on failure", async () => {
    run.mockImplementation(async (_command, args) => {
      await fs.writeFile(args[args.length - 1], "half");
      throw new Error("Command failed: ffmpeg");
    });

    await expect(new FfmpegTagger(runner, "ffmpeg").tag(audioPath, { title: "Song X" })).rejects.toThrow(
      "Failed to tag Artist A - Song X.mp3: Command failed: ffmpeg"
    );
    expect(await fs.readFile(audioPath, "utf-8")).toBe("untagged");
    expect(await fs.readdir(tempDir)).toEqual(["Artist A - Song X.mp3"]);
  });
});
