import * as path from "node:path";
import * as fs from "node:fs/promises";
import type { AudioTagger } from "../master/types.js";
import type { CommandRunner } from "../utils/exec.js";
import { summarizeToolError } from "../utils/ytdlp.js";

/**
 * Build ffmpeg arguments that copy every stream and replace the
 * artist/title tags.
 */
export function buildTagArgs(
  inputPath: string,
  outputPath: string,
  tags: { artist?: string; title: string }
): string[] {
  const args = ["-y", "-i", inputPath, "-map", "0", "-c", "copy"];
  if (tags.artist) {
    args.push("-metadata", `artist=${tags.artist}`);
  }
  args.push("-metadata", `title=${tags.title}`, outputPath);
  return args;
}

/**
 * Tags audio files with ffmpeg.
 * ffmpeg cannot write in place, so the tagged copy goes to a sibling temp
 * file that then replaces the original.
 */
export class FfmpegTagger implements AudioTagger {
  constructor(
    private readonly runner: CommandRunner,
    private readonly ffmpegPath: string,
    private readonly timeoutMs?: number
  ) {}

  async tag(filePath: string, tags: { artist?: string; title: string }): Promise<void> {
    const ext = path.extname(filePath);
    const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath, ext)}.tagging${ext}`);

    try {
      await this.runner.run(this.ffmpegPath, buildTagArgs(filePath, tempPath, tags), {
        timeoutMs: this.timeoutMs,
      });
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new Error(`Failed to tag ${path.basename(filePath)}: ${summarizeToolError(error)}`);
    }
  }
}
