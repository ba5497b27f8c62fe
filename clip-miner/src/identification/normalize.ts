import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner } from "../utils/exec.js";
import { uniqueStem } from "../utils/names.js";
import { summarizeToolError } from "../utils/ytdlp.js";
import { logger } from "../utils/logger.js";

export interface NormalizeOptions {
  /** Resolved ffmpeg location; never read from process-wide state */
  ffmpegPath: string;
  sampleRate: number;
  /** Directory the temporary WAV is written to */
  tempDir: string;
  timeoutMs?: number;
}

/**
 * Build FFmpeg arguments that turn any clip into 16-bit mono PCM at a fixed
 * rate, dropping video and every container tag.
 */
export function buildNormalizeArgs(inputPath: string, outputPath: string, sampleRate: number): string[] {
  return [
    "-y",
    "-i", inputPath,
    "-vn",
    "-acodec", "pcm_s16le",
    "-ar", String(sampleRate),
    "-ac", "1",
    "-map_metadata", "-1",
    outputPath,
  ];
}

/**
 * Normalize a clip for fingerprinting.
 * Returns the temporary WAV path (caller deletes it), or null when ffmpeg
 * fails; the caller then falls back to the raw file.
 */
export async function normalizeForFingerprint(
  inputPath: string,
  runner: CommandRunner,
  options: NormalizeOptions
): Promise<string | null> {
  const base = path.basename(inputPath, path.extname(inputPath));
  const outputPath = path.join(options.tempDir, `${uniqueStem(`clean_${base}`)}.wav`);

  try {
    await fs.mkdir(options.tempDir, { recursive: true });
    await runner.run(
      options.ffmpegPath,
      buildNormalizeArgs(inputPath, outputPath, options.sampleRate),
      { timeoutMs: options.timeoutMs }
    );
    await fs.access(outputPath);
    return outputPath;
  } catch (error) {
    logger.error(`Audio normalization failed: ${summarizeToolError(error)}`);
    await fs.rm(outputPath, { force: true });
    return null;
  }
}
