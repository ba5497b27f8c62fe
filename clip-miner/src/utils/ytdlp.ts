/**
 * Helpers shared by everything that drives yt-dlp.
 */

import * as path from "node:path";
import { isRecord } from "./fields.js";
import type { JsonRecord } from "./fields.js";

/** Output template that prints a JSON summary once the file is in place */
export const AFTER_MOVE_SUMMARY = "after_move:%(.{filepath,ext,title,uploader,track,artist,duration})j";

/** Base arguments every yt-dlp run uses */
export function baseYtDlpArgs(ffmpegPath: string): string[] {
  const args = ["--no-playlist", "--no-warnings", "--no-check-certificates", "--no-progress"];
  // A bare command name is resolved from PATH by yt-dlp itself
  if (path.isAbsolute(ffmpegPath)) {
    args.push("--ffmpeg-location", ffmpegPath);
  }
  return args;
}

/**
 * Parse the last JSON object printed on stdout.
 * yt-dlp may print other lines before it.
 */
export function parseLastJsonLine(stdout: string): JsonRecord | undefined {
  const lines = stdout.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
  for (let i = lines.length - 1; i >= 0; i--) {
    if (!lines[i].startsWith("{")) continue;
    try {
      const parsed: unknown = JSON.parse(lines[i]);
      if (isRecord(parsed)) return parsed;
    } catch {
      // Keep scanning upwards
    }
  }
  return undefined;
}

/**
 * Reduce a failed tool run to one readable line.
 * Prefers yt-dlp's own "ERROR:" line over the generic "Command failed" text.
 */
export function summarizeToolError(error: unknown): string {
  const stderr =
    isRecord(error) && typeof error.stderr === "string" ? error.stderr : "";
  const message = error instanceof Error ? error.message : String(error);

  if (isRecord(error) && error.killed === true) {
    return "Timed out";
  }

  const lines = `${stderr}\n${message}`.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
  const errorLine = lines.find((l) => l.startsWith("ERROR:"));
  return errorLine ?? lines[0] ?? "Unknown error";
}
