/**
 * yt-dlp backed catalog: "ytsearchN:" queries and audio-only downloads.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CatalogClient, MasterCandidate } from "./types.js";
import type { CommandRunner } from "../utils/exec.js";
import { getArray, getNumber, getString, isRecord } from "../utils/fields.js";
import { AFTER_MOVE_SUMMARY, baseYtDlpArgs, parseLastJsonLine, summarizeToolError } from "../utils/ytdlp.js";

export interface YtDlpCatalogOptions {
  ytDlpPath: string;
  ffmpegPath: string;
  timeoutMs: number;
  audioFormat: string;
  audioQuality: string;
}

export class YtDlpCatalog implements CatalogClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: YtDlpCatalogOptions
  ) {}

  async search(query: string, count: number): Promise<MasterCandidate[]> {
    let stdout: string;
    try {
      ({ stdout } = await this.runner.run(
        this.options.ytDlpPath,
        [
          "--flat-playlist",
          "--dump-single-json",
          "--no-warnings",
          `ytsearch${count}:${query}`,
        ],
        { timeoutMs: this.options.timeoutMs }
      ));
    } catch (error) {
      throw new Error(`Catalog search failed: ${summarizeToolError(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch {
      throw new Error("Catalog search returned invalid JSON");
    }
    return parseSearchResults(parsed);
  }

  async downloadAudio(candidate: MasterCandidate, dir: string, baseName: string): Promise<string> {
    const template = path.join(dir, `${baseName}.%(ext)s`);

    let stdout: string;
    try {
      ({ stdout } = await this.runner.run(
        this.options.ytDlpPath,
        [
          ...baseYtDlpArgs(this.options.ffmpegPath),
          "-f", "bestaudio/best",
          "-x",
          "--audio-format", this.options.audioFormat,
          "--audio-quality", this.options.audioQuality,
          "-o", template,
          "--no-simulate",
          "--print", AFTER_MOVE_SUMMARY,
          candidate.url,
        ],
        { timeoutMs: this.options.timeoutMs }
      ));
    } catch (error) {
      throw new Error(`Master download failed: ${summarizeToolError(error)}`);
    }

    // After -x the printed filepath is the converted file
    const printed = getString(parseLastJsonLine(stdout), "filepath");
    const expected = printed ?? path.join(dir, `${baseName}.${this.options.audioFormat}`);
    try {
      await fs.access(expected);
    } catch {
      throw new Error(`Master download produced no file at ${expected}`);
    }
    return expected;
  }
}

/**
 * Candidates from a flat-playlist search dump, in catalog order.
 * Entries without a usable URL are dropped.
 */
export function parseSearchResults(payload: unknown): MasterCandidate[] {
  const candidates: MasterCandidate[] = [];

  for (const entry of getArray(payload, "entries")) {
    if (!isRecord(entry)) continue;

    const url = getString(entry, "webpage_url") ?? getString(entry, "url");
    if (!url) continue;

    candidates.push({
      url,
      title: getString(entry, "title") ?? url,
      durationSeconds: getNumber(entry, "duration"),
    });
  }

  return candidates;
}
