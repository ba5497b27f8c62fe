/**
 * Native extractor tier: yt-dlp run under one client-identity strategy.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import type {
  AcquisitionProvider,
  AcquisitionRequest,
  AcquisitionOutcome,
  PlatformMetadata,
} from "../types.js";
import { providerFailure } from "../types.js";
import type { NativeStrategy } from "../strategies.js";
import type { CommandRunner } from "../../utils/exec.js";
import type { JsonRecord } from "../../utils/fields.js";
import { getString } from "../../utils/fields.js";
import { uniqueStem } from "../../utils/names.js";
import {
  AFTER_MOVE_SUMMARY,
  baseYtDlpArgs,
  parseLastJsonLine,
  summarizeToolError,
} from "../../utils/ytdlp.js";
import { describeError } from "../../errors.js";
import { logger } from "../../utils/logger.js";
import { extensionOf, removeStagedFiles } from "./staging.js";

export interface NativeExtractorOptions {
  ytDlpPath: string;
  ffmpegPath: string;
  timeoutMs: number;
}

/**
 * One provider per strategy, so the chain records each identity as its own
 * attempt. Runs go through the shared command runner, whose pool bounds
 * how many extractor processes exist at once.
 */
export class NativeExtractorProvider implements AcquisitionProvider {
  readonly name: string;
  readonly tier = "native";

  constructor(
    private readonly strategy: NativeStrategy,
    private readonly runner: CommandRunner,
    private readonly options: NativeExtractorOptions
  ) {
    this.name = `native:${strategy.name}`;
  }

  supports(url: URL): boolean {
    return url.protocol === "https:" || url.protocol === "http:";
  }

  async acquire(request: AcquisitionRequest): Promise<AcquisitionOutcome> {
    const stem = uniqueStem(`ref_native-${this.strategy.name}`);

    try {
      await fs.mkdir(request.targetDir, { recursive: true });

      const delay = this.strategy.delayBeforeAttemptMs();
      if (delay > 0) {
        logger.debug(`${this.name}: waiting ${delay}ms before attempt`);
        await sleep(delay);
      }

      const { stdout } = await this.runner.run(
        this.options.ytDlpPath,
        this.buildArgs(request, stem),
        { timeoutMs: this.options.timeoutMs }
      );

      const summary = parseLastJsonLine(stdout);
      const filePath = await this.locateOutput(request.targetDir, stem, summary);
      if (!filePath) {
        await removeStagedFiles(request.targetDir, stem);
        return providerFailure(this.name, "Extractor finished without producing a file");
      }

      return {
        ok: true,
        result: {
          filePath,
          extension: extensionOf(filePath) ?? getString(summary, "ext") ?? "bin",
          provider: this.name,
          metadata: summary ? parseNativeMetadata(summary, this.name) : undefined,
        },
      };
    } catch (error) {
      await removeStagedFiles(request.targetDir, stem).catch((cleanupError: unknown) => {
        logger.warn(`${this.name}: could not clean staging: ${describeError(cleanupError)}`);
      });
      return providerFailure(this.name, summarizeToolError(error));
    }
  }

  private buildArgs(request: AcquisitionRequest, stem: string): string[] {
    const format = request.mediaKind === "audio" ? "bestaudio/best" : "best/bestvideo+bestaudio";
    return [
      ...baseYtDlpArgs(this.options.ffmpegPath),
      "-f",
      format,
      "-o",
      path.join(request.targetDir, `${stem}.%(ext)s`),
      "--no-simulate",
      "--print",
      AFTER_MOVE_SUMMARY,
      ...this.strategy.buildArgs(),
      request.url,
    ];
  }

  /**
   * Trust the printed filepath when it exists; otherwise look for a finished
   * file carrying the attempt's stem.
   */
  private async locateOutput(
    dir: string,
    stem: string,
    summary: JsonRecord | undefined
  ): Promise<string | undefined> {
    const printed = getString(summary, "filepath");
    if (printed && (await isFile(printed))) {
      return printed;
    }

    const entries = await fs.readdir(dir);
    const finished = entries.find(
      (e) => e.startsWith(`${stem}.`) && !e.endsWith(".part") && !e.endsWith(".ytdl")
    );
    return finished ? path.join(dir, finished) : undefined;
  }
}

/**
 * Prefer the music fields (track/artist) where the platform has them; the
 * post title and uploader become the secondary pair.
 */
export function parseNativeMetadata(summary: JsonRecord, provider: string): PlatformMetadata {
  const title = getString(summary, "title");
  const uploader = getString(summary, "uploader");
  return {
    provider,
    title: getString(summary, "track") ?? title,
    author: getString(summary, "artist") ?? uploader,
    secondaryTitle: title,
    secondaryAuthor: uploader,
  };
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
