import { execFile } from "node:child_process";
import { promisify } from "node:util";
import pLimit from "p-limit";
import type { LimitFunction } from "p-limit";
import { logger } from "./logger.js";

const execFileAsync = promisify(execFile);

/** Captured output of an external tool run */
export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Runs external tools (yt-dlp, ffmpeg, fpcalc).
 * Implementations reject when the tool exits non-zero or times out.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandOutput>;
}

const DEFAULT_TIMEOUT = 120_000;
const MAX_BUFFER = 32 * 1024 * 1024;

/**
 * Command runner backed by child processes.
 * A shared limiter caps how many tool processes run at once, so extractor
 * runs for one batch item cannot starve the others.
 */
export class PooledCommandRunner implements CommandRunner {
  private readonly limit: LimitFunction;

  constructor(
    concurrency: number,
    private readonly defaultTimeoutMs: number = DEFAULT_TIMEOUT
  ) {
    this.limit = pLimit(concurrency);
  }

  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandOutput> {
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;

    return this.limit(async () => {
      logger.debug(`Executing: ${command} ${args.map(quoteArg).join(" ")}`);
      const { stdout, stderr } = await execFileAsync(command, args, {
        timeout,
        maxBuffer: MAX_BUFFER,
        encoding: "utf-8",
      });

      if (stderr) {
        logger.debug(`${command} stderr: ${stderr.trim()}`);
      }

      return { stdout, stderr };
    });
  }
}

function quoteArg(arg: string): string {
  return /[\s"']/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg;
}
