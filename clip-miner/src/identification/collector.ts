/**
 * Runs every signal source over one acquired clip.
 */

import * as fs from "node:fs/promises";
import type { SignalSource, SignalContext, IdentitySignal } from "./types.js";
import type { PlatformMetadata } from "../acquisition/types.js";
import type { CommandRunner } from "../utils/exec.js";
import { normalizeForFingerprint } from "./normalize.js";
import { cleanLabel } from "../output/label.js";
import { describeError } from "../errors.js";
import { logger } from "../utils/logger.js";

export interface CollectorOptions {
  ffmpegPath: string;
  sampleRate: number;
  tempDir: string;
  timeoutMs?: number;
}

/**
 * Collects identity signals from registered sources.
 *
 * Registration order is priority order: consensus tie-breaks prefer earlier
 * sources, so fingerprint recognizers are registered before metadata.
 */
export class SignalCollector {
  private sources: SignalSource[] = [];

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: CollectorOptions
  ) {}

  /**
   * Register a signal source.
   */
  registerSource(source: SignalSource): void {
    this.sources.push(source);
    logger.debug(`Registered signal source: ${source.name}`);
  }

  registerSources(sources: SignalSource[]): void {
    sources.forEach((s) => this.registerSource(s));
  }

  getSourceNames(): string[] {
    return this.sources.map((s) => s.name);
  }

  /**
   * Run all sources concurrently against the clip.
   * Returns one signal per registered source, in registration order.
   * The normalized WAV is removed once every source has settled.
   */
  async collect(mediaPath: string, metadata?: PlatformMetadata): Promise<IdentitySignal[]> {
    const context: SignalContext = { mediaPath, metadata };

    const needsAudio = this.sources.some((s) => s.requiresAudio);
    if (needsAudio) {
      const normalized = await normalizeForFingerprint(mediaPath, this.runner, this.options);
      if (normalized) {
        context.normalizedPath = normalized;
      } else {
        logger.warn("Audio normalization failed, fingerprinting the raw file");
      }
    }

    try {
      const results = await Promise.allSettled(this.sources.map((source) => source.identify(context)));

      return results.map((result, i): IdentitySignal => {
        const source = this.sources[i];
        const base = { source: source.name, kind: source.kind };

        if (result.status === "rejected") {
          const reason = describeError(result.reason);
          logger.warn(`✗ ${source.name}: ${reason}`);
          return { ...base, present: false, reason };
        }

        const label = result.value === null ? "" : cleanLabel(result.value);
        if (!label) {
          logger.debug(`- ${source.name}: No result`);
          return { ...base, present: false };
        }

        logger.info(`✓ ${source.name}: ${label}`);
        return { ...base, present: true, label };
      });
    } finally {
      if (context.normalizedPath) {
        await fs.rm(context.normalizedPath, { force: true });
      }
    }
  }
}
