/**
 * Identification module: builds the signal collector from configuration.
 */

import type { Config } from "../config/types.js";
import type { CommandRunner } from "../utils/exec.js";
import { SignalCollector } from "./collector.js";
import { AuddSource } from "./sources/audd.js";
import { AcoustIdSource } from "./sources/acoustid.js";
import { PlatformMetadataSource } from "./sources/platform-metadata.js";
import { logger } from "../utils/logger.js";

/** AcoustID only runs with an API key; the key is what makes fpcalc required */
export function acoustIdActive(config: Config): boolean {
  return config.recognition.acoustid.enabled && config.recognition.acoustid.apiKey.length > 0;
}

/**
 * Create the signal collector with sources in priority order:
 * fingerprint recognizers first, platform metadata last.
 */
export function createSignalCollector(config: Config, runner: CommandRunner): SignalCollector {
  const collector = new SignalCollector(runner, {
    ffmpegPath: config.tools.ffmpeg,
    sampleRate: config.recognition.sampleRate,
    tempDir: config.stagingDir,
    timeoutMs: config.tools.timeoutMs,
  });

  const { audd, acoustid } = config.recognition;

  if (audd.enabled) {
    collector.registerSource(new AuddSource(audd, config.requestTimeoutMs));
  }

  if (acoustIdActive(config)) {
    collector.registerSource(
      new AcoustIdSource(acoustid, config.tools.fpcalc, runner, config.requestTimeoutMs)
    );
  } else if (acoustid.enabled) {
    logger.debug("AcoustID enabled without an API key, skipping");
  }

  collector.registerSource(new PlatformMetadataSource());

  return collector;
}

export { SignalCollector } from "./collector.js";
export type { IdentitySignal, PresentSignal, SignalSource, SignalContext, SignalKind } from "./types.js";
export { isPresent } from "./types.js";
