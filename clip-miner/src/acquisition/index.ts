/**
 * Acquisition module: builds the provider chain from configuration.
 */

import type { Config } from "../config/types.js";
import type { CommandRunner } from "../utils/exec.js";
import { AcquisitionChain } from "./chain.js";
import { TikwmProvider } from "./providers/tikwm.js";
import { CobaltProvider } from "./providers/cobalt.js";
import { NativeExtractorProvider } from "./providers/native.js";
import { createStrategy } from "./strategies.js";

/**
 * Create the acquisition chain: platform relays, the universal relay, then
 * one native extractor provider per configured strategy.
 */
export function createAcquisitionChain(config: Config, runner: CommandRunner): AcquisitionChain {
  const chain = new AcquisitionChain();
  const { tikwm, cobalt, native } = config.acquisition;

  if (tikwm.enabled) {
    chain.registerProvider(new TikwmProvider(tikwm, config.requestTimeoutMs));
  }

  if (cobalt.enabled) {
    chain.registerProvider(new CobaltProvider(cobalt, config.requestTimeoutMs));
  }

  if (native.enabled) {
    for (const name of native.strategies) {
      chain.registerProvider(
        new NativeExtractorProvider(createStrategy(name, native.randomDelayMs), runner, {
          ytDlpPath: config.tools.ytDlp,
          ffmpegPath: config.tools.ffmpeg,
          timeoutMs: config.tools.timeoutMs,
        })
      );
    }
  }

  return chain;
}

export { AcquisitionChain } from "./chain.js";
export type {
  AcquisitionProvider,
  AcquisitionRequest,
  AcquisitionResult,
  AcquisitionOutcome,
  AcquisitionAttempt,
  ChainOutcome,
  PlatformMetadata,
  ProviderFailure,
} from "./types.js";
