import * as fs from "node:fs/promises";

import type { CliFlags, Config, ProgressCallback } from "./config/types.js";
import { loadConfig, applyFlags, resolveErrorLogPath } from "./config/config.js";
import type { CommandRunner } from "./utils/exec.js";
import { PooledCommandRunner } from "./utils/exec.js";
import { extractUrls } from "./utils/urls.js";
import { verifyRequiredTools } from "./utils/startup.js";
import { createAcquisitionChain } from "./acquisition/index.js";
import { acoustIdActive, createSignalCollector } from "./identification/index.js";
import { createConsensusEngine } from "./consensus/index.js";
import { createMasterResolver } from "./master/index.js";
import { BatchOrchestrator } from "./batch/orchestrator.js";
import type { BatchListener, BatchResult } from "./batch/types.js";
import { describeError } from "./errors.js";
import { logger } from "./utils/logger.js";

export interface MineOptions {
  onEvent?: BatchListener;
  /** Polled before each item starts; true stops the batch */
  shouldStop?: () => boolean;
  onProgress?: ProgressCallback;
  /** Replaces the process-backed runner */
  runner?: CommandRunner;
}

/**
 * Turn CLI inputs into the batch's URL list.
 * Each input is a URL or a path to a text file (e.g. a chat export).
 * Order of first appearance is kept; duplicates across inputs are dropped.
 */
export async function collectInputUrls(inputs: string[], knownDomains: string[]): Promise<string[]> {
  const texts: string[] = [];

  for (const input of inputs) {
    if (/^https?:\/\//i.test(input)) {
      texts.push(input);
      continue;
    }
    try {
      texts.push(await fs.readFile(input, "utf-8"));
    } catch (error) {
      throw new Error(`Cannot read input file ${input}: ${describeError(error)}`);
    }
  }

  const urls = extractUrls(texts.join("\n"), knownDomains);
  if (urls.length === 0) {
    throw new Error(`No supported URLs found (known domains: ${knownDomains.join(", ")})`);
  }
  return urls;
}

/**
 * Build the pipeline for a loaded config.
 */
export function createOrchestrator(config: Config, runner: CommandRunner, options: MineOptions = {}): BatchOrchestrator {
  return new BatchOrchestrator(
    {
      chain: createAcquisitionChain(config, runner),
      collector: createSignalCollector(config, runner),
      consensus: createConsensusEngine(config.consensus),
      resolver: createMasterResolver(config, runner),
    },
    {
      outputDir: config.outputDir,
      stagingDir: config.stagingDir,
      errorLogPath: resolveErrorLogPath(config),
      mediaKind: config.mediaKind,
      concurrency: config.concurrency,
      shouldStop: options.shouldStop,
    },
    options.onEvent
  );
}

/**
 * Main entry point: load config, check tools, collect URLs, run the batch.
 */
export async function mineClips(inputs: string[], flags: CliFlags, options: MineOptions = {}): Promise<BatchResult> {
  logger.setDebug(flags.debug);
  const onProgress: ProgressCallback = options.onProgress ?? ((msg) => console.log(msg));

  const config = applyFlags(await loadConfig(flags.config), flags);
  const runner = options.runner ?? new PooledCommandRunner(config.tools.concurrency, config.tools.timeoutMs);

  await verifyRequiredTools(config.tools, acoustIdActive(config), runner, onProgress);

  const urls = await collectInputUrls(inputs, config.knownDomains);
  onProgress(`Found ${urls.length} URL(s)\n`);

  return createOrchestrator(config, runner, options).run(urls);
}
