import type { Config } from "../config/types.js";
import type { CommandRunner } from "../utils/exec.js";
import { MasterResolver } from "./resolver.js";
import { YtDlpCatalog } from "./catalog.js";
import { FfmpegTagger } from "../output/tagger.js";

export function createMasterResolver(config: Config, runner: CommandRunner): MasterResolver {
  const catalog = new YtDlpCatalog(runner, {
    ytDlpPath: config.tools.ytDlp,
    ffmpegPath: config.tools.ffmpeg,
    timeoutMs: config.tools.timeoutMs,
    audioFormat: config.master.audioFormat,
    audioQuality: config.master.audioQuality,
  });
  const tagger = new FfmpegTagger(runner, config.tools.ffmpeg, config.tools.timeoutMs);
  return new MasterResolver(catalog, tagger, config.master);
}

export { MasterResolver, isWithinWindow, selectCandidate } from "./resolver.js";
export type { DurationWindow } from "./resolver.js";
export type { MasterCandidate, MasterOutcome, CatalogClient, AudioTagger } from "./types.js";
