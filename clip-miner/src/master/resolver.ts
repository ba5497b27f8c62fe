/**
 * Finds and downloads a full-length master for an identified clip.
 */

import type { MasterConfig, ProgressCallback } from "../config/types.js";
import type { ConsensusVerdict } from "../consensus/types.js";
import { isResolvable } from "../consensus/types.js";
import type { AudioTagger, CatalogClient, MasterCandidate, MasterOutcome } from "./types.js";
import { sanitizeFilename, splitLabel } from "../output/label.js";
import { describeError } from "../errors.js";
import { logger } from "../utils/logger.js";

export interface DurationWindow {
  minSeconds: number;
  maxSeconds: number;
  inclusive: boolean;
}

/**
 * Whether a duration is inside the acceptance window.
 * Short edits and hour-long mixes both fall outside the default (110, 600).
 */
export function isWithinWindow(durationSeconds: number | undefined, window: DurationWindow): boolean {
  if (durationSeconds === undefined) {
    return false;
  }
  return window.inclusive
    ? durationSeconds >= window.minSeconds && durationSeconds <= window.maxSeconds
    : durationSeconds > window.minSeconds && durationSeconds < window.maxSeconds;
}

/** First candidate, in catalog order, inside the window */
export function selectCandidate(
  candidates: MasterCandidate[],
  window: DurationWindow
): MasterCandidate | undefined {
  return candidates.find((c) => isWithinWindow(c.durationSeconds, window));
}

export function buildQuery(label: string, qualifier: string): string {
  return qualifier ? `${label} ${qualifier}` : label;
}

export class MasterResolver {
  private readonly window: DurationWindow;

  constructor(
    private readonly catalog: CatalogClient,
    private readonly tagger: AudioTagger,
    private readonly config: MasterConfig
  ) {
    this.window = {
      minSeconds: config.minDurationSeconds,
      maxSeconds: config.maxDurationSeconds,
      inclusive: config.inclusiveBounds,
    };
  }

  /**
   * Resolve a master for the verdict into itemDir.
   * Never throws: search and download errors come back as FAILED.
   */
  async resolve(
    verdict: ConsensusVerdict,
    itemDir: string,
    onProgress?: ProgressCallback
  ): Promise<MasterOutcome> {
    if (!this.config.enabled) {
      return { status: "SKIPPED", reason: "Master resolution disabled" };
    }
    if (!isResolvable(verdict)) {
      return { status: "SKIPPED", reason: `Verdict is ${verdict.status}` };
    }

    const query = buildQuery(verdict.winningLabel, this.config.queryQualifier);
    onProgress?.(`Searching catalog: ${query}`);

    let candidates: MasterCandidate[];
    try {
      candidates = await this.catalog.search(query, this.config.searchCount);
    } catch (error) {
      return { status: "FAILED", query, reason: describeError(error) };
    }

    const candidate = selectCandidate(candidates, this.window);
    if (!candidate) {
      logger.debug(
        `No candidate in window: ${candidates.map((c) => c.durationSeconds ?? "?").join(", ")}`
      );
      return { status: "NOT_FOUND", query, candidates: candidates.length };
    }

    onProgress?.(`Downloading master: ${candidate.title} (${candidate.durationSeconds}s)`);

    let filePath: string;
    try {
      filePath = await this.catalog.downloadAudio(candidate, itemDir, sanitizeFilename(verdict.winningLabel));
    } catch (error) {
      return { status: "FAILED", query, reason: describeError(error) };
    }

    let tagged = true;
    try {
      await this.tagger.tag(filePath, splitLabel(verdict.winningLabel));
    } catch (error) {
      tagged = false;
      logger.warn(describeError(error));
    }

    return { status: "DOWNLOADED", query, candidate, filePath, tagged };
  }
}
