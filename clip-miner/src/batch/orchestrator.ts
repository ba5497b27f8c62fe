/**
 * Batch orchestrator: runs every URL through acquisition, identification
 * and master resolution, isolating failures per item.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import pLimit from "p-limit";
import type { MediaKind } from "../config/types.js";
import type { AcquisitionChain } from "../acquisition/chain.js";
import type { AcquisitionResult } from "../acquisition/types.js";
import type { SignalCollector } from "../identification/collector.js";
import type { IdentitySignal } from "../identification/types.js";
import type { ConsensusEngine } from "../consensus/engine.js";
import type { ConsensusVerdict } from "../consensus/types.js";
import { isResolvable } from "../consensus/types.js";
import type { MasterResolver } from "../master/resolver.js";
import type { MasterOutcome } from "../master/types.js";
import type {
  AcquisitionSummary,
  BatchEvent,
  BatchItemReport,
  BatchListener,
  BatchResult,
  FailureKind,
  ItemFailure,
  ItemFiles,
  ItemIssue,
  ItemOutcome,
  ItemStage,
} from "./types.js";
import type { MediaProbe } from "../output/probe.js";
import { probeMedia } from "../output/probe.js";
import {
  BATCH_REPORT_NAME,
  ITEM_REPORT_NAME,
  appendBatchReport,
  appendErrorLog,
  generateReportContent,
  writeItemReport,
} from "../output/report.js";
import { sanitizeFilename } from "../output/label.js";
import { zeroPad } from "../utils/names.js";
import { FatalIOError, describeError } from "../errors.js";
import { logger } from "../utils/logger.js";

export const STOPPED_REASON = "Batch stopped before processing";

export interface BatchDependencies {
  chain: Pick<AcquisitionChain, "acquire">;
  collector: Pick<SignalCollector, "collect">;
  consensus: Pick<ConsensusEngine, "evaluate">;
  resolver: Pick<MasterResolver, "resolve">;
  /** Defaults to the music-metadata probe */
  probe?: (filePath: string) => Promise<MediaProbe | undefined>;
}

export interface BatchOptions {
  outputDir: string;
  stagingDir: string;
  errorLogPath: string;
  mediaKind: MediaKind;
  /** Items processed at once; 1 = sequential */
  concurrency: number;
  /** Checked before each item starts */
  shouldStop?: () => boolean;
}

/** Mutable state of one item while it moves through the stages */
interface ItemDraft {
  index: number;
  url: string;
  stage: ItemStage;
  acquisition?: AcquisitionSummary;
  signals: IdentitySignal[];
  verdict?: ConsensusVerdict;
  master?: MasterOutcome;
  files: ItemFiles;
  issues: ItemIssue[];
}

/** Terminal failure of one item, carrying the stage it happened in */
class ItemFailedError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string
  ) {
    super(message);
    this.name = "ItemFailedError";
  }
}

export class BatchOrchestrator {
  private readonly probe: (filePath: string) => Promise<MediaProbe | undefined>;

  constructor(
    private readonly deps: BatchDependencies,
    private readonly options: BatchOptions,
    private readonly listener: BatchListener = () => undefined
  ) {
    this.probe = deps.probe ?? probeMedia;
  }

  /**
   * Process every URL. Always emits a completion event, and returns one
   * report per URL in input order.
   */
  async run(urls: string[]): Promise<BatchResult> {
    const reportPath = path.join(this.options.outputDir, BATCH_REPORT_NAME);
    const reports: BatchItemReport[] = [];

    // An unusable output or staging directory fails every item, not the batch
    let setupFailure: string | undefined;
    try {
      await ensureDir(this.options.outputDir);
      await ensureDir(this.options.stagingDir);
    } catch (error) {
      setupFailure = describeError(error);
      logger.error(setupFailure);
    }

    try {
      const limit = pLimit(Math.max(1, this.options.concurrency));
      const settled = await Promise.all(
        urls.map((url, i) => limit(() => this.processItem(url, i + 1, urls.length, reportPath, setupFailure)))
      );
      reports.push(...settled);
    } finally {
      const counts = countOutcomes(reports);
      this.emit({ type: "complete", total: urls.length, ...counts, reportPath });
    }

    return { reports, ...countOutcomes(reports), reportPath, errorLogPath: this.options.errorLogPath };
  }

  private async processItem(
    url: string,
    index: number,
    total: number,
    reportPath: string,
    setupFailure?: string
  ): Promise<BatchItemReport> {
    const draft: ItemDraft = { index, url, stage: "PENDING", signals: [], files: {}, issues: [] };
    const progress = (message: string) =>
      this.emit({ type: "item", index, total, url, stage: draft.stage, message });
    const advance = (stage: ItemStage, message: string) => {
      draft.stage = stage;
      progress(message);
    };

    let report: BatchItemReport;

    if (setupFailure !== undefined) {
      report = await this.fail(draft, { kind: "FatalIOFailure", stage: "ACQUIRING", reason: setupFailure });
    } else if (this.options.shouldStop?.()) {
      report = await this.fail(draft, { kind: "Stopped", stage: "PENDING", reason: STOPPED_REASON });
    } else {
      try {
        report = await this.runStages(draft, advance, progress);
      } catch (error) {
        const kind: FailureKind =
          error instanceof ItemFailedError ? error.kind : error instanceof FatalIOError ? "FatalIOFailure" : "InternalError";
        report = await this.fail(draft, { kind, stage: draft.stage, reason: describeError(error) });
      }
    }

    this.emit({
      type: "item",
      index,
      total,
      url,
      stage: report.stage,
      message: terminalMessage(report),
      outcome: report.outcome,
    });

    await this.recordBatchLine(reportPath, report);
    return report;
  }

  private async runStages(
    draft: ItemDraft,
    advance: (stage: ItemStage, message: string) => void,
    progress: (message: string) => void
  ): Promise<BatchItemReport> {
    advance("ACQUIRING", "Acquiring media");
    const acquired = await this.deps.chain.acquire({
      url: draft.url,
      targetDir: this.options.stagingDir,
      mediaKind: this.options.mediaKind,
    });
    if (!acquired.ok) {
      throw new ItemFailedError("ProviderFailure", acquired.failure.reason);
    }

    const { result } = acquired;
    draft.acquisition = {
      provider: result.provider,
      attempts: acquired.attempts,
      metadata: result.metadata,
    };

    advance("IDENTIFYING", `Acquired via ${result.provider}`);
    let verdict: ConsensusVerdict;
    let itemDir: string;
    try {
      draft.acquisition.probe = await this.probe(result.filePath);
      draft.signals = await this.deps.collector.collect(result.filePath, result.metadata);
      verdict = this.deps.consensus.evaluate(draft.signals);
      draft.verdict = verdict;
      progress(`${verdict.status}: ${verdict.winningLabel}`);

      itemDir = await this.fileReference(draft, result, verdict);
    } finally {
      // Only still staged when filing did not happen
      if (!draft.files.reference) {
        await fs.rm(result.filePath, { force: true });
      }
    }

    for (const signal of draft.signals) {
      if (!signal.present && signal.reason) {
        draft.issues.push({ kind: "RecognitionFailure", message: `${signal.source}: ${signal.reason}` });
      }
    }
    if (verdict.status === "CONFLICT") {
      draft.issues.push({
        kind: "AmbiguousIdentity",
        message: `No signals agree; kept ${verdict.winningLabel}`,
      });
    }

    advance("RESOLVING_MASTER", `Resolving master for ${verdict.winningLabel}`);
    const master = await this.deps.resolver.resolve(verdict, itemDir, progress);
    draft.master = master;
    if (master.status === "DOWNLOADED") {
      draft.files.master = master.filePath;
    } else if (master.status === "NOT_FOUND") {
      draft.issues.push({
        kind: "MasterNotFound",
        message: `No candidate in the duration window out of ${master.candidates}`,
      });
    } else if (master.status === "FAILED") {
      draft.issues.push({ kind: "MasterNotFound", message: master.reason });
    }

    const outcome: ItemOutcome =
      !isResolvable(verdict) || master.status === "NOT_FOUND" || master.status === "FAILED"
        ? "partial"
        : "success";

    draft.files.report = path.join(itemDir, ITEM_REPORT_NAME);
    const report = freezeReport(draft, "DONE", outcome);
    await writeItemReport(itemDir, generateReportContent(report));
    return report;
  }

  /**
   * Create `<NNN>_<label>` and move the staged reference into it as
   * `reference.<ext>`. A directory left by an earlier run gets a `_2`,
   * `_3`, ... sibling instead of being written into.
   */
  private async fileReference(draft: ItemDraft, result: AcquisitionResult, verdict: ConsensusVerdict): Promise<string> {
    const itemDir = await claimItemDir(
      path.join(this.options.outputDir, `${zeroPad(draft.index)}_${sanitizeFilename(verdict.winningLabel)}`)
    );
    draft.files.itemDir = itemDir;

    const reference = path.join(itemDir, `reference.${result.extension}`);
    await moveFile(result.filePath, reference);
    draft.files.reference = reference;
    return itemDir;
  }

  private async fail(draft: ItemDraft, failure: ItemFailure): Promise<BatchItemReport> {
    logger.error(`[${draft.index}] ${failure.kind} at ${failure.stage}: ${failure.reason}`);

    // A report.md only exists where the item already has a directory
    const itemDir = failure.kind === "FatalIOFailure" ? undefined : draft.files.itemDir;
    if (itemDir) {
      draft.files.report = path.join(itemDir, ITEM_REPORT_NAME);
    }
    const report = freezeReport(draft, "FAILED", "failed", failure);

    try {
      await appendErrorLog(this.options.errorLogPath, draft.url, failure);
    } catch (error) {
      logger.error(describeError(error));
    }

    if (itemDir) {
      try {
        await writeItemReport(itemDir, generateReportContent(report));
      } catch (error) {
        logger.error(describeError(error));
      }
    }

    return report;
  }

  private async recordBatchLine(reportPath: string, report: BatchItemReport): Promise<void> {
    try {
      await appendBatchReport(reportPath, report);
    } catch (error) {
      logger.error(describeError(error));
    }
  }

  private emit(event: BatchEvent): void {
    try {
      this.listener(event);
    } catch (error) {
      logger.warn(`Progress listener failed: ${describeError(error)}`);
    }
  }
}

function freezeReport(
  draft: ItemDraft,
  stage: ItemStage,
  outcome: ItemOutcome,
  failure?: ItemFailure
): BatchItemReport {
  return Object.freeze({
    index: draft.index,
    url: draft.url,
    stage,
    outcome,
    acquisition: draft.acquisition,
    signals: [...draft.signals],
    verdict: draft.verdict,
    master: draft.master,
    files: { ...draft.files },
    issues: [...draft.issues],
    failure,
  });
}

function terminalMessage(report: BatchItemReport): string {
  if (report.failure) {
    return `${report.failure.kind}: ${report.failure.reason}`;
  }
  const label = report.verdict?.winningLabel ?? "";
  const master = report.master;
  if (!master) {
    return label;
  }
  switch (master.status) {
    case "DOWNLOADED":
      return `Master saved: ${path.basename(master.filePath)}`;
    case "NOT_FOUND":
      return `${label}: no master in the duration window`;
    case "FAILED":
      return `${label}: master download failed (${master.reason})`;
    case "SKIPPED":
      return `${label}: master skipped (${master.reason})`;
  }
}

function countOutcomes(reports: BatchItemReport[]): { succeeded: number; partial: number; failed: number } {
  return {
    succeeded: reports.filter((r) => r.outcome === "success").length,
    partial: reports.filter((r) => r.outcome === "partial").length,
    failed: reports.filter((r) => r.outcome === "failed").length,
  };
}

/**
 * Create a fresh directory at base, or base_2, base_3, ... when taken.
 * mkdir without recursive fails on an existing path, so the claim is atomic.
 */
export async function claimItemDir(base: string): Promise<string> {
  for (let n = 1; ; n++) {
    const dir = n === 1 ? base : `${base}_${n}`;
    try {
      await fs.mkdir(dir);
      return dir;
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
        throw new FatalIOError("Create directory", dir, error);
      }
    }
  }
}

async function ensureDir(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    throw new FatalIOError("Create directory", dir, error);
  }
}

/**
 * Rename, falling back to copy + delete when staging and output live on
 * different filesystems.
 */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "EXDEV")) {
      throw new FatalIOError("Move file", to, error);
    }
    try {
      await fs.copyFile(from, to);
      await fs.unlink(from);
    } catch (copyError) {
      throw new FatalIOError("Copy file", to, copyError);
    }
  }
}
