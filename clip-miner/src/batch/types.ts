/**
 * Types for batch processing, item reports and progress events.
 */

import type { AcquisitionAttempt, PlatformMetadata } from "../acquisition/types.js";
import type { IdentitySignal } from "../identification/types.js";
import type { ConsensusVerdict } from "../consensus/types.js";
import type { MasterOutcome } from "../master/types.js";
import type { MediaProbe } from "../output/probe.js";

/** One-directional: PENDING → ACQUIRING → IDENTIFYING → RESOLVING_MASTER → DONE | FAILED */
export type ItemStage = "PENDING" | "ACQUIRING" | "IDENTIFYING" | "RESOLVING_MASTER" | "DONE" | "FAILED";

export type ItemOutcome = "success" | "partial" | "failed";

/** What ended an item at FAILED */
export type FailureKind = "ProviderFailure" | "FatalIOFailure" | "Stopped" | "InternalError";

export interface ItemFailure {
  kind: FailureKind;
  /** Stage the item was in when it failed */
  stage: ItemStage;
  reason: string;
}

/** Problems recorded on an item that did not stop it */
export type IssueKind = "RecognitionFailure" | "AmbiguousIdentity" | "MasterNotFound";

export interface ItemIssue {
  kind: IssueKind;
  message: string;
}

export interface AcquisitionSummary {
  provider: string;
  attempts: AcquisitionAttempt[];
  metadata?: PlatformMetadata;
  probe?: MediaProbe;
}

export interface ItemFiles {
  itemDir?: string;
  reference?: string;
  master?: string;
  report?: string;
}

/** Final record of one input URL; exactly one per input */
export interface BatchItemReport {
  readonly index: number;
  readonly url: string;
  /** Terminal stage: DONE or FAILED */
  readonly stage: ItemStage;
  readonly outcome: ItemOutcome;
  readonly acquisition?: AcquisitionSummary;
  readonly signals: IdentitySignal[];
  readonly verdict?: ConsensusVerdict;
  readonly master?: MasterOutcome;
  readonly files: ItemFiles;
  readonly issues: ItemIssue[];
  readonly failure?: ItemFailure;
}

export interface ItemEvent {
  type: "item";
  /** 1-based */
  index: number;
  total: number;
  url: string;
  stage: ItemStage;
  message: string;
  /** Only on the terminal event */
  outcome?: ItemOutcome;
}

export interface CompleteEvent {
  type: "complete";
  total: number;
  succeeded: number;
  partial: number;
  failed: number;
  reportPath: string;
}

export type BatchEvent = ItemEvent | CompleteEvent;

export type BatchListener = (event: BatchEvent) => void;

export interface BatchResult {
  /** In input order */
  reports: BatchItemReport[];
  succeeded: number;
  partial: number;
  failed: number;
  reportPath: string;
  errorLogPath: string;
}
