/**
 * Fuses identity signals into one verdict.
 */

import type { IdentitySignal, PresentSignal } from "../identification/types.js";
import { isPresent } from "../identification/types.js";
import type { ConsensusConfig } from "../config/types.js";
import type { ConsensusVerdict, PairAgreement, VerdictStatus } from "./types.js";
import type { SimilarityScorer } from "./similarity.js";
import { cleanLabel } from "../output/label.js";
import { logger } from "../utils/logger.js";

export interface ConsensusOptions {
  /** A pair agrees when its score is strictly above this */
  agreementThreshold: number;
  singleSourceStatus: ConsensusConfig["singleSourceStatus"];
  /** Clock for placeholder labels */
  now?: () => number;
}

// Shared across engines so placeholders stay distinct within one millisecond
let placeholderSequence = 0;

/** Label used when nothing identified the track, e.g. "Unknown_1718000000000_3" */
export function placeholderLabel(now: number = Date.now()): string {
  placeholderSequence += 1;
  return `Unknown_${now}_${placeholderSequence}`;
}

interface RankedSignal {
  signal: PresentSignal;
  /** 0 = highest priority */
  rank: number;
}

interface ScoredPair {
  left: RankedSignal;
  right: RankedSignal;
  agreement: PairAgreement;
}

export class ConsensusEngine {
  private readonly now: () => number;

  constructor(
    private readonly scorer: SimilarityScorer,
    private readonly options: ConsensusOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Classify the signals and pick the winning label.
   * Absent signals are ignored; they never count as disagreement.
   */
  evaluate(signals: IdentitySignal[]): ConsensusVerdict {
    const ranked = rankByPriority(signals.filter(isPresent));

    if (ranked.length === 0) {
      return this.freeze("UNIDENTIFIED", undefined, []);
    }

    if (ranked.length === 1) {
      return this.freeze(this.options.singleSourceStatus, ranked[0].signal, []);
    }

    const pairs = this.scorePairs(ranked);
    const agreeing = pairs.filter((p) => p.agreement.agrees);
    const agreements = pairs.map((p) => p.agreement);

    if (agreeing.length === pairs.length) {
      const status: VerdictStatus = ranked.length === 2 ? "CONFIRMED" : "PLATINUM";
      return this.freeze(status, ranked[0].signal, agreements);
    }

    if (agreeing.length > 0) {
      const best = [...agreeing].sort(comparePairs)[0];
      return this.freeze("GOLD", best.left.signal, agreements);
    }

    return this.freeze("CONFLICT", ranked[0].signal, agreements);
  }

  private scorePairs(ranked: RankedSignal[]): ScoredPair[] {
    const pairs: ScoredPair[] = [];
    for (let i = 0; i < ranked.length; i++) {
      for (let j = i + 1; j < ranked.length; j++) {
        const left = ranked[i];
        const right = ranked[j];
        const score = this.scorer.score(left.signal.label, right.signal.label);
        const agreement: PairAgreement = Object.freeze({
          a: left.signal.source,
          b: right.signal.source,
          score,
          agrees: score > this.options.agreementThreshold,
        });
        logger.debug(`Agreement ${agreement.a} ~ ${agreement.b}: ${score}`);
        pairs.push({ left, right, agreement });
      }
    }
    return pairs;
  }

  private freeze(
    status: VerdictStatus,
    winner: PresentSignal | undefined,
    agreements: PairAgreement[]
  ): ConsensusVerdict {
    const label = winner ? cleanLabel(winner.label) : "";
    const verdict: ConsensusVerdict = {
      status,
      winningLabel: label || placeholderLabel(this.now()),
      winningSource: label ? winner?.source : undefined,
      agreements: Object.freeze([...agreements]),
    };
    return Object.freeze(verdict);
  }
}

/** Fingerprint signals first, registration order within a kind */
function rankByPriority(signals: PresentSignal[]): RankedSignal[] {
  const fingerprints = signals.filter((s) => s.kind === "fingerprint");
  const metadata = signals.filter((s) => s.kind !== "fingerprint");
  return [...fingerprints, ...metadata].map((signal, rank) => ({ signal, rank }));
}

function fingerprintMembers(pair: ScoredPair): number {
  return [pair.left, pair.right].filter((r) => r.signal.kind === "fingerprint").length;
}

/** Highest score, then more fingerprint members, then earlier priority */
function comparePairs(x: ScoredPair, y: ScoredPair): number {
  return (
    y.agreement.score - x.agreement.score ||
    fingerprintMembers(y) - fingerprintMembers(x) ||
    x.left.rank - y.left.rank ||
    x.right.rank - y.right.rank
  );
}
