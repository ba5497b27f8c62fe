/**
 * Types for the consensus verdict.
 */

/**
 * Verdict classes, from "nothing known" to "three or more sources agree".
 * - UNIDENTIFIED: no source produced a label
 * - SINGLE_SOURCE / UNCERTAIN: one label, nothing to cross-check it against
 * - CONFIRMED: exactly two labels and they agree
 * - GOLD: some, not all, pairs agree
 * - PLATINUM: three or more labels, every pair agrees
 * - CONFLICT: two or more labels, no pair agrees
 */
export type VerdictStatus =
  | "UNIDENTIFIED"
  | "SINGLE_SOURCE"
  | "UNCERTAIN"
  | "CONFIRMED"
  | "GOLD"
  | "PLATINUM"
  | "CONFLICT";

/** Score of one unordered pair of present signals */
export interface PairAgreement {
  /** Source name of the higher-priority member */
  readonly a: string;
  readonly b: string;
  /** 0-100 */
  readonly score: number;
  readonly agrees: boolean;
}

export interface ConsensusVerdict {
  readonly status: VerdictStatus;
  /** Never empty; a placeholder when nothing was identified */
  readonly winningLabel: string;
  /** Source that supplied the winning label, absent for the placeholder */
  readonly winningSource?: string;
  readonly agreements: readonly PairAgreement[];
}

/** Verdicts that carry an identity worth searching the catalog for */
export function isResolvable(verdict: ConsensusVerdict): boolean {
  return verdict.status !== "UNIDENTIFIED" && verdict.status !== "CONFLICT";
}
