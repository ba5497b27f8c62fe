import type { ConsensusConfig } from "../config/types.js";
import { ConsensusEngine } from "./engine.js";
import { createSimilarityScorer } from "./similarity.js";

export function createConsensusEngine(config: ConsensusConfig): ConsensusEngine {
  return new ConsensusEngine(createSimilarityScorer(config.scorer), {
    agreementThreshold: config.agreementThreshold,
    singleSourceStatus: config.singleSourceStatus,
  });
}

export { ConsensusEngine, placeholderLabel } from "./engine.js";
export type { SimilarityScorer } from "./similarity.js";
export type { ConsensusVerdict, PairAgreement, VerdictStatus } from "./types.js";
export { isResolvable } from "./types.js";
