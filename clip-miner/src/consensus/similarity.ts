import * as fuzz from "fuzzball";
import type { ScorerKind } from "../config/types.js";

/**
 * Scores how alike two labels are, 0-100.
 * Implementations must be symmetric and case-insensitive.
 */
export interface SimilarityScorer {
  readonly name: ScorerKind;
  score(a: string, b: string): number;
}

/**
 * Token-set ratio: word order and extra words on one side do not lower the
 * score, so "Artist - Song" and "Song by Artist" agree.
 */
export class FuzzySimilarityScorer implements SimilarityScorer {
  readonly name = "fuzzy";

  score(a: string, b: string): number {
    return fuzz.token_set_ratio(a, b);
  }
}

/** 100 when the labels are equal ignoring case and whitespace, else 0 */
export class ExactMatchScorer implements SimilarityScorer {
  readonly name = "exact";

  score(a: string, b: string): number {
    return normalize(a) === normalize(b) ? 100 : 0;
  }
}

function normalize(label: string): string {
  return label.toLowerCase().split(/\s+/).filter(Boolean).join(" ");
}

export function createSimilarityScorer(kind: ScorerKind): SimilarityScorer {
  switch (kind) {
    case "fuzzy":
      return new FuzzySimilarityScorer();
    case "exact":
      return new ExactMatchScorer();
    default: {
      const unknown: never = kind;
      throw new Error(`Unknown similarity scorer: ${String(unknown)}`);
    }
  }
}
