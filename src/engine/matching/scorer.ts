import type { MatchThresholdConfig } from "../../shared/config/engine";
import type {
  MatchClassification,
  MatchResult,
} from "../../shared/types/detection";
import type { FeatureVector } from "../../shared/types/identity";
import type { IdentityStore } from "../identity/store";
import {
  type SimilarityFunction,
  clampSimilarity,
  euclideanSimilarity,
} from "./similarity";

export type MatchScorerOptions = {
  thresholds: MatchThresholdConfig;
  similarity?: SimilarityFunction;
};

export const EMPTY_MATCH: MatchResult = Object.freeze({
  identityName: null,
  similarity: 0,
});

export class MatchScorer {
  private readonly store: IdentityStore;

  private thresholds: MatchThresholdConfig;

  private readonly similarity: SimilarityFunction;

  constructor(store: IdentityStore, options: MatchScorerOptions) {
    this.store = store;
    this.thresholds = { ...options.thresholds };
    this.similarity = options.similarity ?? euclideanSimilarity;
  }

  match(observed: FeatureVector): MatchResult {
    let best: MatchResult = EMPTY_MATCH;

    for (const identity of this.store.snapshot()) {
      const score =
        identity.featureVector.length === observed.length
          ? clampSimilarity(this.similarity(identity.featureVector, observed))
          : 0;
      // Strict comparison keeps the earliest registration on ties.
      if (best.identityName === null || score > best.similarity) {
        best = { identityName: identity.name, similarity: score };
      }
    }

    return best;
  }

  classify(match: MatchResult): MatchClassification {
    if (
      match.identityName !== null &&
      match.similarity >= this.thresholds.knownSimilarity
    ) {
      return "known";
    }
    if (match.similarity < this.thresholds.unknownSimilarity) {
      return "unknown";
    }
    return "ambiguous";
  }

  updateThresholds(thresholds: MatchThresholdConfig): void {
    this.thresholds = { ...thresholds };
  }
}
