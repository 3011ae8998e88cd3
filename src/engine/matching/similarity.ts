import type { FeatureVector } from "../../shared/types/identity";

/** Similarity between a reference and an observed vector, in `[0, 100]`. */
export type SimilarityFunction = (
  reference: FeatureVector,
  observed: FeatureVector,
) => number;

export const euclideanDistance = (
  a: FeatureVector,
  b: FeatureVector,
): number => {
  if (a.length !== b.length) {
    return Number.POSITIVE_INFINITY;
  }
  let sum = 0;
  for (let index = 0; index < a.length; index += 1) {
    const delta = a[index] - b[index];
    sum += delta * delta;
  }
  return Math.sqrt(sum);
};

export const clampSimilarity = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(100, Math.max(0, value));
};

/**
 * `(1 - distance) * 100`, the usual reading of face-embedding distances where
 * 0.6 is the conventional same-person tolerance.
 */
export const euclideanSimilarity: SimilarityFunction = (reference, observed) => {
  return clampSimilarity((1 - euclideanDistance(reference, observed)) * 100);
};
