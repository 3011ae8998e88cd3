export type FeatureVector = readonly number[];

export type Identity = {
  name: string;
  featureVector: FeatureVector;
  /** Epoch milliseconds. */
  registeredAt: number;
  /** Stored reference image, or null when registered from a bare vector. */
  imagePath: string | null;
};

export type IdentitySummary = {
  name: string;
  registeredAt: number;
};
