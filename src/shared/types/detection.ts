import type { EmotionLabel } from "./emotion";
import type { FeatureVector } from "./identity";

/** Pixel coordinates, as produced by the face detector. */
export type BoundingBox = {
  top: number;
  right: number;
  bottom: number;
  left: number;
};

export type Point = {
  x: number;
  y: number;
};

/** Encoded image bytes (JPEG). Opaque to the engine. */
export type FaceImage = Uint8Array;

export type ObservedFace = {
  boundingBox: BoundingBox;
  featureVector: FeatureVector;
  croppedImage: FaceImage;
};

export type MatchResult = {
  identityName: string | null;
  /** 0-100. */
  similarity: number;
};

export type MatchClassification = "known" | "ambiguous" | "unknown";

/**
 * - `verified`: known identity with a confirmed session, reported as a visit.
 * - `tentative`: known identity still inside its activation window.
 * - `ambiguous`: matched, but between the unknown and known thresholds.
 * - `incident`: below the unknown threshold, archived as an unknown face.
 */
export type DetectionOutcome = "verified" | "tentative" | "ambiguous" | "incident";

export const UNKNOWN_IDENTITY_LABEL = "unknown";

export type DetectionEvent = Readonly<{
  identityLabel: string;
  matchedIdentity: string | null;
  similarity: number;
  emotion: EmotionLabel;
  instantaneousMotion: number;
  cumulativeMotion: number;
  isKnown: boolean;
  outcome: DetectionOutcome;
  boundingBox: Readonly<BoundingBox>;
  /** Epoch milliseconds. */
  timestamp: number;
}>;
