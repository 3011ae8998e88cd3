import type {
  BoundingBox,
  DetectionOutcome,
  ObservedFace,
} from "../types/detection";
import { EMOTION_LABELS, type EmotionLabel } from "../types/emotion";
import type { FeatureVector } from "../types/identity";

const EMOTION_LOOKUP: ReadonlySet<string> = new Set(EMOTION_LABELS);

const OUTCOME_LOOKUP: Record<DetectionOutcome, true> = {
  verified: true,
  tentative: true,
  ambiguous: true,
  incident: true,
};

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null;
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

export const isEmotionLabel = (value: unknown): value is EmotionLabel => {
  return typeof value === "string" && EMOTION_LOOKUP.has(value);
};

export const isDetectionOutcome = (
  value: unknown,
): value is DetectionOutcome => {
  return typeof value === "string" && Object.hasOwn(OUTCOME_LOOKUP, value);
};

export const isFeatureVector = (value: unknown): value is FeatureVector => {
  return (
    Array.isArray(value) && value.length > 0 && value.every(isFiniteNumber)
  );
};

export const isBoundingBox = (value: unknown): value is BoundingBox => {
  if (!isRecord(value)) {
    return false;
  }
  const { top, right, bottom, left } = value;
  return (
    isFiniteNumber(top) &&
    isFiniteNumber(right) &&
    isFiniteNumber(bottom) &&
    isFiniteNumber(left)
  );
};

export const isObservedFace = (value: unknown): value is ObservedFace => {
  if (!isRecord(value)) {
    return false;
  }
  const { boundingBox, featureVector, croppedImage } = value;
  return (
    isBoundingBox(boundingBox) &&
    isFeatureVector(featureVector) &&
    croppedImage instanceof Uint8Array
  );
};
