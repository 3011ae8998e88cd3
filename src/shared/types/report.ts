import type { FaceImage } from "./detection";
import type { EmotionLabel } from "./emotion";

export type VerifiedVisitReport = {
  identityName: string;
  similarity: number;
  /** Emotion classified for the reporting frame. */
  emotion: EmotionLabel;
  /** Most frequent emotion over the confirmed session so far. */
  dominantEmotion: EmotionLabel;
  cumulativeMotion: number;
  presenceSeconds: number;
  timestamp: number;
};

export type UnknownIncidentReport = {
  similarity: number;
  emotion: EmotionLabel;
  faceImage: FaceImage;
  cumulativeMotion: number;
  timestamp: number;
};

export type ReportDirective =
  | { kind: "verified"; report: VerifiedVisitReport }
  | { kind: "unknown"; report: UnknownIncidentReport };
