import type { Point } from "../../shared/types/detection";
import type { EmotionCounts, EmotionLabel } from "../../shared/types/emotion";

export type PresencePhaseKind = "Idle" | "Pending" | "Confirmed";

export type PresencePhase =
  | { kind: "Idle" }
  | { kind: "Pending"; since: number }
  | { kind: "Confirmed"; since: number };

export type PresenceSessionConfig = {
  /** Seconds a known identity must stay matched before confirmation. */
  activationSeconds: number;
};

export type KnownSighting = {
  timestamp: number;
  center: Point;
  instantaneousMotion: number;
  emotion: EmotionLabel;
};

export type PresenceSnapshot = {
  identityName: string;
  phase: PresencePhase;
  cumulativeMotion: number;
  lastCenter: Point | null;
  /** Populated only while the session is confirmed. */
  emotionCounts: EmotionCounts | null;
  lastUpdatedAt: number;
  lastStateChangeAt: number;
};

export type PresenceTransitionEvent = {
  identityName: string;
  from: PresencePhaseKind;
  to: PresencePhaseKind;
  timestamp: number;
  snapshot: PresenceSnapshot;
};

export type PresenceSessionOptions = {
  config: PresenceSessionConfig;
  onTransition?: (event: PresenceTransitionEvent) => void;
};
