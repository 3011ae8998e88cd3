import "./main/loadEnv";

export {
  SessionEngine,
  HistoryLedger,
  IdentityStore,
  MatchScorer,
  MotionTracker,
  PresenceSession,
} from "./engine";
export type {
  ClassifiedFace,
  EngineStats,
  FaceResolution,
  FrameOutcome,
  HistoryPage,
  HistoryQuery,
  HistoryStats,
  PresenceSnapshot,
  PresenceTransitionEvent,
  SessionEngineOptions,
} from "./engine";
export type { FaceDetector } from "./engine/detection/detector";
export {
  RandomEmotionClassifier,
  type EmotionClassifier,
} from "./engine/emotion/classifier";
export { euclideanSimilarity } from "./engine/matching/similarity";
export {
  bootstrapPresenceService,
  shutdownPresenceService,
  type BootstrapOptions,
  type BootstrapResult,
} from "./main/bootstrap";
export {
  FaceSessionService,
  type FaceSessionServiceOptions,
  type PresencePersistence,
  type ServiceFailure,
  type ServiceFailureKind,
} from "./main/faceSessionService";
export {
  parseUnknownReport,
  parseVerifiedReport,
  type ParsedUnknownIncident,
  type ParsedVerifiedVisit,
} from "./main/reports/reportFormat";
export { ReportSink } from "./main/reports/reportSink";
export { IdentityStorage } from "./main/storage/identityStorage";
export {
  getEngineConfig,
  resetEngineConfig,
  updateEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from "./shared/config/engine";
export { getLogger } from "./shared/logger";
export type { DetectionEvent, ObservedFace } from "./shared/types/detection";
export { EMOTION_LABELS, type EmotionLabel } from "./shared/types/emotion";
export type { Identity, IdentitySummary } from "./shared/types/identity";
