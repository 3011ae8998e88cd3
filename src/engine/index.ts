import {
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type EngineConfigOverrides,
  cloneEngineConfig,
  mergeEngineConfig,
} from "../shared/config/engine";
import { getLogger } from "../shared/logger";
import { resolveTimestamp } from "../shared/time";
import {
  type DetectionEvent,
  type DetectionOutcome,
  type ObservedFace,
  UNKNOWN_IDENTITY_LABEL,
} from "../shared/types/detection";
import { type EmotionLabel, dominantEmotion } from "../shared/types/emotion";
import type {
  FeatureVector,
  Identity,
  IdentitySummary,
} from "../shared/types/identity";
import type { ReportDirective } from "../shared/types/report";
import {
  HistoryLedger,
  type HistoryQuery,
  type HistoryStats,
} from "./history/ledger";
import {
  type IdentityRegistrationOptions,
  IdentityStore,
  type RegisterIdentityResult,
  type RemoveIdentityResult,
} from "./identity/store";
import { MatchScorer } from "./matching/scorer";
import type { SimilarityFunction } from "./matching/similarity";
import {
  MotionTracker,
  UNIDENTIFIED_MOTION_KEY,
  boundingBoxCenter,
} from "./motion/tracker";
import { PresenceSession } from "./presence/session";
import type {
  PresenceSnapshot,
  PresenceTransitionEvent,
} from "./presence/types";

const logger = getLogger("session-engine", "engine");

export type ClassifiedFace = ObservedFace & {
  emotion: EmotionLabel;
};

export type SessionEngineOptions = {
  config?: EngineConfigOverrides;
  /** Replaces the default Euclidean similarity (primarily for tests). */
  similarity?: SimilarityFunction;
  onTransition?: (event: PresenceTransitionEvent) => void;
};

export type FaceResolution = {
  event: DetectionEvent;
  report: ReportDirective | null;
};

export type FrameOutcome = {
  timestamp: number;
  resolutions: FaceResolution[];
};

export type HistoryPage = {
  events: DetectionEvent[];
  /** Number of retained events matching the filter, before the limit. */
  total: number;
};

export type EngineStats = HistoryStats & {
  totalIdentities: number;
};

/**
 * Owns every piece of mutable session state: the identity store, the
 * per-identity presence sessions, the motion tracker and the history ledger.
 *
 * `processFaces` runs match, motion, transition and append for a whole frame
 * without yielding, which makes each frame atomic for concurrent callers on
 * the event loop. Durable reporting is left to the caller through the
 * returned report directives.
 */
export class SessionEngine {
  private config: EngineConfig;

  private readonly identities = new IdentityStore();

  private readonly scorer: MatchScorer;

  private readonly motion = new MotionTracker();

  private readonly sessions = new Map<string, PresenceSession>();

  private readonly ledger: HistoryLedger;

  private readonly onTransition?: (event: PresenceTransitionEvent) => void;

  constructor(options: SessionEngineOptions = {}) {
    this.config = mergeEngineConfig(DEFAULT_ENGINE_CONFIG, options.config);
    this.scorer = new MatchScorer(this.identities, {
      thresholds: this.config.thresholds,
      similarity: options.similarity,
    });
    this.ledger = new HistoryLedger({
      capacity: this.config.history.capacity,
      recentWindowHours: this.config.history.recentWindowHours,
    });
    this.onTransition = options.onTransition;
  }

  getConfig(): EngineConfig {
    return cloneEngineConfig(this.config);
  }

  /** Thresholds and the activation window apply from the next frame on. */
  updateConfig(overrides: Omit<EngineConfigOverrides, "history">): EngineConfig {
    this.config = mergeEngineConfig(this.config, overrides);
    this.scorer.updateThresholds(this.config.thresholds);
    this.sessions.forEach((session) => {
      session.updateConfig(this.config.timings);
    });
    return this.getConfig();
  }

  registerIdentity(
    name: string,
    featureVector: FeatureVector,
    options?: IdentityRegistrationOptions,
  ): RegisterIdentityResult {
    const result = this.identities.register(name, featureVector, options);
    if (result.success) {
      logger.info("Identity registered", {
        name: result.identity.name,
        replaced: result.replaced,
        dimensions: result.identity.featureVector.length,
      });
    }
    return result;
  }

  /** Removes the identity together with its presence session and motion track. */
  removeIdentity(name: string): RemoveIdentityResult {
    const result = this.identities.remove(name);
    if (result.success) {
      this.sessions.delete(result.identity.name);
      this.motion.forget(result.identity.name);
      logger.info("Identity removed", { name: result.identity.name });
    }
    return result;
  }

  getIdentity(name: string): Identity | null {
    return this.identities.get(name);
  }

  listIdentities(): IdentitySummary[] {
    return this.identities.list();
  }

  getPresence(name: string): PresenceSnapshot | null {
    return this.sessions.get(name)?.getSnapshot() ?? null;
  }

  processFaces(
    faces: readonly ClassifiedFace[],
    timestamp?: number,
  ): FrameOutcome {
    const resolvedTimestamp = resolveTimestamp(timestamp);
    const resolutions = faces.map((face) =>
      this.resolveFace(face, resolvedTimestamp),
    );
    return { timestamp: resolvedTimestamp, resolutions };
  }

  queryHistory(query: HistoryQuery): HistoryPage {
    return {
      events: this.ledger.query(query),
      total: this.ledger.count(query.identity),
    };
  }

  getStats(now?: number): EngineStats {
    return {
      totalIdentities: this.identities.size,
      ...this.ledger.stats(now),
    };
  }

  /** Seeds the ledger with previously persisted events, oldest first. */
  restoreHistory(events: readonly DetectionEvent[]): void {
    this.ledger.restore(events);
  }

  get historyCapacity(): number {
    return this.ledger.capacity;
  }

  private resolveFace(face: ClassifiedFace, timestamp: number): FaceResolution {
    const match = this.scorer.match(face.featureVector);
    const classification = this.scorer.classify(match);
    const center = boundingBoxCenter(face.boundingBox);

    if (classification === "known" && match.identityName !== null) {
      const name = match.identityName;
      const instantaneousMotion = this.motion.update(name, center);
      const session = this.getOrCreateSession(name);
      const snapshot = session.observeKnown({
        timestamp,
        center,
        instantaneousMotion,
        emotion: face.emotion,
      });
      const confirmed = snapshot.phase.kind === "Confirmed";

      const event = this.record({
        identityLabel: name,
        matchedIdentity: name,
        similarity: match.similarity,
        emotion: face.emotion,
        instantaneousMotion,
        cumulativeMotion: snapshot.cumulativeMotion,
        isKnown: true,
        outcome: confirmed ? "verified" : "tentative",
        boundingBox: { ...face.boundingBox },
        timestamp,
      });

      if (!confirmed) {
        return { event, report: null };
      }

      return {
        event,
        report: {
          kind: "verified",
          report: {
            identityName: name,
            similarity: match.similarity,
            emotion: face.emotion,
            dominantEmotion: snapshot.emotionCounts
              ? dominantEmotion(snapshot.emotionCounts)
              : face.emotion,
            cumulativeMotion: snapshot.cumulativeMotion,
            presenceSeconds: session.presenceSeconds(timestamp),
            timestamp,
          },
        },
      };
    }

    if (match.identityName !== null) {
      this.sessions.get(match.identityName)?.observeMiss(timestamp);
    }

    const instantaneousMotion = this.motion.update(
      UNIDENTIFIED_MOTION_KEY,
      center,
    );
    const cumulativeMotion = this.motion.cumulative(UNIDENTIFIED_MOTION_KEY);
    const outcome: DetectionOutcome =
      classification === "unknown" ? "incident" : "ambiguous";

    const event = this.record({
      identityLabel: UNKNOWN_IDENTITY_LABEL,
      matchedIdentity: match.identityName,
      similarity: match.similarity,
      emotion: face.emotion,
      instantaneousMotion,
      cumulativeMotion,
      isKnown: false,
      outcome,
      boundingBox: { ...face.boundingBox },
      timestamp,
    });

    if (outcome === "ambiguous") {
      return { event, report: null };
    }

    return {
      event,
      report: {
        kind: "unknown",
        report: {
          similarity: match.similarity,
          emotion: face.emotion,
          faceImage: face.croppedImage,
          cumulativeMotion,
          timestamp,
        },
      },
    };
  }

  private record(event: DetectionEvent): DetectionEvent {
    const frozen = Object.freeze(event);
    this.ledger.append(frozen);
    return frozen;
  }

  private getOrCreateSession(name: string): PresenceSession {
    const existing = this.sessions.get(name);
    if (existing) {
      return existing;
    }
    const session = new PresenceSession(name, {
      config: this.config.timings,
      onTransition: (event) => {
        logger.info("Presence session transition", {
          name: event.identityName,
          from: event.from,
          to: event.to,
          timestamp: event.timestamp,
        });
        this.onTransition?.(event);
      },
    });
    this.sessions.set(name, session);
    return session;
  }
}

export { HistoryLedger } from "./history/ledger";
export type { HistoryQuery, HistoryStats } from "./history/ledger";
export { IdentityStore } from "./identity/store";
export { MatchScorer } from "./matching/scorer";
export { MotionTracker } from "./motion/tracker";
export { PresenceSession } from "./presence/session";
export type { PresenceSnapshot, PresenceTransitionEvent } from "./presence/types";
