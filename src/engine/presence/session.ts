import { MS_PER_SECOND, resolveTimestamp } from "../../shared/time";
import type { Point } from "../../shared/types/detection";
import {
  type EmotionCounts,
  createEmotionCounts,
} from "../../shared/types/emotion";
import type {
  KnownSighting,
  PresencePhase,
  PresenceSessionConfig,
  PresenceSessionOptions,
  PresenceSnapshot,
  PresenceTransitionEvent,
} from "./types";

const IDLE: PresencePhase = Object.freeze({ kind: "Idle" });

/**
 * Per-identity presence state machine: `Idle → Pending → Confirmed`.
 *
 * The activation window is polled against wall-clock timestamps on each
 * sighting; nothing is scheduled. A confirmed session is never demoted by
 * misses, only discarded with its identity.
 */
export class PresenceSession {
  readonly identityName: string;

  private config: PresenceSessionConfig;

  private phase: PresencePhase = IDLE;

  private cumulativeMotion = 0;

  private lastCenter: Point | null = null;

  private emotionCounts: EmotionCounts | null = null;

  private lastUpdatedAt = 0;

  private lastStateChangeAt = 0;

  private readonly onTransition?: (event: PresenceTransitionEvent) => void;

  constructor(identityName: string, options: PresenceSessionOptions) {
    this.identityName = identityName;
    this.config = { ...options.config };
    this.onTransition = options.onTransition;
  }

  updateConfig(config: PresenceSessionConfig): void {
    this.config = { ...config };
  }

  /** Applies a frame in which this identity was matched at or above the known threshold. */
  observeKnown(sighting: KnownSighting): PresenceSnapshot {
    const timestamp = resolveTimestamp(sighting.timestamp);
    const motion = Math.max(0, sighting.instantaneousMotion);
    const previous = this.phase;

    this.lastCenter = { ...sighting.center };
    this.lastUpdatedAt = timestamp;

    if (previous.kind === "Idle") {
      this.phase = { kind: "Pending", since: timestamp };
      this.cumulativeMotion += motion;
    } else if (previous.kind === "Pending") {
      const elapsedMs = timestamp - previous.since;
      if (elapsedMs >= this.config.activationSeconds * MS_PER_SECOND) {
        this.phase = { kind: "Confirmed", since: timestamp };
        this.cumulativeMotion = 0;
        this.emotionCounts = createEmotionCounts();
      } else {
        this.cumulativeMotion += motion;
      }
    } else {
      this.cumulativeMotion += motion;
    }

    if (this.phase.kind === "Confirmed" && this.emotionCounts) {
      this.emotionCounts[sighting.emotion] += 1;
    }

    this.emitTransition(previous, timestamp);
    return this.getSnapshot();
  }

  /** Applies a frame in which this identity was the best candidate but not known. */
  observeMiss(timestamp?: number): PresenceSnapshot {
    const resolvedTimestamp = resolveTimestamp(timestamp);
    const previous = this.phase;

    this.lastUpdatedAt = resolvedTimestamp;
    if (previous.kind === "Pending") {
      this.phase = IDLE;
    }

    this.emitTransition(previous, resolvedTimestamp);
    return this.getSnapshot();
  }

  isConfirmed(): boolean {
    return this.phase.kind === "Confirmed";
  }

  /** Seconds since confirmation, or 0 when not confirmed. */
  presenceSeconds(timestamp?: number): number {
    if (this.phase.kind !== "Confirmed") {
      return 0;
    }
    const elapsedMs = resolveTimestamp(timestamp) - this.phase.since;
    return Math.max(0, elapsedMs / MS_PER_SECOND);
  }

  getSnapshot(): PresenceSnapshot {
    return {
      identityName: this.identityName,
      phase: { ...this.phase },
      cumulativeMotion: this.cumulativeMotion,
      lastCenter: this.lastCenter ? { ...this.lastCenter } : null,
      emotionCounts: this.emotionCounts ? { ...this.emotionCounts } : null,
      lastUpdatedAt: this.lastUpdatedAt,
      lastStateChangeAt: this.lastStateChangeAt,
    };
  }

  private emitTransition(previous: PresencePhase, timestamp: number): void {
    if (previous.kind === this.phase.kind) {
      return;
    }
    this.lastStateChangeAt = timestamp;
    this.onTransition?.({
      identityName: this.identityName,
      from: previous.kind,
      to: this.phase.kind,
      timestamp,
      snapshot: this.getSnapshot(),
    });
  }
}
