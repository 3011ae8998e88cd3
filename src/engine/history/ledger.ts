import { MS_PER_HOUR, resolveTimestamp } from "../../shared/time";
import type { DetectionEvent } from "../../shared/types/detection";
import {
  type EmotionCounts,
  createEmotionCounts,
} from "../../shared/types/emotion";

export const DEFAULT_HISTORY_CAPACITY = 1000;

export type HistoryLedgerOptions = {
  capacity?: number;
  recentWindowHours?: number;
};

export type HistoryQuery = {
  limit: number;
  /** Exact identity label; empty or missing means every event. */
  identity?: string | null;
};

export type HistoryStats = {
  totalDetections: number;
  knownDetections: number;
  unknownDetections: number;
  recentDetections: number;
  /** Mean instantaneous motion, rounded to one decimal. */
  averageMotion: number;
  emotionCounts: EmotionCounts;
};

const roundToTenth = (value: number): number => Math.round(value * 10) / 10;

/**
 * Bounded, insertion-ordered log of detection events. Once full, each append
 * overwrites the oldest slot of the ring buffer.
 */
export class HistoryLedger {
  readonly capacity: number;

  private readonly recentWindowMs: number;

  private readonly slots: Array<DetectionEvent | undefined>;

  private head = 0;

  private length = 0;

  constructor(options: HistoryLedgerOptions = {}) {
    const capacity = Math.floor(options.capacity ?? DEFAULT_HISTORY_CAPACITY);
    if (!Number.isFinite(capacity) || capacity < 1) {
      throw new Error(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.recentWindowMs = (options.recentWindowHours ?? 24) * MS_PER_HOUR;
    this.slots = new Array<DetectionEvent | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  /** Returns the evicted event when the ledger was already full. */
  append(event: DetectionEvent): DetectionEvent | null {
    const frozen = Object.freeze({ ...event });
    if (this.length < this.capacity) {
      this.slots[(this.head + this.length) % this.capacity] = frozen;
      this.length += 1;
      return null;
    }

    const evicted = this.slots[this.head] ?? null;
    this.slots[this.head] = frozen;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /** Replaces the contents with `events` (oldest first), keeping the newest that fit. */
  restore(events: readonly DetectionEvent[]): void {
    this.clear();
    events
      .slice(Math.max(0, events.length - this.capacity))
      .forEach((event) => {
        this.append(event);
      });
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.length = 0;
  }

  /** Oldest first. */
  toArray(): DetectionEvent[] {
    const events: DetectionEvent[] = [];
    for (let offset = 0; offset < this.length; offset += 1) {
      const event = this.slots[(this.head + offset) % this.capacity];
      if (event) {
        events.push(event);
      }
    }
    return events;
  }

  /** Up to `limit` matching events, newest first. */
  query({ limit, identity }: HistoryQuery): DetectionEvent[] {
    const max = Math.floor(limit);
    if (!Number.isFinite(max) || max <= 0) {
      return [];
    }

    const results: DetectionEvent[] = [];
    for (let offset = this.length - 1; offset >= 0 && results.length < max; offset -= 1) {
      const event = this.slots[(this.head + offset) % this.capacity];
      if (event && (!identity || event.identityLabel === identity)) {
        results.push(event);
      }
    }
    return results;
  }

  count(identity?: string | null): number {
    if (!identity) {
      return this.length;
    }
    return this.toArray().filter((event) => event.identityLabel === identity)
      .length;
  }

  stats(now?: number): HistoryStats {
    const events = this.toArray();
    const recentCutoff = resolveTimestamp(now) - this.recentWindowMs;
    const emotionCounts = createEmotionCounts();

    let knownDetections = 0;
    let recentDetections = 0;
    let motionSum = 0;

    events.forEach((event) => {
      if (event.isKnown) {
        knownDetections += 1;
      }
      if (event.timestamp > recentCutoff) {
        recentDetections += 1;
      }
      motionSum += event.instantaneousMotion;
      emotionCounts[event.emotion] += 1;
    });

    return {
      totalDetections: events.length,
      knownDetections,
      unknownDetections: events.length - knownDetections,
      recentDetections,
      averageMotion:
        events.length > 0 ? roundToTenth(motionSum / events.length) : 0,
      emotionCounts,
    };
  }
}
