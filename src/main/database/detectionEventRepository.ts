import { desc, lt } from "drizzle-orm";
import { getLogger } from "../../shared/logger";
import type { DetectionEvent } from "../../shared/types/detection";
import {
  isBoundingBox,
  isDetectionOutcome,
  isEmotionLabel,
} from "../../shared/validation/detection";
import { getDatabase } from "./client";
import { type DetectionEventRow, detectionEvents } from "./schema";

const logger = getLogger("detection-event-repository", "main");

const parseBoundingBox = (json: string): DetectionEvent["boundingBox"] | null => {
  try {
    const parsed: unknown = JSON.parse(json);
    return isBoundingBox(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

const mapRowToEvent = (row: DetectionEventRow): DetectionEvent | null => {
  const boundingBox = parseBoundingBox(row.boundingBoxJson);
  if (
    !boundingBox ||
    !isEmotionLabel(row.emotion) ||
    !isDetectionOutcome(row.outcome)
  ) {
    return null;
  }
  return {
    identityLabel: row.identityLabel,
    matchedIdentity: row.matchedIdentity ?? null,
    similarity: row.similarity,
    emotion: row.emotion,
    instantaneousMotion: row.instantaneousMotion,
    cumulativeMotion: row.cumulativeMotion,
    isKnown: row.isKnown,
    outcome: row.outcome,
    boundingBox,
    timestamp: row.timestamp,
  };
};

export const insertDetectionEvents = (
  events: readonly DetectionEvent[],
): void => {
  if (events.length === 0) {
    return;
  }
  const db = getDatabase();
  db.insert(detectionEvents)
    .values(
      events.map((event) => ({
        identityLabel: event.identityLabel,
        matchedIdentity: event.matchedIdentity,
        similarity: event.similarity,
        emotion: event.emotion,
        instantaneousMotion: event.instantaneousMotion,
        cumulativeMotion: event.cumulativeMotion,
        isKnown: event.isKnown,
        outcome: event.outcome,
        boundingBoxJson: JSON.stringify(event.boundingBox),
        timestamp: event.timestamp,
      })),
    )
    .run();
};

/** Deletes every row older than the newest `capacity` rows. */
export const pruneDetectionEvents = (capacity: number): number => {
  const db = getDatabase();
  const boundary = db
    .select({ id: detectionEvents.id })
    .from(detectionEvents)
    .orderBy(desc(detectionEvents.id))
    .limit(1)
    .offset(Math.max(0, capacity - 1))
    .get();

  if (!boundary) {
    return 0;
  }

  const result = db
    .delete(detectionEvents)
    .where(lt(detectionEvents.id, boundary.id))
    .run();
  return result.changes;
};

/** The newest `limit` events, oldest first, ready to seed the history ledger. */
export const loadRecentDetectionEvents = (limit: number): DetectionEvent[] => {
  const db = getDatabase();
  const rows = db
    .select()
    .from(detectionEvents)
    .orderBy(desc(detectionEvents.id))
    .limit(limit)
    .all();

  const events = rows.reverse().flatMap((row) => {
    const event = mapRowToEvent(row);
    return event ? [event] : [];
  });

  if (events.length !== rows.length) {
    logger.warn("Skipped unreadable detection event rows", {
      skipped: rows.length - events.length,
    });
  }
  return events;
};
