import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { DetectionEvent } from "../../../shared/types/detection";
import { closeDatabase, getDatabase, initializeDatabase } from "../client";
import {
  insertDetectionEvents,
  loadRecentDetectionEvents,
  pruneDetectionEvents,
} from "../detectionEventRepository";
import {
  deleteIdentity,
  listStoredIdentities,
  saveIdentity,
} from "../identityRepository";
import { detectionEvents, identities } from "../schema";

vi.mock("../../../shared/logger", () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    flush: vi.fn(),
  }),
  toErrorPayload: (error: unknown) => ({ error: String(error) }),
}));

const createEvent = (timestamp: number, overrides: Partial<DetectionEvent> = {}): DetectionEvent => ({
  identityLabel: "alice",
  matchedIdentity: "alice",
  similarity: 91.5,
  emotion: "happy",
  instantaneousMotion: 1.5,
  cumulativeMotion: 4,
  isKnown: true,
  outcome: "tentative",
  boundingBox: { top: 1, right: 20, bottom: 30, left: 4 },
  timestamp,
  ...overrides,
});

describe("database repositories", () => {
  beforeEach(() => {
    initializeDatabase(":memory:");
  });

  afterEach(() => {
    closeDatabase();
  });

  describe("identityRepository", () => {
    it("saves and lists identities in registration order", () => {
      saveIdentity({
        name: "bob",
        featureVector: [0.3, 0.4],
        registeredAt: 2000,
        imagePath: "/data/identities/bob/bob.jpg",
      });
      saveIdentity({
        name: "alice",
        featureVector: [0.1, 0.2],
        registeredAt: 1000,
        imagePath: null,
      });

      expect(listStoredIdentities()).toEqual([
        { name: "alice", featureVector: [0.1, 0.2], registeredAt: 1000, imagePath: null },
        {
          name: "bob",
          featureVector: [0.3, 0.4],
          registeredAt: 2000,
          imagePath: "/data/identities/bob/bob.jpg",
        },
      ]);
    });

    it("overwrites an identity saved under the same name", () => {
      saveIdentity({ name: "alice", featureVector: [0.1], registeredAt: 1000, imagePath: null });
      saveIdentity({ name: "alice", featureVector: [0.9], registeredAt: 3000, imagePath: null });

      expect(listStoredIdentities()).toEqual([
        { name: "alice", featureVector: [0.9], registeredAt: 1000, imagePath: null },
      ]);
    });

    it("keeps registration order when an earlier identity is saved again", () => {
      saveIdentity({ name: "alice", featureVector: [0.1], registeredAt: 1000, imagePath: null });
      saveIdentity({ name: "bob", featureVector: [0.2], registeredAt: 2000, imagePath: null });
      saveIdentity({
        name: "alice",
        featureVector: [0.3],
        registeredAt: 3000,
        imagePath: "/data/alice.jpg",
      });

      expect(listStoredIdentities()).toEqual([
        { name: "alice", featureVector: [0.3], registeredAt: 1000, imagePath: "/data/alice.jpg" },
        { name: "bob", featureVector: [0.2], registeredAt: 2000, imagePath: null },
      ]);
    });

    it("deletes identities by name", () => {
      saveIdentity({ name: "alice", featureVector: [0.1], registeredAt: 1000, imagePath: null });

      deleteIdentity("alice");

      expect(listStoredIdentities()).toEqual([]);
    });

    it("skips rows whose feature vector cannot be read", () => {
      getDatabase()
        .insert(identities)
        .values({ name: "broken", featureVectorJson: "not json", registeredAt: 5 })
        .run();
      saveIdentity({ name: "alice", featureVector: [0.1], registeredAt: 10, imagePath: null });

      expect(listStoredIdentities().map((identity) => identity.name)).toEqual(["alice"]);
    });
  });

  describe("detectionEventRepository", () => {
    it("round-trips events oldest first", () => {
      const incident = createEvent(2, {
        identityLabel: "unknown",
        matchedIdentity: null,
        isKnown: false,
        outcome: "incident",
        emotion: "sad",
      });
      insertDetectionEvents([createEvent(1), incident]);

      expect(loadRecentDetectionEvents(10)).toEqual([createEvent(1), incident]);
    });

    it("loads only the newest rows up to the limit", () => {
      insertDetectionEvents([1, 2, 3, 4].map((timestamp) => createEvent(timestamp)));

      expect(loadRecentDetectionEvents(2).map((event) => event.timestamp)).toEqual([3, 4]);
    });

    it("prunes everything beyond the newest rows", () => {
      insertDetectionEvents([1, 2, 3, 4, 5].map((timestamp) => createEvent(timestamp)));

      expect(pruneDetectionEvents(3)).toBe(2);
      expect(pruneDetectionEvents(3)).toBe(0);
      expect(loadRecentDetectionEvents(10).map((event) => event.timestamp)).toEqual([
        3, 4, 5,
      ]);
    });

    it("skips rows that no longer validate", () => {
      insertDetectionEvents([createEvent(1)]);
      getDatabase()
        .insert(detectionEvents)
        .values({
          identityLabel: "alice",
          similarity: 90,
          emotion: "bored",
          instantaneousMotion: 0,
          cumulativeMotion: 0,
          isKnown: true,
          outcome: "tentative",
          boundingBoxJson: "{}",
          timestamp: 2,
        })
        .run();

      expect(loadRecentDetectionEvents(10)).toEqual([createEvent(1)]);
    });

    it("ignores an empty batch", () => {
      insertDetectionEvents([]);

      expect(loadRecentDetectionEvents(10)).toEqual([]);
    });
  });
});
