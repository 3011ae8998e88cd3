import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { FaceDetector } from "../../engine/detection/detector";
import type { DetectionEvent, FaceImage } from "../../shared/types/detection";
import { bootstrapPresenceService, shutdownPresenceService } from "../bootstrap";
import { closeDatabase, getDatabase, initializeDatabase } from "../database/client";
import {
  insertDetectionEvents,
  loadRecentDetectionEvents,
} from "../database/detectionEventRepository";
import { saveIdentity } from "../database/identityRepository";
import { IdentityStorage } from "../storage/identityStorage";

vi.mock("../../shared/logger", () => ({
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

const detector: FaceDetector = {
  detect: async (image: FaceImage) => [
    {
      boundingBox: { top: 0, right: 10, bottom: 10, left: 0 },
      featureVector: [image[0], image[1]],
      croppedImage: image,
    },
  ],
};

const storedEvent = (timestamp: number): DetectionEvent => ({
  identityLabel: "bob",
  matchedIdentity: "bob",
  similarity: 80,
  emotion: "neutral",
  instantaneousMotion: 0,
  cumulativeMotion: 0,
  isKnown: true,
  outcome: "tentative",
  boundingBox: { top: 0, right: 10, bottom: 10, left: 0 },
  timestamp,
});

describe("bootstrapPresenceService", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "presence-bootstrap-"));
    initializeDatabase(":memory:");
  });

  afterEach(async () => {
    closeDatabase();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("reloads identities and retained history", async () => {
    const storage = new IdentityStorage(dataDir);
    const aliceImage = await storage.saveReferenceImage(
      "alice",
      new Uint8Array([0, 1]),
    );
    saveIdentity({
      name: "alice",
      featureVector: [0.5, 0.5],
      registeredAt: 1000,
      imagePath: aliceImage,
    });
    saveIdentity({
      name: "bob",
      featureVector: [0.9, 0.9],
      registeredAt: 2000,
      imagePath: null,
    });
    saveIdentity({
      name: "carol",
      featureVector: [0.3, 0.3],
      registeredAt: 3000,
      imagePath: path.join(dataDir, "identities", "carol", "carol.jpg"),
    });
    insertDetectionEvents([1, 2, 3].map(storedEvent));

    const { engine, service, reloadedIdentities, restoredEvents } =
      await bootstrapPresenceService({
        detector,
        registerHandlers: false,
        config: { storage: { dataDir, databasePath: ":memory:" } },
      });

    expect(reloadedIdentities).toBe(3);
    expect(restoredEvents).toBe(3);
    expect(engine.getIdentity("alice")?.featureVector).toEqual([0, 1]);
    expect(engine.getIdentity("bob")?.featureVector).toEqual([0.9, 0.9]);
    expect(engine.getIdentity("carol")?.featureVector).toEqual([0.3, 0.3]);
    expect(service.listIdentities().map((identity) => identity.name)).toEqual([
      "alice",
      "bob",
      "carol",
    ]);
    expect(
      service.queryHistory({ limit: 10 }).events.map((event) => event.timestamp),
    ).toEqual([3, 2, 1]);
  });

  it("persists new detections to the database", async () => {
    const { service } = await bootstrapPresenceService({
      detector,
      registerHandlers: false,
      config: { storage: { dataDir, databasePath: ":memory:" } },
    });
    await service.registerFromImage("alice", new Uint8Array([0, 1]));

    const result = await service.processFrame(new Uint8Array([0, 1]), 5000);

    expect(result).toMatchObject({
      success: true,
      outcome: {
        resolutions: [
          { event: { identityLabel: "alice", similarity: 100, outcome: "tentative" } },
        ],
      },
    });
    expect(loadRecentDetectionEvents(10).map((event) => event.identityLabel)).toEqual([
      "alice",
    ]);
  });

  it("closes the database on shutdown", async () => {
    await bootstrapPresenceService({
      detector,
      registerHandlers: false,
      config: { storage: { dataDir, databasePath: ":memory:" } },
    });

    await shutdownPresenceService();

    expect(() => getDatabase()).toThrow("Database has not been initialized");
  });
});
