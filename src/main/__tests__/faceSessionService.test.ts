import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SessionEngine } from "../../engine";
import type { FaceDetector } from "../../engine/detection/detector";
import type { DetectionEvent, FaceImage, ObservedFace } from "../../shared/types/detection";
import type { Identity } from "../../shared/types/identity";
import { FaceSessionService, type PresencePersistence } from "../faceSessionService";
import { parseUnknownReport, parseVerifiedReport } from "../reports/reportFormat";
import { ReportSink } from "../reports/reportSink";
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

const ALICE = 1;
const NO_FACE = 0;
const BROKEN = 99;
const CROWD = 98;

// Images are [id, score, x]: the fake detector turns them into one face whose
// vector is [id, score], centred horizontally at x. Reserved ids yield no face,
// two faces or a detector error.
const fakeDetector: FaceDetector = {
  detect: async (image: FaceImage): Promise<ObservedFace[]> => {
    if (image[0] === BROKEN) {
      throw new Error("model unavailable");
    }
    if (image[0] === NO_FACE) {
      return [];
    }
    const x = image.length > 2 ? image[2] : 0;
    const face: ObservedFace = {
      boundingBox: { top: 0, right: x, bottom: 0, left: x },
      featureVector: [image[0], image.length > 1 ? image[1] : 0],
      croppedImage: image,
    };
    return image[0] === CROWD ? [face, { ...face }] : [face];
  },
};

const scoreById = (reference: readonly number[], observed: readonly number[]) =>
  reference[0] === observed[0] ? observed[1] : 0;

class MemoryPersistence implements PresencePersistence {
  readonly identities = new Map<string, Identity>();

  readonly events: DetectionEvent[] = [];

  capacities: number[] = [];

  saveIdentity(identity: Identity): void {
    this.identities.set(identity.name, identity);
  }

  deleteIdentity(name: string): void {
    this.identities.delete(name);
  }

  recordEvents(events: readonly DetectionEvent[], capacity: number): void {
    this.events.push(...events);
    this.capacities.push(capacity);
  }
}

const frameAt = new Date(2024, 2, 5, 9, 0, 0).getTime();

describe("FaceSessionService", () => {
  let dataDir: string;
  let storage: IdentityStorage;
  let persistence: MemoryPersistence;
  let service: FaceSessionService;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "presence-service-"));
    storage = new IdentityStorage(dataDir);
    persistence = new MemoryPersistence();
    service = new FaceSessionService({
      engine: new SessionEngine({
        config: { timings: { activationSeconds: 3 } },
        similarity: scoreById,
      }),
      detector: fakeDetector,
      classifier: { classify: async () => "happy" },
      storage,
      reports: new ReportSink(storage),
      persistence,
    });
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  describe("registerFromImage", () => {
    it("stores the reference image and persists the identity", async () => {
      const image = new Uint8Array([ALICE, 0]);

      const result = await service.registerFromImage(" alice ", image);

      const imagePath = path.join(dataDir, "identities", "alice", "alice.jpg");
      expect(result).toMatchObject({
        success: true,
        replaced: false,
        identity: { name: "alice", featureVector: [ALICE, 0], imagePath },
      });
      expect(new Uint8Array(await fs.readFile(imagePath))).toEqual(image);
      expect(persistence.identities.get("alice")?.imagePath).toBe(imagePath);
      expect(service.listIdentities().map((identity) => identity.name)).toEqual([
        "alice",
      ]);
    });

    it("keeps the original registration time when a name is registered again", async () => {
      const first = await service.registerFromImage("alice", new Uint8Array([ALICE, 0]));
      const second = await service.registerFromImage("alice", new Uint8Array([ALICE, 5]));

      expect(first.success && second.success).toBe(true);
      if (!first.success || !second.success) {
        return;
      }
      expect(second.replaced).toBe(true);
      expect(second.identity.registeredAt).toBe(first.identity.registeredAt);
      expect(persistence.identities.get("alice")).toMatchObject({
        featureVector: [ALICE, 5],
        registeredAt: first.identity.registeredAt,
      });
    });

    it("rejects names that cannot become a folder", async () => {
      const image = new Uint8Array([ALICE, 0]);

      for (const name of ["", "   ", "..", "a/b", "a\\b"]) {
        await expect(service.registerFromImage(name, image)).resolves.toMatchObject({
          success: false,
          kind: "InvalidInput",
        });
      }
      expect(service.listIdentities()).toEqual([]);
    });

    it("rejects an empty image", async () => {
      await expect(
        service.registerFromImage("alice", new Uint8Array()),
      ).resolves.toMatchObject({ success: false, kind: "InvalidInput" });
    });

    it("needs exactly one face in the image", async () => {
      const result = await service.registerFromImage("alice", new Uint8Array([NO_FACE]));

      expect(result).toEqual({
        success: false,
        kind: "InvalidInput",
        message: "Registration needs exactly one face, found 0",
      });
      expect(await storage.hasIdentityDir("alice")).toBe(false);
    });

    it("rejects an image with several faces", async () => {
      const result = await service.registerFromImage("alice", new Uint8Array([CROWD]));

      expect(result).toMatchObject({ success: false, kind: "InvalidInput" });
      expect(service.listIdentities()).toEqual([]);
    });

    it("fails extraction when the detector throws", async () => {
      await expect(
        service.registerFromImage("alice", new Uint8Array([BROKEN])),
      ).resolves.toEqual({
        success: false,
        kind: "ExtractionFailure",
        message: "model unavailable",
      });
    });
  });

  describe("processFrame", () => {
    beforeEach(async () => {
      await service.registerFromImage("alice", new Uint8Array([ALICE, 0]));
    });

    it("writes one verified report once presence is confirmed", async () => {
      const xs = [0, 5, 8, 10];
      for (const [index, x] of xs.entries()) {
        const result = await service.processFrame(
          new Uint8Array([ALICE, 90, x]),
          frameAt + index * 1000,
        );
        expect(result.success).toBe(true);
      }

      const content = await fs.readFile(storage.verifiedReportPath("alice"), "utf8");
      expect(parseVerifiedReport(content)).toEqual([
        {
          identityName: "alice",
          timestamp: frameAt + 3000,
          presenceSeconds: 0,
          dominantEmotion: "happy",
          cumulativeMotion: 0,
          similarity: 90,
        },
      ]);
      expect(persistence.events.map((event) => event.outcome)).toEqual([
        "tentative",
        "tentative",
        "tentative",
        "verified",
      ]);
      expect(persistence.capacities).toEqual([1000, 1000, 1000, 1000]);
    });

    it("archives a low-similarity face as one incident", async () => {
      const result = await service.processFrame(new Uint8Array([ALICE, 45]), frameAt);

      expect(result).toMatchObject({
        success: true,
        outcome: { resolutions: [{ event: { outcome: "incident" } }] },
      });
      const content = await fs.readFile(storage.unknownReportPath, "utf8");
      expect(parseUnknownReport(content)).toEqual([
        { timestamp: frameAt, similarity: 45, emotion: "happy", cumulativeMotion: 0 },
      ]);
      expect(await fs.readdir(storage.unknownFacesDir)).toEqual([
        "unknown_20240305_090000_000.jpg",
      ]);
      await expect(fs.stat(storage.verifiedReportPath("alice"))).rejects.toThrow();
    });

    it("archives a separate crop for each unknown face in one frame", async () => {
      const result = await service.processFrame(new Uint8Array([CROWD, 0, 0]), frameAt);

      expect(result).toMatchObject({
        success: true,
        outcome: {
          resolutions: [
            { event: { outcome: "incident" } },
            { event: { outcome: "incident" } },
          ],
        },
      });
      const content = await fs.readFile(storage.unknownReportPath, "utf8");
      expect(parseUnknownReport(content)).toHaveLength(2);
      expect((await fs.readdir(storage.unknownFacesDir)).sort()).toEqual([
        "unknown_20240305_090000_000.jpg",
        "unknown_20240305_090000_000_1.jpg",
      ]);
    });

    it("appends concurrent unstamped frames in time order", async () => {
      const SLOW = 1;
      const engine = new SessionEngine({ similarity: scoreById });
      engine.registerIdentity("alice", [ALICE, 0]);
      const delayedService = new FaceSessionService({
        engine,
        detector: fakeDetector,
        classifier: {
          classify: async (image) => {
            if (image[3] === SLOW) {
              await new Promise((resolve) => setTimeout(resolve, 30));
            }
            return "neutral";
          },
        },
        storage,
        reports: new ReportSink(storage),
        persistence,
      });

      const slowFrame = delayedService.processFrame(new Uint8Array([ALICE, 45, 0, SLOW]));
      await new Promise((resolve) => setTimeout(resolve, 5));
      const fastFrame = delayedService.processFrame(new Uint8Array([ALICE, 30, 0]));
      await Promise.all([slowFrame, fastFrame]);

      const { events } = delayedService.queryHistory({ limit: 10 });
      expect(events.map((event) => event.similarity)).toEqual([45, 30]);
      expect(events[0].timestamp).toBeGreaterThanOrEqual(events[1].timestamp);
    });

    it("returns an empty outcome for a frame without faces", async () => {
      const result = await service.processFrame(new Uint8Array([NO_FACE]), frameAt);

      expect(result).toEqual({
        success: true,
        outcome: { timestamp: frameAt, resolutions: [] },
      });
      expect(persistence.events).toEqual([]);
    });

    it("surfaces detector failures", async () => {
      await expect(
        service.processFrame(new Uint8Array([BROKEN]), frameAt),
      ).resolves.toMatchObject({ success: false, kind: "ExtractionFailure" });
    });

    it("keeps processing when event persistence fails", async () => {
      vi.spyOn(persistence, "recordEvents").mockImplementation(() => {
        throw new Error("disk full");
      });

      const result = await service.processFrame(new Uint8Array([ALICE, 90]), frameAt);

      expect(result.success).toBe(true);
      expect(service.queryHistory({ limit: 5 }).total).toBe(1);
    });
  });

  describe("processDetections", () => {
    it("rejects malformed faces without touching history", async () => {
      const result = await service.processDetections(
        [{ boundingBox: { top: 0, right: 1, bottom: 1, left: 0 }, featureVector: [] }],
        frameAt,
      );

      expect(result).toMatchObject({ success: false, kind: "InvalidInput" });
      expect(service.getStats(frameAt).totalDetections).toBe(0);
    });
  });

  describe("deleteIdentity", () => {
    it("removes the identity everywhere", async () => {
      await service.registerFromImage("alice", new Uint8Array([ALICE, 0]));

      await expect(service.deleteIdentity("alice")).resolves.toEqual({
        success: true,
        name: "alice",
      });
      expect(await storage.hasIdentityDir("alice")).toBe(false);
      expect(persistence.identities.has("alice")).toBe(false);
      expect(service.listIdentities()).toEqual([]);
    });

    it("drops the stored row even when the folder cannot be removed", async () => {
      await service.registerFromImage("alice", new Uint8Array([ALICE, 0]));
      vi.spyOn(storage, "removeIdentity").mockRejectedValue(new Error("permission denied"));

      await expect(service.deleteIdentity("alice")).resolves.toEqual({
        success: false,
        kind: "StorageFailure",
        message: "permission denied",
      });
      expect(persistence.identities.has("alice")).toBe(false);
      expect(service.listIdentities()).toEqual([]);
    });

    it("still removes the folder when the stored row cannot be deleted", async () => {
      await service.registerFromImage("alice", new Uint8Array([ALICE, 0]));
      vi.spyOn(persistence, "deleteIdentity").mockImplementation(() => {
        throw new Error("database locked");
      });

      await expect(service.deleteIdentity("alice")).resolves.toMatchObject({
        success: false,
        kind: "StorageFailure",
        message: "database locked",
      });
      expect(await storage.hasIdentityDir("alice")).toBe(false);
    });

    it("reports unknown names", async () => {
      await expect(service.deleteIdentity("carol")).resolves.toMatchObject({
        success: false,
        kind: "NotFound",
      });
    });
  });

  it("exposes history queries and stats", async () => {
    await service.registerFromImage("alice", new Uint8Array([ALICE, 0]));
    await service.processFrame(new Uint8Array([ALICE, 90]), frameAt);
    await service.processFrame(new Uint8Array([ALICE, 30]), frameAt + 1000);

    const page = service.queryHistory({ limit: 1, identity: "unknown" });

    expect(page.total).toBe(1);
    expect(page.events.map((event) => event.similarity)).toEqual([30]);
    expect(service.getStats(frameAt + 1000)).toMatchObject({
      totalIdentities: 1,
      totalDetections: 2,
      knownDetections: 1,
      unknownDetections: 1,
    });
  });
});
