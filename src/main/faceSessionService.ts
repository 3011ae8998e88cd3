import type { FaceDetector } from "../engine/detection/detector";
import type { EmotionClassifier } from "../engine/emotion/classifier";
import type {
  ClassifiedFace,
  EngineStats,
  FrameOutcome,
  HistoryPage,
  SessionEngine,
} from "../engine";
import type { HistoryQuery } from "../engine/history/ledger";
import { getLogger, toErrorPayload } from "../shared/logger";
import type {
  DetectionEvent,
  FaceImage,
  ObservedFace,
} from "../shared/types/detection";
import type { Identity, IdentitySummary } from "../shared/types/identity";
import { isObservedFace } from "../shared/validation/detection";
import {
  deleteIdentity as deleteStoredIdentity,
  saveIdentity,
} from "./database/identityRepository";
import {
  insertDetectionEvents,
  pruneDetectionEvents,
} from "./database/detectionEventRepository";
import type { ReportSink } from "./reports/reportSink";
import { captureException } from "./sentry";
import {
  type IdentityStorage,
  isStorableIdentityName,
} from "./storage/identityStorage";

const logger = getLogger("face-session-service", "main");

export type ServiceFailureKind =
  | "InvalidInput"
  | "ExtractionFailure"
  | "NotFound"
  | "StorageFailure"
  | "DuplicateOrInvalid";

export type ServiceFailure = {
  success: false;
  kind: ServiceFailureKind;
  message: string;
};

export type RegisterFromImageResult =
  | { success: true; identity: Identity; replaced: boolean }
  | ServiceFailure;

export type ProcessFrameResult =
  | { success: true; outcome: FrameOutcome }
  | ServiceFailure;

export type DeleteIdentityResult = { success: true; name: string } | ServiceFailure;

/** Durable side of the service; the default writes through the SQLite repositories. */
export type PresencePersistence = {
  saveIdentity(identity: Identity): void;
  deleteIdentity(name: string): void;
  recordEvents(events: readonly DetectionEvent[], capacity: number): void;
};

export const databasePersistence: PresencePersistence = {
  saveIdentity,
  deleteIdentity: deleteStoredIdentity,
  recordEvents: (events, capacity) => {
    insertDetectionEvents(events);
    pruneDetectionEvents(capacity);
  },
};

export type FaceSessionServiceOptions = {
  engine: SessionEngine;
  detector: FaceDetector;
  classifier: EmotionClassifier;
  storage: IdentityStorage;
  reports: ReportSink;
  persistence?: PresencePersistence;
};

const failure = (kind: ServiceFailureKind, message: string): ServiceFailure => ({
  success: false,
  kind,
  message,
});

const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

/**
 * Entry point for callers: joins the session engine with detection, emotion
 * classification, identity folders, the database and the report files.
 */
export class FaceSessionService {
  private readonly engine: SessionEngine;

  private readonly detector: FaceDetector;

  private readonly classifier: EmotionClassifier;

  private readonly storage: IdentityStorage;

  private readonly reports: ReportSink;

  private readonly persistence: PresencePersistence;

  constructor(options: FaceSessionServiceOptions) {
    this.engine = options.engine;
    this.detector = options.detector;
    this.classifier = options.classifier;
    this.storage = options.storage;
    this.reports = options.reports;
    this.persistence = options.persistence ?? databasePersistence;
  }

  async registerFromImage(
    name: string,
    image: FaceImage,
  ): Promise<RegisterFromImageResult> {
    const trimmedName = name.trim();
    if (!isStorableIdentityName(trimmedName)) {
      return failure("InvalidInput", "Identity name must be a non-empty folder-safe name");
    }
    if (image.byteLength === 0) {
      return failure("InvalidInput", "Image must not be empty");
    }

    let faces: ObservedFace[];
    try {
      faces = await this.detector.detect(image);
    } catch (error) {
      logger.warn("Face extraction failed during registration", {
        name: trimmedName,
        ...toErrorPayload(error),
      });
      return failure("ExtractionFailure", describeError(error));
    }

    if (faces.length !== 1) {
      return failure(
        "InvalidInput",
        `Registration needs exactly one face, found ${faces.length}`,
      );
    }
    const [face] = faces;
    if (!isObservedFace(face)) {
      return failure("ExtractionFailure", "Detector returned no usable feature vector");
    }

    let imagePath: string;
    try {
      imagePath = await this.storage.saveReferenceImage(trimmedName, image);
    } catch (error) {
      logger.error("Failed to store reference image", {
        name: trimmedName,
        ...toErrorPayload(error),
      });
      captureException(error, { operation: "saveReferenceImage" });
      return failure("StorageFailure", describeError(error));
    }

    const result = this.engine.registerIdentity(trimmedName, face.featureVector, {
      imagePath,
    });
    if (!result.success) {
      return result;
    }

    try {
      this.persistence.saveIdentity(result.identity);
    } catch (error) {
      // The identity stays usable for this run; only the restart reload is lost.
      captureException(error, { operation: "saveIdentity" });
      return failure("StorageFailure", describeError(error));
    }

    return result;
  }

  async processFrame(
    image: FaceImage,
    timestamp?: number,
  ): Promise<ProcessFrameResult> {
    let faces: ObservedFace[];
    try {
      faces = await this.detector.detect(image);
    } catch (error) {
      logger.warn("Face extraction failed for frame", toErrorPayload(error));
      return failure("ExtractionFailure", describeError(error));
    }
    return this.processDetections(faces, timestamp);
  }

  async processDetections(
    faces: readonly unknown[],
    timestamp?: number,
  ): Promise<ProcessFrameResult> {
    const observed = faces.filter(isObservedFace);
    if (observed.length !== faces.length) {
      return failure(
        "InvalidInput",
        "Every face needs a bounding box, a feature vector and a cropped image",
      );
    }

    let classified: ClassifiedFace[];
    try {
      classified = await Promise.all(
        observed.map(async (face) => ({
          ...face,
          emotion: await this.classifier.classify(face.croppedImage),
        })),
      );
    } catch (error) {
      logger.warn("Emotion classification failed for frame", toErrorPayload(error));
      return failure("ExtractionFailure", describeError(error));
    }

    // An omitted timestamp is taken inside the engine, after every await, so
    // concurrent frames reach the ledger in time order.
    const outcome = this.engine.processFaces(classified, timestamp);
    this.persistEvents(outcome);

    for (const resolution of outcome.resolutions) {
      if (resolution.report) {
        await this.reports.dispatch(resolution.report);
      }
    }

    return { success: true, outcome };
  }

  listIdentities(): IdentitySummary[] {
    return this.engine.listIdentities();
  }

  async deleteIdentity(name: string): Promise<DeleteIdentityResult> {
    const result = this.engine.removeIdentity(name);
    if (!result.success) {
      return result;
    }
    const removedName = result.identity.name;

    let cleanupError: unknown;
    try {
      this.persistence.deleteIdentity(removedName);
    } catch (error) {
      logger.error("Failed to delete stored identity", {
        name: removedName,
        ...toErrorPayload(error),
      });
      captureException(error, { operation: "deleteIdentity" });
      cleanupError = error;
    }

    try {
      await this.storage.removeIdentity(removedName);
    } catch (error) {
      logger.error("Failed to remove identity folder", {
        name: removedName,
        ...toErrorPayload(error),
      });
      captureException(error, { operation: "removeIdentityFolder" });
      if (cleanupError === undefined) {
        cleanupError = error;
      }
    }

    if (cleanupError !== undefined) {
      return failure("StorageFailure", describeError(cleanupError));
    }

    return { success: true, name: removedName };
  }

  queryHistory(query: HistoryQuery): HistoryPage {
    return this.engine.queryHistory(query);
  }

  getStats(now?: number): EngineStats {
    return this.engine.getStats(now);
  }

  private persistEvents(outcome: FrameOutcome): void {
    if (outcome.resolutions.length === 0) {
      return;
    }
    try {
      this.persistence.recordEvents(
        outcome.resolutions.map((resolution) => resolution.event),
        this.engine.historyCapacity,
      );
    } catch (error) {
      logger.error("Failed to persist detection events", toErrorPayload(error));
      captureException(error, { operation: "recordEvents" });
    }
  }
}
