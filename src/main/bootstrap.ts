import { SessionEngine } from "../engine";
import type { FaceDetector } from "../engine/detection/detector";
import {
  type EmotionClassifier,
  RandomEmotionClassifier,
} from "../engine/emotion/classifier";
import {
  type EngineConfigOverrides,
  getEngineConfig,
  mergeEngineConfig,
} from "../shared/config/engine";
import { getLogger, toErrorPayload } from "../shared/logger";
import type { FeatureVector, Identity } from "../shared/types/identity";
import { isObservedFace } from "../shared/validation/detection";
import { closeDatabase, initializeDatabase } from "./database/client";
import { loadRecentDetectionEvents } from "./database/detectionEventRepository";
import { listStoredIdentities } from "./database/identityRepository";
import { FaceSessionService } from "./faceSessionService";
import { ReportSink } from "./reports/reportSink";
import { flushSentry, initSentry, registerProcessHandlers } from "./sentry";
import { IdentityStorage } from "./storage/identityStorage";

const logger = getLogger("bootstrap", "main");

export type BootstrapOptions = {
  detector: FaceDetector;
  classifier?: EmotionClassifier;
  config?: EngineConfigOverrides;
  /** Install uncaughtException/unhandledRejection handlers (default true). */
  registerHandlers?: boolean;
};

export type BootstrapResult = {
  service: FaceSessionService;
  engine: SessionEngine;
  reloadedIdentities: number;
  restoredEvents: number;
};

const resolveReloadVector = async (
  identity: Identity,
  storage: IdentityStorage,
  detector: FaceDetector,
): Promise<FeatureVector> => {
  if (!identity.imagePath) {
    return identity.featureVector;
  }

  try {
    const image = await storage.readImage(identity.imagePath);
    if (!image) {
      logger.warn("Reference image missing, using stored vector", {
        name: identity.name,
      });
      return identity.featureVector;
    }
    const face = (await detector.detect(image)).find(isObservedFace);
    if (!face) {
      logger.warn("No face re-extracted from reference image, using stored vector", {
        name: identity.name,
      });
      return identity.featureVector;
    }
    return face.featureVector;
  } catch (error) {
    logger.warn("Re-extraction failed, using stored vector", {
      name: identity.name,
      ...toErrorPayload(error),
    });
    return identity.featureVector;
  }
};

/**
 * Wires monitoring, the database, identity folders and the session engine,
 * then reloads persisted identities and retained history.
 */
export const bootstrapPresenceService = async (
  options: BootstrapOptions,
): Promise<BootstrapResult> => {
  initSentry();
  if (options.registerHandlers ?? true) {
    registerProcessHandlers();
  }

  const config = mergeEngineConfig(getEngineConfig(), options.config);
  initializeDatabase(config.storage.databasePath);

  const engine = new SessionEngine({ config });
  const storage = new IdentityStorage(config.storage.dataDir);

  let reloadedIdentities = 0;
  for (const identity of listStoredIdentities()) {
    const vector = await resolveReloadVector(identity, storage, options.detector);
    const result = engine.registerIdentity(identity.name, vector, {
      registeredAt: identity.registeredAt,
      imagePath: identity.imagePath,
    });
    if (result.success) {
      reloadedIdentities += 1;
    } else {
      logger.warn("Skipped stored identity", {
        name: identity.name,
        reason: result.message,
      });
    }
  }

  const history = loadRecentDetectionEvents(engine.historyCapacity);
  engine.restoreHistory(history);

  logger.info("Presence service ready", {
    identities: reloadedIdentities,
    restoredEvents: history.length,
    dataDir: config.storage.dataDir,
  });

  const service = new FaceSessionService({
    engine,
    detector: options.detector,
    classifier: options.classifier ?? new RandomEmotionClassifier(),
    storage,
    reports: new ReportSink(storage),
  });

  return {
    service,
    engine,
    reloadedIdentities,
    restoredEvents: history.length,
  };
};

/** Closes the database and flushes pending log and error shipments. */
export const shutdownPresenceService = async (): Promise<void> => {
  closeDatabase();
  await Promise.all([logger.flush(), flushSentry()]);
};
