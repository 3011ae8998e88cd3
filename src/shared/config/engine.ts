import path from "node:path";
import { getEnvVar, parseNumericEnv } from "../env";

export type MatchThresholdConfig = {
  /** Similarity (0-100) at or above which a match is promoted to known. */
  knownSimilarity: number;
  /** Similarity (0-100) below which a face is logged as an unknown incident. */
  unknownSimilarity: number;
};

export type SessionTimingConfig = {
  /** Seconds of continuous known sightings before a session is confirmed. */
  activationSeconds: number;
};

export type HistoryConfig = {
  /** Maximum number of detection events retained in memory and on disk. */
  capacity: number;
  /** Window, in hours, counted as recent activity by the stats aggregate. */
  recentWindowHours: number;
};

export type StorageConfig = {
  /** Root folder holding identity folders and the unknown-face archive. */
  dataDir: string;
  /** SQLite database file, or ":memory:". */
  databasePath: string;
};

export type EngineConfig = {
  thresholds: MatchThresholdConfig;
  timings: SessionTimingConfig;
  history: HistoryConfig;
  storage: StorageConfig;
};

export type EngineConfigOverrides = Partial<{
  thresholds: Partial<MatchThresholdConfig>;
  timings: Partial<SessionTimingConfig>;
  history: Partial<HistoryConfig>;
  storage: Partial<StorageConfig>;
}>;

const DEFAULT_DATA_DIR = path.resolve(process.cwd(), "data");

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  thresholds: {
    knownSimilarity: 70,
    unknownSimilarity: 60,
  },
  timings: {
    activationSeconds: 3,
  },
  history: {
    capacity: 1000,
    recentWindowHours: 24,
  },
  storage: {
    dataDir: DEFAULT_DATA_DIR,
    databasePath: path.join(DEFAULT_DATA_DIR, "presence.sqlite"),
  },
};

export const cloneEngineConfig = (config: EngineConfig): EngineConfig => {
  return {
    thresholds: { ...config.thresholds },
    timings: { ...config.timings },
    history: { ...config.history },
    storage: { ...config.storage },
  };
};

const normaliseThresholds = (
  thresholds: MatchThresholdConfig,
): MatchThresholdConfig => {
  // The unknown cut-off can never sit above the known cut-off.
  return {
    knownSimilarity: thresholds.knownSimilarity,
    unknownSimilarity: Math.min(
      thresholds.unknownSimilarity,
      thresholds.knownSimilarity,
    ),
  };
};

export const mergeEngineConfig = (
  current: EngineConfig,
  overrides?: EngineConfigOverrides,
): EngineConfig => {
  if (!overrides) {
    return cloneEngineConfig(current);
  }

  return {
    thresholds: normaliseThresholds({
      ...current.thresholds,
      ...(overrides.thresholds ?? {}),
    }),
    timings: {
      ...current.timings,
      ...(overrides.timings ?? {}),
    },
    history: {
      ...current.history,
      ...(overrides.history ?? {}),
    },
    storage: {
      ...current.storage,
      ...(overrides.storage ?? {}),
    },
  };
};

export const createEngineEnvOverrides = (): EngineConfigOverrides => {
  const thresholds: Partial<MatchThresholdConfig> = {};
  const knownSimilarity = parseNumericEnv(
    getEnvVar("PRESENCE_KNOWN_THRESHOLD"),
    { min: 0, max: 100 },
  );
  if (knownSimilarity !== null) {
    thresholds.knownSimilarity = knownSimilarity;
  }
  const unknownSimilarity = parseNumericEnv(
    getEnvVar("PRESENCE_UNKNOWN_THRESHOLD"),
    { min: 0, max: 100 },
  );
  if (unknownSimilarity !== null) {
    thresholds.unknownSimilarity = unknownSimilarity;
  }

  const timings: Partial<SessionTimingConfig> = {};
  const activationSeconds = parseNumericEnv(
    getEnvVar("PRESENCE_ACTIVATION_SECONDS"),
    { min: 0, max: 600 },
  );
  if (activationSeconds !== null) {
    timings.activationSeconds = activationSeconds;
  }

  const history: Partial<HistoryConfig> = {};
  const capacity = parseNumericEnv(getEnvVar("PRESENCE_HISTORY_CAPACITY"), {
    min: 1,
    max: 100_000,
    integer: true,
  });
  if (capacity !== null) {
    history.capacity = capacity;
  }
  const recentWindowHours = parseNumericEnv(
    getEnvVar("PRESENCE_RECENT_WINDOW_HOURS"),
    { min: 1, max: 24 * 365 },
  );
  if (recentWindowHours !== null) {
    history.recentWindowHours = recentWindowHours;
  }

  const storage: Partial<StorageConfig> = {};
  const dataDir = getEnvVar("PRESENCE_DATA_DIR");
  if (dataDir) {
    storage.dataDir = path.resolve(dataDir);
    storage.databasePath = path.join(storage.dataDir, "presence.sqlite");
  }
  const databasePath = getEnvVar("PRESENCE_DATABASE_PATH");
  if (databasePath) {
    storage.databasePath =
      databasePath === ":memory:" ? databasePath : path.resolve(databasePath);
  }

  return {
    thresholds: Object.keys(thresholds).length > 0 ? thresholds : undefined,
    timings: Object.keys(timings).length > 0 ? timings : undefined,
    history: Object.keys(history).length > 0 ? history : undefined,
    storage: Object.keys(storage).length > 0 ? storage : undefined,
  };
};

let activeEngineConfig: EngineConfig | null = null;

const resolveActiveConfig = (): EngineConfig => {
  if (!activeEngineConfig) {
    activeEngineConfig = mergeEngineConfig(
      DEFAULT_ENGINE_CONFIG,
      createEngineEnvOverrides(),
    );
  }
  return activeEngineConfig;
};

export const getEngineConfig = (): EngineConfig => {
  return cloneEngineConfig(resolveActiveConfig());
};

export const updateEngineConfig = (
  overrides: EngineConfigOverrides,
): EngineConfig => {
  activeEngineConfig = mergeEngineConfig(resolveActiveConfig(), overrides);
  return getEngineConfig();
};

export const resetEngineConfig = (): EngineConfig => {
  activeEngineConfig = null;
  return getEngineConfig();
};
