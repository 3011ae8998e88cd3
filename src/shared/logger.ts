/* eslint-disable no-console */
// Console output mirrors the structured logs locally while they ship to Better Stack.
import { monitoringConfig } from "./config/monitoring";

export type LoggerProcessType = "engine" | "main";

export type LoggerMetadata = Record<string, unknown>;

type LoggerOptions = {
  module: string;
  processType: LoggerProcessType;
};

type LogtailMethod = (
  message: string,
  context?: LoggerMetadata,
) => Promise<unknown>;

type LogtailClient = {
  debug: LogtailMethod;
  info: LogtailMethod;
  warn: LogtailMethod;
  error: LogtailMethod;
  flush: () => Promise<unknown>;
};

const consoleWriters = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
} as const;

type LogLevel = keyof typeof consoleWriters;

let logtailInstance: Promise<LogtailClient | null> | null = null;

const loadLogtail = async (): Promise<LogtailClient | null> => {
  if (!monitoringConfig.logtail.enabled) {
    return null;
  }

  if (logtailInstance) {
    return logtailInstance;
  }

  logtailInstance = (async () => {
    try {
      const { Logtail } = await import("@logtail/node");
      return new Logtail(monitoringConfig.logtail.token);
    } catch (error) {
      console.error("Failed to initialise Better Stack Logtail client", error);
      return null;
    }
  })();

  return logtailInstance;
};

const emitLogtail = async (
  level: LogLevel,
  message: string,
  metadata: LoggerMetadata,
) => {
  try {
    const instance = await loadLogtail();
    if (!instance) {
      return;
    }
    const method = level === "fatal" ? "error" : level;
    await instance[method](message, metadata);
  } catch (error) {
    console.error("Failed to send log to Better Stack", error);
  }
};

const createEmitter =
  ({ module, processType }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    const timestamp = new Date().toISOString();
    const enrichedMetadata = {
      ...metadata,
      module,
      processType,
      environment: monitoringConfig.environment,
      timestamp,
      level,
    };

    consoleWriters[level](
      `[${timestamp}] [${level.toUpperCase()}] ${message}`,
      enrichedMetadata,
    );

    if (monitoringConfig.logtail.enabled) {
      void emitLogtail(level, message, enrichedMetadata);
    }
  };

export const createLogger = (options: LoggerOptions) => {
  const flush = async () => {
    const instance = await loadLogtail();
    await instance?.flush();
  };

  return {
    debug: createEmitter(options, "debug"),
    info: createEmitter(options, "info"),
    warn: createEmitter(options, "warn"),
    error: createEmitter(options, "error"),
    fatal: createEmitter(options, "fatal"),
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (
  module: string,
  processType: LoggerProcessType,
): Logger => {
  const cacheKey = `${processType}:${module}`;
  const cached = loggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module, processType });
  loggerCache.set(cacheKey, logger);
  return logger;
};

export const toErrorPayload = (error: unknown): LoggerMetadata => ({
  error: error instanceof Error ? error.message : String(error),
  stack: error instanceof Error ? error.stack : undefined,
});
