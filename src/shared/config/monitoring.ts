import { getEnvVar, parseBooleanFlag } from "../env";

type Environment = string;

const resolveEnvironment = (): Environment => {
  const explicitEnv = getEnvVar("APP_ENV") ?? getEnvVar("PRESENCE_ENV");
  if (explicitEnv) {
    return explicitEnv.trim();
  }
  return getEnvVar("NODE_ENV")?.trim() ?? "development";
};

// Identity names are personal data, so they are scrubbed alongside credentials.
const SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "authorization",
  "auth",
  "email",
  "phone",
  "identityname",
  "featurevector",
];

const scrubValue = (value: unknown): unknown => {
  if (value == null) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }

  if (typeof value === "object") {
    const result: Record<string, unknown> = {};
    Object.entries(value).forEach(([key, nestedValue]) => {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey))) {
        result[key] = "[redacted]";
        return;
      }
      result[key] = scrubValue(nestedValue);
    });
    return result;
  }

  return value;
};

const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const sanitizeSentryEvent = <TEvent>(event: TEvent): TEvent => {
  if (!isPlainRecord(event)) {
    return event;
  }
  const eventRecord: Record<string, unknown> = event;

  const breadcrumbs = eventRecord.breadcrumbs;
  if (Array.isArray(breadcrumbs)) {
    eventRecord.breadcrumbs = breadcrumbs.map((breadcrumb: unknown) => {
      if (!isPlainRecord(breadcrumb) || !("data" in breadcrumb)) {
        return breadcrumb;
      }
      return { ...breadcrumb, data: scrubValue(breadcrumb.data) };
    });
  }

  if (isPlainRecord(eventRecord.extra)) {
    eventRecord.extra = scrubValue(eventRecord.extra);
  }

  if (isPlainRecord(eventRecord.contexts)) {
    eventRecord.contexts = scrubValue(eventRecord.contexts);
  }

  eventRecord.request = undefined;
  eventRecord.user = undefined;

  return event;
};

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    tracesSampleRate: number;
  };
  logtail: {
    token: string;
    enabled: boolean;
  };
};

const environment = resolveEnvironment();
const isProductionLike =
  environment === "production" || environment === "staging";

const sentryDsn = getEnvVar("SENTRY_DSN") ?? "";
const logtailToken = getEnvVar("BETTER_STACK_TOKEN") ?? "";

export const monitoringConfig: MonitoringConfig = {
  environment,
  release: getEnvVar("npm_package_version"),
  sentry: {
    dsn: sentryDsn,
    enabled:
      Boolean(sentryDsn) &&
      (isProductionLike ||
        parseBooleanFlag(getEnvVar("ENABLE_SENTRY_IN_DEV"), false)),
    tracesSampleRate: (() => {
      const parsedValue = Number.parseFloat(
        getEnvVar("SENTRY_TRACES_SAMPLE_RATE") ?? "0.1",
      );
      return Number.isNaN(parsedValue) ? 0.1 : parsedValue;
    })(),
  },
  logtail: {
    token: logtailToken,
    enabled:
      Boolean(logtailToken) &&
      (isProductionLike ||
        parseBooleanFlag(getEnvVar("ENABLE_BETTER_STACK_IN_DEV"), false)),
  },
};
