export const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
};

const TRUTHY_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSY_VALUES = new Set(["0", "false", "no", "off"]);

const parseOptionalBoolean = (value?: string | null): boolean | null => {
  if (typeof value !== "string") {
    return null;
  }
  const normalised = value.trim().toLowerCase();
  if (TRUTHY_VALUES.has(normalised)) {
    return true;
  }
  if (FALSY_VALUES.has(normalised)) {
    return false;
  }
  return null;
};

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => {
  return parseOptionalBoolean(value) ?? defaultValue;
};

type NumericOptions = {
  min: number;
  max: number;
  integer?: boolean;
};

/**
 * Parses a numeric environment value, clamping it into `[min, max]`.
 * Returns null for missing, blank or non-numeric input so callers can fall
 * back to their defaults.
 */
export const parseNumericEnv = (
  value: string | null | undefined,
  options: NumericOptions,
): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = options.integer
    ? Number.parseInt(trimmed, 10)
    : Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return clamp(parsed, options.min, options.max);
};

export const getEnvVar = (key: string): string | undefined => {
  const value = process.env[key];
  return value !== undefined && value.trim().length > 0 ? value : undefined;
};
