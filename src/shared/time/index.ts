export const MS_PER_SECOND = 1000;
export const MS_PER_HOUR = 60 * 60 * MS_PER_SECOND;

/**
 * Session timers and the recent-activity window compare wall-clock
 * timestamps, so the fallback is `Date.now()` rather than a monotonic clock.
 */
export const resolveTimestamp = (value?: number): number => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return Date.now();
};

const pad = (value: number, length = 2): string => {
  return String(value).padStart(length, "0");
};

/** Local time as `YYYY-MM-DD_HH:MM:SS`. */
export const formatReportTimestamp = (timestamp: number): string => {
  const date = new Date(timestamp);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
};

/** Local time as `YYYYMMDD_HHMMSS`. */
export const formatCompactTimestamp = (timestamp: number): string => {
  const date = new Date(timestamp);
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
};

const REPORT_TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})_(\d{2}):(\d{2}):(\d{2})$/;
const COMPACT_TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;

const toLocalTimestamp = (match: RegExpExecArray | null): number | null => {
  if (!match) {
    return null;
  }
  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  const value = date.getTime();
  return Number.isFinite(value) ? value : null;
};

export const parseReportTimestamp = (value: string): number | null => {
  return toLocalTimestamp(REPORT_TIMESTAMP_PATTERN.exec(value.trim()));
};

export const parseCompactTimestamp = (value: string): number | null => {
  return toLocalTimestamp(COMPACT_TIMESTAMP_PATTERN.exec(value.trim()));
};
