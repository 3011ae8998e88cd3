import {
  formatCompactTimestamp,
  formatReportTimestamp,
  parseCompactTimestamp,
  parseReportTimestamp,
} from "../../shared/time";
import type { EmotionLabel } from "../../shared/types/emotion";
import type {
  UnknownIncidentReport,
  VerifiedVisitReport,
} from "../../shared/types/report";
import { isEmotionLabel } from "../../shared/validation/detection";

// Field order and labels are read back by parseVerifiedReport/parseUnknownReport
// and by external consumers of the report files; change them together.

const NAME_SEPARATOR = " at ";
const PRESENCE_PREFIX = "Presence duration: ";
const EMOTION_PREFIX = "Dominant emotion: ";
const MOTION_PREFIX = "Motion: ";
const SIMILARITY_PREFIX = "Top similarity: ";
const UNKNOWN_PREFIX = "unknown";

export type ParsedVerifiedVisit = {
  identityName: string;
  timestamp: number;
  presenceSeconds: number;
  dominantEmotion: EmotionLabel;
  cumulativeMotion: number;
  similarity: number;
};

export type ParsedUnknownIncident = {
  timestamp: number;
  similarity: number;
  emotion: EmotionLabel;
  cumulativeMotion: number;
};

/** One blank-line-terminated block per verified sighting. */
export const formatVerifiedReport = (report: VerifiedVisitReport): string => {
  return [
    `${report.identityName}${NAME_SEPARATOR}${formatReportTimestamp(report.timestamp)}`,
    `${PRESENCE_PREFIX}${report.presenceSeconds.toFixed(1)} s`,
    `${EMOTION_PREFIX}${report.dominantEmotion}`,
    `${MOTION_PREFIX}${report.cumulativeMotion.toFixed(1)}`,
    `${SIMILARITY_PREFIX}${report.similarity.toFixed(1)}%`,
    "",
    "",
  ].join("\n");
};

export const formatUnknownReportLine = (report: UnknownIncidentReport): string => {
  return (
    `${UNKNOWN_PREFIX} ${formatCompactTimestamp(report.timestamp)}` +
    ` similarity:${report.similarity.toFixed(1)}%` +
    ` emotion:${report.emotion}` +
    ` motion:${report.cumulativeMotion.toFixed(1)}\n`
  );
};

const parsePrefixedNumber = (
  line: string | undefined,
  prefix: string,
  suffix = "",
): number | null => {
  if (!line?.startsWith(prefix)) {
    return null;
  }
  let raw = line.slice(prefix.length).trim();
  if (suffix && raw.endsWith(suffix)) {
    raw = raw.slice(0, -suffix.length).trim();
  }
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) ? value : null;
};

const parseVerifiedBlock = (block: string): ParsedVerifiedVisit | null => {
  const [header, presence, emotion, motion, similarity] = block
    .split("\n")
    .map((line) => line.trim());

  const separatorIndex = header?.lastIndexOf(NAME_SEPARATOR) ?? -1;
  if (!header || separatorIndex <= 0) {
    return null;
  }
  const timestamp = parseReportTimestamp(
    header.slice(separatorIndex + NAME_SEPARATOR.length),
  );
  const presenceSeconds = parsePrefixedNumber(presence, PRESENCE_PREFIX, "s");
  const dominantEmotion = emotion?.startsWith(EMOTION_PREFIX)
    ? emotion.slice(EMOTION_PREFIX.length).trim()
    : null;
  const cumulativeMotion = parsePrefixedNumber(motion, MOTION_PREFIX);
  const similarityValue = parsePrefixedNumber(similarity, SIMILARITY_PREFIX, "%");

  if (
    timestamp === null ||
    presenceSeconds === null ||
    !isEmotionLabel(dominantEmotion) ||
    cumulativeMotion === null ||
    similarityValue === null
  ) {
    return null;
  }

  return {
    identityName: header.slice(0, separatorIndex),
    timestamp,
    presenceSeconds,
    dominantEmotion,
    cumulativeMotion,
    similarity: similarityValue,
  };
};

/** Reads back a verified report file; malformed blocks are skipped. */
export const parseVerifiedReport = (content: string): ParsedVerifiedVisit[] => {
  return content
    .replace(/\r\n/g, "\n")
    .split(/\n\s*\n/)
    .filter((block) => block.trim().length > 0)
    .flatMap((block) => {
      const parsed = parseVerifiedBlock(block.trim());
      return parsed ? [parsed] : [];
    });
};

const parseUnknownLine = (line: string): ParsedUnknownIncident | null => {
  const [prefix, stamp, ...tokens] = line.trim().split(/\s+/);
  if (prefix !== UNKNOWN_PREFIX || !stamp) {
    return null;
  }
  const timestamp = parseCompactTimestamp(stamp);
  if (timestamp === null) {
    return null;
  }

  const fields = new Map<string, string>();
  tokens.forEach((token) => {
    const separator = token.indexOf(":");
    if (separator > 0) {
      fields.set(token.slice(0, separator), token.slice(separator + 1));
    }
  });

  const similarity = Number.parseFloat(
    (fields.get("similarity") ?? "").replace("%", ""),
  );
  const emotion = fields.get("emotion");
  const cumulativeMotion = Number.parseFloat(fields.get("motion") ?? "");

  if (
    !Number.isFinite(similarity) ||
    !isEmotionLabel(emotion) ||
    !Number.isFinite(cumulativeMotion)
  ) {
    return null;
  }

  return { timestamp, similarity, emotion, cumulativeMotion };
};

/** Reads back the unknown-incident log; malformed lines are skipped. */
export const parseUnknownReport = (content: string): ParsedUnknownIncident[] => {
  return content.split(/\r?\n/).flatMap((line) => {
    const parsed = parseUnknownLine(line);
    return parsed ? [parsed] : [];
  });
};
