import fs from "node:fs/promises";
import path from "node:path";
import { getLogger, toErrorPayload } from "../../shared/logger";
import { formatCompactTimestamp } from "../../shared/time";
import type {
  ReportDirective,
  UnknownIncidentReport,
  VerifiedVisitReport,
} from "../../shared/types/report";
import { captureException } from "../sentry";
import type { IdentityStorage } from "../storage/identityStorage";
import { formatUnknownReportLine, formatVerifiedReport } from "./reportFormat";

const logger = getLogger("report-sink", "main");

export type ReportWriteResult =
  | { success: true; path: string; imagePath?: string }
  | { success: false; error: string };

const padMilliseconds = (timestamp: number): string => {
  return String(new Date(timestamp).getMilliseconds()).padStart(3, "0");
};

const MAX_FILENAME_ATTEMPTS = 1000;

export const unknownFaceFilename = (timestamp: number, sequence = 0): string => {
  const base = `unknown_${formatCompactTimestamp(timestamp)}_${padMilliseconds(timestamp)}`;
  return sequence > 0 ? `${base}_${sequence}.jpg` : `${base}.jpg`;
};

const isAlreadyExists = (error: unknown): boolean => {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "EEXIST"
  );
};

/**
 * Appends verified and unknown reports to their files. Write failures are
 * logged and reported, never thrown: a failed report must not interrupt frame
 * processing.
 */
export class ReportSink {
  private readonly storage: IdentityStorage;

  constructor(storage: IdentityStorage) {
    this.storage = storage;
  }

  async dispatch(directive: ReportDirective): Promise<ReportWriteResult> {
    if (directive.kind === "verified") {
      return this.writeVerified(directive.report);
    }
    return this.writeUnknown(directive.report);
  }

  async writeVerified(report: VerifiedVisitReport): Promise<ReportWriteResult> {
    try {
      // The folder is created at registration; a missing one means the identity
      // was deleted out from under us, so nothing is recreated here.
      if (!(await this.storage.hasIdentityDir(report.identityName))) {
        logger.error("Identity folder missing, verified report dropped", {
          name: report.identityName,
        });
        return { success: false, error: "Identity folder not found" };
      }

      const reportPath = this.storage.verifiedReportPath(report.identityName);
      await fs.appendFile(reportPath, formatVerifiedReport(report), "utf8");
      logger.debug("Verified report appended", {
        name: report.identityName,
        reportPath,
      });
      return { success: true, path: reportPath };
    } catch (error) {
      logger.error("Failed to append verified report", {
        name: report.identityName,
        ...toErrorPayload(error),
      });
      captureException(error, { operation: "writeVerifiedReport" });
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  async writeUnknown(report: UnknownIncidentReport): Promise<ReportWriteResult> {
    try {
      await fs.mkdir(this.storage.unknownFacesDir, { recursive: true });
      const imagePath = await this.writeUniqueFaceImage(report);

      const reportPath = this.storage.unknownReportPath;
      await fs.appendFile(reportPath, formatUnknownReportLine(report), "utf8");
      logger.debug("Unknown incident archived", { imagePath });
      return { success: true, path: reportPath, imagePath };
    } catch (error) {
      logger.error("Failed to archive unknown incident", toErrorPayload(error));
      captureException(error, { operation: "writeUnknownReport" });
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  // Faces from one frame share a timestamp; later crops take a numeric suffix.
  private async writeUniqueFaceImage(report: UnknownIncidentReport): Promise<string> {
    for (let sequence = 0; sequence < MAX_FILENAME_ATTEMPTS; sequence += 1) {
      const imagePath = path.join(
        this.storage.unknownFacesDir,
        unknownFaceFilename(report.timestamp, sequence),
      );
      try {
        await fs.writeFile(imagePath, report.faceImage, { flag: "wx" });
        return imagePath;
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error;
        }
      }
    }
    throw new Error(
      `No free filename for unknown face at ${formatCompactTimestamp(report.timestamp)}`,
    );
  }
}
