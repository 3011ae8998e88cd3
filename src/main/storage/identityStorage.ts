import fs from "node:fs/promises";
import path from "node:path";
import type { FaceImage } from "../../shared/types/detection";

export const VERIFIED_REPORT_FILENAME = "verified_report.txt";
export const UNKNOWN_REPORT_FILENAME = "unknown_report.txt";

const IDENTITIES_FOLDER = "identities";
const UNKNOWN_FOLDER = "unknown";
const UNKNOWN_FACES_FOLDER = "faces";

// Names become folder names, so anything that could escape the data directory is refused.
const FORBIDDEN_NAME_PATTERN = /[/\\\0]/;

export const isStorableIdentityName = (name: string): boolean => {
  const trimmed = name.trim();
  return (
    trimmed.length > 0 &&
    trimmed !== "." &&
    trimmed !== ".." &&
    !FORBIDDEN_NAME_PATTERN.test(trimmed)
  );
};

const isMissingFileError = (error: unknown): boolean => {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
};

/**
 * On-disk layout under the data directory:
 *
 * - `identities/<name>/<name>.jpg`, the reference image
 * - `identities/<name>/verified_report.txt`
 * - `unknown/unknown_report.txt` and `unknown/faces/*.jpg`
 */
export class IdentityStorage {
  readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = path.resolve(dataDir);
  }

  identityDir(name: string): string {
    if (!isStorableIdentityName(name)) {
      throw new Error(`"${name}" cannot be used as an identity folder name`);
    }
    return path.join(this.dataDir, IDENTITIES_FOLDER, name.trim());
  }

  referenceImagePath(name: string): string {
    return path.join(this.identityDir(name), `${name.trim()}.jpg`);
  }

  verifiedReportPath(name: string): string {
    return path.join(this.identityDir(name), VERIFIED_REPORT_FILENAME);
  }

  get unknownDir(): string {
    return path.join(this.dataDir, UNKNOWN_FOLDER);
  }

  get unknownFacesDir(): string {
    return path.join(this.unknownDir, UNKNOWN_FACES_FOLDER);
  }

  get unknownReportPath(): string {
    return path.join(this.unknownDir, UNKNOWN_REPORT_FILENAME);
  }

  async hasIdentityDir(name: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.identityDir(name));
      return stats.isDirectory();
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  async saveReferenceImage(name: string, image: FaceImage): Promise<string> {
    await fs.mkdir(this.identityDir(name), { recursive: true });
    const imagePath = this.referenceImagePath(name);
    await fs.writeFile(imagePath, image);
    return imagePath;
  }

  async readImage(imagePath: string): Promise<FaceImage | null> {
    try {
      return new Uint8Array(await fs.readFile(imagePath));
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }

  async removeIdentity(name: string): Promise<void> {
    await fs.rm(this.identityDir(name), { recursive: true, force: true });
  }
}
