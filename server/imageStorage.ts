import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import { StorageError, errorMessage } from "./errors";
import { safeLogger, type Logger } from "./safe_logger";

export interface ImageUpload {
  buffer: Buffer;
  originalName: string;
}

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, "_");
}

function safeExtension(originalName: string): string {
  const ext = path.extname(originalName).toLowerCase();
  return /^\.[a-z0-9]{1,10}$/.test(ext) ? ext : "";
}

// 20240315_142501
function fileTimestamp(now: Date): string {
  return now.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * Image artifacts on local disk. Records only keep the returned path; the
 * bytes are never read back by the core.
 */
export class ImageStorage {
  private readonly log: Logger;

  constructor(
    readonly uploadDir: string,
    logger: Logger = safeLogger,
  ) {
    this.log = logger.child("image-storage");
  }

  buildPath(patientId: string, recordType: string, originalName: string, now: Date = new Date()): string {
    const suffix = randomUUID().slice(0, 8);
    const fileName = `${safeSegment(recordType)}_${fileTimestamp(now)}_${suffix}${safeExtension(originalName)}`;
    return path.join(this.uploadDir, safeSegment(patientId), fileName);
  }

  async save(patientId: string, recordType: string, upload: ImageUpload): Promise<string> {
    const target = this.buildPath(patientId, recordType, upload.originalName);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, upload.buffer);
      return target;
    } catch (error) {
      throw new StorageError(`Failed to save image: ${errorMessage(error)}`);
    }
  }

  /** Resolves false when the file was already gone. */
  async remove(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      this.log.warn("Could not remove image file", { error: errorMessage(error) });
      return false;
    }
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (error) {
      if (!isMissingFile(error)) {
        this.log.warn("Could not stat image file", { error: errorMessage(error) });
      }
      return false;
    }
  }
}
