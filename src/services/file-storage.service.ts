import crypto from "crypto";
import fs from "fs";
import path from "path";
import { pipeline } from "stream/promises";
import type { Readable } from "stream";
import { config } from "../config/config";
import { StorageFailureError, ValidationFailureError } from "../utils/app-errors";

/**
 * Disk storage for uploaded documents. Callers deal only in paths relative to the
 * upload root; those relative paths are what the database stores.
 */
export class FileStorage {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  resolve(relativePath: string): string {
    const absolute = path.resolve(this.root, relativePath);
    if (absolute !== this.root && !absolute.startsWith(this.root + path.sep)) {
      throw new ValidationFailureError(`Path escapes the upload directory: ${relativePath}`);
    }
    return absolute;
  }

  /** Writes the stream to disk and returns the byte count. A partial file is removed on failure. */
  async save(stream: Readable, relativePath: string): Promise<number> {
    const target = this.resolve(relativePath);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });

    try {
      await pipeline(stream, fs.createWriteStream(target));
    } catch (err) {
      await fs.promises.rm(target, { force: true });
      throw new StorageFailureError(`Could not store file ${relativePath}`, err);
    }
    const { size } = await fs.promises.stat(target);
    return size;
  }

  /** Missing files are not an error. */
  async remove(relativePath: string): Promise<void> {
    await fs.promises.rm(this.resolve(relativePath), { force: true });
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      await fs.promises.access(this.resolve(relativePath), fs.constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }
}

export const fileStorage = new FileStorage(config.uploadDir);

// Original name reduced to a safe single path segment
export const sanitizeFilename = (name: string): string => {
  const base = path.basename(name).replace(/\s+/g, "_").replace(/[^A-Za-z0-9._-]/g, "");
  return base.replace(/^\.+/, "") || "file";
};

// The random token keeps same-name uploads in the same millisecond apart
export const buildDocumentPath = (
  amendmentId: number | string,
  originalName: string,
  now = Date.now(),
  token = crypto.randomBytes(4).toString("hex")
): string =>
  path.posix.join("amendments", String(amendmentId), `${now}-${token}-${sanitizeFilename(originalName)}`);
