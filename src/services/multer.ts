import multer from "multer";
import type { Request } from "express";
import { config } from "../config/config";
import { buildDocumentPath, fileStorage, type FileStorage } from "./file-storage.service";

type HandleFileCallback = (error?: Error | null, info?: Partial<Express.Multer.File>) => void;

const asError = (err: unknown) => (err instanceof Error ? err : new Error(String(err)));

/**
 * Streams uploads through FileStorage instead of multer's disk storage, so
 * `file.path` is the path relative to the upload root.
 */
class AmendmentDocumentStorage implements multer.StorageEngine {
  constructor(private readonly storage: FileStorage) {}

  _handleFile(req: Request, file: Express.Multer.File, cb: HandleFileCallback): void {
    const relativePath = buildDocumentPath(req.params.id ?? "unassigned", file.originalname);
    this.storage.save(file.stream, relativePath).then(
      (size) => cb(null, { path: relativePath, filename: relativePath.split("/").pop(), size }),
      (err: unknown) => cb(asError(err))
    );
  }

  _removeFile(req: Request, file: Express.Multer.File, cb: (error: Error | null) => void): void {
    this.storage.remove(file.path).then(
      () => cb(null),
      (err: unknown) => cb(asError(err))
    );
  }
}

export const documentUpload = multer({
  storage: new AmendmentDocumentStorage(fileStorage),
  limits: { fileSize: config.maxUploadBytes, files: 1 },
});
