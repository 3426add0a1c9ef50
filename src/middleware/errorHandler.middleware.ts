import type { ErrorRequestHandler } from "express";
import multer from "multer";
import { errorResponse, sendError } from "../utils/responseHandler";
import ErrorLogger from "../db/core/logger/error-logger";

const isBodyParseError = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";

// Last stop for anything a route did not answer itself
const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof multer.MulterError) {
    const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    errorResponse(res, err.message, { code: err.code, field: err.field ?? null }, status);
    return;
  }

  if (isBodyParseError(err)) {
    errorResponse(res, "Malformed JSON body", null, 400);
    return;
  }

  ErrorLogger.write(err, { method: req.method, url: req.originalUrl });
  sendError(res, err, "Internal Server Error");
};

export default errorHandler;
