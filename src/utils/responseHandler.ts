import type { Response } from "express";
import { AppError, toAppError } from "./app-errors";
import { errorLog } from "../services/logging-service";

export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T | null;
  error?: unknown;
}

/* ------------------------------------------------------------------
   NORMAL API RESPONSES
------------------------------------------------------------------- */
export const successResponse = <T>(res: Response, message: string, data: T | null = null) => {
  return res.status(200).json({
    success: true,
    message,
    data,
  } satisfies ApiResponse<T>);
};

export const createdResponse = <T>(res: Response, message: string, data: T) => {
  return res.status(201).json({
    success: true,
    message,
    data,
  } satisfies ApiResponse<T>);
};

export const errorResponse = (
  res: Response,
  message: string,
  error: unknown = null,
  statusCode: number = 400
) => {
  return res.status(statusCode).json({
    success: false,
    message,
    error,
  } satisfies ApiResponse);
};

const serverError = (res: Response, message: string, error: unknown = null) => {
  return errorResponse(res, message || "Internal Server Error", error, 500);
};

/* ------------------------------------------------------------------
   TYPED ERRORS -> STATUS CODES
------------------------------------------------------------------- */
export const sendError = (res: Response, err: unknown, fallbackMessage: string) => {
  const appError = toAppError(err);
  if (appError instanceof AppError && appError.statusCode < 500) {
    return errorResponse(res, appError.message, appError.details ?? appError.code, appError.statusCode);
  }
  const routePath = res.req?.originalUrl;
  errorLog(`Error in route ${routePath}: ${appError.stack || appError.message}`);
  return serverError(res, fallbackMessage, appError instanceof AppError ? appError.code : null);
};
