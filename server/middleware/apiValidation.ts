import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { z, type ZodSchema } from "zod";
import { InsufficientDataError, isSpeakerError } from "../voice/errors";
import { logError, logWarn } from "../logger";

function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.errors.map((err) => ({
    path: err.path.join("."),
    message: err.message,
  }));
}

/**
 * Middleware to validate route params against a Zod schema
 */
export function validateParams<T extends ZodSchema>(schema: T) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      res.status(400).json({
        status: "error",
        code: "validation_error",
        message: "Invalid route parameters",
        details: formatIssues(result.error),
      });
      return;
    }
    next();
  };
}

/**
 * Standard error response format
 */
export interface ApiError {
  status: "error";
  code: string;
  message: string;
  details?: unknown;
}

export interface ErrorHandlerOptions {
  maxUploadBytes?: number;
}

function formatMegabytes(bytes: number): string {
  const mb = bytes / (1024 * 1024);
  return `${Number.isInteger(mb) ? mb : mb.toFixed(1)}MB`;
}

/**
 * Standardized error handler: the one place core errors are logged and
 * turned into HTTP responses.
 */
export function createApiErrorHandler(options: ErrorHandlerOptions = {}) {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    // Don't handle if response already sent
    if (res.headersSent) {
      return next(err);
    }

    let status = 500;
    let body: ApiError = {
      status: "error",
      code: "internal_error",
      message: "Server error",
    };

    if (isSpeakerError(err)) {
      status = err.status;
      body = { status: "error", code: err.code, message: err.message };
      if (err instanceof InsufficientDataError && err.failedSlots.length > 0) {
        body.details = { failed_slots: err.failedSlots };
      }
    } else if (err instanceof multer.MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        status = 413;
        body = {
          status: "error",
          code: "file_too_large",
          message: options.maxUploadBytes
            ? `File too large. Maximum size is ${formatMegabytes(options.maxUploadBytes)}`
            : "File too large",
        };
      } else {
        status = 400;
        body = { status: "error", code: "invalid_upload", message: err.message };
      }
    }

    if (status >= 500) {
      logError(`${req.method} ${req.path} failed: ${body.message}`, "api", err);
    } else {
      logWarn(`${req.method} ${req.path} rejected (${status}): ${body.message}`, "api");
    }

    res.status(status).json(body);
  };
}
