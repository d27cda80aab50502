import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { AppError, ValidationError } from "@ragsync/errors";
import type { ApiResponse } from "@ragsync/types";

interface ErrorBody {
  status: number;
  code: string;
  message: string;
  details?: unknown;
}

/** body-parser and similar middleware attach an HTTP status to their errors. */
function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err) {
    const { status } = err;
    if (typeof status === "number" && status >= 400 && status < 500) return status;
  }
  return undefined;
}

function describe(err: unknown): ErrorBody {
  if (err instanceof ValidationError) {
    return {
      status: err.statusCode,
      code: err.code,
      message: err.message,
      details: { ...err.details, fields: err.fields },
    };
  }

  if (AppError.isAppError(err)) {
    return { status: err.statusCode, ...err.toJSON() };
  }

  if (err instanceof multer.MulterError) {
    return err.code === "LIMIT_FILE_SIZE"
      ? { status: 413, code: "PAYLOAD_TOO_LARGE", message: "Uploaded file exceeds the size limit" }
      : { status: 400, code: "VALIDATION_ERROR", message: err.message, details: { field: err.field } };
  }

  const status = httpStatusOf(err);
  if (status !== undefined) {
    return {
      status,
      code: status === 413 ? "PAYLOAD_TOO_LARGE" : "BAD_REQUEST",
      message: err instanceof Error ? err.message : "Bad request",
    };
  }

  return { status: 500, code: "INTERNAL_ERROR", message: "Internal server error" };
}

/**
 * Maps errors onto the response envelope. Bad input is 4xx; upstream
 * failures keep their 5xx status so callers can tell them apart.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const body = describe(err);

  if (body.status >= 500) {
    req.log.error({ err, code: body.code }, "Request failed");
  } else {
    req.log.warn({ code: body.code, message: body.message }, "Request rejected");
  }

  const response: ApiResponse = {
    success: false,
    error: {
      code: body.code,
      message: body.message,
      requestId: req.requestId,
      ...(body.details !== undefined ? { details: body.details } : {}),
    },
  };
  res.status(body.status).json(response);
}
