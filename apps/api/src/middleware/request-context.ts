import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { createChildLogger, type Logger } from "@ragsync/logger";

// Extend Express Request with requestId and a request-scoped logger
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId: string;
      log: Logger;
    }
  }
}

export const REQUEST_ID_HEADER = "x-request-id";

/**
 * Reuses an incoming `x-request-id` or mints one, echoes it on the response
 * and logs one line per completed request.
 */
export function createRequestContext(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER)?.trim();
    const requestId = incoming ? incoming : randomUUID();
    const startedAt = Date.now();

    req.requestId = requestId;
    req.log = createChildLogger(logger, { requestId, method: req.method, path: req.path });
    res.setHeader(REQUEST_ID_HEADER, requestId);

    res.on("finish", () => {
      req.log.info({ status: res.statusCode, durationMs: Date.now() - startedAt }, "Request completed");
    });

    next();
  };
}
