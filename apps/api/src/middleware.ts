import type { NextFunction, Request, RequestHandler, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { ZodError } from "zod";
import type { ApiError, ApiResponse } from "@gapscout/types";
import { AppError } from "@gapscout/errors";
import { createChildLogger, type Logger } from "@gapscout/logger";

// Extend Express Request with the request id and its child logger
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
      log?: Logger;
    }
  }
}

const REQUEST_ID_HEADER = "x-request-id";

/**
 * Echoes the caller's `x-request-id` or assigns a new one, binds a child
 * logger to it and logs one line per finished response.
 */
export function requestContext(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId = incoming && incoming.length <= 128 ? incoming : uuidv4();
    const log = createChildLogger(logger, { requestId });
    const startedAt = Date.now();

    req.requestId = requestId;
    req.log = log;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    res.on("finish", () => {
      log.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        "Request completed",
      );
    });
    next();
  };
}

/** Express 4 does not forward rejected promises to the error handler. */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function sendData<T>(res: Response, data: T, status = 200): void {
  const body: ApiResponse<T> = { success: true, data };
  res.status(status).json(body);
}

/** Errors raised by body-parser carry an HTTP status and a `type`. */
function bodyParserStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if (!("type" in err) || typeof err.type !== "string" || !err.type.startsWith("entity.")) {
    return undefined;
  }
  return "status" in err && typeof err.status === "number" ? err.status : 400;
}

function toApiError(err: unknown, requestId: string): { status: number; error: ApiError } {
  if (AppError.isAppError(err)) {
    return { status: err.statusCode, error: err.toApiError(requestId) };
  }

  if (err instanceof ZodError) {
    return {
      status: 400,
      error: {
        code: "VALIDATION_ERROR",
        message: "Request validation failed",
        requestId,
        details: {
          issues: err.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        },
      },
    };
  }

  const parserStatus = bodyParserStatus(err);
  if (parserStatus !== undefined) {
    return {
      status: parserStatus,
      error: {
        code: parserStatus === 413 ? "PAYLOAD_TOO_LARGE" : "BAD_REQUEST",
        message: err instanceof Error ? err.message : "Malformed request body",
        requestId,
      },
    };
  }

  return {
    status: 500,
    error: { code: "INTERNAL_ERROR", message: "Internal server error", requestId },
  };
}

export function errorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const requestId = req.requestId ?? "unknown";
    const { status, error } = toApiError(err, requestId);
    const log = req.log ?? logger;

    if (status >= 500) {
      log.error({ err, code: error.code }, "Request failed");
    } else {
      log.warn({ code: error.code, message: error.message }, "Request rejected");
    }

    const body: ApiResponse = { success: false, error };
    res.status(status).json(body);
  };
}

export function notFound(req: Request, res: Response): void {
  const body: ApiResponse = {
    success: false,
    error: {
      code: "NOT_FOUND",
      message: `Route ${req.method} ${req.path} not found`,
      requestId: req.requestId ?? "unknown",
    },
  };
  res.status(404).json(body);
}
