/**
 * Error mapping and request plumbing for the HTTP transport.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError } from "zod";
import { InvalidDecisionError, KeyUnavailableError } from "../errors.js";
import { logger } from "../log.js";

export type ApiErrorCode = "VALIDATION" | "INVALID_DECISION" | "KEY_UNAVAILABLE" | "NOT_FOUND" | "INTERNAL";

export type ApiErrorBody = {
  error: { code: ApiErrorCode; message: string; details?: unknown };
};

export function apiError(code: ApiErrorCode, message: string, details?: unknown): ApiErrorBody {
  return details === undefined ? { error: { code, message } } : { error: { code, message, details } };
}

/** Thrown by routes for request-shape problems they detect themselves. */
export class RequestValidationError extends Error {
  readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = "RequestValidationError";
    this.details = details;
  }
}

/** Express 4 does not catch rejected handlers; forward them to the error handler. */
export function asyncRoute(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

/** Global error handler: maps the error taxonomy onto status codes. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    res.status(400).json(
      apiError(
        "VALIDATION",
        "Request body failed validation",
        err.issues.map((i) => ({ path: "/" + i.path.join("/"), message: i.message }))
      )
    );
    return;
  }

  if (err instanceof RequestValidationError) {
    res.status(400).json(apiError("VALIDATION", err.message, err.details));
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json(apiError("VALIDATION", "Request body is not valid JSON"));
    return;
  }

  if (err instanceof InvalidDecisionError) {
    res.status(422).json(apiError("INVALID_DECISION", err.message, err.issues));
    return;
  }

  if (err instanceof KeyUnavailableError) {
    logger.error("signing unavailable", { message: err.message });
    res.status(503).json(apiError("KEY_UNAVAILABLE", "Signing is temporarily unavailable"));
    return;
  }

  logger.error("unhandled request error", {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(apiError("INTERNAL", "Internal server error"));
}
