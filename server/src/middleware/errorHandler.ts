// server/src/middleware/errorHandler.ts
// Maps thrown errors to JSON responses

import type { ErrorRequestHandler, RequestHandler } from "express";
import { isAppError, ValidationError } from "@samurai/shared/errors.js";

export interface ErrorBody {
  error: string;
  code: string;
  details?: unknown;
}

// express.json() raises a SyntaxError carrying the raw body
function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && "body" in err;
}

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const cause: unknown = isMalformedJson(err) ? new ValidationError("Malformed JSON body") : err;

  if (isAppError(cause)) {
    const body: ErrorBody = { error: cause.message, code: cause.code };
    if (cause instanceof ValidationError && cause.details.length > 0) {
      body.details = cause.details;
    }
    if (cause.status >= 500) {
      console.error(`[server] ${req.method} ${req.originalUrl} failed:`, cause);
    }
    res.status(cause.status).json(body);
    return;
  }

  console.error(`[server error] ${req.method} ${req.originalUrl}`, cause);
  const body: ErrorBody = { error: "Internal server error", code: "internal_error" };
  res.status(500).json(body);
};

export const notFoundHandler: RequestHandler = (req, res) => {
  const body: ErrorBody = { error: `No route for ${req.method} ${req.path}`, code: "not_found" };
  res.status(404).json(body);
};
