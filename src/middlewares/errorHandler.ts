// ============================================================
// Fallback Handlers — 404 and 500
// ============================================================
// Registered LAST in app.ts, after every route:
//
//   notFound      → no route matched the URL
//   errorHandler  → something called next(error) or threw
//                   synchronously inside a handler
//
// Express recognises an error handler by its FOUR parameters,
// so `_next` must stay in the signature even though it is unused.
// ============================================================

import { NextFunction, Request, Response } from "express";
import { HttpError, getErrorMessage } from "../utils/errors";

export const notFound = (_req: Request, res: Response): void => {
  res.status(404).json({
    message: "🔍 Resource not found",
    detail: "The requested resource was not found on this server.",
  });
};

// body-parser attaches a 4xx `status` to errors it raises (e.g. bad JSON)
const clientErrorStatus = (error: unknown): number | undefined => {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    if (typeof status === "number" && status >= 400 && status < 500) return status;
  }
  return undefined;
};

export const errorHandler = (
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (error instanceof HttpError) {
    res.status(error.statusCode).json({ success: false, message: error.message });
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== undefined) {
    res.status(status).json({ success: false, message: "Invalid request body" });
    return;
  }

  console.error(`[API] Unhandled error: ${getErrorMessage(error)}`);
  res.status(500).json({
    message: "⚠️ Internal server error",
    detail: "An internal error occurred. Please try again later.",
  });
};
