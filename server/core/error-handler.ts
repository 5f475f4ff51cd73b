import type { NextFunction, Request, Response } from "express";
import { log } from "./logger";
import { ValidationError, errorMessage } from "./errors";

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}

function messageOf(err: unknown): string {
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string" && err.message) {
    return err.message;
  }
  return "Internal Server Error";
}

/**
 * Letzte Express-Middleware: Status aus dem Fehler, Antwort nur mit Message (kein Stack).
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ValidationError) {
    res.status(err.status).json({ error: err.message, issues: err.issues });
    return;
  }

  const status = statusOf(err);
  const message = messageOf(err);
  if (status >= 500) {
    log("error", "api", `${req.method} ${req.path} fehlgeschlagen`, errorMessage(err));
  }
  res.status(status).json({ message });
}
