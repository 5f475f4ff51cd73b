import type { Express, Response } from "express";
import { log } from "../core/logger";
import { ValidationError } from "../core/errors";
import type { ControlRuntime } from "../control/runtime";

function sendValidationError(res: Response, error: ValidationError): void {
  res.status(error.status).json({ error: error.message, issues: error.issues });
}

/**
 * Betriebsmodus und Akku-Schutz umschalten. Ungültige Eingaben ändern nichts am Status.
 */
export function registerModeRoutes(app: Express, runtime: ControlRuntime): void {
  const { modeController } = runtime;

  app.get("/api/mode", (_req, res) => {
    res.json({ mode: modeController.getMode() });
  });

  app.post("/api/mode", (req, res, next) => {
    try {
      const mode = modeController.setModeFromRequest(req.body);
      res.json({ status: "ok", mode });
    } catch (error) {
      if (error instanceof ValidationError) {
        log("warning", "api", "Ungültiger Moduswechsel abgelehnt", error.message);
        sendValidationError(res, error);
        return;
      }
      next(error);
    }
  });

  app.post("/api/soc-protection", (req, res, next) => {
    try {
      const socProtection = modeController.setSocProtection(req.body);
      res.json({ status: "ok", socProtection });
    } catch (error) {
      if (error instanceof ValidationError) {
        log("warning", "api", "Ungültige Akku-Schutz-Anfrage abgelehnt", error.message);
        sendValidationError(res, error);
        return;
      }
      next(error);
    }
  });
}
