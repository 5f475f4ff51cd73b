import type { Express } from "express";
import { log } from "../core/logger";
import { errorMessage } from "../core/errors";
import { createHealthHandler } from "../core/health";
import type { ControlRuntime } from "../control/runtime";

/**
 * Lesende Endpunkte: kompletter Status-Snapshot und Health-Check.
 */
export function registerStatusRoutes(app: Express, runtime: ControlRuntime): void {
  app.get("/api/health", createHealthHandler(() => runtime.loop.isRunning()));

  app.get("/api/status", (_req, res) => {
    try {
      res.json(runtime.store.snapshot());
    } catch (error) {
      log("error", "api", "Fehler beim Abrufen des Status", errorMessage(error));
      res.status(500).json({ error: "Failed to retrieve status" });
    }
  });
}
