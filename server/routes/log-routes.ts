import type { Express } from "express";
import { logLevelSchema, logSettingsSchema } from "@shared/schema";
import { log, logLevelPriority } from "../core/logger";
import { storage } from "../core/storage";

export function registerLogRoutes(app: Express): void {
  app.get("/api/logs", (req, res) => {
    const logs = storage.getLogs();
    if (req.query.level === undefined) {
      res.json(logs);
      return;
    }

    const level = logLevelSchema.safeParse(req.query.level);
    if (!level.success) {
      res.status(400).json({ error: `Unknown log level: ${String(req.query.level)}` });
      return;
    }
    const minPriority = logLevelPriority[level.data];
    res.json(logs.filter((entry) => logLevelPriority[entry.level] >= minPriority));
  });

  app.delete("/api/logs", (_req, res) => {
    storage.clearLogs();
    log("info", "system", "Logs gelöscht");
    res.json({ success: true });
  });

  app.get("/api/logs/settings", (_req, res) => {
    res.json(storage.getLogSettings());
  });

  app.post("/api/logs/settings", (req, res) => {
    const settings = logSettingsSchema.safeParse(req.body);
    if (!settings.success) {
      res.status(400).json({ error: "Invalid log settings data" });
      return;
    }
    storage.saveLogSettings(settings.data);
    log("info", "system", `Log-Level auf "${settings.data.level}" gesetzt`);
    res.json({ success: true });
  });
}
