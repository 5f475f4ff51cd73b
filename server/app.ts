import express from "express";
import { isLevelEnabled, log } from "./core/logger";
import { errorHandler } from "./core/error-handler";
import { serveStatic } from "./core/static";
import type { ControlRuntime } from "./control/runtime";
import { registerRoutes } from "./routes/index";

/**
 * Express-App mit allen API-Routen und dem Dashboard. Startet nichts und bindet keinen Port.
 */
export function createApp(runtime: ControlRuntime): express.Express {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json;
    res.json = function (bodyJson) {
      capturedJsonResponse = bodyJson;
      return originalResJson.call(res, bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      // HTTP-Logs nur bei TRACE-Level (sehr detailliert)
      if (path.startsWith("/api") && isLevelEnabled("trace")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }
        if (logLine.length > 80) {
          logLine = logLine.slice(0, 79) + "…";
        }
        log("trace", "api", logLine);
      }
    });

    next();
  });

  registerRoutes(app, runtime);
  serveStatic(app);
  app.use(errorHandler);

  return app;
}
