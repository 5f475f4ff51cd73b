import type { Express } from "express";
import type { ControlRuntime } from "../control/runtime";
import { registerLogRoutes } from "./log-routes";
import { registerModeRoutes } from "./mode-routes";
import { registerStatusRoutes } from "./status-routes";

export function registerRoutes(app: Express, runtime: ControlRuntime): void {
  registerStatusRoutes(app, runtime);
  registerModeRoutes(app, runtime);
  registerLogRoutes(app);
}
