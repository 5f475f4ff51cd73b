import type { Request, Response } from "express";

const startTime = Date.now();

export interface HealthResponse {
  status: "ok" | "degraded" | "error";
  version: string;
  uptime: number;
  loopRunning: boolean;
  timestamp: string;
}

/**
 * GET /api/health: Health-Check für Docker/systemd/Monitoring.
 * "degraded" solange der Supervisory-Loop nicht läuft.
 */
export function createHealthHandler(isLoopRunning: () => boolean) {
  return (_req: Request, res: Response): void => {
    const loopRunning = isLoopRunning();

    const response: HealthResponse = {
      status: loopRunning ? "ok" : "degraded",
      version: process.env.npm_package_version ?? "dev",
      uptime: Math.floor((Date.now() - startTime) / 1000),
      loopRunning,
      timestamp: new Date().toISOString(),
    };

    res.json(response);
  };
}
