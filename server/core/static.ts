import express, { type Express } from "express";
import fs from "fs";
import { fileURLToPath } from "url";

const publicDir = fileURLToPath(new URL("../public", import.meta.url));

/**
 * Liefert das Dashboard (server/public) unter `/` aus. Muss nach den API-Routen registriert werden.
 */
export function serveStatic(app: Express): void {
  if (!fs.existsSync(publicDir)) {
    throw new Error(`Could not find the dashboard directory: ${publicDir}`);
  }

  app.use(express.static(publicDir));
}
