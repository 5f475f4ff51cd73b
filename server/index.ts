import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig, type AppConfig } from "./core/config";
import { validateEnvironment } from "./core/env-validation";
import { errorMessage } from "./core/errors";
import { log } from "./core/logger";
import { storage } from "./core/storage";
import { createRuntime } from "./control/runtime";
import { SimulatedSite } from "./demo/simulated-site";
import { createDeviceSet } from "./devices/index";

// Environment prüfen, bevor irgendetwas gestartet wird
const envResult = validateEnvironment();
if (!envResult.valid) {
  process.exit(1);
}

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    log("error", "system", "Konfiguration ungültig", errorMessage(error));
    process.exit(1);
  }
}

const config = loadConfigOrExit();

storage.saveLogSettings({ level: config.logLevel });

const devices = config.demoMode ? new SimulatedSite().devices() : createDeviceSet(config.devices);
if (config.demoMode) {
  log("info", "demo", "🔧 Demo-Modus: simulierte Anlage statt echter Geräte");
}

const runtime = createRuntime(config, devices);
const app = createApp(runtime);
const server = createServer(app);

server.listen({ port: config.port, host: config.host }, () => {
  log("info", "system", `serving on port ${config.port}`);
  log("info", "system", `Modus: ${runtime.modeController.getMode()}, Akku-Schutz: ${runtime.modeController.isSocProtectionEnabled() ? "an" : "aus"}`);
  runtime.loop.start();
});

let isShuttingDown = false;
const shutdown = async (signal: string) => {
  // Verhindere doppeltes Shutdown (z.B. SIGINT + SIGTERM gleichzeitig)
  if (isShuttingDown) return;
  isShuttingDown = true;

  log("info", "system", `🛑 Server wird heruntergefahren... (Signal: ${signal})`);

  // Falls Cleanup hängt (z.B. Fahrzeug-Cloud), trotzdem nach 5s beenden
  const forceExitTimer = setTimeout(() => {
    log("warning", "system", "⚠️ Shutdown-Timeout (5s) erreicht - erzwinge Exit");
    process.exit(1);
  }, 5000);
  forceExitTimer.unref();

  try {
    // 1. Loop stoppen (wartet auf laufenden Tick)
    await runtime.loop.stop();

    // 2. Modbus-Verbindungen schließen
    try {
      await devices.close();
      log("info", "system", "✅ Geräteverbindungen geschlossen");
    } catch (error) {
      log("debug", "system", "Geräte-Close beim Shutdown", errorMessage(error));
    }

    // 3. HTTP-Server schließen
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    log("info", "system", "✅ Graceful Shutdown abgeschlossen");
  } catch (error) {
    log("error", "system", "Fehler beim Shutdown", errorMessage(error));
  }

  clearTimeout(forceExitTimer);
  process.exit(0);
};

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
