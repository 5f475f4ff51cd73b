import { log } from "./logger";

type LogLevel = "warning" | "info" | "debug";

interface EnvVarConfig {
  name: string;
  /** Pflicht außerhalb des Demo-Modus */
  required: boolean;
  defaultValue?: string;
  description: string;
  /** Log level when not set (default: "warning") */
  missingLogLevel?: LogLevel;
}

const ENV_VARS: EnvVarConfig[] = [
  {
    name: "PORT",
    required: false,
    defaultValue: "3000",
    description: "HTTP-Server-Port",
    missingLogLevel: "info",
  },
  {
    name: "GRID_METER_HOST",
    required: true,
    description: "Tasmota-Lesekopf am Stromzähler",
  },
  {
    name: "PV_INVERTER_HOST",
    required: true,
    description: "PV-Wechselrichter (Modbus TCP)",
  },
  {
    name: "WALLBOX_HOST",
    required: true,
    description: "go-e Wallbox (HTTP-API v2 + Modbus TCP)",
  },
  {
    name: "VEHICLE_STATUS_URL",
    required: false,
    description: "Fahrzeugstatus-Endpoint (ohne: kein SoC, kein Akku-Schutz)",
    missingLogLevel: "warning",
  },
  {
    name: "SOC_PROTECTION_ENABLED",
    required: false,
    defaultValue: "false",
    description: "Akku-Schutz beim Start aktivieren (true/false)",
    missingLogLevel: "debug",
  },
  {
    name: "LOG_LEVEL",
    required: false,
    defaultValue: "info",
    description: "Minimales Log-Level (trace/debug/info/warning/error)",
    missingLogLevel: "debug",
  },
  {
    name: "DEMO_AUTOSTART",
    required: false,
    description: "Demo-Modus mit simulierten Geräten starten (true/false)",
    missingLogLevel: "debug",
  },
];

export interface EnvMessage {
  level: LogLevel;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  missing: string[];
  warnings: string[];
  messages: EnvMessage[];
}

/**
 * Validates environment variables at startup.
 * Required vars → error (nur außerhalb des Demo-Modus).
 * Optional vars without value → log at their configured level.
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const missing: string[] = [];
  const warnings: string[] = [];
  const messages: EnvMessage[] = [];
  const demoMode = env.DEMO_AUTOSTART === "true" || env.DEMO_AUTOSTART === "1";

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    if (!value) {
      if (envVar.required && !demoMode) {
        missing.push(`${envVar.name} – ${envVar.description}`);
      } else {
        const defaultInfo = envVar.defaultValue
          ? ` (Default: ${envVar.defaultValue})`
          : "";
        const msg = `${envVar.name} nicht gesetzt${defaultInfo} – ${envVar.description}`;
        const level = envVar.required ? "debug" : envVar.missingLogLevel ?? "warning";
        messages.push({ level, message: msg });
        if (level === "warning") {
          warnings.push(msg);
        }
      }
    }
  }

  for (const { level, message } of messages) {
    const prefix = level === "warning" ? "⚠️ " : "";
    log(level, "system", `${prefix}${message}`);
  }

  if (missing.length > 0) {
    log("error", "system", "❌ Fehlende Pflicht-Environment-Variablen:");
    for (const m of missing) {
      log("error", "system", `   → ${m}`);
    }
    log("error", "system", "Server kann nicht starten. Bitte setze die fehlenden Variablen oder DEMO_AUTOSTART=true.");
  }

  return { valid: missing.length === 0, missing, warnings, messages };
}
