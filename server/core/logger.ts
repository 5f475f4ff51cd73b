import type { LogCategory, LogLevel } from "@shared/schema";
import { storage } from "./storage";

export const logLevelPriority: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warning: 3,
  error: 4,
};

export function isLevelEnabled(level: LogLevel): boolean {
  return logLevelPriority[level] >= logLevelPriority[storage.getLogSettings().level];
}

function consoleTimestamp(date: Date): string {
  return date.toLocaleTimeString("de-DE", {
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    fractionalSecondDigits: 3,
  });
}

/**
 * Schreibt in den Log-Puffer (GET /api/logs) und auf die Konsole.
 * Fehler und Warnungen landen auf stderr.
 */
export function log(level: LogLevel, category: LogCategory, message: string, details?: string): void {
  if (!isLevelEnabled(level)) {
    return;
  }

  storage.addLog({ level, category, message, details });

  const line = `[${consoleTimestamp(new Date())}] [${level.toUpperCase()}] [${category}] ${message}${details ? ` - ${details}` : ""}`;
  if (level === "error") {
    console.error(line);
  } else if (level === "warning") {
    console.warn(line);
  } else {
    console.log(line);
  }
}
