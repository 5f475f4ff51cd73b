import type { LogEntry, LogSettings } from "@shared/schema";

export interface IStorage {
  getLogs(): LogEntry[];
  addLog(entry: Omit<LogEntry, "id" | "timestamp">): void;
  clearLogs(): void;
  getLogSettings(): LogSettings;
  saveLogSettings(settings: LogSettings): void;
}

/**
 * Flüchtiger Speicher für Log-Einträge und Log-Einstellungen.
 * Nichts wird auf die Platte geschrieben - nach einem Neustart ist alles weg.
 */
export class MemStorage implements IStorage {
  private logs: LogEntry[] = [];
  private logSettings: LogSettings = {
    level: "info",
  };
  private sequence = 0;

  constructor(private readonly maxLogs: number = 1000) {}

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  addLog(entry: Omit<LogEntry, "id" | "timestamp">): void {
    this.sequence++;
    const logEntry: LogEntry = {
      id: `${Date.now()}-${this.sequence}`,
      timestamp: new Date().toISOString(),
      ...entry,
    };

    this.logs.push(logEntry);

    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }
  }

  clearLogs(): void {
    this.logs = [];
  }

  getLogSettings(): LogSettings {
    return { ...this.logSettings };
  }

  saveLogSettings(settings: LogSettings): void {
    this.logSettings = { ...settings };
  }
}

export const storage = new MemStorage();
