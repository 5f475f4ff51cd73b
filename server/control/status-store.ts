import type { OperatingMode, SharedStatus, StatusPatch } from "@shared/schema";

export function createInitialStatus(mode: OperatingMode, socProtection: boolean): SharedStatus {
  return {
    timestamp: null,
    pvKw: null,
    pvStringsKw: null,
    gridKw: null,
    wallboxKw: null,
    gridKwAvg: null,
    wallboxKwAvg: null,
    pAvailableKw: null,
    pAvailableNow: null,
    phase: null,
    current: null,
    carState: null,
    mode,
    decisionPhase: null,
    decisionCurrent: null,
    lastControlAt: null,
    carSoc: null,
    carAutonomyKm: null,
    carPlugStatus: null,
    carChargingStatus: null,
    carStatusTimestamp: null,
    carStatusLastAttempt: null,
    carStatusValid: false,
    socProtection,
    socProtectionStop: null,
    socProtectionSoc: null,
  };
}

function copyStatus(status: SharedStatus): SharedStatus {
  return {
    ...status,
    pvStringsKw: status.pvStringsKw ? { ...status.pvStringsKw } : null,
  };
}

/**
 * Gemeinsamer Status zwischen Supervisory-Loop (Schreiber) und HTTP-Handlern.
 *
 * Jeder Zugriff läuft über withLock(). Kritische Abschnitte sind synchron:
 * ein Promise als Rückgabewert oder ein verschachtelter Aufruf wird abgewiesen,
 * damit niemand den Lock über ein await hinweg hält. Geräte-I/O passiert immer
 * außerhalb, nur die Mutation selbst ist gesperrt.
 */
export class StatusStore {
  private status: SharedStatus;
  private locked = false;
  private modeSwitchPending = false;

  constructor(initial: SharedStatus) {
    this.status = copyStatus(initial);
  }

  withLock<T>(fn: (status: SharedStatus) => T): T {
    if (this.locked) {
      throw new Error("StatusStore: verschachtelter Lock-Zugriff");
    }
    this.locked = true;
    try {
      const result = fn(this.status);
      if (result instanceof Promise) {
        throw new Error("StatusStore: kritischer Abschnitt darf nicht asynchron sein");
      }
      return result;
    } finally {
      this.locked = false;
    }
  }

  /**
   * Atomare Kopie des kompletten Status (für /api/status und den Akku-Schutz).
   */
  snapshot(): SharedStatus {
    return this.withLock((status) => copyStatus(status));
  }

  /**
   * Übernimmt eine Feldgruppe in einem Schritt - Leser sehen entweder alles oder nichts.
   */
  update(patch: StatusPatch): void {
    this.withLock((status) => {
      // undefined heißt "Feld nicht Teil dieser Gruppe", null heißt "unbekannt"
      const defined = Object.entries(patch).filter(([, value]) => value !== undefined);
      Object.assign(status, Object.fromEntries(defined));
      if (patch.pvStringsKw) {
        status.pvStringsKw = { ...patch.pvStringsKw };
      }
    });
  }

  getMode(): OperatingMode {
    return this.withLock((status) => status.mode);
  }

  /**
   * Setzt den Modus. Wechsel monitor_only → pv_surplus merkt einen sofortigen Regelzyklus vor.
   * @returns vorheriger Modus
   */
  setMode(mode: OperatingMode): OperatingMode {
    return this.withLock((status) => {
      const previous = status.mode;
      status.mode = mode;
      if (previous === "monitor_only" && mode === "pv_surplus") {
        this.modeSwitchPending = true;
      }
      return previous;
    });
  }

  isModeSwitchPending(): boolean {
    return this.withLock(() => this.modeSwitchPending);
  }

  clearModeSwitch(): void {
    this.withLock(() => {
      this.modeSwitchPending = false;
    });
  }

  isSocProtectionEnabled(): boolean {
    return this.withLock((status) => status.socProtection);
  }

  setSocProtection(enabled: boolean): void {
    this.withLock((status) => {
      status.socProtection = enabled;
    });
  }
}
