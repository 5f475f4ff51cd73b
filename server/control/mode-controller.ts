import { modeRequestSchema, operatingModeSchema, socProtectionRequestSchema, type OperatingMode } from "@shared/schema";
import { log } from "../core/logger";
import { ValidationError } from "../core/errors";
import type { StatusStore } from "./status-store";

/**
 * Umschalten zwischen pv_surplus (Wallbox wird geregelt) und monitor_only (nur Anzeige),
 * sowie Ein-/Ausschalten des Akku-Schutzes. Eingaben kommen ungeprüft von der API.
 */
export class ModeController {
  constructor(private readonly store: StatusStore) {}

  getMode(): OperatingMode {
    return this.store.getMode();
  }

  /**
   * @throws ValidationError bei unbekanntem Modus (gespeicherter Modus bleibt unverändert)
   */
  setMode(value: unknown): OperatingMode {
    const parsed = operatingModeSchema.safeParse(value);
    if (!parsed.success) {
      throw new ValidationError(`Unbekannter Modus: ${JSON.stringify(value) ?? String(value)}`, [
        `mode: erwartet ${operatingModeSchema.options.join(" | ")}`,
      ]);
    }

    const mode = parsed.data;
    const previous = this.store.setMode(mode);

    if (previous !== mode) {
      log("info", "control", `Modus gewechselt: ${previous} → ${mode}`);
      if (previous === "monitor_only" && mode === "pv_surplus") {
        log("debug", "control", "Sofortiger Regelzyklus im nächsten Tick vorgemerkt");
      }
    }
    return mode;
  }

  /**
   * Body-Variante für POST /api/mode
   */
  setModeFromRequest(body: unknown): OperatingMode {
    const parsed = modeRequestSchema.safeParse(body);
    if (!parsed.success) {
      const raw = typeof body === "object" && body !== null && "mode" in body ? body.mode : undefined;
      if (raw === undefined) {
        throw new ValidationError("mode is required", ["mode: fehlt"]);
      }
      return this.setMode(raw);
    }
    return this.setMode(parsed.data.mode);
  }

  isSocProtectionEnabled(): boolean {
    return this.store.isSocProtectionEnabled();
  }

  setSocProtection(body: unknown): boolean {
    const parsed = socProtectionRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError("enabled (boolean) is required", parsed.error.issues.map((i) => i.message));
    }

    const enabled = parsed.data.enabled;
    const previous = this.store.isSocProtectionEnabled();
    this.store.setSocProtection(enabled);
    if (previous !== enabled) {
      log("info", "protection", `Akku-Schutz ${enabled ? "aktiviert" : "deaktiviert"}`);
    }
    return enabled;
  }

  isModeSwitchPending(): boolean {
    return this.store.isModeSwitchPending();
  }

  clearModeSwitch(): void {
    this.store.clearModeSwitch();
  }
}
