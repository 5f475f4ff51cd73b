import type { SharedStatus } from "@shared/schema";
import type { BatteryProtectionConfig } from "../core/config";

export interface ProtectionVerdict {
  stop: boolean;
  /** Informativ, auch wenn stop=false (z.B. für Anzeige/Logging) */
  soc: number | null;
  reason: ProtectionReason;
}

export type ProtectionReason =
  | "limit-reached"
  | "below-limit"
  | "status-invalid"
  | "soc-missing"
  | "soc-out-of-range"
  | "timestamp-missing"
  | "timestamp-invalid"
  | "stale";

type ProtectionInput = Pick<SharedStatus, "carSoc" | "carStatusValid" | "carStatusTimestamp">;

/**
 * Akku-Schutz: Ladung nur dann zwangsweise stoppen, wenn ein gültiger, frischer
 * SoC-Wert über dem Limit liegt. Jede fehlende oder veraltete Angabe ergibt stop=false.
 */
export function shouldForceStop(
  status: ProtectionInput,
  now: Date,
  config: Pick<BatteryProtectionConfig, "socLimit" | "maxAgeSec">,
): ProtectionVerdict {
  const soc = typeof status.carSoc === "number" && Number.isFinite(status.carSoc) ? status.carSoc : null;

  if (!status.carStatusValid) {
    return { stop: false, soc, reason: "status-invalid" };
  }
  if (soc === null) {
    return { stop: false, soc, reason: "soc-missing" };
  }
  if (soc < 0 || soc > 100) {
    return { stop: false, soc, reason: "soc-out-of-range" };
  }
  if (!status.carStatusTimestamp) {
    return { stop: false, soc, reason: "timestamp-missing" };
  }

  const ts = Date.parse(status.carStatusTimestamp);
  if (Number.isNaN(ts)) {
    return { stop: false, soc, reason: "timestamp-invalid" };
  }

  const ageSec = (now.getTime() - ts) / 1000;
  if (ageSec > config.maxAgeSec) {
    return { stop: false, soc, reason: "stale" };
  }

  if (soc >= config.socLimit) {
    return { stop: true, soc, reason: "limit-reached" };
  }
  return { stop: false, soc, reason: "below-limit" };
}
