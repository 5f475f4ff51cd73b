import { z } from "zod";
import { log } from "../core/logger";
import { ReadError, errorMessage } from "../core/errors";
import type { GridMeterReader } from "./types";

const tasmotaStatusSchema = z.object({
  StatusSNS: z.object({
    MT631: z.object({
      Power_cur: z.number(),
    }),
  }),
});

/**
 * Tasmota-Antwort auf "status 10" → Netzleistung in kW (> 0 Bezug, < 0 Einspeisung).
 */
export function parseTasmotaPowerKw(body: unknown): number {
  const parsed = tasmotaStatusSchema.safeParse(body);
  if (!parsed.success) {
    throw new ReadError(
      `Ungültige Tasmota-Antwort: StatusSNS.MT631.Power_cur fehlt (${parsed.error.issues[0]?.message ?? "unbekannt"})`,
      "grid",
    );
  }
  return parsed.data.StatusSNS.MT631.Power_cur / 1000;
}

/**
 * Optischer Lesekopf (Tasmota) am Zweirichtungszähler.
 */
export class TasmotaGridMeter implements GridMeterReader {
  private readonly url: string;

  constructor(
    host: string,
    private readonly timeoutMs: number,
  ) {
    this.url = `http://${host}/cm?cmnd=status%2010`;
  }

  async readPowerKw(): Promise<number> {
    let body: unknown;
    try {
      const response = await fetch(this.url, { method: "GET", signal: AbortSignal.timeout(this.timeoutMs) });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      throw new ReadError(`Fehler beim Auslesen des Stromzählers: ${errorMessage(error)}`, "grid", { cause: error });
    }

    const kw = parseTasmotaPowerKw(body);
    log("trace", "grid", `Netzleistung: ${kw.toFixed(3)} kW`);
    return kw;
  }
}
