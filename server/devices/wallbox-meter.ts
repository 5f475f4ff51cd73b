import { log } from "../core/logger";
import type { WallboxReader } from "./types";
import type { RegisterReader } from "./modbus-connection";

/** go-e POWER_TOTAL, Input-Register 120-121, UINT32 in 0,01 W */
const GOE_POWER_TOTAL = 120;

/** Mehr ist an diesem Anschluss physikalisch nicht möglich */
export const MAX_PLAUSIBLE_WALLBOX_KW = 11;

/**
 * Rohregister → kW. Unplausible Werte (< 0 oder > 11 kW) werden als 0 gemeldet.
 */
export function decodeWallboxPowerKw(registers: number[]): number {
  if (registers.length < 2) {
    throw new RangeError(`POWER_TOTAL braucht 2 Register, erhalten: ${registers.length}`);
  }
  // Multiplikation statt << 16, sonst wird das Ergebnis als INT32 negativ
  const raw = (registers[0] & 0xffff) * 0x10000 + (registers[1] & 0xffff);
  const kw = raw / 100000;
  if (kw < 0 || kw > MAX_PLAUSIBLE_WALLBOX_KW) {
    return 0;
  }
  return kw;
}

export class GoEWallboxMeter implements WallboxReader {
  constructor(private readonly modbus: RegisterReader) {}

  async readPowerKw(): Promise<number> {
    const registers = await this.modbus.readInputRegisters(GOE_POWER_TOTAL, 2);
    const kw = decodeWallboxPowerKw(registers);
    log("trace", "wallbox", `Wallbox-Leistung: ${kw.toFixed(3)} kW`, `Register: [${registers.join(", ")}]`);
    return kw;
  }
}
