import { log } from "../core/logger";
import { ReadError } from "../core/errors";
import type { PVReader } from "./types";
import type { RegisterReader } from "./modbus-connection";

/**
 * Kostal Plenticore Modbus-Register (Float32, 2 Register, Word-Reihenfolge vertauscht)
 */
const KOSTAL_REGISTERS = {
  TOTAL_AC_POWER: 172,
  DC1_POWER: 260,
  DC2_POWER: 270,
  DC3_POWER: 280,
} as const;

/**
 * Float32 aus zwei Registern: Low-Word zuerst, innerhalb des Words Big-Endian.
 */
export function decodeSwappedFloat32(registers: number[]): number {
  if (registers.length < 2) {
    throw new RangeError(`Float32 braucht 2 Register, erhalten: ${registers.length}`);
  }
  const buffer = Buffer.alloc(4);
  buffer.writeUInt16BE(registers[1] & 0xffff, 0);
  buffer.writeUInt16BE(registers[0] & 0xffff, 2);
  return buffer.readFloatBE(0);
}

export class KostalPvInverter implements PVReader {
  constructor(private readonly modbus: RegisterReader) {}

  private async readPowerKw(address: number): Promise<number> {
    const registers = await this.modbus.readHoldingRegisters(address, 2);
    const watts = decodeSwappedFloat32(registers);
    if (!Number.isFinite(watts)) {
      throw new ReadError(`Kostal Register ${address}: ungültiger Wert ${watts}`, "pv");
    }
    return watts / 1000;
  }

  async readTotalPowerKw(): Promise<number> {
    const kw = await this.readPowerKw(KOSTAL_REGISTERS.TOTAL_AC_POWER);
    log("trace", "pv", `PV-Leistung: ${kw.toFixed(3)} kW`);
    return kw;
  }

  async readStringPowersKw(): Promise<Record<string, number>> {
    const [dc1, dc2, dc3] = await Promise.all([
      this.readPowerKw(KOSTAL_REGISTERS.DC1_POWER),
      this.readPowerKw(KOSTAL_REGISTERS.DC2_POWER),
      this.readPowerKw(KOSTAL_REGISTERS.DC3_POWER),
    ]);
    return { dc1, dc2, dc3 };
  }
}
