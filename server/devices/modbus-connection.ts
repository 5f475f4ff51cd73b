import ModbusRTU from "modbus-serial";
import { log } from "../core/logger";
import { ReadError, errorMessage } from "../core/errors";

export interface ModbusEndpoint {
  host: string;
  port: number;
  unitId: number;
  timeoutMs: number;
}

/**
 * Modbus-TCP-Verbindung mit Lazy-Connect.
 *
 * Nach einem Lesefehler wird die Verbindung verworfen und beim nächsten Zugriff
 * neu aufgebaut. Das Timeout von modbus-serial begrenzt jeden einzelnen Request.
 */
export class ModbusConnection {
  private client: ModbusRTU;
  private isConnected = false;
  private connecting: Promise<void> | null = null;

  constructor(
    private readonly endpoint: ModbusEndpoint,
    private readonly source: string,
  ) {
    this.client = new ModbusRTU();
    this.client.setTimeout(endpoint.timeoutMs);
  }

  private async ensureConnected(): Promise<void> {
    if (this.isConnected) {
      return;
    }
    // Parallele Leser warten auf denselben Verbindungsaufbau
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    await this.connecting;
  }

  private async connect(): Promise<void> {
    const { host, port, unitId, timeoutMs } = this.endpoint;
    try {
      await this.client.connectTCP(host, { port, timeout: timeoutMs });
      this.client.setID(unitId);
      this.isConnected = true;
      log("debug", "system", `Modbus TCP Verbindung zu ${host}:${port} (Unit ${unitId}) hergestellt`);
    } catch (error) {
      this.reset();
      throw new ReadError(`Modbus-Verbindung zu ${host}:${port} fehlgeschlagen: ${errorMessage(error)}`, this.source, {
        cause: error,
      });
    }
  }

  async readHoldingRegisters(address: number, length: number): Promise<number[]> {
    await this.ensureConnected();
    try {
      const result = await this.client.readHoldingRegisters(address, length);
      return result.data;
    } catch (error) {
      this.reset();
      throw new ReadError(`Modbus Read Holding @ Register ${address}: ${errorMessage(error)}`, this.source, {
        cause: error,
      });
    }
  }

  async readInputRegisters(address: number, length: number): Promise<number[]> {
    await this.ensureConnected();
    try {
      const result = await this.client.readInputRegisters(address, length);
      return result.data;
    } catch (error) {
      this.reset();
      throw new ReadError(`Modbus Read Input @ Register ${address}: ${errorMessage(error)}`, this.source, {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    if (!this.isConnected) {
      return;
    }
    this.isConnected = false;
    await new Promise<void>((resolve) => {
      this.client.close(() => resolve());
    });
    log("debug", "system", `Modbus TCP Verbindung zu ${this.endpoint.host} getrennt`);
  }

  private reset(): void {
    this.isConnected = false;
    this.client.close(() => {});
    // Frische Instanz, damit ein halb offener Socket nicht weiterverwendet wird
    this.client = new ModbusRTU();
    this.client.setTimeout(this.endpoint.timeoutMs);
  }
}

/** Minimale Lese-Schnittstelle, damit Treiber ohne echte Verbindung testbar sind */
export type RegisterReader = Pick<ModbusConnection, "readHoldingRegisters" | "readInputRegisters" | "close">;
