import type { DeviceConfig } from "../core/config";
import { ValidationError } from "../core/errors";
import { log } from "../core/logger";
import { GoEChargerClient } from "./charger-client";
import { TasmotaGridMeter } from "./grid-meter";
import { ModbusConnection } from "./modbus-connection";
import { KostalPvInverter } from "./pv-inverter";
import { available, unavailable, type DeviceSet } from "./types";
import { HttpVehicleStatusClient } from "./vehicle-client";
import { GoEWallboxMeter } from "./wallbox-meter";

function requireHost(value: string | undefined, key: string): string {
  if (!value) {
    throw new ValidationError(`${key} ist nicht gesetzt`, [`${key}: erforderlich`]);
  }
  return value;
}

/**
 * Baut die echten Geräte-Treiber aus der Konfiguration.
 */
export function createDeviceSet(config: DeviceConfig): DeviceSet {
  const gridHost = requireHost(config.gridMeterHost, "GRID_METER_HOST");
  const pvHost = requireHost(config.pvInverterHost, "PV_INVERTER_HOST");
  const wallboxHost = requireHost(config.wallboxHost, "WALLBOX_HOST");

  const pvModbus = new ModbusConnection(
    { host: pvHost, port: config.pvInverterPort, unitId: config.pvInverterUnit, timeoutMs: config.timeoutMs },
    "pv",
  );
  const wallboxModbus = new ModbusConnection(
    {
      host: wallboxHost,
      port: config.wallboxModbusPort,
      unitId: config.wallboxModbusUnit,
      timeoutMs: config.timeoutMs,
    },
    "wallbox",
  );

  const vehicle = config.vehicleStatusUrl
    ? available(new HttpVehicleStatusClient(config.vehicleStatusUrl, config.vehicleTimeoutMs, config.vehicleStatusToken))
    : unavailable<HttpVehicleStatusClient>("VEHICLE_STATUS_URL nicht gesetzt");

  if (vehicle.kind === "unavailable") {
    log("info", "vehicle", "Kein Fahrzeug-Endpunkt konfiguriert - Akku-Schutz bleibt wirkungslos");
  }

  return {
    gridMeter: new TasmotaGridMeter(gridHost, config.timeoutMs),
    pvInverter: new KostalPvInverter(pvModbus),
    wallbox: new GoEWallboxMeter(wallboxModbus),
    charger: available(new GoEChargerClient(wallboxHost, config.timeoutMs)),
    vehicle,
    async close() {
      await Promise.all([pvModbus.close(), wallboxModbus.close()]);
    },
  };
}
