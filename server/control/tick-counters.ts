import type { SchedulerConfig } from "../core/config";

export type TickPeriods = Pick<
  SchedulerConfig,
  "gridSampleEvery" | "controlPeriod" | "vehiclePollPeriod" | "batteryCheckPeriod"
>;

export interface TickCounterValues {
  grid: number;
  control: number;
  battery: number;
  vehicle: number;
}

/**
 * Vier unabhängige Zähler, je einer pro periodischer Teilaufgabe.
 * Jeder läuft pro Tick um eins weiter und springt modulo seiner Periode auf 0 zurück.
 */
export class TickCounters {
  private values: TickCounterValues = { grid: 0, control: 0, battery: 0, vehicle: 0 };

  constructor(private readonly periods: TickPeriods) {}

  isGridSampleDue(): boolean {
    return this.values.grid === 0;
  }

  isVehiclePollDue(): boolean {
    return this.values.vehicle === 0;
  }

  isBatteryCheckDue(): boolean {
    return this.values.battery === 0;
  }

  /**
   * Letzter Tick einer Control-Periode (Zähler == Periode - 1)
   */
  isControlPeriodComplete(): boolean {
    return this.values.control === this.periods.controlPeriod - 1;
  }

  advance(): void {
    this.values = {
      grid: (this.values.grid + 1) % this.periods.gridSampleEvery,
      control: (this.values.control + 1) % this.periods.controlPeriod,
      battery: (this.values.battery + 1) % this.periods.batteryCheckPeriod,
      vehicle: (this.values.vehicle + 1) % this.periods.vehiclePollPeriod,
    };
  }

  getValues(): TickCounterValues {
    return { ...this.values };
  }
}
