import type { ChargerStatus, LogCategory, StatusPatch } from "@shared/schema";
import type { BatteryProtectionConfig, SchedulerConfig } from "../core/config";
import { errorMessage } from "../core/errors";
import { log } from "../core/logger";
import type { DeviceSet, VehicleStatusClient } from "../devices/types";
import { shouldForceStop } from "./battery-protection";
import { applyChargerDecision } from "./charger-command";
import { GridSampleWindow } from "./grid-sample-window";
import type { ModeController } from "./mode-controller";
import type { StatusStore } from "./status-store";
import { SurplusController } from "./surplus-controller";
import { TickCounters } from "./tick-counters";

export interface SupervisoryLoopOptions {
  store: StatusStore;
  modeController: ModeController;
  controller: SurplusController;
  devices: DeviceSet;
  scheduler: SchedulerConfig;
  batteryProtection: Pick<BatteryProtectionConfig, "socLimit" | "maxAgeSec">;
  now?: () => Date;
}

/**
 * Supervisory-Loop: ein Tick pro Intervall, Ticks überlappen nie.
 *
 * Pro Tick:
 * 1. Live-Werte (PV, Netz, Wallbox, Ladezustand) lesen und in den Status schreiben
 * 2. Netz-Sample für die Mittelung (alle gridSampleEvery Ticks)
 * 3. Fahrzeugstatus abfragen (alle vehiclePollPeriod Ticks, läuft losgelöst vom Tick)
 * 4. Regelung am Ende jeder Control-Periode oder direkt nach Wechsel in pv_surplus
 * 5. Akku-Schutz im monitor_only-Modus (alle batteryCheckPeriod Ticks)
 *
 * Fehler eines Ticks werden geloggt, der Loop läuft weiter.
 */
export class SupervisoryLoop {
  private readonly counters: TickCounters;
  private readonly window: GridSampleWindow;
  private readonly now: () => Date;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private runningTick: Promise<void> | null = null;
  private runningVehiclePoll: Promise<void> | null = null;

  constructor(private readonly options: SupervisoryLoopOptions) {
    this.counters = new TickCounters(options.scheduler);
    this.window = new GridSampleWindow(options.scheduler.maxGridSamples);
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    const { tickIntervalMs, gridSampleEvery, controlPeriod, vehiclePollPeriod, batteryCheckPeriod } =
      this.options.scheduler;
    log(
      "info",
      "system",
      "Supervisory-Loop gestartet",
      `Tick: ${tickIntervalMs}ms, Netz-Sample alle ${gridSampleEvery}, Regelung alle ${controlPeriod}, Fahrzeug alle ${vehiclePollPeriod}, Akku-Schutz alle ${batteryCheckPeriod} Ticks`,
    );
    this.scheduleNext(0);
  }

  /**
   * Stoppt den Loop und wartet auf laufenden Tick und Fahrzeug-Abfrage.
   */
  async stop(): Promise<void> {
    if (!this.running && !this.runningTick && !this.runningVehiclePoll) {
      return;
    }
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.runningTick) {
      await this.runningTick;
    }
    await this.whenVehiclePollSettled();
    log("info", "system", "Supervisory-Loop gestoppt");
  }

  isRunning(): boolean {
    return this.running;
  }

  async whenVehiclePollSettled(): Promise<void> {
    if (this.runningVehiclePoll) {
      await this.runningVehiclePoll;
    }
  }

  private scheduleNext(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runScheduledTick();
    }, delayMs);
  }

  private async runScheduledTick(): Promise<void> {
    const startedAt = Date.now();
    this.runningTick = this.tick();
    try {
      await this.runningTick;
    } finally {
      this.runningTick = null;
    }
    if (this.running) {
      const elapsed = Date.now() - startedAt;
      this.scheduleNext(Math.max(0, this.options.scheduler.tickIntervalMs - elapsed));
    }
  }

  /**
   * Ein kompletter Tick. Wirft nie.
   */
  async tick(): Promise<void> {
    const { store, modeController } = this.options;
    try {
      await this.refreshLiveSnapshot();

      if (this.counters.isGridSampleDue()) {
        await this.sampleGrid();
      }

      if (this.counters.isVehiclePollDue()) {
        this.startVehiclePoll();
      }

      const mode = modeController.getMode();
      const switchPending = modeController.isModeSwitchPending();
      const triggerControl =
        mode === "pv_surplus" && !this.window.isEmpty() && (this.counters.isControlPeriodComplete() || switchPending);

      const protectionEnabled = modeController.isSocProtectionEnabled();
      const socControl = protectionEnabled && mode === "monitor_only" && this.counters.isBatteryCheckDue();

      // Akku-Schutz nur einmal pro Tick auswerten, gilt für beide Zweige
      let forceStop = false;
      if (protectionEnabled && (triggerControl || socControl)) {
        const verdict = shouldForceStop(store.snapshot(), this.now(), this.options.batteryProtection);
        store.update({ socProtectionStop: verdict.stop, socProtectionSoc: verdict.soc });
        forceStop = verdict.stop;
        log(
          verdict.stop ? "info" : "debug",
          "protection",
          `Akku-Schutz: stop=${verdict.stop} (${verdict.reason})`,
          `SoC=${verdict.soc ?? "?"}%, Limit=${this.options.batteryProtection.socLimit}%`,
        );
      }

      if (triggerControl) {
        await this.runControl(forceStop, switchPending);
      } else if (socControl && forceStop) {
        await this.enforceProtectionStop();
      }
    } catch (error) {
      log("error", "control", "Fehler im Supervisory-Tick", errorMessage(error));
    } finally {
      this.counters.advance();
    }
  }

  private async refreshLiveSnapshot(): Promise<void> {
    const { devices, store, controller } = this.options;
    const readStringPowers = devices.pvInverter.readStringPowersKw?.bind(devices.pvInverter);

    const [pvKw, pvStringsKw, gridKw, wallboxKw, chargerStatus] = await Promise.all([
      readOrNull("pv", "PV-Leistung", () => devices.pvInverter.readTotalPowerKw()),
      readStringPowers ? readOrNull("pv", "PV-Strings", readStringPowers) : Promise.resolve(null),
      readOrNull("grid", "Netzleistung", () => devices.gridMeter.readPowerKw()),
      readOrNull("wallbox", "Wallbox-Leistung", () => devices.wallbox.readPowerKw()),
      devices.charger.kind === "available"
        ? readOrNull("charger", "Wallbox-Status", () => this.readChargerStatus())
        : Promise.resolve(undefined),
    ]);

    const patch: StatusPatch = {
      timestamp: this.now().toISOString(),
      pvKw,
      pvStringsKw,
      gridKw,
      wallboxKw,
      pAvailableNow:
        gridKw !== null && wallboxKw !== null
          ? SurplusController.availableKw(gridKw, wallboxKw, controller.params.deltaP)
          : null,
    };

    // Ohne Steuerung bleiben die Ladefelder unangetastet
    if (chargerStatus !== undefined) {
      patch.phase = chargerStatus?.phaseMode ?? null;
      patch.current = chargerStatus?.ampereAllowed ?? null;
      patch.carState = chargerStatus?.carState ?? null;
    }

    store.update(patch);
  }

  private async readChargerStatus(): Promise<ChargerStatus> {
    const charger = this.options.devices.charger;
    if (charger.kind === "unavailable") {
      throw new Error(charger.reason);
    }
    return charger.client.getStatus();
  }

  private async sampleGrid(): Promise<void> {
    try {
      const sample = await this.options.devices.gridMeter.readPowerKw();
      this.window.push(sample);
      log("debug", "grid", `Netz-Sample ${sample.toFixed(3)} kW (${this.window.size} im Fenster)`);
    } catch (error) {
      log("warning", "grid", "Netz-Sample fehlgeschlagen", errorMessage(error));
    }
  }

  private startVehiclePoll(): void {
    const vehicle = this.options.devices.vehicle;
    if (vehicle.kind === "unavailable") {
      log("trace", "vehicle", "Fahrzeugabfrage übersprungen", vehicle.reason);
      return;
    }
    if (this.runningVehiclePoll) {
      log("debug", "vehicle", "Vorherige Fahrzeugabfrage läuft noch - übersprungen");
      return;
    }
    this.runningVehiclePoll = this.pollVehicle(vehicle.client).finally(() => {
      this.runningVehiclePoll = null;
    });
  }

  private async pollVehicle(client: VehicleStatusClient): Promise<void> {
    const { store } = this.options;
    const attemptedAt = this.now().toISOString();
    try {
      const status = await client.readStatus();
      store.update({
        carSoc: status.soc,
        carAutonomyKm: status.autonomyKm,
        carPlugStatus: status.plugStatus,
        carChargingStatus: status.chargingStatus,
        carStatusTimestamp: status.timestamp,
        carStatusLastAttempt: attemptedAt,
        carStatusValid: true,
      });
    } catch (error) {
      // Alte Werte bleiben zur Anzeige stehen, gelten aber nicht mehr als gültig
      store.update({ carStatusLastAttempt: attemptedAt, carStatusValid: false });
      log("warning", "vehicle", "Fahrzeugstatus-Abfrage fehlgeschlagen", errorMessage(error));
    }
  }

  private async runControl(forceStop: boolean, switchPending: boolean): Promise<void> {
    const { devices, store, controller, modeController } = this.options;

    const gridKwAvg = this.window.mean();
    if (gridKwAvg === null) {
      return;
    }

    let wallboxKw: number;
    try {
      wallboxKw = await devices.wallbox.readPowerKw();
    } catch (error) {
      wallboxKw = 0;
      log("warning", "wallbox", "Wallbox-Leistung für Regelung nicht lesbar - verwende 0 kW", errorMessage(error));
    }

    const decision = controller.step(gridKwAvg, wallboxKw);
    const current = forceStop ? 0 : decision.current;

    log(
      "info",
      "control",
      `Regelung${switchPending ? " (Moduswechsel)" : ""}: Netz Ø ${gridKwAvg.toFixed(2)} kW | Wallbox ${wallboxKw.toFixed(2)} kW | verfügbar ${decision.availableKw.toFixed(2)} kW → ${decision.phase}P / ${current}A`,
      forceStop && decision.current > 0 ? `Akku-Schutz: ${decision.current}A → 0A` : undefined,
    );

    store.update({
      gridKwAvg,
      wallboxKwAvg: wallboxKw,
      pAvailableKw: decision.availableKw,
      decisionPhase: decision.phase,
      decisionCurrent: current,
      lastControlAt: this.now().toISOString(),
    });
    modeController.clearModeSwitch();
    this.window.reset();

    // Der Modus kann sich während der Lesezugriffe geändert haben; ein Akku-Schutz-Stopp gilt auch in monitor_only.
    const isCommandAllowed = () => forceStop || modeController.getMode() === "pv_surplus";
    if (!isCommandAllowed()) {
      log("info", "control", "Modus während der Regelung auf monitor_only gewechselt - kein Befehl an die Wallbox");
      return;
    }
    await applyChargerDecision(devices.charger, decision.phase, current, isCommandAllowed);
  }

  private async enforceProtectionStop(): Promise<void> {
    const { devices, store } = this.options;
    const status = store.snapshot();
    const phase = status.phase ?? status.decisionPhase ?? 1;
    log("info", "protection", `Akku-Schutz greift im monitor_only-Modus: Ladung stoppen (${phase}P)`);
    await applyChargerDecision(devices.charger, phase, 0);
  }
}

async function readOrNull<T>(
  category: LogCategory,
  label: string,
  read: () => Promise<T>,
): Promise<T | null> {
  try {
    return await read();
  } catch (error) {
    log("warning", category, `${label} nicht lesbar`, errorMessage(error));
    return null;
  }
}
