import type { ChargerStatus, PhaseCount } from "@shared/schema";
import { log } from "../core/logger";
import { CommandError, errorMessage } from "../core/errors";
import type { Capability, ChargerClient } from "../devices/types";

export type ChargerAction = "skipped" | "noop" | "stop" | "start" | "adjust" | "switch-phase";

/**
 * Wendet eine Regler-Entscheidung (Phase + Strom) auf die Wallbox an.
 *
 * Liest zuerst den Ist-Zustand. Ist der unbekannt oder unvollständig, wird nichts gesendet.
 * Phase und Strom werden immer VOR der Freigabe gesetzt, damit die Wallbox nie
 * kurzzeitig mit Default-Werten lädt.
 *
 * | Fahrzeug        | Strom neu | Aktion                                   |
 * |-----------------|-----------|------------------------------------------|
 * | lädt nicht      | 0         | nichts                                   |
 * | lädt            | 0         | Stopp                                    |
 * | weder Idle/lädt | > 0       | Phase, Strom, Freigabe                   |
 * | lädt            | > 0       | Strom (bei Phasenwechsel vorher Phase)   |
 *
 * `isCommandAllowed` wird nach dem Status-Lesen erneut geprüft; liefert es `false`,
 * wird nichts gesendet.
 *
 * @throws CommandError wenn ein Befehl fehlschlägt
 */
export async function applyChargerDecision(
  charger: Capability<ChargerClient>,
  phaseNew: PhaseCount,
  currentNew: number,
  isCommandAllowed: () => boolean = () => true,
): Promise<ChargerAction> {
  if (charger.kind === "unavailable") {
    log("warning", "charger", `Keine Wallbox-Steuerung verfügbar - Entscheidung verworfen`, charger.reason);
    return "skipped";
  }
  const client = charger.client;

  let status: ChargerStatus;
  try {
    status = await client.getStatus();
  } catch (error) {
    log("warning", "charger", "Wallbox-Status nicht lesbar - keine Aktion", errorMessage(error));
    return "skipped";
  }

  if (!isCommandAllowed()) {
    log("info", "charger", "Befehl verworfen - Steuerung inzwischen nicht mehr freigegeben");
    return "skipped";
  }

  const { carState, phaseMode, ampereAllowed } = status;

  log(
    "debug",
    "charger",
    `Ist: carState=${carState}, phase=${phaseMode ?? "?"}, ampere=${ampereAllowed ?? "?"} | Soll: phase=${phaseNew}, current=${currentNew}A`,
  );

  if (carState === "Unknown" || phaseMode === null || ampereAllowed === null) {
    log("warning", "charger", "Wallbox-Status unvollständig - keine Aktion");
    return "skipped";
  }

  const charging = carState === "Charging";

  // 1) Aus lassen
  if (!charging && currentNew === 0) {
    return "noop";
  }

  // 2) Ladung stoppen
  if (charging && currentNew === 0) {
    await run("Ladung stoppen", () => client.setChargingEnabled(false));
    log("info", "charger", "Ladung gestoppt");
    return "stop";
  }

  // 3) Ladung starten (Fahrzeug wartet / fertig / Fehler, aber nicht Idle)
  if (!charging && carState !== "Idle") {
    await run(`Phase ${phaseNew} setzen`, () => client.setPhaseMode(phaseNew));
    await run(`Strom ${currentNew}A setzen`, () => client.setAmpere(currentNew));
    await run("Ladung freigeben", () => client.setChargingEnabled(true));
    log("info", "charger", `Ladung gestartet mit ${currentNew}A @ ${phaseNew}P`);
    return "start";
  }

  // Idle = kein Fahrzeug angesteckt
  if (!charging) {
    log("debug", "charger", "Kein Fahrzeug angesteckt - Start nicht möglich");
    return "noop";
  }

  // 4) Laufende Ladung anpassen
  if (phaseMode !== phaseNew) {
    await run(`Phasenwechsel ${phaseMode}P → ${phaseNew}P`, () => client.setPhaseMode(phaseNew));
    await run(`Strom ${currentNew}A setzen`, () => client.setAmpere(currentNew));
    log("info", "charger", `Phasenwechsel ${phaseMode}P → ${phaseNew}P mit ${currentNew}A`);
    return "switch-phase";
  }

  await run(`Strom ${currentNew}A setzen`, () => client.setAmpere(currentNew));
  if (ampereAllowed !== currentNew) {
    log("info", "charger", `Ladestrom angepasst: ${ampereAllowed}A → ${currentNew}A @ ${phaseNew}P`);
  }
  return "adjust";
}

async function run(description: string, command: () => Promise<void>): Promise<void> {
  try {
    await command();
  } catch (error) {
    if (error instanceof CommandError) {
      throw error;
    }
    throw new CommandError(`${description} fehlgeschlagen: ${errorMessage(error)}`, "charger", { cause: error });
  }
}
