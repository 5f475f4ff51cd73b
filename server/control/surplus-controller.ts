import type { ControlDecision, ControllerParams, PhaseCount } from "@shared/schema";
import { DEFAULT_CONTROLLER_PARAMS } from "@shared/schema";

export interface ControllerState {
  isStartup: boolean;
  phase: PhaseCount;
  current: number;
  pAvailableKw: number;
}

/**
 * Überschuss-Regler: entscheidet aus gemittelter Netzleistung und Wallbox-Leistung
 * über Phasenzahl (1/3) und Ladestrom (A).
 *
 * Leistungsbilanz: P_grid = P_haus + P_wb - P_pv  =>  P_pv - P_haus = P_wb - P_grid
 * Netzleistung > 0 bedeutet Bezug, < 0 Einspeisung.
 *
 * Hysterese an zwei Stellen:
 * - Phasen: 1→3 erst über thres1to3, 3→1 erst unter thres3to1
 *   (beim allerersten Schritt gilt die höhere Schwelle thres1to3Start)
 * - Strom: Start erst über thresStart, Stopp erst unter thresStop
 */
export class SurplusController {
  private state: ControllerState = {
    isStartup: true,
    phase: 1,
    current: 0,
    pAvailableKw: 0,
  };

  constructor(readonly params: ControllerParams = DEFAULT_CONTROLLER_PARAMS) {}

  /**
   * Verfügbare Leistung nach Sicherheitsabschlag, nie negativ.
   */
  static availableKw(gridKw: number, wallboxKw: number, deltaP: number): number {
    const raw = wallboxKw - gridKw;
    return Math.max(0, raw - deltaP);
  }

  /**
   * Lineare Umrechnung Leistung → Strom, getrennt nach Phasenzahl (230 V Nennspannung).
   */
  static powerToCurrent(powerKw: number, phase: PhaseCount): number {
    if (phase === 1) {
      return 4.4444 * powerKw + 1.1111;
    }
    return 1.2345 * powerKw + 4.01;
  }

  step(gridKw: number, wallboxKw: number): ControlDecision {
    const availableKw = SurplusController.availableKw(gridKw, wallboxKw, this.params.deltaP);

    const phase = this.decidePhase(availableKw);
    const current = this.decideCurrent(availableKw, phase);

    this.state = {
      isStartup: false,
      phase,
      current,
      pAvailableKw: availableKw,
    };

    return { phase, current, availableKw };
  }

  getState(): ControllerState {
    return { ...this.state };
  }

  private decidePhase(availableKw: number): PhaseCount {
    const p = this.params;

    if (this.state.isStartup) {
      return availableKw > p.thres1to3Start ? 3 : 1;
    }
    if (this.state.phase === 1 && availableKw > p.thres1to3) {
      return 3;
    }
    if (this.state.phase === 3 && availableKw < p.thres3to1) {
      return 1;
    }
    return this.state.phase;
  }

  private decideCurrent(availableKw: number, phase: PhaseCount): number {
    const p = this.params;
    const charging = this.state.current > 0;

    const keepOrStart =
      (charging && availableKw > p.thresStop) ||
      (!charging && availableKw > p.thresStart);

    if (!keepOrStart) {
      return 0;
    }

    const candidate = Math.floor(SurplusController.powerToCurrent(availableKw, phase));
    return Math.max(p.minCurrent, Math.min(candidate, p.maxCurrent));
  }
}
