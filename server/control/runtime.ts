import type { AppConfig } from "../core/config";
import type { DeviceSet } from "../devices/types";
import { ModeController } from "./mode-controller";
import { StatusStore, createInitialStatus } from "./status-store";
import { SupervisoryLoop } from "./supervisor";
import { SurplusController } from "./surplus-controller";

/**
 * Gesamter Laufzeitzustand der Anwendung. Wird einmal beim Start gebaut und an
 * Loop und HTTP-Routen übergeben.
 */
export interface ControlRuntime {
  config: AppConfig;
  devices: DeviceSet;
  store: StatusStore;
  modeController: ModeController;
  controller: SurplusController;
  loop: SupervisoryLoop;
}

export function createRuntime(
  config: AppConfig,
  devices: DeviceSet,
  options: { now?: () => Date } = {},
): ControlRuntime {
  const store = new StatusStore(createInitialStatus(config.initialMode, config.batteryProtection.enabled));
  const modeController = new ModeController(store);
  const controller = new SurplusController(config.controller);
  const loop = new SupervisoryLoop({
    store,
    modeController,
    controller,
    devices,
    scheduler: config.scheduler,
    batteryProtection: config.batteryProtection,
    now: options.now,
  });

  return { config, devices, store, modeController, controller, loop };
}
