import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../core/logger", () => ({
  log: vi.fn(),
}));

import { StatusStore, createInitialStatus } from "../control/status-store";
import { ModeController } from "../control/mode-controller";
import { ValidationError } from "../core/errors";

describe("StatusStore", () => {
  let store: StatusStore;

  beforeEach(() => {
    store = new StatusStore(createInitialStatus("pv_surplus", false));
  });

  it("starts with unknown readings and invalid vehicle data", () => {
    const status = store.snapshot();

    expect(status.mode).toBe("pv_surplus");
    expect(status.socProtection).toBe(false);
    expect(status.carStatusValid).toBe(false);
    expect(status.gridKw).toBeNull();
    expect(status.decisionCurrent).toBeNull();
  });

  it("returns snapshots that do not alias the stored status", () => {
    store.update({ pvStringsKw: { dc1: 1.2 } });

    const snapshot = store.snapshot();
    snapshot.gridKw = 99;
    if (snapshot.pvStringsKw) snapshot.pvStringsKw.dc1 = 99;

    expect(store.snapshot().gridKw).toBeNull();
    expect(store.snapshot().pvStringsKw).toEqual({ dc1: 1.2 });
  });

  it("applies a field group and leaves omitted fields untouched", () => {
    store.update({ gridKw: -1.5, wallboxKw: 2 });
    store.update({ gridKw: null, wallboxKw: undefined });

    const status = store.snapshot();
    expect(status.gridKw).toBeNull();
    expect(status.wallboxKw).toBe(2);
  });

  it("rejects nested lock usage and releases the lock afterwards", () => {
    expect(() => store.withLock(() => store.snapshot())).toThrow("verschachtelter Lock-Zugriff");

    expect(() => store.snapshot()).not.toThrow();
  });

  it("rejects asynchronous critical sections", () => {
    expect(() => store.withLock(async () => 1)).toThrow("nicht asynchron");
  });

  it("flags an immediate control cycle only on monitor_only → pv_surplus", () => {
    expect(store.setMode("pv_surplus")).toBe("pv_surplus");
    expect(store.isModeSwitchPending()).toBe(false);

    store.setMode("monitor_only");
    expect(store.isModeSwitchPending()).toBe(false);

    expect(store.setMode("pv_surplus")).toBe("monitor_only");
    expect(store.isModeSwitchPending()).toBe(true);

    store.clearModeSwitch();
    expect(store.isModeSwitchPending()).toBe(false);
  });
});

describe("ModeController", () => {
  let store: StatusStore;
  let modes: ModeController;

  beforeEach(() => {
    store = new StatusStore(createInitialStatus("monitor_only", false));
    modes = new ModeController(store);
  });

  it("switches mode and arms the one-shot flag", () => {
    expect(modes.setMode("pv_surplus")).toBe("pv_surplus");

    expect(modes.getMode()).toBe("pv_surplus");
    expect(modes.isModeSwitchPending()).toBe(true);

    modes.clearModeSwitch();
    expect(modes.isModeSwitchPending()).toBe(false);
  });

  it("rejects unknown modes without changing the stored mode", () => {
    expect(() => modes.setMode("turbo")).toThrow(ValidationError);
    expect(() => modes.setMode("turbo")).toThrow('Unbekannter Modus: "turbo"');

    expect(modes.getMode()).toBe("monitor_only");
    expect(modes.isModeSwitchPending()).toBe(false);
  });

  it("requires the mode field in request bodies", () => {
    expect(() => modes.setModeFromRequest({})).toThrow("mode is required");
    expect(() => modes.setModeFromRequest(null)).toThrow("mode is required");
    expect(() => modes.setModeFromRequest({ mode: 3 })).toThrow("Unbekannter Modus: 3");

    expect(modes.setModeFromRequest({ mode: "pv_surplus" })).toBe("pv_surplus");
  });

  it("toggles battery protection from a boolean body", () => {
    expect(modes.setSocProtection({ enabled: true })).toBe(true);

    expect(modes.isSocProtectionEnabled()).toBe(true);
    expect(store.snapshot().socProtection).toBe(true);
  });

  it("rejects non-boolean battery protection values", () => {
    expect(() => modes.setSocProtection({ enabled: "yes" })).toThrow("enabled (boolean) is required");

    expect(modes.isSocProtectionEnabled()).toBe(false);
  });
});
