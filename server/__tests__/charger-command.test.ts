import { describe, it, expect, vi } from "vitest";
import type { ChargerStatus } from "@shared/schema";

vi.mock("../core/logger", () => ({
  log: vi.fn(),
}));

import { applyChargerDecision } from "../control/charger-command";
import { CommandError } from "../core/errors";
import { available, unavailable, type ChargerClient } from "../devices/types";

function createCharger(status: ChargerStatus) {
  const client = {
    getStatus: vi.fn().mockResolvedValue(status),
    setPhaseMode: vi.fn().mockResolvedValue(undefined),
    setAmpere: vi.fn().mockResolvedValue(undefined),
    setChargingEnabled: vi.fn().mockResolvedValue(undefined),
  };
  return { client, capability: available<ChargerClient>(client) };
}

function expectNoCommands(client: ReturnType<typeof createCharger>["client"]): void {
  expect(client.setPhaseMode).not.toHaveBeenCalled();
  expect(client.setAmpere).not.toHaveBeenCalled();
  expect(client.setChargingEnabled).not.toHaveBeenCalled();
}

describe("applyChargerDecision", () => {
  it("skips when no charger control is available", async () => {
    await expect(applyChargerDecision(unavailable("keine Wallbox"), 1, 10)).resolves.toBe("skipped");
  });

  it("skips without commands when the status cannot be read", async () => {
    const { client, capability } = createCharger({ carState: "Waiting", phaseMode: 1, ampereAllowed: 10 });
    client.getStatus.mockRejectedValue(new CommandError("timeout", "charger"));

    await expect(applyChargerDecision(capability, 1, 10)).resolves.toBe("skipped");
    expectNoCommands(client);
  });

  it.each<ChargerStatus>([
    { carState: "Unknown", phaseMode: 1, ampereAllowed: 10 },
    { carState: "Charging", phaseMode: null, ampereAllowed: 10 },
    { carState: "Charging", phaseMode: 3, ampereAllowed: null },
  ])("skips on indeterminate state %o", async (status) => {
    const { client, capability } = createCharger(status);

    await expect(applyChargerDecision(capability, 1, 0)).resolves.toBe("skipped");
    expectNoCommands(client);
  });

  it.each<ChargerStatus["carState"]>(["Idle", "Waiting", "Finished", "Error"])(
    "does nothing for 0 A while not charging (%s)",
    async (carState) => {
      const { client, capability } = createCharger({ carState, phaseMode: 1, ampereAllowed: 10 });

      await expect(applyChargerDecision(capability, 1, 0)).resolves.toBe("noop");
      expectNoCommands(client);
    },
  );

  it("stops a running charge for 0 A", async () => {
    const { client, capability } = createCharger({ carState: "Charging", phaseMode: 3, ampereAllowed: 12 });

    await expect(applyChargerDecision(capability, 3, 0)).resolves.toBe("stop");
    expect(client.setChargingEnabled).toHaveBeenCalledWith(false);
    expect(client.setPhaseMode).not.toHaveBeenCalled();
    expect(client.setAmpere).not.toHaveBeenCalled();
  });

  it("sets phase and current before enabling a new charge", async () => {
    const { client, capability } = createCharger({ carState: "Waiting", phaseMode: 1, ampereAllowed: 6 });

    await expect(applyChargerDecision(capability, 3, 12)).resolves.toBe("start");

    expect(client.setPhaseMode).toHaveBeenCalledWith(3);
    expect(client.setAmpere).toHaveBeenCalledWith(12);
    expect(client.setChargingEnabled).toHaveBeenCalledWith(true);

    const phaseOrder = client.setPhaseMode.mock.invocationCallOrder[0];
    const ampereOrder = client.setAmpere.mock.invocationCallOrder[0];
    const enableOrder = client.setChargingEnabled.mock.invocationCallOrder[0];
    expect(phaseOrder).toBeLessThan(ampereOrder);
    expect(ampereOrder).toBeLessThan(enableOrder);
  });

  it("does not start when no vehicle is plugged in", async () => {
    const { client, capability } = createCharger({ carState: "Idle", phaseMode: 1, ampereAllowed: 6 });

    await expect(applyChargerDecision(capability, 1, 12)).resolves.toBe("noop");
    expectNoCommands(client);
  });

  it("only adjusts the current while charging on the same phase", async () => {
    const { client, capability } = createCharger({ carState: "Charging", phaseMode: 1, ampereAllowed: 10 });

    await expect(applyChargerDecision(capability, 1, 14)).resolves.toBe("adjust");
    expect(client.setAmpere).toHaveBeenCalledWith(14);
    expect(client.setPhaseMode).not.toHaveBeenCalled();
    expect(client.setChargingEnabled).not.toHaveBeenCalled();
  });

  it("sets the current again even when it already matches", async () => {
    const { client, capability } = createCharger({ carState: "Charging", phaseMode: 1, ampereAllowed: 14 });

    await expect(applyChargerDecision(capability, 1, 14)).resolves.toBe("adjust");
    expect(client.setAmpere).toHaveBeenCalledTimes(1);
    expect(client.setAmpere).toHaveBeenCalledWith(14);
    expect(client.setPhaseMode).not.toHaveBeenCalled();
    expect(client.setChargingEnabled).not.toHaveBeenCalled();
  });

  it("skips without commands when control is withdrawn after the status read", async () => {
    const { client, capability } = createCharger({ carState: "Waiting", phaseMode: 1, ampereAllowed: 6 });
    const isCommandAllowed = vi.fn().mockReturnValue(false);

    await expect(applyChargerDecision(capability, 3, 10, isCommandAllowed)).resolves.toBe("skipped");
    expect(client.getStatus).toHaveBeenCalledTimes(1);
    expect(isCommandAllowed).toHaveBeenCalledTimes(1);
    expectNoCommands(client);
  });

  it.each([
    [1, 3],
    [3, 1],
  ] as const)("switches phase %i → %i before setting the current", async (from, to) => {
    const { client, capability } = createCharger({ carState: "Charging", phaseMode: from, ampereAllowed: 10 });

    await expect(applyChargerDecision(capability, to, 11)).resolves.toBe("switch-phase");
    expect(client.setPhaseMode).toHaveBeenCalledWith(to);
    expect(client.setAmpere).toHaveBeenCalledWith(11);
    expect(client.setPhaseMode.mock.invocationCallOrder[0]).toBeLessThan(client.setAmpere.mock.invocationCallOrder[0]);
    expect(client.setChargingEnabled).not.toHaveBeenCalled();
  });

  it("wraps failing commands in a CommandError", async () => {
    const { client, capability } = createCharger({ carState: "Charging", phaseMode: 1, ampereAllowed: 10 });
    client.setChargingEnabled.mockRejectedValue(new Error("socket hang up"));

    const result = applyChargerDecision(capability, 1, 0);

    await expect(result).rejects.toBeInstanceOf(CommandError);
    await expect(result).rejects.toThrow("Ladung stoppen fehlgeschlagen: socket hang up");
  });

  it("passes CommandErrors through unchanged", async () => {
    const { client, capability } = createCharger({ carState: "Waiting", phaseMode: 1, ampereAllowed: 10 });
    const failure = new CommandError("HTTP 500", "charger");
    client.setPhaseMode.mockRejectedValue(failure);

    await expect(applyChargerDecision(capability, 1, 10)).rejects.toBe(failure);
    expect(client.setAmpere).not.toHaveBeenCalled();
  });
});
