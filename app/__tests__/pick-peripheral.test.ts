import { afterEach, describe, it, expect, vi } from "vitest";
import { BleChannel } from "@/features/bluetooth/ble-channel";
import { FakeCentral, flushMicrotasks } from "@/features/bluetooth/__tests__/fake-central";
import { MemoryLogSink } from "@/features/logging";
import { pickPeripheral } from "../pick-peripheral";

function setup(central = new FakeCentral()) {
  const channel = new BleChannel({ central, log: new MemoryLogSink() });
  const log = new MemoryLogSink();
  return { central, channel, log };
}

function discover(central: FakeCentral, id: string) {
  central.emit({
    type: "peripheralDiscovered",
    peripheral: { id, name: "Serviceberry", rssi: -58 },
  });
}

afterEach(() => {
  vi.useRealTimers();
});

describe("pickPeripheral", () => {
  it("uses the configured peripheral without scanning", async () => {
    const { central, channel, log } = setup();
    await expect(pickPeripheral({ channel, central, preferred: "p7", log })).resolves.toBe("p7");
    expect(channel.getSelectedPeripheralId()).toBe("p7");
    expect(central.commands).toEqual([]);
  });

  it("prefers the peripheral restored from the previous run", async () => {
    const { central, channel, log } = setup();
    central.emit({
      type: "stateRestored",
      peripherals: [{ id: "p9", name: null, connected: false }],
    });
    await expect(pickPeripheral({ channel, central, preferred: null, log })).resolves.toBe("p9");
    expect(central.commands).toEqual([]);
  });

  it("takes the first peripheral a scan finds", async () => {
    const { central, channel, log } = setup();
    const picked = pickPeripheral({ channel, central, preferred: null, log });
    await flushMicrotasks();
    expect(central.commandTypes()).toEqual(["startScan"]);

    discover(central, "p1");
    discover(central, "p2");
    await expect(picked).resolves.toBe("p1");
    expect(channel.getSelectedPeripheralId()).toBe("p1");
    expect(central.commandTypes()).toEqual(["startScan", "stopScan"]);
    expect(log.messages("info")).toEqual(["Found peripheral p1"]);
  });

  it("waits for the adapter to power on before scanning", async () => {
    const central = new FakeCentral();
    central.adapterState = "poweredOff";
    const { channel, log } = setup(central);
    const picked = pickPeripheral({ channel, central, preferred: null, log });
    await flushMicrotasks();
    expect(central.commands).toEqual([]);

    central.adapterState = "poweredOn";
    central.emit({ type: "adapterStateChanged", state: "poweredOn" });
    await flushMicrotasks(50);
    discover(central, "p2");
    await expect(picked).resolves.toBe("p2");
    expect(log.messages("info")[0]).toBe("Waiting for Bluetooth (adapter is poweredOff)");
  });

  it("gives up when the scan finds nothing", async () => {
    vi.useFakeTimers();
    const { central, channel, log } = setup();
    const picked = pickPeripheral({ channel, central, preferred: null, log, scanTimeoutMs: 5_000 });
    await flushMicrotasks();
    await vi.advanceTimersByTimeAsync(5_000);
    await expect(picked).resolves.toBeNull();
    expect(channel.getSelectedPeripheralId()).toBeNull();
    expect(central.commandTypes()).toEqual(["startScan", "stopScan"]);
    expect(log.messages("warn")).toEqual(["No Serviceberry peripheral found within 5000ms"]);
  });

  it("rejects when startup is cancelled", async () => {
    const central = new FakeCentral();
    central.adapterState = "poweredOff";
    const { channel, log } = setup(central);
    const controller = new AbortController();
    const picked = pickPeripheral({
      channel,
      central,
      preferred: null,
      log,
      signal: controller.signal,
    });
    controller.abort();
    await expect(picked).rejects.toThrow("Startup cancelled");
    expect(central.listenerCount).toBe(1);
  });
});
