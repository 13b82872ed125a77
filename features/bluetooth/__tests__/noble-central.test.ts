import { describe, it, expect, vi } from "vitest";
import { BleConfig } from "@/constants/transport";
import { MemoryLogSink } from "@/features/logging";
import { MemoryPreferenceStore } from "@/features/storage";
import { normalizeUuid, type BleCentralEvent } from "../ble-central";
import { BleChannel } from "../ble-channel";
import { NobleCentral } from "../noble-central";
import { flushMicrotasks } from "./fake-central";
import { FakeNoble, FakePeripheral, FakeService } from "./fake-noble";

const SERVICE = normalizeUuid(BleConfig.SERVICE_UUID);

function setup(preferences = new MemoryPreferenceStore()) {
  const noble = new FakeNoble();
  const log = new MemoryLogSink();
  const central = new NobleCentral(noble, { log, preferences });
  const events: BleCentralEvent[] = [];
  central.addEventListener((event) => events.push(event));
  return { noble, central, events, preferences, log };
}

function withChannel() {
  const ctx = setup();
  const channel = new BleChannel({ central: ctx.central, log: ctx.log });
  const peripheral = new FakePeripheral("p1", BleConfig.PERIPHERAL_NAME);
  ctx.noble.discover(peripheral);
  return { ...ctx, channel, peripheral };
}

describe("NobleCentral scanning", () => {
  it("reports discoveries only while a scan is running", () => {
    const { noble, central, events } = setup();
    central.startScan([BleConfig.SERVICE_UUID]);
    expect(noble.scans).toEqual([[SERVICE]]);

    noble.discover(new FakePeripheral("a", BleConfig.PERIPHERAL_NAME));
    central.stopScan();
    noble.discover(new FakePeripheral("b"));

    expect(events).toEqual([
      {
        type: "peripheralDiscovered",
        peripheral: { id: "a", name: BleConfig.PERIPHERAL_NAME, rssi: -60 },
      },
    ]);
    expect(noble.stopCount).toBe(1);
  });
});

describe("NobleCentral connect", () => {
  it("scans for an unseen peripheral, connects and remembers it", async () => {
    const { noble, central, events, preferences } = setup();
    central.connect("p1");
    expect(noble.scans).toEqual([[SERVICE]]);

    noble.discover(new FakePeripheral("p1"));
    expect(noble.stopCount).toBe(1);
    await flushMicrotasks();

    expect(events).toEqual([{ type: "peripheralConnected", peripheralId: "p1" }]);
    expect(preferences.getItem(BleConfig.RESTORE_IDENTIFIER)).toBe("p1");
  });

  it("waits for the adapter before scanning for a peripheral", () => {
    const noble = new FakeNoble();
    noble.state = "poweredOff";
    const central = new NobleCentral(noble, { log: new MemoryLogSink() });
    central.connect("p1");
    expect(noble.scans).toEqual([]);

    noble.powerOn();
    expect(noble.scans).toEqual([[SERVICE]]);
  });

  it("reuses a link that is already up", async () => {
    const { noble, central, events } = setup();
    const peripheral = new FakePeripheral("p1");
    peripheral.state = "connected";
    noble.discover(peripheral);

    central.connect("p1");
    await flushMicrotasks();
    expect(peripheral.connectCalls).toBe(0);
    expect(events).toEqual([{ type: "peripheralConnected", peripheralId: "p1" }]);
  });

  it("keeps the remembered peripheral when the link is cancelled", async () => {
    const { noble, central, events, preferences } = setup();
    noble.discover(new FakePeripheral("p1"));
    central.connect("p1");
    await flushMicrotasks();

    central.cancelConnection("p1");
    await flushMicrotasks();
    expect(events.at(-1)).toEqual({ type: "peripheralDisconnected", peripheralId: "p1", error: null });
    expect(preferences.getItem(BleConfig.RESTORE_IDENTIFIER)).toBe("p1");
  });
});

describe("NobleCentral with BleChannel", () => {
  it("recovers after a handshake that found no relay service", async () => {
    const { channel, peripheral } = withChannel();
    peripheral.services = [];
    await expect(channel.connectTo("p1")).rejects.toThrow(
      "Connection failed: Relay service not found",
    );
    await channel.settle();
    expect(peripheral.state).toBe("disconnected");

    peripheral.services = [new FakeService()];
    await channel.connect();
    expect(channel.getConnectionState()).toEqual({ status: "connected" });
    expect(peripheral.connectCalls).toBe(2);
  });

  it("forwards notifications and detaches them when the link drops", async () => {
    const { channel, peripheral } = withChannel();
    const handler = vi.fn(async () => {});
    channel.onLocationRequest = handler;
    await channel.connectTo("p1");

    const characteristic = peripheral.services[0]?.characteristics[0];
    expect(characteristic?.subscribed).toBe(true);
    expect(characteristic?.listenerCount("data")).toBe(1);
    characteristic?.emit("data", Buffer.from("request"));
    await channel.settle();
    expect(handler).toHaveBeenCalledTimes(1);

    peripheral.emit("disconnect");
    await channel.settle();
    expect(characteristic?.listenerCount("data")).toBe(0);
    expect(channel.getConnectionState()).toEqual({ status: "disconnected" });
  });

  it("leaves the restore identifier in place on dispose", async () => {
    const { channel, preferences, peripheral } = withChannel();
    await channel.connectTo("p1");
    channel.dispose();
    expect(peripheral.state).toBe("disconnected");
    expect(preferences.getItem(BleConfig.RESTORE_IDENTIFIER)).toBe("p1");
  });
});

describe("NobleCentral restoration", () => {
  it("announces the remembered peripheral once the adapter powers on", () => {
    const preferences = new MemoryPreferenceStore();
    preferences.setItem(BleConfig.RESTORE_IDENTIFIER, "p9");
    const noble = new FakeNoble();
    noble.state = "poweredOff";
    const central = new NobleCentral(noble, { log: new MemoryLogSink(), preferences });
    const events: BleCentralEvent[] = [];
    central.addEventListener((event) => events.push(event));

    noble.powerOn();
    noble.powerOn();
    expect(events).toEqual([
      { type: "adapterStateChanged", state: "poweredOn" },
      { type: "stateRestored", peripherals: [{ id: "p9", name: null, connected: false }] },
      { type: "adapterStateChanged", state: "poweredOn" },
    ]);
  });

  it("checks for a remembered peripheral when created with the adapter on", async () => {
    const preferences = new MemoryPreferenceStore();
    preferences.setItem(BleConfig.RESTORE_IDENTIFIER, "p9");
    const { events } = setup(preferences);
    await flushMicrotasks();
    expect(events).toEqual([
      { type: "stateRestored", peripherals: [{ id: "p9", name: null, connected: false }] },
    ]);
  });
});

describe("NobleCentral maximumWriteLength", () => {
  it("uses the negotiated MTU minus the ATT header", () => {
    const { noble, central } = setup();
    const peripheral = new FakePeripheral("p1");
    noble.discover(peripheral);
    expect(central.maximumWriteLength("p1")).toBe(BleConfig.DEFAULT_WRITE_LENGTH);

    peripheral.mtu = 185;
    expect(central.maximumWriteLength("p1")).toBe(182);
    expect(central.maximumWriteLength("unknown")).toBe(20);
  });
});
