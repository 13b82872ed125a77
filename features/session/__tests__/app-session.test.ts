import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { BleConfig, LanConfig, PreferenceKeys } from "@/constants/transport";
import { BleChannel } from "@/features/bluetooth/ble-channel";
import { FakeCentral } from "@/features/bluetooth/__tests__/fake-central";
import { LanChannel } from "@/features/lan/lan-channel";
import { FakeServerClient } from "@/features/lan/__tests__/fake-server-client";
import { LocationService } from "@/features/location";
import { MemoryLogSink } from "@/features/logging";
import { manualServerInfo } from "@/features/models";
import { loadSettings, MemoryPreferenceStore, saveSettings } from "@/features/storage";
import { isTransportError } from "@/features/transport/errors";
import { TransportManager } from "@/features/transport/transport-manager";
import { AppSession } from "../app-session";

const server = manualServerInfo("10.1.1.2", "ab12");

function setup(preferences = new MemoryPreferenceStore()) {
  const log = new MemoryLogSink();
  const manager = new TransportManager({
    channels: {
      createBluetoothChannel: () => new BleChannel({ central: new FakeCentral(), log }),
      createLanChannel: (info) =>
        new LanChannel({
          server: info,
          client: new FakeServerClient()
            .route(LanConfig.STATUS_PATH, { status: 200, text: "ok" })
            .route(LanConfig.REQUEST_PATH, { status: 200, text: "" }),
          log,
        }),
    },
    location: new LocationService({
      source: { readFix: async () => ({ latitude: 0, longitude: 0, accuracy: 1 }) },
      log,
    }),
    log,
  });
  const session = new AppSession({ manager, preferences, log });
  return { manager, preferences, session };
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("AppSession", () => {
  it("stays unconfigured before onboarding", async () => {
    const { manager, session } = setup();
    expect(session.start()).toEqual({
      isOnboarded: false,
      transportMode: null,
      serverInfo: null,
    });
    expect(manager.isConfigured).toBe(false);
    const error = await session.connect().catch((e: unknown) => e);
    expect(isTransportError(error, "NOT_CONFIGURED")).toBe(true);
  });

  it("persists onboarding and configures the manager", () => {
    const { manager, preferences, session } = setup();
    session.completeOnboarding("lan", server);
    expect(loadSettings(preferences)).toEqual({
      isOnboarded: true,
      transportMode: "lan",
      serverInfo: server,
    });
    expect(manager.getState()).toMatchObject({ mode: "lan", serverInfo: server });
  });

  it("does not keep a server for bluetooth mode", () => {
    const { manager, preferences, session } = setup();
    session.completeOnboarding("bluetooth", server);
    expect(preferences.getItem(PreferenceKeys.SERVER_INFO)).toBeUndefined();
    expect(manager.getBluetoothChannel()).not.toBeNull();
  });

  it("restores the saved configuration on start", async () => {
    const preferences = new MemoryPreferenceStore();
    saveSettings(preferences, { isOnboarded: true, transportMode: "lan", serverInfo: server });
    const { manager, session } = setup(preferences);

    session.start();
    expect(session.isOnboarded).toBe(true);
    await session.connect();
    expect(manager.connectionState).toEqual({ status: "connected" });
    session.disconnect();
  });

  it("reconfigures from settings when connecting after a disconnect", async () => {
    const { manager, session } = setup();
    session.completeOnboarding("lan", server);
    session.disconnect();
    expect(manager.isConfigured).toBe(false);
    await session.connect();
    expect(manager.connectionState).toEqual({ status: "connected" });
    session.disconnect();
  });

  it("clears everything on reset", async () => {
    const { manager, preferences, session } = setup();
    session.completeOnboarding("lan", server);
    await session.connect();

    session.reset();
    expect(manager.connectionState).toEqual({ status: "disconnected" });
    expect(session.getSettings()).toEqual({
      isOnboarded: false,
      transportMode: null,
      serverInfo: null,
    });
    expect(preferences.getItem(PreferenceKeys.IS_ONBOARDED)).toBeUndefined();
    await expect(session.connect()).rejects.toThrow("Transport not configured");
  });

  it("keeps the remembered peripheral when the manager is torn down, and forgets it on reset", () => {
    const { manager, preferences, session } = setup();
    session.completeOnboarding("bluetooth");
    preferences.setItem(BleConfig.RESTORE_IDENTIFIER, "p1");

    manager.destroy();
    expect(preferences.getItem(BleConfig.RESTORE_IDENTIFIER)).toBe("p1");

    session.reset();
    expect(preferences.getItem(BleConfig.RESTORE_IDENTIFIER)).toBeUndefined();
  });
});
