/**
 * BleCentral on top of @abandonware/noble.
 *
 * noble's promise API is adapted to the port's command/event shape: each
 * command runs asynchronously and reports its outcome as a BleCentralEvent.
 * The connected peripheral id is remembered in the preference store so the
 * next process can re-acquire it after the adapter powers on. Tearing the
 * link down keeps it; only a settings reset clears it.
 */

import { BleConfig } from "@/constants/transport";
import { scopedLog, type LogSink, type Logger } from "@/features/logging";
import type { PreferenceStore } from "@/features/storage";
import { Completion } from "@/features/transport/completion";
import { describeError } from "@/features/transport/errors";
import { ListenerSet } from "@/features/transport/listener-set";
import {
  normalizeUuid,
  type AdapterState,
  type BleCentral,
  type BleCentralEvent,
  type BleCentralListener,
} from "./ble-central";

export type Noble = typeof import("@abandonware/noble");

/** The parts of a noble characteristic this adapter drives. */
export interface NobleCharacteristic {
  readonly uuid: string;
  on(event: "data", listener: (data: Buffer) => void): unknown;
  removeListener(event: "data", listener: (data: Buffer) => void): unknown;
  subscribeAsync(): Promise<void>;
  unsubscribeAsync(): Promise<void>;
  writeAsync(data: Buffer, withoutResponse: boolean): Promise<void>;
}

export interface NobleService {
  readonly uuid: string;
  discoverCharacteristicsAsync(characteristicUuids: string[]): Promise<NobleCharacteristic[]>;
}

export interface NoblePeripheral {
  readonly id: string;
  readonly state: string;
  readonly rssi: number;
  readonly mtu?: number | null;
  readonly advertisement: { readonly localName?: string };
  connectAsync(): Promise<void>;
  disconnectAsync(): Promise<void>;
  discoverServicesAsync(serviceUuids: string[]): Promise<NobleService[]>;
  once(event: "disconnect", listener: () => void): unknown;
  removeAllListeners(event: "disconnect"): unknown;
}

/** The noble module surface; tests pass an in-process stand-in. */
export interface NobleHost {
  readonly state: string;
  on(event: "stateChange", listener: (state: string) => void): unknown;
  on(event: "discover", listener: (peripheral: NoblePeripheral) => void): unknown;
  removeListener(event: "stateChange", listener: (state: string) => void): unknown;
  removeListener(event: "discover", listener: (peripheral: NoblePeripheral) => void): unknown;
  startScanningAsync(serviceUuids: string[], allowDuplicates: boolean): Promise<void>;
  stopScanningAsync(): Promise<void>;
}

// ATT header bytes subtracted from the negotiated MTU.
const ATT_WRITE_OVERHEAD = 3;

const ADAPTER_STATES: readonly AdapterState[] = [
  "unknown",
  "resetting",
  "unsupported",
  "unauthorized",
  "poweredOff",
  "poweredOn",
];

function toAdapterState(state: string): AdapterState {
  return ADAPTER_STATES.find((s) => s === state) ?? "unknown";
}

function isNoble(value: unknown): value is Noble {
  return (
    typeof value === "object" &&
    value !== null &&
    "startScanningAsync" in value &&
    typeof value.startScanningAsync === "function"
  );
}

/**
 * Load noble on demand. The package opens the HCI socket on import, so only
 * processes that actually use Bluetooth pay for it.
 */
export async function loadNoble(): Promise<Noble> {
  const mod: unknown = await import("@abandonware/noble");
  if (isNoble(mod)) return mod;
  if (typeof mod === "object" && mod !== null && "default" in mod && isNoble(mod.default)) {
    return mod.default;
  }
  throw new Error("@abandonware/noble did not load");
}

export interface NobleCentralOptions {
  log: LogSink;
  /** Where the connected peripheral is remembered between runs. */
  preferences?: PreferenceStore;
}

export class NobleCentral implements BleCentral {
  private readonly log: Logger;
  private readonly preferences: PreferenceStore | null;
  private readonly listeners: ListenerSet<BleCentralEvent>;

  private state: AdapterState;
  private restoreChecked = false;
  private scanning = false;
  private readonly peripherals = new Map<string, NoblePeripheral>();
  private readonly services = new Map<string, NobleService>();
  private readonly characteristics = new Map<string, NobleCharacteristic>();
  private readonly dataHandlers = new Map<string, (data: Buffer) => void>();
  private readonly acquiring = new Map<string, Completion<NoblePeripheral>>();

  private readonly onStateChange = (state: string) => this.handleStateChange(state);
  private readonly onDiscover = (peripheral: NoblePeripheral) => this.handleDiscover(peripheral);

  static async create(options: NobleCentralOptions): Promise<NobleCentral> {
    return new NobleCentral(await loadNoble(), options);
  }

  constructor(
    private readonly noble: NobleHost,
    options: NobleCentralOptions,
  ) {
    this.log = scopedLog(options.log, "BLE");
    this.preferences = options.preferences ?? null;
    this.listeners = new ListenerSet(this.log);
    this.state = toAdapterState(noble.state);
    noble.on("stateChange", this.onStateChange);
    noble.on("discover", this.onDiscover);
    if (this.state === "poweredOn") queueMicrotask(() => this.checkRestore());
  }

  get adapterState(): AdapterState {
    return this.state;
  }

  addEventListener(listener: BleCentralListener): () => void {
    return this.listeners.add(listener);
  }

  // ============================================================================
  // SCANNING
  // ============================================================================

  startScan(serviceUuids: string[]): void {
    this.scanning = true;
    this.run("startScan", () => this.noble.startScanningAsync(serviceUuids.map(normalizeUuid), false));
  }

  stopScan(): void {
    this.scanning = false;
    // Keep scanning while a connect is still looking for its peripheral.
    if (this.acquiring.size > 0) return;
    this.run("stopScan", () => this.noble.stopScanningAsync());
  }

  // ============================================================================
  // CONNECTION
  // ============================================================================

  connect(peripheralId: string): void {
    this.acquire(peripheralId)
      .then(async (peripheral) => {
        peripheral.removeAllListeners("disconnect");
        // A link left up by an earlier run of the handshake is reused as is.
        if (peripheral.state !== "connected") await peripheral.connectAsync();
        peripheral.once("disconnect", () => this.handleDisconnect(peripheralId));
        this.remember(peripheralId);
        this.listeners.emit({ type: "peripheralConnected", peripheralId });
      })
      .catch((error: unknown) => {
        this.listeners.emit({
          type: "peripheralConnectFailed",
          peripheralId,
          error: describeError(error),
        });
      });
  }

  cancelConnection(peripheralId: string): void {
    this.acquiring.get(peripheralId)?.reject(new Error("Connection cancelled"));
    this.acquiring.delete(peripheralId);
    const peripheral = this.peripherals.get(peripheralId);
    if (!peripheral) return;
    if (peripheral.state === "disconnected") {
      this.listeners.emit({ type: "peripheralDisconnected", peripheralId, error: null });
      return;
    }
    this.run("disconnect", () => peripheral.disconnectAsync());
  }

  // ============================================================================
  // GATT
  // ============================================================================

  discoverServices(peripheralId: string, serviceUuids: string[]): void {
    const peripheral = this.peripherals.get(peripheralId);
    if (!peripheral) {
      this.emitServices(peripheralId, [], "Unknown peripheral");
      return;
    }
    peripheral
      .discoverServicesAsync(serviceUuids.map(normalizeUuid))
      .then((services) => {
        for (const service of services) {
          this.services.set(this.key(peripheralId, service.uuid), service);
        }
        this.emitServices(peripheralId, services.map((s) => s.uuid), null);
      })
      .catch((error: unknown) => this.emitServices(peripheralId, [], describeError(error)));
  }

  discoverCharacteristics(
    peripheralId: string,
    serviceUuid: string,
    characteristicUuids: string[],
  ): void {
    const emit = (uuids: string[], error: string | null) =>
      this.listeners.emit({
        type: "characteristicsDiscovered",
        peripheralId,
        serviceUuid,
        characteristicUuids: uuids,
        error,
      });

    const service = this.services.get(this.key(peripheralId, serviceUuid));
    if (!service) {
      emit([], "Service not discovered");
      return;
    }
    service
      .discoverCharacteristicsAsync(characteristicUuids.map(normalizeUuid))
      .then((characteristics) => {
        for (const characteristic of characteristics) {
          this.characteristics.set(this.key(peripheralId, characteristic.uuid), characteristic);
        }
        emit(characteristics.map((c) => c.uuid), null);
      })
      .catch((error: unknown) => emit([], describeError(error)));
  }

  setNotify(
    peripheralId: string,
    _serviceUuid: string,
    characteristicUuid: string,
    enabled: boolean,
  ): void {
    const emit = (error: string | null) =>
      this.listeners.emit({
        type: "notificationStateChanged",
        peripheralId,
        characteristicUuid,
        enabled: error ? false : enabled,
        error,
      });

    const key = this.key(peripheralId, characteristicUuid);
    const characteristic = this.characteristics.get(key);
    if (!characteristic) {
      emit("Characteristic not discovered");
      return;
    }

    if (enabled && !this.dataHandlers.has(key)) {
      const handler = (data: Buffer) =>
        this.listeners.emit({
          type: "valueUpdated",
          peripheralId,
          characteristicUuid,
          value: new Uint8Array(data),
        });
      this.dataHandlers.set(key, handler);
      characteristic.on("data", handler);
    }

    const task = enabled ? characteristic.subscribeAsync() : characteristic.unsubscribeAsync();
    task
      .then(() => emit(null))
      .catch((error: unknown) => emit(describeError(error)));
  }

  write(
    peripheralId: string,
    _serviceUuid: string,
    characteristicUuid: string,
    data: Uint8Array,
  ): void {
    const emit = (error: string | null) =>
      this.listeners.emit({ type: "valueWritten", peripheralId, characteristicUuid, error });

    const characteristic = this.characteristics.get(this.key(peripheralId, characteristicUuid));
    if (!characteristic) {
      emit("Characteristic not discovered");
      return;
    }
    characteristic
      .writeAsync(Buffer.from(data), false)
      .then(() => emit(null))
      .catch((error: unknown) => emit(describeError(error)));
  }

  maximumWriteLength(peripheralId: string): number {
    const mtu = this.peripherals.get(peripheralId)?.mtu;
    return mtu ? mtu - ATT_WRITE_OVERHEAD : BleConfig.DEFAULT_WRITE_LENGTH;
  }

  destroy(): void {
    this.noble.removeListener("stateChange", this.onStateChange);
    this.noble.removeListener("discover", this.onDiscover);
    for (const pending of this.acquiring.values()) pending.reject(new Error("Central destroyed"));
    this.acquiring.clear();
    this.listeners.clear();
    if (this.scanning) this.run("stopScan", () => this.noble.stopScanningAsync());
    this.scanning = false;
  }

  // ============================================================================
  // NOBLE EVENTS
  // ============================================================================

  private handleStateChange(raw: string): void {
    const state = toAdapterState(raw);
    this.log.info(`Adapter ${state}`);
    this.state = state;
    this.listeners.emit({ type: "adapterStateChanged", state });
    if (state === "poweredOn") {
      this.checkRestore();
      if (this.acquiring.size > 0) this.scanForPending();
    }
  }

  private handleDiscover(peripheral: NoblePeripheral): void {
    this.peripherals.set(peripheral.id, peripheral);
    const pending = this.acquiring.get(peripheral.id);
    if (pending) {
      this.acquiring.delete(peripheral.id);
      pending.resolve(peripheral);
      if (this.acquiring.size === 0 && !this.scanning) {
        this.run("stopScan", () => this.noble.stopScanningAsync());
      }
    }
    if (!this.scanning) return;
    this.listeners.emit({
      type: "peripheralDiscovered",
      peripheral: {
        id: peripheral.id,
        name: peripheral.advertisement.localName ?? null,
        rssi: peripheral.rssi,
      },
    });
  }

  private handleDisconnect(peripheralId: string): void {
    for (const key of [...this.characteristics.keys()]) {
      if (!key.startsWith(`${peripheralId}/`)) continue;
      const handler = this.dataHandlers.get(key);
      if (handler) this.characteristics.get(key)?.removeListener("data", handler);
      this.dataHandlers.delete(key);
      this.characteristics.delete(key);
    }
    for (const key of [...this.services.keys()]) {
      if (key.startsWith(`${peripheralId}/`)) this.services.delete(key);
    }
    this.listeners.emit({ type: "peripheralDisconnected", peripheralId, error: null });
  }

  // ============================================================================
  // RESTORATION
  // ============================================================================

  private checkRestore(): void {
    if (this.restoreChecked || !this.preferences) return;
    this.restoreChecked = true;
    const id = this.preferences.getItem(BleConfig.RESTORE_IDENTIFIER);
    if (typeof id !== "string" || id.length === 0) return;
    this.log.info(`Restoring peripheral ${id}`);
    const known = this.peripherals.get(id);
    this.listeners.emit({
      type: "stateRestored",
      peripherals: [
        {
          id,
          name: known?.advertisement.localName ?? null,
          connected: known?.state === "connected",
        },
      ],
    });
  }

  private remember(peripheralId: string): void {
    this.preferences?.setItem(BleConfig.RESTORE_IDENTIFIER, peripheralId);
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  /**
   * Resolve a peripheral by id, scanning for it when this process has not
   * seen it yet (e.g. a restored id).
   */
  private acquire(peripheralId: string): Promise<NoblePeripheral> {
    const known = this.peripherals.get(peripheralId);
    if (known) return Promise.resolve(known);
    const existing = this.acquiring.get(peripheralId);
    if (existing) return existing.promise;

    const pending = new Completion<NoblePeripheral>();
    this.acquiring.set(peripheralId, pending);
    this.log.info(`Scanning for ${peripheralId}`);
    if (this.state === "poweredOn") this.scanForPending();
    return pending.promise;
  }

  private scanForPending(): void {
    this.run("startScan", () =>
      this.noble.startScanningAsync([normalizeUuid(BleConfig.SERVICE_UUID)], false),
    );
  }

  private emitServices(peripheralId: string, serviceUuids: string[], error: string | null): void {
    this.listeners.emit({ type: "servicesDiscovered", peripheralId, serviceUuids, error });
  }

  private key(peripheralId: string, uuid: string): string {
    return `${peripheralId}/${normalizeUuid(uuid)}`;
  }

  private run(label: string, task: () => Promise<void>): void {
    task().catch((error: unknown) => {
      this.log.error(`${label} failed: ${describeError(error)}`);
    });
  }
}
