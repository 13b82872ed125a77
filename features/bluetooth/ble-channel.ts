/**
 * BLE channel.
 *
 * Central-side GATT client for the relay peripheral. `connect()` walks
 * connect → discover service → discover characteristic → subscribe, and
 * only resolves once notifications are enabled. Payloads are written as a
 * newline-terminated JSON frame, chunked to the link's maximum write length,
 * one acknowledged write at a time.
 *
 * Platform events are drained through a serial queue so every state change
 * happens in delivery order.
 */

import { BleConfig } from "@/constants/transport";
import {
  Connected,
  Connecting,
  Disconnected,
  errorState,
  sameConnectionState,
  type ConnectionState,
  type LocationPayload,
} from "@/features/models";
import { scopedLog, type LogSink, type Logger } from "@/features/logging";
import type { LocationRequestHandler, TransportChannel } from "@/features/transport/channel";
import { Completion } from "@/features/transport/completion";
import { describeError, TransportError } from "@/features/transport/errors";
import { ListenerSet } from "@/features/transport/listener-set";
import { SerialQueue } from "@/features/transport/serial-queue";
import {
  uuidsEqual,
  type AdapterState,
  type BleCentral,
  type BleCentralEvent,
  type DiscoveredPeripheral,
} from "./ble-central";
import { chunkFrame, frameForWrite, isLocationRequestSignal } from "./ble-framing";

export interface BleChannelOptions {
  central: BleCentral;
  log: LogSink;
  connectionTimeoutMs?: number;
}

const ADAPTER_ERRORS: Partial<Record<AdapterState, string>> = {
  poweredOff: "Bluetooth is turned off",
  unauthorized: "Bluetooth access not authorized",
  unsupported: "Bluetooth not supported",
};

export class BleChannel implements TransportChannel {
  onLocationRequest: LocationRequestHandler | null = null;

  private readonly central: BleCentral;
  private readonly log: Logger;
  private readonly connectionTimeoutMs: number;

  private state: ConnectionState = Disconnected;
  private readonly stateListeners: ListenerSet<ConnectionState>;
  private readonly discoveryListeners: ListenerSet<DiscoveredPeripheral>;

  // Scanning
  private scanning = false;
  private discovered: DiscoveredPeripheral[] = [];

  // Link
  private peripheralId: string | null = null;
  private subscribed = false;
  // True between the platform link coming up and it going down or being cancelled.
  private linkUp = false;
  private pendingConnect: Completion<void> | null = null;
  private pendingWrite: Completion<void> | null = null;
  private connectionTimeoutId: ReturnType<typeof setTimeout> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();
  // Bumped on every teardown so writes started before it never report success.
  private generation = 0;

  private readonly events: SerialQueue<BleCentralEvent>;
  private unsubscribeCentral: (() => void) | null;

  constructor(options: BleChannelOptions) {
    this.central = options.central;
    this.log = scopedLog(options.log, "BLE");
    this.connectionTimeoutMs = options.connectionTimeoutMs ?? BleConfig.CONNECTION_TIMEOUT_MS;
    this.stateListeners = new ListenerSet(this.log);
    this.discoveryListeners = new ListenerSet(this.log);
    this.events = new SerialQueue(
      (event) => this.handleEvent(event),
      (error, event) => this.log.error(`Failed to handle ${event.type}: ${describeError(error)}`),
    );
    this.unsubscribeCentral = this.central.addEventListener((event) => this.events.push(event));
  }

  // ============================================================================
  // STATE ACCESS
  // ============================================================================

  getConnectionState(): ConnectionState {
    return this.state;
  }

  onConnectionStateChange(listener: (state: ConnectionState) => void): () => void {
    return this.stateListeners.add(listener);
  }

  onPeripheralDiscovered(listener: (peripheral: DiscoveredPeripheral) => void): () => void {
    return this.discoveryListeners.add(listener);
  }

  getDiscoveredPeripherals(): readonly DiscoveredPeripheral[] {
    return this.discovered;
  }

  getSelectedPeripheralId(): string | null {
    return this.peripheralId;
  }

  isScanning(): boolean {
    return this.scanning;
  }

  /** Resolves once every platform event received so far has been handled. */
  settle(): Promise<void> {
    return this.events.drain();
  }

  // ============================================================================
  // SCANNING
  // ============================================================================

  startScanning(): boolean {
    if (this.central.adapterState !== "poweredOn") {
      this.log.warn(`Cannot scan, adapter is ${this.central.adapterState}`);
      return false;
    }
    this.discovered = [];
    this.scanning = true;
    this.log.info("Scanning for BLE peripherals");
    this.central.startScan([BleConfig.SERVICE_UUID]);
    return true;
  }

  stopScanning(): void {
    if (!this.scanning) return;
    this.central.stopScan();
    this.scanning = false;
    this.log.debug("Scan stopped");
  }

  // ============================================================================
  // CONNECTION
  // ============================================================================

  selectPeripheral(peripheralId: string): void {
    this.peripheralId = peripheralId;
  }

  /** Select `peripheralId` and connect to it. */
  connectTo(peripheralId: string): Promise<void> {
    if (this.pendingConnect) {
      return Promise.reject(new TransportError("CONNECT_IN_PROGRESS"));
    }
    this.selectPeripheral(peripheralId);
    return this.connect();
  }

  async connect(): Promise<void> {
    if (this.pendingConnect) throw new TransportError("CONNECT_IN_PROGRESS");
    const peripheralId = this.peripheralId;
    if (!peripheralId) throw TransportError.connectionFailed("No peripheral selected");
    if (this.state.status === "connected") return;

    const adapterError = ADAPTER_ERRORS[this.central.adapterState];
    if (adapterError) {
      this.setState(errorState(adapterError));
      throw TransportError.connectionFailed(adapterError);
    }

    this.stopScanning();
    this.subscribed = false;
    this.setState(Connecting);

    const completion = new Completion<void>();
    this.pendingConnect = completion;
    this.connectionTimeoutId = setTimeout(
      () => this.handleConnectionTimeout(peripheralId),
      this.connectionTimeoutMs,
    );
    this.log.info(`Connecting to ${this.describePeripheral(peripheralId)}...`);
    this.central.connect(peripheralId);

    try {
      await completion.promise;
    } finally {
      if (this.pendingConnect === completion) {
        this.pendingConnect = null;
        this.clearConnectionTimeout();
      }
    }
  }

  disconnect(): void {
    this.generation++;
    this.clearConnectionTimeout();
    const peripheralId = this.peripheralId;
    this.pendingConnect?.reject(TransportError.connectionFailed("Disconnected"));
    this.pendingConnect = null;
    this.pendingWrite?.reject(TransportError.notConnected());
    this.pendingWrite = null;
    if (peripheralId) {
      this.central.cancelConnection(peripheralId);
      this.log.info("Disconnecting");
    }
    this.peripheralId = null;
    this.subscribed = false;
    this.linkUp = false;
    this.setState(Disconnected);
  }

  /** Disconnect and release the platform central. */
  dispose(): void {
    this.stopScanning();
    this.disconnect();
    this.unsubscribeCentral?.();
    this.unsubscribeCentral = null;
    this.stateListeners.clear();
    this.discoveryListeners.clear();
    this.central.destroy();
  }

  // ============================================================================
  // SENDING
  // ============================================================================

  /**
   * Queue `payload` for transmission. Sends are serialized: a frame's chunks
   * are never interleaved with another frame's.
   */
  send(payload: LocationPayload): Promise<void> {
    if (!this.peripheralId || !this.subscribed || this.state.status !== "connected") {
      return Promise.reject(TransportError.notConnected());
    }
    const generation = this.generation;
    const frame = frameForWrite(payload);
    const run = this.writeQueue.then(() => this.writeFrame(frame, generation));
    // Failures reach the caller through `run`; the queue only orders writes.
    this.writeQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async writeFrame(frame: Uint8Array, generation: number): Promise<void> {
    const peripheralId = this.peripheralId;
    if (!peripheralId || generation !== this.generation) throw TransportError.notConnected();

    const maxLength = this.central.maximumWriteLength(peripheralId);
    const chunks = chunkFrame(frame, maxLength);
    this.log.debug(`Writing ${frame.length} bytes in ${chunks.length} chunk(s) of <= ${maxLength}`);

    for (const chunk of chunks) {
      if (generation !== this.generation) throw TransportError.notConnected();
      const write = new Completion<void>();
      this.pendingWrite = write;
      this.central.write(
        peripheralId,
        BleConfig.SERVICE_UUID,
        BleConfig.CHARACTERISTIC_UUID,
        chunk,
      );
      try {
        await write.promise;
      } finally {
        if (this.pendingWrite === write) this.pendingWrite = null;
      }
    }
    if (generation !== this.generation) throw TransportError.notConnected();
  }

  // ============================================================================
  // PLATFORM EVENTS
  // ============================================================================

  private handleEvent(event: BleCentralEvent): void {
    switch (event.type) {
      case "adapterStateChanged":
        this.handleAdapterState(event.state);
        return;
      case "peripheralDiscovered":
        this.handleDiscovered(event.peripheral);
        return;
      case "stateRestored":
        this.handleStateRestored(event.peripherals);
        return;
    }

    if (event.peripheralId !== this.peripheralId) {
      this.log.debug(`Ignoring ${event.type} from ${event.peripheralId}`);
      return;
    }

    switch (event.type) {
      case "peripheralConnected":
        this.linkUp = true;
        this.log.info(`Connected to ${this.describePeripheral(event.peripheralId)}`);
        this.central.discoverServices(event.peripheralId, [BleConfig.SERVICE_UUID]);
        break;
      case "peripheralConnectFailed":
        this.log.error(`Connection failed: ${event.error}`);
        this.failConnection(event.error);
        break;
      case "peripheralDisconnected":
        this.handleDisconnected(event.error);
        break;
      case "servicesDiscovered":
        this.handleServicesDiscovered(event.peripheralId, event.serviceUuids, event.error);
        break;
      case "characteristicsDiscovered":
        this.handleCharacteristicsDiscovered(
          event.peripheralId,
          event.serviceUuid,
          event.characteristicUuids,
          event.error,
        );
        break;
      case "notificationStateChanged":
        this.handleNotificationState(event.enabled, event.error);
        break;
      case "valueUpdated":
        if (uuidsEqual(event.characteristicUuid, BleConfig.CHARACTERISTIC_UUID)) {
          this.handleNotification(event.value);
        }
        break;
      case "valueWritten":
        this.handleValueWritten(event.error);
        break;
    }
  }

  private handleAdapterState(adapterState: AdapterState): void {
    this.log.debug(`Adapter state: ${adapterState}`);
    const message = ADAPTER_ERRORS[adapterState];
    if (!message) return;
    this.scanning = false;
    this.subscribed = false;
    this.linkUp = false;
    this.clearConnectionTimeout();
    this.pendingConnect?.reject(TransportError.connectionFailed(message));
    this.pendingWrite?.reject(TransportError.sendFailed(message));
    this.setState(errorState(message));
  }

  private handleDiscovered(peripheral: DiscoveredPeripheral): void {
    if (!this.scanning) return;
    if (this.discovered.some((p) => p.id === peripheral.id)) return;
    this.log.debug(`Discovered: ${peripheral.name ?? "Unknown"} (RSSI: ${peripheral.rssi})`);
    this.discovered = [...this.discovered, peripheral];
    this.discoveryListeners.emit(peripheral);
  }

  private handleStateRestored(
    peripherals: { id: string; name: string | null; connected: boolean }[],
  ): void {
    const restored = peripherals[0];
    if (!restored) return;
    this.log.info(`Restored peripheral ${restored.name ?? restored.id}`);
    this.peripheralId = restored.id;
    if (restored.connected && this.state.status !== "connected") {
      this.linkUp = true;
      this.subscribed = false;
      this.setState(Connecting);
      this.central.discoverServices(restored.id, [BleConfig.SERVICE_UUID]);
    }
  }

  private handleDisconnected(error: string | null): void {
    if (!this.linkUp) {
      this.log.debug("Link already released");
      return;
    }
    this.linkUp = false;
    this.log.warn(error ? `Disconnected from peripheral: ${error}` : "Disconnected from peripheral");
    this.generation++;
    this.subscribed = false;
    this.clearConnectionTimeout();
    this.pendingConnect?.reject(TransportError.connectionFailed(error ?? "Peripheral disconnected"));
    this.pendingWrite?.reject(TransportError.notConnected());
    // A failed handshake keeps reporting its error rather than "disconnected".
    if (this.state.status !== "error") this.setState(Disconnected);
  }

  private handleServicesDiscovered(
    peripheralId: string,
    serviceUuids: string[],
    error: string | null,
  ): void {
    if (error) {
      this.failConnection(error);
      return;
    }
    if (!serviceUuids.some((uuid) => uuidsEqual(uuid, BleConfig.SERVICE_UUID))) {
      this.failConnection("Relay service not found");
      return;
    }
    this.central.discoverCharacteristics(peripheralId, BleConfig.SERVICE_UUID, [
      BleConfig.CHARACTERISTIC_UUID,
    ]);
  }

  private handleCharacteristicsDiscovered(
    peripheralId: string,
    serviceUuid: string,
    characteristicUuids: string[],
    error: string | null,
  ): void {
    if (error) {
      this.failConnection(error);
      return;
    }
    if (!characteristicUuids.some((uuid) => uuidsEqual(uuid, BleConfig.CHARACTERISTIC_UUID))) {
      this.failConnection("Relay characteristic not found");
      return;
    }
    this.central.setNotify(peripheralId, serviceUuid, BleConfig.CHARACTERISTIC_UUID, true);
  }

  private handleNotificationState(enabled: boolean, error: string | null): void {
    if (error) {
      this.log.error(`Failed to subscribe to notifications: ${error}`);
      this.failConnection(error);
      return;
    }
    if (!enabled || this.state.status !== "connecting") return;
    this.log.debug("Subscribed to notifications");
    this.subscribed = true;
    this.clearConnectionTimeout();
    this.setState(Connected);
    this.pendingConnect?.resolve();
  }

  private handleNotification(value: Uint8Array): void {
    if (!isLocationRequestSignal(value)) return;
    const handler = this.onLocationRequest;
    if (!handler) return;
    // Not awaited: the handler's own writes complete through this queue.
    handler().catch((error: unknown) => {
      this.log.error(`Location request handler failed: ${describeError(error)}`);
    });
  }

  private handleValueWritten(error: string | null): void {
    const write = this.pendingWrite;
    if (!write) return;
    this.pendingWrite = null;
    if (error) write.reject(TransportError.sendFailed(error));
    else write.resolve();
  }

  private handleConnectionTimeout(peripheralId: string): void {
    this.connectionTimeoutId = null;
    this.log.warn("Connection timeout");
    const linkUp = this.linkUp;
    this.failConnection("Connection timed out");
    // Still acquiring or connecting: stop that too.
    if (!linkUp) this.central.cancelConnection(peripheralId);
  }

  private failConnection(reason: string): void {
    this.clearConnectionTimeout();
    this.subscribed = false;
    this.setState(errorState(reason));
    this.pendingConnect?.reject(TransportError.connectionFailed(reason));
    this.releaseLink();
  }

  /** Drop a link whose handshake failed so the next connect starts clean. */
  private releaseLink(): void {
    const peripheralId = this.peripheralId;
    if (!this.linkUp || !peripheralId) return;
    this.linkUp = false;
    this.generation++;
    this.log.info("Releasing half-open link");
    this.central.cancelConnection(peripheralId);
  }

  private clearConnectionTimeout(): void {
    if (this.connectionTimeoutId) {
      clearTimeout(this.connectionTimeoutId);
      this.connectionTimeoutId = null;
    }
  }

  private setState(next: ConnectionState): void {
    if (sameConnectionState(this.state, next)) return;
    this.state = next;
    this.stateListeners.emit(next);
  }

  private describePeripheral(peripheralId: string): string {
    const found = this.discovered.find((p) => p.id === peripheralId);
    return found?.name ?? peripheralId;
  }
}
