/**
 * Transport manager.
 *
 * Owns the active channel for the chosen mode, republishes its connection
 * state and answers the server's location requests by reading a position
 * and sending it back through the same channel.
 */

import type { BleChannel } from "@/features/bluetooth/ble-channel";
import { isLocationError, type LocationService } from "@/features/location";
import { scopedLog, type LogSink, type Logger } from "@/features/logging";
import {
  createLocationPayload,
  Disconnected,
  errorState,
  sameConnectionState,
  type ConnectionState,
  type ServerInfo,
  type TransportMode,
} from "@/features/models";
import type { TransportChannel } from "./channel";
import { describeError, isTransportError, TransportError } from "./errors";
import { ListenerSet } from "./listener-set";

export interface ChannelFactory {
  createBluetoothChannel(): BleChannel;
  createLanChannel(server: ServerInfo): TransportChannel;
}

export interface ManagerError {
  code: string;
  message: string;
  timestamp: number;
}

export interface TransportManagerState {
  mode: TransportMode | null;
  serverInfo: ServerInfo | null;
  connectionState: ConnectionState;
  submissionCount: number;
  lastSubmissionAt: number | null;
  lastError: ManagerError | null;
}

export type TransportManagerEvent =
  | { type: "configured"; mode: TransportMode; serverInfo: ServerInfo | null }
  | { type: "connectionStateChanged"; state: ConnectionState }
  | { type: "locationSubmitted"; count: number; timestamp: number }
  | { type: "error"; error: ManagerError };

export type TransportEventListener = (event: TransportManagerEvent) => void;

export interface TransportManagerOptions {
  channels: ChannelFactory;
  location: LocationService;
  log: LogSink;
  now?: () => number;
}

function errorCode(error: unknown): string {
  if (isTransportError(error) || isLocationError(error)) return error.code;
  return "UNKNOWN";
}

export class TransportManager {
  private readonly channels: ChannelFactory;
  private readonly location: LocationService;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly listeners: ListenerSet<TransportManagerEvent>;

  private channel: TransportChannel | null = null;
  private bluetooth: BleChannel | null = null;
  private unsubscribeChannel: (() => void) | null = null;

  private state: TransportManagerState = {
    mode: null,
    serverInfo: null,
    connectionState: Disconnected,
    submissionCount: 0,
    lastSubmissionAt: null,
    lastError: null,
  };

  constructor(options: TransportManagerOptions) {
    this.channels = options.channels;
    this.location = options.location;
    this.log = scopedLog(options.log, "Transport");
    this.now = options.now ?? Date.now;
    this.listeners = new ListenerSet(this.log);
  }

  // ============================================================================
  // STATE ACCESS
  // ============================================================================

  getState(): TransportManagerState {
    return { ...this.state };
  }

  get connectionState(): ConnectionState {
    return this.state.connectionState;
  }

  get isConfigured(): boolean {
    return this.channel !== null;
  }

  addEventListener(listener: TransportEventListener): () => void {
    return this.listeners.add(listener);
  }

  /** The BLE channel, for peripheral scanning and selection. Null in LAN mode. */
  getBluetoothChannel(): BleChannel | null {
    return this.bluetooth;
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  configure(mode: TransportMode, serverInfo?: ServerInfo | null): void {
    this.teardown();
    this.state.mode = mode;
    this.state.serverInfo = serverInfo ?? null;

    let channel: TransportChannel;
    if (mode === "lan") {
      if (!serverInfo) {
        this.log.error("LAN mode requires a server");
        this.setConnectionState(errorState("No server info provided"));
        return;
      }
      channel = this.channels.createLanChannel(serverInfo);
    } else {
      const bluetooth = this.channels.createBluetoothChannel();
      this.bluetooth = bluetooth;
      channel = bluetooth;
    }

    this.attach(channel);
    this.log.info(
      serverInfo && mode === "lan"
        ? `Configured for LAN (${serverInfo.host}:${serverInfo.port})`
        : "Configured for Bluetooth",
    );
    this.setConnectionState(channel.getConnectionState());
    this.emit({ type: "configured", mode, serverInfo: this.state.serverInfo });
  }

  async connect(): Promise<void> {
    const channel = this.channel;
    if (!channel) throw new TransportError("NOT_CONFIGURED");
    await channel.connect();
  }

  disconnect(): void {
    this.teardown();
    this.setConnectionState(Disconnected);
  }

  /** Read a position now and send it; errors reach the caller. */
  async sendCurrentLocation(): Promise<void> {
    const channel = this.channel;
    if (!channel) throw new TransportError("NOT_CONFIGURED");
    await this.submitLocation(channel);
  }

  destroy(): void {
    this.teardown();
    this.listeners.clear();
  }

  // ============================================================================
  // CHANNEL WIRING
  // ============================================================================

  private attach(channel: TransportChannel): void {
    this.channel = channel;
    this.unsubscribeChannel = channel.onConnectionStateChange((state) => {
      if (this.channel !== channel) return;
      this.setConnectionState(state);
    });
    channel.onLocationRequest = () => this.handleLocationRequest(channel);
  }

  private teardown(): void {
    const channel = this.channel;
    this.unsubscribeChannel?.();
    this.unsubscribeChannel = null;
    this.channel = null;
    this.bluetooth = null;
    if (!channel) return;
    channel.onLocationRequest = null;
    channel.dispose();
  }

  private async handleLocationRequest(channel: TransportChannel): Promise<void> {
    this.log.info("Location requested");
    try {
      await this.submitLocation(channel);
    } catch (error) {
      this.log.error(`Failed to answer location request: ${describeError(error)}`);
      this.handleError(errorCode(error), describeError(error));
    }
  }

  private async submitLocation(channel: TransportChannel): Promise<void> {
    const position = await this.location.requestPosition();
    await channel.send(createLocationPayload(position));
    if (this.channel !== channel) return;

    const timestamp = this.now();
    this.state.submissionCount++;
    this.state.lastSubmissionAt = timestamp;
    this.log.info(`Location sent (#${this.state.submissionCount})`);
    this.emit({ type: "locationSubmitted", count: this.state.submissionCount, timestamp });
  }

  private setConnectionState(next: ConnectionState): void {
    if (sameConnectionState(this.state.connectionState, next)) return;
    this.state.connectionState = next;
    this.emit({ type: "connectionStateChanged", state: next });
  }

  private handleError(code: string, message: string): void {
    const error = { code, message, timestamp: this.now() };
    this.state.lastError = error;
    this.emit({ type: "error", error });
  }

  private emit(event: TransportManagerEvent): void {
    this.listeners.emit(event);
  }
}
