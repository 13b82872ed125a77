/**
 * LAN channel: HTTPS to a relay server on the local network.
 *
 * `connect()` checks `/status`, then `/request` is polled right away and
 * on a fixed interval after each poll; a body containing "request" asks for a position. Payloads are
 * POSTed to `/submit`. Poll failures never change the connection state.
 */

import { LanConfig } from "@/constants/transport";
import { scopedLog, type LogSink, type Logger } from "@/features/logging";
import {
  baseUrl,
  Connected,
  Connecting,
  Disconnected,
  encodeLocationPayload,
  errorState,
  sameConnectionState,
  type ConnectionState,
  type LocationPayload,
  type ServerInfo,
} from "@/features/models";
import type { LocationRequestHandler, TransportChannel } from "@/features/transport/channel";
import { describeError, isTransportError, TransportError } from "@/features/transport/errors";
import { ListenerSet } from "@/features/transport/listener-set";
import { isSuccessStatus, type ServerClient } from "./server-client";

export interface LanChannelOptions {
  server: ServerInfo;
  client: ServerClient;
  log: LogSink;
  pollIntervalMs?: number;
}

export class LanChannel implements TransportChannel {
  onLocationRequest: LocationRequestHandler | null = null;

  readonly server: ServerInfo;
  private readonly client: ServerClient;
  private readonly log: Logger;
  private readonly pollIntervalMs: number;

  private state: ConnectionState = Disconnected;
  private readonly stateListeners: ListenerSet<ConnectionState>;

  private abort: AbortController | null = null;
  private pollTimer: ReturnType<typeof setTimeout> | null = null;
  private pendingConnect: number | null = null;
  private pollFailures = 0;
  // Bumped on every teardown; work from an older generation is dropped.
  private generation = 0;

  constructor(options: LanChannelOptions) {
    this.server = options.server;
    this.client = options.client;
    this.log = scopedLog(options.log, "LAN");
    this.pollIntervalMs = options.pollIntervalMs ?? LanConfig.REQUEST_POLL_INTERVAL_MS;
    this.stateListeners = new ListenerSet(this.log);
  }

  getConnectionState(): ConnectionState {
    return this.state;
  }

  onConnectionStateChange(listener: (state: ConnectionState) => void): () => void {
    return this.stateListeners.add(listener);
  }

  /** Failed polls since the last successful one. */
  get consecutivePollFailures(): number {
    return this.pollFailures;
  }

  async connect(): Promise<void> {
    if (this.pendingConnect !== null) throw new TransportError("CONNECT_IN_PROGRESS");
    if (this.state.status === "connected") return;

    this.stopPolling();
    const generation = ++this.generation;
    const controller = new AbortController();
    this.abort = controller;
    this.pendingConnect = generation;
    this.pollFailures = 0;
    this.setState(Connecting);
    this.log.info(`Connecting to ${baseUrl(this.server)}...`);

    try {
      const res = await this.client.request("GET", LanConfig.STATUS_PATH, {
        signal: controller.signal,
      });
      if (generation !== this.generation) throw TransportError.connectionFailed("Disconnected");
      if (!isSuccessStatus(res.status)) {
        throw TransportError.connectionFailed(`Server returned ${res.status}`);
      }
      this.setState(Connected);
      this.log.info(`Connected to ${this.server.name}`);
      this.startPoll(generation);
    } catch (error) {
      if (generation !== this.generation) {
        throw isTransportError(error) ? error : TransportError.connectionFailed("Disconnected");
      }
      const failure = isTransportError(error)
        ? error
        : TransportError.connectionFailed(describeError(error));
      this.log.error(`Connection failed: ${failure.message}`);
      this.setState(errorState(failure.reason ?? failure.message));
      throw failure;
    } finally {
      if (this.pendingConnect === generation) this.pendingConnect = null;
    }
  }

  disconnect(): void {
    this.generation++;
    this.pendingConnect = null;
    this.stopPolling();
    if (this.state.status !== "disconnected") this.log.info("Disconnecting");
    this.setState(Disconnected);
  }

  dispose(): void {
    this.disconnect();
    this.stateListeners.clear();
    this.client.close().catch((error: unknown) => {
      this.log.warn(`Failed to close client: ${describeError(error)}`);
    });
  }

  async send(payload: LocationPayload): Promise<void> {
    if (this.state.status !== "connected") throw TransportError.notConnected();
    const generation = this.generation;

    let status: number;
    try {
      const res = await this.client.request("POST", LanConfig.SUBMIT_PATH, {
        body: encodeLocationPayload(payload),
        signal: this.abort?.signal,
      });
      status = res.status;
    } catch (error) {
      if (generation !== this.generation) throw TransportError.notConnected();
      throw isTransportError(error) ? error : TransportError.sendFailed(describeError(error));
    }
    if (!isSuccessStatus(status)) throw TransportError.sendFailed(`Server returned ${status}`);
    this.log.debug("Location submitted");
  }

  // ============================================================================
  // POLLING
  // ============================================================================

  private schedulePoll(generation: number): void {
    this.pollTimer = setTimeout(() => {
      this.pollTimer = null;
      this.startPoll(generation);
    }, this.pollIntervalMs);
  }

  private startPoll(generation: number): void {
    this.poll(generation).catch((error: unknown) => {
      this.log.error(`Poll loop stopped: ${describeError(error)}`);
    });
  }

  private async poll(generation: number): Promise<void> {
    if (generation !== this.generation) return;
    let requested = false;
    try {
      const res = await this.client.request("GET", LanConfig.REQUEST_PATH, {
        signal: this.abort?.signal,
      });
      if (generation !== this.generation) return;
      if (!isSuccessStatus(res.status)) throw new Error(`Server returned ${res.status}`);
      this.pollFailures = 0;
      requested = res.text.toLowerCase().includes("request");
    } catch (error) {
      if (generation !== this.generation) return;
      this.pollFailures++;
      this.log.warn(`Poll failed (${this.pollFailures} in a row): ${describeError(error)}`);
    }

    const handler = this.onLocationRequest;
    if (requested && handler) {
      this.log.info("Server requested location");
      try {
        await handler();
      } catch (error) {
        this.log.error(`Location request handler failed: ${describeError(error)}`);
      }
    }

    if (generation === this.generation && this.state.status === "connected") {
      this.schedulePoll(generation);
    }
  }

  private stopPolling(): void {
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    this.abort?.abort();
    this.abort = null;
  }

  private setState(next: ConnectionState): void {
    if (sameConnectionState(this.state, next)) return;
    this.state = next;
    this.stateListeners.emit(next);
  }
}
