import type { ConnectionState, LocationPayload } from "@/features/models";

export type LocationRequestHandler = () => Promise<void>;

/**
 * Capability contract shared by the BLE and LAN channels.
 */
export interface TransportChannel {
  getConnectionState(): ConnectionState;

  /**
   * Subscribe to state transitions that happen after this call. Returns the
   * unsubscribe function.
   */
  onConnectionStateChange(listener: (state: ConnectionState) => void): () => void;

  /** Invoked whenever the server asks for a fresh position. */
  onLocationRequest: LocationRequestHandler | null;

  connect(): Promise<void>;

  /** Idempotent; always leaves the channel disconnected. */
  disconnect(): void;

  send(payload: LocationPayload): Promise<void>;

  /** Disconnect and release platform resources; the channel is not reused. */
  dispose(): void;
}
