/**
 * BLE central port.
 *
 * Commands are fire-and-forget; their outcomes arrive as `BleCentralEvent`s
 * on a single event stream, in the order the platform delivered them. The
 * noble adapter (`noble-central.ts`) implements this on Node; tests drive a
 * scripted fake.
 */

export type AdapterState =
  | "unknown"
  | "resetting"
  | "unsupported"
  | "unauthorized"
  | "poweredOff"
  | "poweredOn";

export interface DiscoveredPeripheral {
  id: string;
  name: string | null;
  rssi: number;
}

export interface RestoredPeripheral {
  id: string;
  name: string | null;
  connected: boolean;
}

export type BleCentralEvent =
  | { type: "adapterStateChanged"; state: AdapterState }
  | { type: "peripheralDiscovered"; peripheral: DiscoveredPeripheral }
  | { type: "peripheralConnected"; peripheralId: string }
  | { type: "peripheralConnectFailed"; peripheralId: string; error: string }
  | { type: "peripheralDisconnected"; peripheralId: string; error: string | null }
  | {
      type: "servicesDiscovered";
      peripheralId: string;
      serviceUuids: string[];
      error: string | null;
    }
  | {
      type: "characteristicsDiscovered";
      peripheralId: string;
      serviceUuid: string;
      characteristicUuids: string[];
      error: string | null;
    }
  | {
      type: "notificationStateChanged";
      peripheralId: string;
      characteristicUuid: string;
      enabled: boolean;
      error: string | null;
    }
  | {
      type: "valueUpdated";
      peripheralId: string;
      characteristicUuid: string;
      value: Uint8Array;
    }
  | {
      type: "valueWritten";
      peripheralId: string;
      characteristicUuid: string;
      error: string | null;
    }
  | { type: "stateRestored"; peripherals: RestoredPeripheral[] };

export type BleCentralListener = (event: BleCentralEvent) => void;

export interface BleCentral {
  readonly adapterState: AdapterState;

  addEventListener(listener: BleCentralListener): () => void;

  startScan(serviceUuids: string[]): void;
  stopScan(): void;

  connect(peripheralId: string): void;
  cancelConnection(peripheralId: string): void;

  discoverServices(peripheralId: string, serviceUuids: string[]): void;
  discoverCharacteristics(
    peripheralId: string,
    serviceUuid: string,
    characteristicUuids: string[],
  ): void;
  setNotify(
    peripheralId: string,
    serviceUuid: string,
    characteristicUuid: string,
    enabled: boolean,
  ): void;

  /** Acknowledged (with-response) write; completion arrives as `valueWritten`. */
  write(
    peripheralId: string,
    serviceUuid: string,
    characteristicUuid: string,
    data: Uint8Array,
  ): void;

  /** Largest value a single acknowledged write may carry on this link. */
  maximumWriteLength(peripheralId: string): number;

  destroy(): void;
}

/** Canonical form for UUID comparison: lowercase, no dashes. */
export function normalizeUuid(uuid: string): string {
  return uuid.replace(/-/g, "").toLowerCase();
}

export function uuidsEqual(a: string, b: string): boolean {
  return normalizeUuid(a) === normalizeUuid(b);
}
