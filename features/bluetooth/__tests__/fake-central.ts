import { BleConfig } from "@/constants/transport";
import type {
  AdapterState,
  BleCentral,
  BleCentralEvent,
  BleCentralListener,
} from "../ble-central";

export interface FakeCentralScript {
  /** Reply to every command with a matching success/failure event. */
  autoRespond: boolean;
  /** Acknowledge writes immediately (requires autoRespond). */
  autoAckWrites: boolean;
  connectError: string | null;
  serviceUuids: string[];
  serviceError: string | null;
  characteristicUuids: string[];
  characteristicError: string | null;
  notifyError: string | null;
  writeError: string | null;
  maxWriteLength: number;
}

export type FakeCommand =
  | { type: "startScan"; serviceUuids: string[] }
  | { type: "stopScan" }
  | { type: "connect"; peripheralId: string }
  | { type: "cancelConnection"; peripheralId: string }
  | { type: "discoverServices"; peripheralId: string }
  | { type: "discoverCharacteristics"; peripheralId: string }
  | { type: "setNotify"; peripheralId: string; enabled: boolean }
  | { type: "write"; peripheralId: string; data: Uint8Array }
  | { type: "destroy" };

/** Scripted in-process BleCentral. */
export class FakeCentral implements BleCentral {
  adapterState: AdapterState = "poweredOn";
  readonly commands: FakeCommand[] = [];
  readonly script: FakeCentralScript;
  private listeners = new Set<BleCentralListener>();

  constructor(script: Partial<FakeCentralScript> = {}) {
    this.script = {
      autoRespond: true,
      autoAckWrites: true,
      connectError: null,
      serviceUuids: [BleConfig.SERVICE_UUID],
      serviceError: null,
      characteristicUuids: [BleConfig.CHARACTERISTIC_UUID],
      characteristicError: null,
      notifyError: null,
      writeError: null,
      maxWriteLength: 20,
      ...script,
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  addEventListener(listener: BleCentralListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: BleCentralEvent): void {
    this.listeners.forEach((fn) => fn(event));
  }

  commandTypes(): string[] {
    return this.commands.map((c) => c.type);
  }

  writes(): Uint8Array[] {
    const out: Uint8Array[] = [];
    for (const c of this.commands) if (c.type === "write") out.push(c.data);
    return out;
  }

  startScan(serviceUuids: string[]): void {
    this.commands.push({ type: "startScan", serviceUuids });
  }

  stopScan(): void {
    this.commands.push({ type: "stopScan" });
  }

  connect(peripheralId: string): void {
    this.commands.push({ type: "connect", peripheralId });
    if (!this.script.autoRespond) return;
    if (this.script.connectError) {
      this.emit({ type: "peripheralConnectFailed", peripheralId, error: this.script.connectError });
    } else {
      this.emit({ type: "peripheralConnected", peripheralId });
    }
  }

  cancelConnection(peripheralId: string): void {
    this.commands.push({ type: "cancelConnection", peripheralId });
    if (this.script.autoRespond) {
      this.emit({ type: "peripheralDisconnected", peripheralId, error: null });
    }
  }

  discoverServices(peripheralId: string): void {
    this.commands.push({ type: "discoverServices", peripheralId });
    if (!this.script.autoRespond) return;
    this.emit({
      type: "servicesDiscovered",
      peripheralId,
      serviceUuids: this.script.serviceError ? [] : this.script.serviceUuids,
      error: this.script.serviceError,
    });
  }

  discoverCharacteristics(peripheralId: string, serviceUuid: string): void {
    this.commands.push({ type: "discoverCharacteristics", peripheralId });
    if (!this.script.autoRespond) return;
    this.emit({
      type: "characteristicsDiscovered",
      peripheralId,
      serviceUuid,
      characteristicUuids: this.script.characteristicError ? [] : this.script.characteristicUuids,
      error: this.script.characteristicError,
    });
  }

  setNotify(
    peripheralId: string,
    _serviceUuid: string,
    characteristicUuid: string,
    enabled: boolean,
  ): void {
    this.commands.push({ type: "setNotify", peripheralId, enabled });
    if (!this.script.autoRespond) return;
    this.emit({
      type: "notificationStateChanged",
      peripheralId,
      characteristicUuid,
      enabled: this.script.notifyError ? false : enabled,
      error: this.script.notifyError,
    });
  }

  write(
    peripheralId: string,
    _serviceUuid: string,
    characteristicUuid: string,
    data: Uint8Array,
  ): void {
    this.commands.push({ type: "write", peripheralId, data: Uint8Array.from(data) });
    if (!this.script.autoRespond || !this.script.autoAckWrites) return;
    this.emit({ type: "valueWritten", peripheralId, characteristicUuid, error: this.script.writeError });
  }

  maximumWriteLength(): number {
    return this.script.maxWriteLength;
  }

  destroy(): void {
    this.commands.push({ type: "destroy" });
    this.listeners.clear();
  }
}

export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.length;
  }
  return out;
}

/** Let queued promise callbacks run. */
export async function flushMicrotasks(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) await Promise.resolve();
}
