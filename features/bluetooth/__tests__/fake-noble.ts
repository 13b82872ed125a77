import { EventEmitter } from "node:events";
import { BleConfig } from "@/constants/transport";
import { normalizeUuid } from "../ble-central";
import type {
  NobleCharacteristic,
  NobleHost,
  NoblePeripheral,
  NobleService,
} from "../noble-central";

export class FakeCharacteristic extends EventEmitter implements NobleCharacteristic {
  readonly uuid: string;
  subscribed = false;
  readonly writes: Buffer[] = [];

  constructor(uuid: string = BleConfig.CHARACTERISTIC_UUID) {
    super();
    this.uuid = normalizeUuid(uuid);
  }

  async subscribeAsync(): Promise<void> {
    this.subscribed = true;
  }

  async unsubscribeAsync(): Promise<void> {
    this.subscribed = false;
  }

  async writeAsync(data: Buffer): Promise<void> {
    this.writes.push(Buffer.from(data));
  }
}

export class FakeService implements NobleService {
  readonly uuid: string;

  constructor(
    readonly characteristics: FakeCharacteristic[] = [new FakeCharacteristic()],
    uuid: string = BleConfig.SERVICE_UUID,
  ) {
    this.uuid = normalizeUuid(uuid);
  }

  async discoverCharacteristicsAsync(uuids: string[]): Promise<NobleCharacteristic[]> {
    return this.characteristics.filter((c) => uuids.includes(c.uuid));
  }
}

/** A peripheral that, like noble's, refuses to connect twice. */
export class FakePeripheral extends EventEmitter implements NoblePeripheral {
  state = "disconnected";
  mtu: number | null = null;
  rssi = -60;
  advertisement: { localName?: string };
  services: FakeService[] = [new FakeService()];
  connectCalls = 0;

  constructor(
    readonly id: string,
    localName?: string,
  ) {
    super();
    this.advertisement = { localName };
  }

  async connectAsync(): Promise<void> {
    if (this.state === "connected") throw new Error("Peripheral already connected");
    this.connectCalls++;
    this.state = "connected";
  }

  async disconnectAsync(): Promise<void> {
    this.state = "disconnected";
    this.emit("disconnect");
  }

  async discoverServicesAsync(uuids: string[]): Promise<NobleService[]> {
    return this.services.filter((s) => uuids.includes(s.uuid));
  }
}

/** In-process stand-in for the noble module. */
export class FakeNoble extends EventEmitter implements NobleHost {
  state = "poweredOn";
  readonly scans: string[][] = [];
  stopCount = 0;

  async startScanningAsync(serviceUuids: string[]): Promise<void> {
    this.scans.push(serviceUuids);
  }

  async stopScanningAsync(): Promise<void> {
    this.stopCount++;
  }

  powerOn(): void {
    this.state = "poweredOn";
    this.emit("stateChange", "poweredOn");
  }

  discover(peripheral: FakePeripheral): void {
    this.emit("discover", peripheral);
  }
}
