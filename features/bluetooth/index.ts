export { BleChannel } from "./ble-channel";
export { NobleCentral, loadNoble } from "./noble-central";
export { frameForWrite, chunkFrame, isLocationRequestSignal } from "./ble-framing";
export { normalizeUuid, uuidsEqual } from "./ble-central";

export type { BleChannelOptions } from "./ble-channel";
export type {
  Noble,
  NobleCentralOptions,
  NobleCharacteristic,
  NobleHost,
  NoblePeripheral,
  NobleService,
} from "./noble-central";
export type {
  AdapterState,
  BleCentral,
  BleCentralEvent,
  BleCentralListener,
  DiscoveredPeripheral,
  RestoredPeripheral,
} from "./ble-central";
