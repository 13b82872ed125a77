export {
  createServerInfo,
  manualServerInfo,
  sameServer,
  serverKey,
  parsePaths,
  parseServerInfo,
  baseUrl,
} from "./server-info";
export { createPosition } from "./position";
export { createLocationPayload, encodeLocationPayload } from "./location-payload";
export {
  Disconnected,
  Connecting,
  Connected,
  errorState,
  isConnected,
  sameConnectionState,
  describeConnectionState,
} from "./connection-state";
export { isTransportMode, transportModeName } from "./transport-mode";

export type { ServerInfo } from "./server-info";
export type { Position, RawFix } from "./position";
export type { LocationPayload, CellTower, RadioType } from "./location-payload";
export type { ConnectionState } from "./connection-state";
export type { TransportMode } from "./transport-mode";
