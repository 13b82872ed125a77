import type { Position } from "./position";

export type RadioType = "gsm" | "wcdma" | "lte";

/** Serving or neighbouring cell observation. */
export interface CellTower {
  radioType?: RadioType;
  mobileCountryCode: number;
  mobileNetworkCode: number;
  locationAreaCode: number;
  cellId: number;
  age?: number;
  asu?: number;
}

/** Payload sent to the server: a position plus optional cell towers. */
export interface LocationPayload {
  position: Position;
  cell_towers?: CellTower[];
}

export function createLocationPayload(
  position: Position,
  cellTowers?: CellTower[],
): LocationPayload {
  return cellTowers ? { position, cell_towers: cellTowers } : { position };
}

export function encodeLocationPayload(payload: LocationPayload): string {
  return JSON.stringify(payload);
}
