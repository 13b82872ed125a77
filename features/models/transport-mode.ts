export type TransportMode = "bluetooth" | "lan";

export function isTransportMode(value: unknown): value is TransportMode {
  return value === "bluetooth" || value === "lan";
}

export function transportModeName(mode: TransportMode): string {
  return mode === "bluetooth" ? "Bluetooth" : "Local Network";
}
