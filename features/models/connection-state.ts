export type ConnectionState =
  | { status: "disconnected" }
  | { status: "connecting" }
  | { status: "connected" }
  | { status: "error"; message: string };

export const Disconnected: ConnectionState = Object.freeze({ status: "disconnected" });
export const Connecting: ConnectionState = Object.freeze({ status: "connecting" });
export const Connected: ConnectionState = Object.freeze({ status: "connected" });

export function errorState(message: string): ConnectionState {
  return { status: "error", message };
}

export function isConnected(state: ConnectionState): boolean {
  return state.status === "connected";
}

export function sameConnectionState(a: ConnectionState, b: ConnectionState): boolean {
  if (a.status === "error" && b.status === "error") return a.message === b.message;
  return a.status === b.status;
}

export function describeConnectionState(state: ConnectionState): string {
  switch (state.status) {
    case "disconnected":
      return "Disconnected";
    case "connecting":
      return "Connecting...";
    case "connected":
      return "Connected";
    case "error":
      return `Error: ${state.message}`;
  }
}
