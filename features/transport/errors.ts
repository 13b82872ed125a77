export type TransportErrorCode =
  | "NOT_CONNECTED"
  | "NOT_CONFIGURED"
  | "CONNECTION_FAILED"
  | "CONNECT_IN_PROGRESS"
  | "SEND_FAILED"
  | "INVALID_RESPONSE"
  | "CERTIFICATE_MISMATCH";

const MESSAGES: Record<TransportErrorCode, string> = {
  NOT_CONNECTED: "Not connected to server",
  NOT_CONFIGURED: "Transport not configured",
  CONNECTION_FAILED: "Connection failed",
  CONNECT_IN_PROGRESS: "Connect already in progress",
  SEND_FAILED: "Send failed",
  INVALID_RESPONSE: "Invalid response from server",
  CERTIFICATE_MISMATCH: "Server certificate does not match expected fingerprint",
};

export class TransportError extends Error {
  readonly code: TransportErrorCode;
  readonly reason: string | null;

  constructor(code: TransportErrorCode, reason?: string) {
    super(reason ? `${MESSAGES[code]}: ${reason}` : MESSAGES[code]);
    this.name = "TransportError";
    this.code = code;
    this.reason = reason ?? null;
  }

  static notConnected(): TransportError {
    return new TransportError("NOT_CONNECTED");
  }

  static connectionFailed(reason: string): TransportError {
    return new TransportError("CONNECTION_FAILED", reason);
  }

  static sendFailed(reason: string): TransportError {
    return new TransportError("SEND_FAILED", reason);
  }
}

export function isTransportError(
  error: unknown,
  code?: TransportErrorCode,
): error is TransportError {
  return error instanceof TransportError && (code === undefined || error.code === code);
}

/** Render any thrown value for a log line. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
