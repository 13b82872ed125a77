import os from "node:os";
import path from "node:path";
import { LanConfig } from "@/constants/transport";
import { isLogLevel, type LogLevel } from "@/features/logging";
import { isTransportMode, type TransportMode } from "@/features/models";

type Env = Record<string, string | undefined>;

export interface RelayConfig {
  /** Directory holding `preferences.json`. */
  dataDir: string;
  logLevel: LogLevel;
  /**
   * Transport forced from the environment. Null keeps whatever the saved
   * settings say.
   */
  mode: TransportMode | null;
  host: string | null;
  port: number;
  /** Lowercase hex without separators; empty disables pinning. */
  fingerprint: string;
  blePeripheral: string | null;
  discover: boolean;
  locationAuthorized: boolean;
}

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

const FLAG_ON = ["1", "true", "yes", "on"];
const FLAG_OFF = ["0", "false", "no", "off"];

function readFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (FLAG_ON.includes(raw)) return true;
  if (FLAG_OFF.includes(raw)) return false;
  throw new ConfigError(name, `expected a boolean flag, got "${env[name]}"`);
}

function readString(env: Env, name: string): string | null {
  const raw = env[name]?.trim();
  return raw ? raw : null;
}

function readPort(env: Env): number {
  const raw = readString(env, "RELAY_PORT");
  if (raw === null) return LanConfig.DEFAULT_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError("RELAY_PORT", `not a valid port: "${raw}"`);
  }
  return port;
}

/** Accepts `ab12…` or `AB:12:…`. */
function readFingerprint(env: Env): string {
  const raw = readString(env, "RELAY_FINGERPRINT");
  if (raw === null) return "";
  const hex = raw.replace(/:/g, "").toLowerCase();
  if (!/^[0-9a-f]+$/.test(hex) || hex.length % 2 !== 0) {
    throw new ConfigError("RELAY_FINGERPRINT", "expected a hex SHA-256 fingerprint");
  }
  return hex;
}

export function loadConfig(env: Env = process.env): RelayConfig {
  const logLevel = readString(env, "RELAY_LOG_LEVEL")?.toLowerCase() ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError("RELAY_LOG_LEVEL", `unknown level "${logLevel}"`);
  }

  const rawMode = readString(env, "RELAY_MODE")?.toLowerCase() ?? null;
  if (rawMode !== null && !isTransportMode(rawMode)) {
    throw new ConfigError("RELAY_MODE", `expected "bluetooth" or "lan", got "${rawMode}"`);
  }

  const host = readString(env, "RELAY_HOST");
  const discover = readFlag(env, "RELAY_DISCOVER", false);
  // A server address or a discovery request implies LAN.
  const mode = rawMode ?? (host || discover ? "lan" : null);
  if (mode === "bluetooth" && host) {
    throw new ConfigError("RELAY_HOST", "only applies to lan mode");
  }

  return {
    dataDir: readString(env, "RELAY_DATA_DIR") ?? path.join(os.homedir(), ".position-relay"),
    logLevel,
    mode,
    host,
    port: readPort(env),
    fingerprint: readFingerprint(env),
    blePeripheral: readString(env, "RELAY_BLE_PERIPHERAL"),
    discover,
    locationAuthorized: readFlag(env, "RELAY_LOCATION_AUTHORIZED", true),
  };
}

/** One-line summary for the startup log. The fingerprint is abbreviated. */
export function describeConfig(config: RelayConfig): string {
  const fingerprint = config.fingerprint
    ? `"${config.fingerprint.slice(0, 8)}…" (${config.fingerprint.length} chars)`
    : "(none)";
  let target = "saved settings";
  if (config.mode === "bluetooth") target = `bluetooth peripheral=${config.blePeripheral ?? "(scan)"}`;
  else if (config.host) target = `lan server=${config.host}:${config.port}`;
  else if (config.mode === "lan") target = `lan server=${config.discover ? "(discover)" : "(saved)"}`;
  return `config loaded — ${target} fingerprint=${fingerprint} dataDir=${config.dataDir} logLevel=${config.logLevel} locationAuthorized=${config.locationAuthorized}`;
}
