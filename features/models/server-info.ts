import { DiscoveryConfig, LanConfig } from "@/constants/transport";

/**
 * A relay server found by discovery or entered by hand.
 *
 * Identity is the (host, port) pair: two records with the same address are
 * the same server even when their metadata differs.
 */
export interface ServerInfo {
  readonly name: string;
  readonly host: string;
  readonly port: number;
  /** Hex SHA-256 of the server certificate; empty disables pinning. */
  readonly certFingerprint: string;
  readonly version: string;
  readonly paths: readonly string[];
}

export function createServerInfo(fields: ServerInfo): ServerInfo {
  return Object.freeze({
    name: fields.name,
    host: fields.host,
    port: fields.port,
    certFingerprint: fields.certFingerprint,
    version: fields.version,
    paths: Object.freeze([...fields.paths]),
  });
}

/** Server record for an address typed in by the operator. */
export function manualServerInfo(
  host: string,
  certFingerprint = "",
  port: number = LanConfig.DEFAULT_PORT,
): ServerInfo {
  return createServerInfo({
    name: "Manual Server",
    host: host.trim(),
    port,
    certFingerprint: certFingerprint.trim(),
    version: "unknown",
    paths: [LanConfig.SUBMIT_PATH, LanConfig.STATUS_PATH, LanConfig.REQUEST_PATH],
  });
}

export function sameServer(a: ServerInfo, b: ServerInfo): boolean {
  return a.host === b.host && a.port === b.port;
}

/** Hash key consistent with `sameServer`. */
export function serverKey(server: Pick<ServerInfo, "host" | "port">): string {
  return `${server.host}:${server.port}`;
}

export function parsePaths(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(DiscoveryConfig.PATHS_SEPARATOR)
    .filter((p) => p.length > 0);
}

export function baseUrl(server: Pick<ServerInfo, "host" | "port">): string {
  const host =
    server.host.includes(":") && !server.host.startsWith("[")
      ? `[${server.host}]`
      : server.host;
  return `https://${host}:${server.port}`;
}

/**
 * Narrow an untyped value (e.g. a persisted JSON record) to a ServerInfo.
 */
export function parseServerInfo(value: unknown): ServerInfo | null {
  if (typeof value !== "object" || value === null) return null;
  const record: Record<string, unknown> = { ...value };
  const { name, host, port, certFingerprint, version, paths } = record;
  if (
    typeof name !== "string" ||
    typeof host !== "string" ||
    typeof port !== "number" ||
    typeof certFingerprint !== "string" ||
    typeof version !== "string" ||
    !Array.isArray(paths)
  ) {
    return null;
  }
  const stringPaths = paths.filter((p): p is string => typeof p === "string");
  return createServerInfo({
    name,
    host,
    port,
    certFingerprint,
    version,
    paths: stringPaths,
  });
}
