import { createServerInfo, parsePaths, type ServerInfo } from "@/features/models";

/** One advertised service instance as seen by a browser. */
export interface ServiceAdvertisement {
  /** Instance name, e.g. "Kitchen Relay". */
  name: string;
  /** Fully qualified instance name, used as the resolution key. */
  fqdn: string;
  txt: Record<string, string>;
}

export interface ResolvedEndpoint {
  host: string;
  port: number;
}

export interface BrowserHandlers {
  onReady(): void;
  /** Full current result set, reported on every change. */
  onResults(advertisements: ServiceAdvertisement[]): void;
  onFailed(error: Error): void;
}

export interface ServiceBrowser {
  start(serviceType: string, domain: string, handlers: BrowserHandlers): void;
  /** Idempotent. No handler runs after it returns. */
  cancel(): void;
}

export interface ServiceResolver {
  /** Rejects when `signal` aborts. */
  resolve(advertisement: ServiceAdvertisement, signal: AbortSignal): Promise<ResolvedEndpoint>;
}

const textDecoder = new TextDecoder();

/**
 * Decode DNS-SD TXT strings (`key=value`). Keys are case-insensitive and
 * the first occurrence wins; a bare key maps to "".
 */
export function parseTxtEntries(entries: readonly (string | Uint8Array)[]): Record<string, string> {
  const txt: Record<string, string> = {};
  for (const entry of entries) {
    const text = typeof entry === "string" ? entry : textDecoder.decode(entry);
    if (text.length === 0) continue;
    const eq = text.indexOf("=");
    const key = (eq === -1 ? text : text.slice(0, eq)).toLowerCase();
    if (key.length === 0 || key in txt) continue;
    txt[key] = eq === -1 ? "" : text.slice(eq + 1);
  }
  return txt;
}

/** Drop the trailing dot of an absolute DNS name. */
export function trimTrailingDot(name: string): string {
  return name.endsWith(".") ? name.slice(0, -1) : name;
}

export function serverInfoFromAdvertisement(
  advertisement: ServiceAdvertisement,
  endpoint: ResolvedEndpoint,
): ServerInfo {
  const { txt } = advertisement;
  return createServerInfo({
    name: advertisement.name,
    host: trimTrailingDot(endpoint.host),
    port: endpoint.port,
    certFingerprint: txt["cert_fingerprint"] ?? "",
    version: txt["version"] ?? "unknown",
    paths: parsePaths(txt["paths"]),
  });
}
