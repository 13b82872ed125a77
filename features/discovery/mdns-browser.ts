/**
 * DNS-SD browsing and resolution over multicast-dns.
 *
 * Browsing sends a PTR query for the service type and collects instances
 * from PTR/TXT records in answers and additionals. Resolution waits for the
 * instance's SRV record and then an A or AAAA record for its target,
 * querying for whatever is missing from the record cache. Cached records
 * live for their TTL, are dropped by goodbye (TTL 0) records and do not
 * outlive a browse.
 */

import type { EventEmitter } from "node:events";
import makeMdns from "multicast-dns";
import { scopedLog, type LogSink, type Logger } from "@/features/logging";
import { describeError } from "@/features/transport/errors";
import {
  parseTxtEntries,
  trimTrailingDot,
  type BrowserHandlers,
  type ResolvedEndpoint,
  type ServiceAdvertisement,
  type ServiceBrowser,
  type ServiceResolver,
} from "./service-browser";

export interface MdnsQuestion {
  name: string;
  type: "PTR" | "SRV" | "TXT" | "A" | "AAAA";
}

/** The part of a multicast-dns instance the browser uses. */
export interface MdnsSocket extends EventEmitter {
  query(questions: MdnsQuestion[]): void;
  destroy(): void;
}

interface DnsRecord {
  name: string;
  type: string;
  ttl: number;
  data: unknown;
}

interface SrvTarget {
  target: string;
  port: number;
}

interface Cached<T> {
  value: T;
  expiresAt: number;
}

export interface MdnsServiceBrowserOptions {
  log: LogSink;
  /** Socket factory; the default binds the mDNS multicast group. */
  createSocket?: () => MdnsSocket;
  now?: () => number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function toRecord(value: unknown): DnsRecord | null {
  if (!isObject(value)) return null;
  const { name, type, ttl, data } = value;
  if (typeof name !== "string" || typeof type !== "string") return null;
  return { name, type, ttl: typeof ttl === "number" ? ttl : 120, data };
}

/** Every answer and additional record of a response packet. */
export function recordsOf(packet: unknown): DnsRecord[] {
  if (!isObject(packet)) return [];
  const sections = [packet.answers, packet.additionals];
  const records: DnsRecord[] = [];
  for (const section of sections) {
    if (!Array.isArray(section)) continue;
    for (const entry of section) {
      const record = toRecord(entry);
      if (record) records.push(record);
    }
  }
  return records;
}

function txtEntries(data: unknown): (string | Uint8Array)[] {
  if (typeof data === "string" || data instanceof Uint8Array) return [data];
  if (!Array.isArray(data)) return [];
  return data.filter((d): d is string | Uint8Array => typeof d === "string" || d instanceof Uint8Array);
}

function srvTarget(data: unknown): SrvTarget | null {
  if (!isObject(data)) return null;
  const { target, port } = data;
  if (typeof target !== "string" || typeof port !== "number") return null;
  return { target: trimTrailingDot(target), port };
}

const key = (name: string) => trimTrailingDot(name).toLowerCase();

export class MdnsServiceBrowser implements ServiceBrowser, ServiceResolver {
  private readonly log: Logger;
  private readonly createSocket: () => MdnsSocket;
  private readonly now: () => number;
  private mdns: MdnsSocket | null = null;

  private browse: { fqdn: string; handlers: BrowserHandlers } | null = null;
  private readonly instances = new Map<string, ServiceAdvertisement>();
  private readonly srv = new Map<string, Cached<SrvTarget>>();
  private readonly v4 = new Map<string, Cached<string>>();
  private readonly v6 = new Map<string, Cached<string>>();

  constructor(options: MdnsServiceBrowserOptions) {
    this.log = scopedLog(options.log, "mDNS");
    this.createSocket = options.createSocket ?? (() => makeMdns());
    this.now = options.now ?? Date.now;
  }

  // ============================================================================
  // BROWSING
  // ============================================================================

  start(serviceType: string, domain: string, handlers: BrowserHandlers): void {
    this.cancel();
    const fqdn = `${trimTrailingDot(serviceType)}.${trimTrailingDot(domain)}`;
    this.browse = { fqdn, handlers };
    const mdns = this.socket();
    mdns.once("ready", () => {
      if (this.browse?.handlers === handlers) handlers.onReady();
    });
    this.log.info(`Browsing for ${fqdn}`);
    mdns.query([{ name: fqdn, type: "PTR" }]);
  }

  cancel(): void {
    this.browse = null;
    this.instances.clear();
    this.srv.clear();
    this.v4.clear();
    this.v6.clear();
    if (!this.mdns) return;
    const mdns = this.mdns;
    this.mdns = null;
    mdns.removeAllListeners();
    mdns.destroy();
  }

  // ============================================================================
  // RESOLUTION
  // ============================================================================

  resolve(advertisement: ServiceAdvertisement, signal: AbortSignal): Promise<ResolvedEndpoint> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new Error("Resolution cancelled"));
        return;
      }
      const mdns = this.socket();
      const instance = key(advertisement.fqdn);
      let queriedSrv = false;
      let queriedTarget: string | null = null;

      const lookup = (): ResolvedEndpoint | null => {
        const target = this.fresh(this.srv, instance);
        if (!target) {
          if (!queriedSrv) {
            queriedSrv = true;
            mdns.query([{ name: advertisement.fqdn, type: "SRV" }]);
          }
          return null;
        }
        const targetKey = key(target.target);
        const host = this.fresh(this.v4, targetKey) ?? this.fresh(this.v6, targetKey);
        if (!host) {
          if (queriedTarget !== target.target) {
            queriedTarget = target.target;
            mdns.query([
              { name: target.target, type: "A" },
              { name: target.target, type: "AAAA" },
            ]);
          }
          return null;
        }
        return { host, port: target.port };
      };

      const check = () => {
        const endpoint = lookup();
        if (!endpoint) return;
        cleanup();
        resolve(endpoint);
      };
      const onAbort = () => {
        cleanup();
        reject(new Error("Resolution cancelled"));
      };
      const cleanup = () => {
        mdns.removeListener("response", check);
        signal.removeEventListener("abort", onAbort);
      };

      signal.addEventListener("abort", onAbort, { once: true });
      mdns.on("response", check);
      check();
    });
  }

  // ============================================================================
  // RESPONSES
  // ============================================================================

  private socket(): MdnsSocket {
    if (this.mdns) return this.mdns;
    const mdns = this.createSocket();
    mdns.on("response", (packet: unknown) => this.handleResponse(packet));
    mdns.on("error", (error: Error) => {
      this.log.error(`Socket error: ${error.message}`);
      const handlers = this.browse?.handlers;
      this.cancel();
      handlers?.onFailed(error);
    });
    this.mdns = mdns;
    return mdns;
  }

  private handleResponse(packet: unknown): void {
    const records = recordsOf(packet);
    let changed = false;

    for (const record of records) {
      const name = key(record.name);
      if (record.type === "SRV") {
        if (record.ttl === 0) {
          this.srv.delete(name);
          continue;
        }
        const target = srvTarget(record.data);
        if (target) this.cache(this.srv, name, target, record.ttl);
      } else if (record.type === "A" || record.type === "AAAA") {
        if (typeof record.data !== "string") continue;
        const cache = record.type === "A" ? this.v4 : this.v6;
        if (record.ttl === 0) {
          if (cache.get(name)?.value === record.data) cache.delete(name);
          continue;
        }
        this.cache(cache, name, record.data, record.ttl);
      }
    }

    const browse = this.browse;
    if (!browse) return;
    const serviceKey = key(browse.fqdn);

    for (const record of records) {
      if (record.type !== "TXT" || record.ttl === 0) continue;
      const instance = key(record.name);
      if (!instance.endsWith(`.${serviceKey}`)) continue;
      const next = this.advertisement(record.name, browse.fqdn, record.data);
      const existing = this.instances.get(instance);
      if (existing && JSON.stringify(existing.txt) === JSON.stringify(next.txt)) continue;
      this.instances.set(instance, next);
      changed = true;
    }

    for (const record of records) {
      if (record.type !== "PTR" || key(record.name) !== serviceKey) continue;
      if (typeof record.data !== "string") continue;
      const instance = key(record.data);
      if (record.ttl === 0) {
        changed = this.instances.delete(instance) || changed;
      } else if (!this.instances.has(instance)) {
        // Instance announced without its TXT record; ask for it.
        this.mdns?.query([{ name: trimTrailingDot(record.data), type: "TXT" }]);
      }
    }

    if (changed) {
      try {
        browse.handlers.onResults([...this.instances.values()]);
      } catch (error) {
        this.log.error(`Result handler failed: ${describeError(error)}`);
      }
    }
  }

  private cache<T>(cache: Map<string, Cached<T>>, name: string, value: T, ttlSeconds: number): void {
    cache.set(name, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  private fresh<T>(cache: Map<string, Cached<T>>, name: string): T | null {
    const entry = cache.get(name);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      cache.delete(name);
      return null;
    }
    return entry.value;
  }

  private advertisement(instanceFqdn: string, serviceFqdn: string, txtData: unknown): ServiceAdvertisement {
    const fqdn = trimTrailingDot(instanceFqdn);
    const suffix = `.${serviceFqdn}`;
    const name = fqdn.toLowerCase().endsWith(suffix.toLowerCase())
      ? fqdn.slice(0, fqdn.length - suffix.length)
      : fqdn;
    return { name, fqdn, txt: parseTxtEntries(txtEntries(txtData)) };
  }
}
