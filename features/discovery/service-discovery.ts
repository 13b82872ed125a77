/**
 * Service discovery.
 *
 * Browses for relay servers, resolves each advertisement independently and
 * keeps a list of servers unique by host. A failed browse is restarted
 * after a short delay, a bounded number of times.
 */

import { DiscoveryConfig, LanConfig } from "@/constants/transport";
import { scopedLog, type LogSink, type Logger } from "@/features/logging";
import type { ServerInfo } from "@/features/models";
import { describeError } from "@/features/transport/errors";
import { ListenerSet } from "@/features/transport/listener-set";
import {
  serverInfoFromAdvertisement,
  type ServiceAdvertisement,
  type ServiceBrowser,
  type ServiceResolver,
} from "./service-browser";

export interface DiscoveryStatus {
  servers: readonly ServerInfo[];
  isSearching: boolean;
  debugState: string;
  lastError: string | null;
}

export interface ServiceDiscoveryOptions {
  browser: ServiceBrowser;
  resolver: ServiceResolver;
  log: LogSink;
  retryDelayMs?: number;
  maxRetries?: number;
  resolveTimeoutMs?: number;
}

export class ServiceDiscovery {
  private readonly browser: ServiceBrowser;
  private readonly resolver: ServiceResolver;
  private readonly log: Logger;
  private readonly retryDelayMs: number;
  private readonly maxRetries: number;
  private readonly resolveTimeoutMs: number;

  private servers: ServerInfo[] = [];
  private searching = false;
  private state = "idle";
  private error: string | null = null;
  private retryCount = 0;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  // Bumped whenever a browse starts or stops; callbacks from older ones are dropped.
  private generation = 0;
  private readonly resolving = new Map<string, AbortController>();
  private readonly listeners: ListenerSet<DiscoveryStatus>;

  constructor(options: ServiceDiscoveryOptions) {
    this.browser = options.browser;
    this.resolver = options.resolver;
    this.log = scopedLog(options.log, "Discovery");
    this.retryDelayMs = options.retryDelayMs ?? DiscoveryConfig.RETRY_DELAY_MS;
    this.maxRetries = options.maxRetries ?? DiscoveryConfig.MAX_RETRIES;
    this.resolveTimeoutMs = options.resolveTimeoutMs ?? DiscoveryConfig.RESOLVE_TIMEOUT_MS;
    this.listeners = new ListenerSet(this.log);
  }

  getServers(): readonly ServerInfo[] {
    return this.servers;
  }

  get isSearching(): boolean {
    return this.searching;
  }

  get debugState(): string {
    return this.state;
  }

  get lastError(): string | null {
    return this.error;
  }

  getStatus(): DiscoveryStatus {
    return {
      servers: this.servers,
      isSearching: this.searching,
      debugState: this.state,
      lastError: this.error,
    };
  }

  /** Notified after every change to the server list or search status. */
  addEventListener(listener: (status: DiscoveryStatus) => void): () => void {
    return this.listeners.add(listener);
  }

  startBrowsing(): void {
    this.teardown();
    this.servers = [];
    this.retryCount = 0;
    this.error = null;
    this.beginBrowse();
  }

  stopBrowsing(): void {
    const wasActive = this.searching || this.retryTimer !== null || this.resolving.size > 0;
    this.teardown();
    if (!wasActive) return;
    this.searching = false;
    this.state = "stopped";
    this.log.info("Stopped browsing");
    this.notify();
  }

  // ============================================================================
  // BROWSING
  // ============================================================================

  private beginBrowse(): void {
    const generation = ++this.generation;
    this.searching = true;
    this.state = "starting";
    this.log.info(`Browsing for ${LanConfig.SERVICE_TYPE}`);
    this.notify();

    this.browser.start(LanConfig.SERVICE_TYPE, LanConfig.DOMAIN, {
      onReady: () => {
        if (generation !== this.generation) return;
        this.state = "ready";
        this.notify();
      },
      onResults: (advertisements) => {
        if (generation !== this.generation) return;
        this.log.debug(`Browse results: ${advertisements.length}`);
        for (const advertisement of advertisements) this.resolveAdvertisement(advertisement, generation);
      },
      onFailed: (error) => {
        if (generation !== this.generation) return;
        this.handleBrowseFailure(error);
      },
    });
  }

  private handleBrowseFailure(error: Error): void {
    this.log.error(`Browse failed: ${error.message}`);
    this.generation++;
    this.browser.cancel();
    this.error = error.message;
    this.state = `failed: ${error.message}`;

    if (this.retryCount >= this.maxRetries) {
      this.log.warn(`Giving up after ${this.retryCount} retries`);
      this.searching = false;
      this.notify();
      return;
    }

    this.retryCount++;
    this.state = `retrying (${this.retryCount}/${this.maxRetries})...`;
    this.notify();
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.beginBrowse();
    }, this.retryDelayMs);
  }

  // ============================================================================
  // RESOLUTION
  // ============================================================================

  private resolveAdvertisement(advertisement: ServiceAdvertisement, generation: number): void {
    if (this.resolving.has(advertisement.fqdn)) return;

    const controller = new AbortController();
    this.resolving.set(advertisement.fqdn, controller);
    const timeout = setTimeout(() => controller.abort(), this.resolveTimeoutMs);

    this.resolver
      .resolve(advertisement, controller.signal)
      .then((endpoint) => {
        if (generation !== this.generation) return;
        const server = serverInfoFromAdvertisement(advertisement, endpoint);
        if (this.servers.some((s) => s.host === server.host)) return;
        this.log.info(`Resolved ${server.name} at ${server.host}:${server.port}`);
        this.servers = [...this.servers, server];
        this.notify();
      })
      .catch((error: unknown) => {
        if (generation !== this.generation) return;
        const reason = controller.signal.aborted ? "timed out" : describeError(error);
        this.log.warn(`Failed to resolve ${advertisement.name}: ${reason}`);
      })
      .finally(() => {
        clearTimeout(timeout);
        if (this.resolving.get(advertisement.fqdn) === controller) {
          this.resolving.delete(advertisement.fqdn);
        }
      });
  }

  private teardown(): void {
    this.generation++;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    this.browser.cancel();
    for (const controller of this.resolving.values()) controller.abort();
    this.resolving.clear();
  }

  private notify(): void {
    this.listeners.emit(this.getStatus());
  }
}
