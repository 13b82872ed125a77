import { DiscoveryConfig } from "@/constants/transport";
import type { ServiceDiscovery } from "@/features/discovery";
import { scopedLog, type LogSink } from "@/features/logging";
import type { ServerInfo } from "@/features/models";
import { Completion } from "@/features/transport/completion";

export interface DiscoverServerOptions {
  discovery: ServiceDiscovery;
  log: LogSink;
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Browse until the first relay server resolves, then stop. Null when the
 * timeout passes or the browser gives up.
 */
export async function discoverFirstServer(options: DiscoverServerOptions): Promise<ServerInfo | null> {
  const { discovery, signal } = options;
  const log = scopedLog(options.log, "Startup");
  const timeoutMs = options.timeoutMs ?? DiscoveryConfig.FIRST_SERVER_TIMEOUT_MS;
  if (signal?.aborted) throw new Error("Startup cancelled");

  const found = new Completion<ServerInfo | null>();
  const unsubscribe = discovery.addEventListener((status) => {
    const [first] = status.servers;
    if (first) found.resolve(first);
    else if (!status.isSearching && status.lastError) {
      log.error(`Discovery failed: ${status.lastError}`);
      found.resolve(null);
    }
  });
  const timeoutId = setTimeout(() => {
    log.warn(`No server found within ${timeoutMs}ms`);
    found.resolve(null);
  }, timeoutMs);
  const onAbort = () => found.reject(new Error("Startup cancelled"));
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    discovery.startBrowsing();
    const server = await found.promise;
    if (server) log.info(`Using discovered server ${server.name} (${server.host}:${server.port})`);
    return server;
  } finally {
    clearTimeout(timeoutId);
    unsubscribe();
    signal?.removeEventListener("abort", onAbort);
    discovery.stopBrowsing();
  }
}
