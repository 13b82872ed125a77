/**
 * Position relay.
 *
 * Reads its configuration from the environment, restores the saved transport
 * settings, connects to the relay server over Bluetooth LE or the local
 * network and answers its location requests until interrupted.
 */

import { loadNoble } from "@/features/bluetooth";
import { formatFingerprint } from "@/features/hex";
import { MdnsServiceBrowser, ServiceDiscovery } from "@/features/discovery";
import { EnvPositionSource, LocationService } from "@/features/location";
import { ConsoleLogSink, scopedLog, type Logger, type LogSink } from "@/features/logging";
import {
  createServerInfo,
  describeConnectionState,
  manualServerInfo,
  type ServerInfo,
} from "@/features/models";
import { AppSession } from "@/features/session";
import { JsonFilePreferenceStore, loadSettings, type Settings } from "@/features/storage";
import { describeError } from "@/features/transport/errors";
import { TransportManager } from "@/features/transport/transport-manager";
import { describeConfig, loadConfig, type RelayConfig } from "./config";
import { discoverFirstServer } from "./discover-server";
import { pickPeripheral } from "./pick-peripheral";
import { Reconnector } from "./reconnect";
import { RelayChannels } from "./relay-channels";

/** The LAN server this run should use, or null when none can be found. */
async function resolveLanServer(
  config: RelayConfig,
  saved: Settings,
  sink: LogSink,
  signal: AbortSignal,
): Promise<ServerInfo | null> {
  if (config.host) return manualServerInfo(config.host, config.fingerprint, config.port);
  if (!config.discover) return saved.serverInfo;

  const browser = new MdnsServiceBrowser({ log: sink });
  const discovery = new ServiceDiscovery({ browser, resolver: browser, log: sink });
  const server = await discoverFirstServer({ discovery, log: sink, signal });
  if (!server || !config.fingerprint) return server;
  // An operator-supplied fingerprint pins the discovered server as well.
  return createServerInfo({ ...server, certFingerprint: config.fingerprint });
}

async function main(): Promise<void> {
  let config: RelayConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(`[Config] ${describeError(error)}`);
    process.exit(1);
  }

  const sink = new ConsoleLogSink(config.logLevel);
  const log: Logger = scopedLog(sink, "Relay");
  log.info(describeConfig(config));

  const preferences = new JsonFilePreferenceStore(config.dataDir, scopedLog(sink, "Storage"));
  const source = new EnvPositionSource();
  if (!source.isConfigured) log.warn("LATITUDE and LONGITUDE are not set; location requests will fail");
  const location = new LocationService({ source, log: sink, authorized: config.locationAuthorized });

  const saved = loadSettings(preferences);
  const mode = config.mode ?? saved.transportMode;
  if (!mode) {
    log.error("No transport configured. Set RELAY_MODE, RELAY_HOST or RELAY_DISCOVER.");
    process.exit(1);
  }

  const channels = new RelayChannels({
    noble: mode === "bluetooth" ? await loadNoble() : null,
    preferences,
    log: sink,
  });
  const manager = new TransportManager({ channels, location, log: sink });
  const session = new AppSession({ manager, preferences, log: sink });
  const startup = new AbortController();

  let shuttingDown = false;
  const shutdown = (code: number): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Shutting down");
    startup.abort();
    reconnector.stop();
    manager.destroy();
    process.exit(code);
  };

  const reconnector = new Reconnector({
    connect: () => session.connect(),
    log: sink,
    onGiveUp: () => shutdown(1),
  });

  process.on("SIGINT", () => shutdown(0));
  process.on("SIGTERM", () => shutdown(0));

  manager.addEventListener((event) => {
    if (event.type !== "connectionStateChanged") return;
    log.info(`Connection: ${describeConnectionState(event.state)}`);
    reconnector.handleState(event.state);
  });

  if (config.mode === "lan") {
    const server = await resolveLanServer(config, saved, sink, startup.signal);
    if (!server) {
      log.error("No LAN server to connect to. Set RELAY_HOST or RELAY_DISCOVER=1.");
      shutdown(1);
      return;
    }
    if (server.certFingerprint) log.info(`Pinning certificate ${formatFingerprint(server.certFingerprint)}`);
    session.completeOnboarding("lan", server);
  } else if (config.mode === "bluetooth") {
    session.completeOnboarding("bluetooth");
  } else {
    session.start();
  }

  if (!manager.isConfigured) {
    log.error("Saved settings are incomplete. Set RELAY_MODE to configure a transport.");
    shutdown(1);
    return;
  }

  const ble = manager.getBluetoothChannel();
  const central = channels.central;
  if (ble && central) {
    const id = await pickPeripheral({
      channel: ble,
      central,
      preferred: config.blePeripheral,
      log: sink,
      signal: startup.signal,
    });
    if (!id) {
      shutdown(1);
      return;
    }
  }

  reconnector.start();
  try {
    await session.connect();
    log.info("Ready; waiting for location requests");
  } catch (error) {
    log.warn(`Initial connect failed: ${describeError(error)}`);
    reconnector.handleState(manager.connectionState);
  }
}

main().catch((error: unknown) => {
  console.error(`[Relay] Fatal: ${describeError(error)}`);
  process.exit(1);
});
