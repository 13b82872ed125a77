import { BleConfig } from "@/constants/transport";
import type { BleCentral } from "@/features/bluetooth/ble-central";
import type { BleChannel } from "@/features/bluetooth/ble-channel";
import { scopedLog, type LogSink } from "@/features/logging";
import { Completion } from "@/features/transport/completion";

export interface PickPeripheralOptions {
  channel: BleChannel;
  central: BleCentral;
  /** Peripheral id named by the operator; skips restore and scanning. */
  preferred: string | null;
  log: LogSink;
  signal?: AbortSignal;
  scanTimeoutMs?: number;
}

function abortError(): Error {
  return new Error("Startup cancelled");
}

function waitForPoweredOn(central: BleCentral, signal?: AbortSignal): Promise<void> {
  if (central.adapterState === "poweredOn") return Promise.resolve();
  const ready = new Completion<void>();
  const unsubscribe = central.addEventListener((event) => {
    if (event.type === "adapterStateChanged" && event.state === "poweredOn") ready.resolve();
  });
  const onAbort = () => ready.reject(abortError());
  signal?.addEventListener("abort", onAbort, { once: true });
  return ready.promise.finally(() => {
    unsubscribe();
    signal?.removeEventListener("abort", onAbort);
  });
}

async function scanForFirst(
  channel: BleChannel,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<string | null> {
  const found = new Completion<string | null>();
  const unsubscribe = channel.onPeripheralDiscovered((peripheral) => found.resolve(peripheral.id));
  const timeoutId = setTimeout(() => found.resolve(null), timeoutMs);
  const onAbort = () => found.reject(abortError());
  signal?.addEventListener("abort", onAbort, { once: true });
  try {
    if (!channel.startScanning()) return null;
    return await found.promise;
  } finally {
    clearTimeout(timeoutId);
    unsubscribe();
    signal?.removeEventListener("abort", onAbort);
    channel.stopScanning();
  }
}

/**
 * Choose the relay peripheral to connect to: the configured id, else the one
 * restored from the previous run, else the first one a scan finds. Returns
 * null when the scan times out.
 */
export async function pickPeripheral(options: PickPeripheralOptions): Promise<string | null> {
  const { channel, central, preferred, signal } = options;
  const log = scopedLog(options.log, "Startup");
  if (signal?.aborted) throw abortError();

  if (preferred) {
    log.info(`Using configured peripheral ${preferred}`);
    channel.selectPeripheral(preferred);
    return preferred;
  }

  if (central.adapterState !== "poweredOn") {
    log.info(`Waiting for Bluetooth (adapter is ${central.adapterState})`);
  }
  await waitForPoweredOn(central, signal);
  await channel.settle();

  const restored = channel.getSelectedPeripheralId();
  if (restored) return restored;

  const timeoutMs = options.scanTimeoutMs ?? BleConfig.SCAN_TIMEOUT_MS;
  const id = await scanForFirst(channel, timeoutMs, signal);
  if (!id) {
    log.warn(`No ${BleConfig.PERIPHERAL_NAME} peripheral found within ${timeoutMs}ms`);
    return null;
  }
  log.info(`Found peripheral ${id}`);
  channel.selectPeripheral(id);
  return id;
}
