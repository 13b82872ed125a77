import { BleChannel, NobleCentral, type Noble } from "@/features/bluetooth";
import { HttpsServerClient, LanChannel } from "@/features/lan";
import type { LogSink } from "@/features/logging";
import type { ServerInfo } from "@/features/models";
import type { PreferenceStore } from "@/features/storage";
import type { ChannelFactory } from "@/features/transport/transport-manager";
import type { TransportChannel } from "@/features/transport/channel";

export interface RelayChannelsOptions {
  /** Null when this run does not use Bluetooth. */
  noble: Noble | null;
  preferences: PreferenceStore;
  log: LogSink;
}

/** Builds production channels: noble for BLE, undici over pinned TLS for LAN. */
export class RelayChannels implements ChannelFactory {
  private readonly noble: Noble | null;
  private readonly preferences: PreferenceStore;
  private readonly log: LogSink;

  /** Central behind the most recent BLE channel. */
  central: NobleCentral | null = null;

  constructor(options: RelayChannelsOptions) {
    this.noble = options.noble;
    this.preferences = options.preferences;
    this.log = options.log;
  }

  createBluetoothChannel(): BleChannel {
    if (!this.noble) throw new Error("Bluetooth support is not loaded");
    const central = new NobleCentral(this.noble, { log: this.log, preferences: this.preferences });
    this.central = central;
    return new BleChannel({ central, log: this.log });
  }

  createLanChannel(server: ServerInfo): TransportChannel {
    const client = new HttpsServerClient({ server, log: this.log });
    return new LanChannel({ server, client, log: this.log });
  }
}
