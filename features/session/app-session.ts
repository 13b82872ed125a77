import { scopedLog, type LogSink, type Logger } from "@/features/logging";
import { transportModeName, type ServerInfo, type TransportMode } from "@/features/models";
import {
  clearSettings,
  DEFAULT_SETTINGS,
  loadSettings,
  saveSettings,
  type PreferenceStore,
  type Settings,
} from "@/features/storage";
import { TransportError } from "@/features/transport/errors";
import type { TransportManager } from "@/features/transport/transport-manager";

export interface AppSessionOptions {
  manager: TransportManager;
  preferences: PreferenceStore;
  log: LogSink;
}

/**
 * Ties persisted settings to the transport manager: restores the saved
 * configuration on start and records the operator's choices.
 */
export class AppSession {
  private readonly manager: TransportManager;
  private readonly preferences: PreferenceStore;
  private readonly log: Logger;
  private settings: Settings = DEFAULT_SETTINGS;

  constructor(options: AppSessionOptions) {
    this.manager = options.manager;
    this.preferences = options.preferences;
    this.log = scopedLog(options.log, "Session");
  }

  getSettings(): Settings {
    return { ...this.settings };
  }

  get isOnboarded(): boolean {
    return this.settings.isOnboarded;
  }

  /** Load settings and configure the manager when onboarding is done. */
  start(): Settings {
    this.settings = loadSettings(this.preferences);
    if (this.settings.isOnboarded) this.applyConfiguration();
    else this.log.info("Not onboarded yet");
    return this.getSettings();
  }

  completeOnboarding(mode: TransportMode, serverInfo: ServerInfo | null = null): void {
    this.settings = {
      isOnboarded: true,
      transportMode: mode,
      serverInfo: mode === "lan" ? serverInfo : null,
    };
    saveSettings(this.preferences, this.settings);
    this.log.info(`Onboarded with ${transportModeName(mode)}`);
    this.applyConfiguration();
  }

  /** Forget everything and return to the first-run state. */
  reset(): void {
    this.manager.disconnect();
    clearSettings(this.preferences);
    this.settings = DEFAULT_SETTINGS;
    this.log.info("Settings cleared");
  }

  async connect(): Promise<void> {
    if (!this.manager.isConfigured) {
      if (!this.settings.isOnboarded) throw new TransportError("NOT_CONFIGURED");
      this.applyConfiguration();
    }
    await this.manager.connect();
  }

  disconnect(): void {
    this.manager.disconnect();
  }

  private applyConfiguration(): void {
    const { transportMode, serverInfo } = this.settings;
    if (!transportMode) {
      this.log.warn("Onboarded without a transport mode");
      return;
    }
    this.manager.configure(transportMode, serverInfo);
  }
}
