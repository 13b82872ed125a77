import { BleConfig, PreferenceKeys } from "@/constants/transport";
import {
  isTransportMode,
  parseServerInfo,
  type ServerInfo,
  type TransportMode,
} from "@/features/models";
import type { PreferenceStore } from "./preference-store";

export interface Settings {
  isOnboarded: boolean;
  transportMode: TransportMode | null;
  serverInfo: ServerInfo | null;
}

export const DEFAULT_SETTINGS: Settings = {
  isOnboarded: false,
  transportMode: null,
  serverInfo: null,
};

/** Malformed entries read as absent. */
export function loadSettings(store: PreferenceStore): Settings {
  const onboarded = store.getItem(PreferenceKeys.IS_ONBOARDED);
  const mode = store.getItem(PreferenceKeys.TRANSPORT_MODE);
  return {
    isOnboarded: onboarded === true,
    transportMode: isTransportMode(mode) ? mode : null,
    serverInfo: parseServerInfo(store.getItem(PreferenceKeys.SERVER_INFO)),
  };
}

export function saveSettings(store: PreferenceStore, settings: Settings): void {
  store.setItem(PreferenceKeys.IS_ONBOARDED, settings.isOnboarded);
  if (settings.transportMode) {
    store.setItem(PreferenceKeys.TRANSPORT_MODE, settings.transportMode);
  } else {
    store.removeItem(PreferenceKeys.TRANSPORT_MODE);
  }
  if (settings.serverInfo) {
    store.setItem(PreferenceKeys.SERVER_INFO, {
      ...settings.serverInfo,
      paths: [...settings.serverInfo.paths],
    });
  } else {
    store.removeItem(PreferenceKeys.SERVER_INFO);
  }
}

/** Also forgets the Bluetooth peripheral remembered for restoration. */
export function clearSettings(store: PreferenceStore): void {
  store.removeItem(PreferenceKeys.IS_ONBOARDED);
  store.removeItem(PreferenceKeys.TRANSPORT_MODE);
  store.removeItem(PreferenceKeys.SERVER_INFO);
  store.removeItem(BleConfig.RESTORE_IDENTIFIER);
}
