export { JsonFilePreferenceStore, MemoryPreferenceStore } from "./preference-store";
export { loadSettings, saveSettings, clearSettings, DEFAULT_SETTINGS } from "./settings";

export type { PreferenceStore } from "./preference-store";
export type { Settings } from "./settings";
