import {
  loadSettings,
  mergeSettings,
  saveSettings,
  type KeyValueStorage,
  type Settings,
  type SettingsPatch,
} from './settings';

export interface SettingsStore {
  get(): Settings;
  apply(patch: SettingsPatch): Settings;
  subscribe(listener: (settings: Settings) => void): () => void;
}

export function createSettingsStore(
  storage: KeyValueStorage,
  initial?: Settings,
): SettingsStore {
  let settings = initial ?? loadSettings(storage);
  const listeners = new Set<(s: Settings) => void>();

  const notify = () => {
    for (const listener of listeners) listener(settings);
  };

  return {
    get() {
      return settings;
    },
    apply(patch) {
      settings = mergeSettings(settings, patch);
      saveSettings(storage, settings);
      notify();
      return settings;
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
  };
}
