import { getConfigRows, setConfig } from '../db/repo.js';
import { parseSettings, validateSetting, type Settings } from '../config/settings.js';

/**
 * Effective settings: stored rows merged over the defaults.
 */
export function loadSettings(): Settings {
  return parseSettings(getConfigRows());
}

export function setConfigKV(key: string, value: string) {
  validateSetting(key, value);
  setConfig(key, value);
}
