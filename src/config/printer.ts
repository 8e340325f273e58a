// src/config/printer.ts
import type { Settings } from '../settings.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('settings');

/**
 * Pretty-print the stored values, sorted by key.
 */
export function renderSettings(settings: Settings): string {
  const view = Object.fromEntries(Object.entries(settings.toJSON()).sort(([a], [b]) => a.localeCompare(b)));
  return JSON.stringify(view, null, 2);
}

/**
 * Pretty-print the stored values via logger.
 */
export function printSettings(settings: Settings): void {
  log.info('[settings]\n' + renderSettings(settings));
}
