import type { Keymap } from '../config/loader.js';
import { KeyActionSchema, type KeyAction } from '../schema/index.js';

export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

/**
 * Map a keymap token to terminal-kit's key naming: single characters stay
 * as typed, named keys are upper-cased (`enter` -> `ENTER`, `ctrl_s` -> `CTRL_S`).
 */
export function normalizeKeyToken(token: string): string {
  if (isSpaceKeyName(token)) return 'SPACE';
  const trimmed = token.trim();
  if (Array.from(trimmed).length === 1) return trimmed;
  return trimmed.toUpperCase();
}

export function normalizeKeyName(name: string): string {
  return isSpaceKeyName(name) ? 'SPACE' : name;
}

export function actionForKey(keymap: Keymap, name: string): KeyAction | null {
  const pressed = normalizeKeyName(name);
  for (const action of KeyActionSchema.options) {
    if (normalizeKeyToken(keymap[action]) === pressed) return action;
  }
  return null;
}

export function formatKeyLabel(token: string): string {
  const normalized = normalizeKeyToken(token);
  if (normalized === 'SPACE') return 'space';
  return normalized.length === 1 ? normalized : normalized.toLowerCase();
}
