import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, describeError } from '../cli/errors.js';
import type { KeyAction } from '../schema/index.js';

export const DEFAULT_KEYMAP: Readonly<Record<KeyAction, string>> = {
  quit: 'q',
  add: 'a',
  edit: 'e',
  delete: 'd',
  toggle: 'space',
  save: 'w',
  move_up: 'k',
  move_down: 'j',
  category_prev: 'h',
  category_next: 'l',
  help: '?',
  reload: 'r',
};

const KeyTokenSchema = z.string().trim().min(1);

export const KeymapSchema = z.object({
  quit: KeyTokenSchema.default(DEFAULT_KEYMAP.quit),
  add: KeyTokenSchema.default(DEFAULT_KEYMAP.add),
  edit: KeyTokenSchema.default(DEFAULT_KEYMAP.edit),
  delete: KeyTokenSchema.default(DEFAULT_KEYMAP.delete),
  toggle: KeyTokenSchema.default(DEFAULT_KEYMAP.toggle),
  save: KeyTokenSchema.default(DEFAULT_KEYMAP.save),
  move_up: KeyTokenSchema.default(DEFAULT_KEYMAP.move_up),
  move_down: KeyTokenSchema.default(DEFAULT_KEYMAP.move_down),
  category_prev: KeyTokenSchema.default(DEFAULT_KEYMAP.category_prev),
  category_next: KeyTokenSchema.default(DEFAULT_KEYMAP.category_next),
  help: KeyTokenSchema.default(DEFAULT_KEYMAP.help),
  reload: KeyTokenSchema.default(DEFAULT_KEYMAP.reload),
});

export type Keymap = z.infer<typeof KeymapSchema>;

export interface KeymapLoadResult {
  keymap: Keymap;
  configPath: string;
  /** Non-fatal problem to surface in the status area. */
  warning: string | null;
  created: boolean;
}

export function getKeymapConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'mdtodo', 'config.json');
}

export function defaultKeymap(): Keymap {
  return { ...DEFAULT_KEYMAP };
}

function writeDefaultKeymap(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, `${JSON.stringify(DEFAULT_KEYMAP, null, 2)}\n`, 'utf-8');
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseKeymap(content: string, configPath: string): Keymap {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(configPath, `invalid JSON (${describeError(error)})`);
  }

  const result = KeymapSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(configPath, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Load the keymap. Actions missing from the file keep their default key; a
 * malformed file falls back to the defaults entirely and reports a warning.
 * When no file exists the defaults are written out.
 */
export function loadKeymap(configPath: string = getKeymapConfigPath()): KeymapLoadResult {
  if (!fs.existsSync(configPath)) {
    try {
      writeDefaultKeymap(configPath);
    } catch (error) {
      return {
        keymap: defaultKeymap(),
        configPath,
        warning: `Could not write default keymap to ${configPath}: ${describeError(error)}`,
        created: false,
      };
    }
    return { keymap: defaultKeymap(), configPath, warning: null, created: true };
  }

  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    return { keymap: parseKeymap(content, configPath), configPath, warning: null, created: false };
  } catch (error) {
    const message =
      error instanceof ConfigError ? error.message : `Error loading keymap ${configPath}: ${describeError(error)}`;
    return { keymap: defaultKeymap(), configPath, warning: `${message} (using defaults)`, created: false };
  }
}
