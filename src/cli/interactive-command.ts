/**
 * mdtodo - full-screen todo browser over <dir>/todo/*.md
 */

import { loadKeymap } from '../config/loader.js';
import { DEFAULT_ROOT_DIR } from '../store/todo-files.js';
import { TodoStore } from '../store/todo-store.js';
import { runInteractiveTui } from '../tui/interactive.js';
import { formatErrorSummary } from '../tui/status.js';
import { CliUsageError } from './errors.js';
import { parseFlags } from './flag-utils.js';

export interface InteractiveOptions {
  rootDir: string;
  configPath?: string;
}

export function parseInteractiveFlags(args: string[]): InteractiveOptions {
  const { values, rest } = parseFlags(args, {
    values: { '--dir': 'dir', '-d': 'dir', '--config': 'config', '-c': 'config' },
  });

  const [unexpected] = rest;
  if (unexpected !== undefined) {
    throw new CliUsageError(`Unknown argument '${unexpected}'. Run \`mdtodo --help\` for usage.`);
  }

  const rootDir = values.dir ?? DEFAULT_ROOT_DIR;
  if (!rootDir.trim()) {
    throw new CliUsageError('Flag --dir requires a non-empty path.');
  }

  return { rootDir, configPath: values.config };
}

export async function handleInteractiveCommand(args: string[]): Promise<void> {
  await runInteractive(parseInteractiveFlags(args));
}

async function runInteractive(options: InteractiveOptions): Promise<void> {
  const store = new TodoStore(options.rootDir);

  // Fatal before the TUI starts: nothing can be loaded or saved without it.
  store.ensureDirectory();

  const { keymap, warning, configPath } = loadKeymap(options.configPath);
  const loaded = store.load();

  const exit = await runInteractiveTui({
    store,
    keymap,
    configPath,
    initialStatus: warning ?? formatErrorSummary(loaded.errors),
    colorsDisabled: Boolean(process.env.NO_COLOR),
  });

  if (exit === 'interrupt') {
    const saved = store.save();
    for (const error of saved.errors) {
      console.error(error.message);
    }
    console.log(saved.errors.length === 0 ? 'Todos saved. Goodbye!' : 'Some todos could not be saved.');
  }
}
