import terminalKit from 'terminal-kit';
import { describeError } from '../cli/errors.js';
import type { Keymap } from '../config/loader.js';
import type { TodoStore } from '../store/todo-store.js';
import { paintFrame, type Term } from './paint.js';
import { buildFrame } from './render.js';
import { createSession, handleKey, setStatus, type Session } from './session.js';
import type { StatusMessage } from './status.js';

export interface TuiOptions {
  store: TodoStore;
  keymap: Keymap;
  configPath: string;
  initialStatus?: string | null;
  colorsDisabled?: boolean;
}

/** `interrupt` means the session ended via Ctrl+C or a signal rather than the quit key. */
export type TuiExit = 'quit' | 'interrupt';

export async function runInteractiveTui(options: TuiOptions): Promise<TuiExit> {
  const term: Term = terminalKit.terminal;
  const colorsDisabled = options.colorsDisabled ?? false;
  const session: Session = createSession({
    store: options.store,
    keymap: options.keymap,
    initialStatus: options.initialStatus,
  });

  let resolveExit: ((reason: TuiExit) => void) | null = null;
  const exitPromise = new Promise<TuiExit>((resolve) => {
    resolveExit = resolve;
  });

  // One pending timer at most: a newer status message replaces the older timer.
  let expiryTimer: ReturnType<typeof setTimeout> | null = null;
  let scheduledStatus: StatusMessage | null = null;

  function render(): void {
    const rows = buildFrame(session, {
      width: term.width || process.stdout.columns || 80,
      height: term.height || process.stdout.rows || 24,
      configPath: options.configPath,
    });
    paintFrame(term, rows, colorsDisabled);
  }

  function clearExpiryTimer(): void {
    if (expiryTimer) clearTimeout(expiryTimer);
    expiryTimer = null;
  }

  function scheduleStatusExpiry(): void {
    const status = session.state.status;
    if (status === scheduledStatus) return;
    scheduledStatus = status;
    clearExpiryTimer();
    if (!status) return;

    const delay = status.expiresAt - session.now();
    if (delay <= 0) return;
    expiryTimer = setTimeout(() => {
      expiryTimer = null;
      render();
    }, delay);
  }

  const onKey = (name: string): void => {
    if (name === 'CTRL_C') {
      resolveExit?.('interrupt');
      return;
    }

    try {
      if (handleKey(session, name) === 'quit') {
        resolveExit?.('quit');
        return;
      }
    } catch (error) {
      setStatus(session, `Error: ${describeError(error)}`);
    }

    scheduleStatusExpiry();
    render();
  };

  const onResize = (): void => {
    render();
  };

  const onSignal = (): void => {
    resolveExit?.('interrupt');
  };

  term.fullscreen(true);
  term.grabInput(true);
  process.stdout.on('resize', onResize);
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
  term.on('key', onKey);

  try {
    render();
    scheduleStatusExpiry();
    return await exitPromise;
  } finally {
    clearExpiryTimer();

    term.removeListener('key', onKey);
    process.stdout.removeListener('resize', onResize);
    process.removeListener('SIGTERM', onSignal);
    process.removeListener('SIGINT', onSignal);
    term.grabInput(false);
    term.fullscreen(false);
    term.hideCursor(false);
    term.styleReset();
  }
}
