import type { Keymap } from '../config/loader.js';
import { describeError } from '../cli/errors.js';
import type { KeyAction, TodoItem } from '../schema/index.js';
import type { TodoStore } from '../store/todo-store.js';
import { actionForKey, formatKeyLabel } from './key-utils.js';
import {
  STATUS_TTL_MS,
  createStatus,
  formatErrorSummary,
  formatHelpHint,
  isStatusActive,
  type StatusMessage,
} from './status.js';
import { applyTextInputKey, createTextInput, type TextInputState } from './text-input.js';

export type DialogField = 'text' | 'category';

export interface DialogFields {
  text: TextInputState;
  category: TextInputState;
  focus: DialogField;
}

export type Modal =
  | { kind: 'none' }
  | { kind: 'add'; fields: DialogFields }
  | { kind: 'edit'; targetId: number; fields: DialogFields }
  | { kind: 'delete'; targetId: number }
  | { kind: 'help' };

export interface PendingConfirm {
  action: 'quit' | 'reload';
  expiresAt: number;
}

export interface InteractionState {
  activeCategoryIndex: number;
  selectedIndex: number;
  modal: Modal;
  status: StatusMessage | null;
  /** Set when quit/reload would drop unsaved changes and waits for a second press. */
  pendingConfirm: PendingConfirm | null;
}

export interface Session {
  store: TodoStore;
  keymap: Keymap;
  state: InteractionState;
  now: () => number;
  statusTtlMs: number;
}

export type KeyOutcome = 'continue' | 'quit';

export interface SessionOptions {
  store: TodoStore;
  keymap: Keymap;
  now?: () => number;
  statusTtlMs?: number;
  initialStatus?: string | null;
}

const NO_MODAL: Modal = { kind: 'none' };

function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max);
}

export function createSession(options: SessionOptions): Session {
  const session: Session = {
    store: options.store,
    keymap: options.keymap,
    state: {
      activeCategoryIndex: 0,
      selectedIndex: 0,
      modal: NO_MODAL,
      status: null,
      pendingConfirm: null,
    },
    now: options.now ?? Date.now,
    statusTtlMs: options.statusTtlMs ?? STATUS_TTL_MS,
  };
  if (options.initialStatus) setStatus(session, options.initialStatus);
  clampSelection(session);
  return session;
}

export function getActiveCategory(session: Session): string {
  const categories = session.store.sortedCategories();
  return categories[clamp(session.state.activeCategoryIndex, 0, categories.length - 1)] ?? '';
}

export function getVisibleTodos(session: Session): TodoItem[] {
  return session.store.todosInCategory(getActiveCategory(session));
}

export function getSelectedTodo(session: Session): TodoItem | null {
  return getVisibleTodos(session)[session.state.selectedIndex] ?? null;
}

export function clampSelection(session: Session): void {
  const { state } = session;
  const categoryCount = session.store.sortedCategories().length;
  state.activeCategoryIndex = clamp(state.activeCategoryIndex, 0, Math.max(0, categoryCount - 1));
  const itemCount = getVisibleTodos(session).length;
  state.selectedIndex = clamp(state.selectedIndex, 0, Math.max(0, itemCount - 1));
}

export function setStatus(session: Session, text: string): void {
  session.state.status = createStatus(text, session.now(), session.statusTtlMs);
}

export function getStatusText(session: Session): string {
  const { status } = session.state;
  if (isStatusActive(status, session.now())) return status.text;
  return formatHelpHint(session.keymap.help);
}

/** Point both indices at `item`, following it into its category. */
function selectTodo(session: Session, item: TodoItem): void {
  const categoryIndex = session.store.sortedCategories().indexOf(item.category);
  if (categoryIndex !== -1) session.state.activeCategoryIndex = categoryIndex;
  const itemIndex = session.store.todosInCategory(item.category).findIndex((t) => t.id === item.id);
  session.state.selectedIndex = Math.max(0, itemIndex);
  clampSelection(session);
}

function createDialogFields(text: string, category: string): DialogFields {
  return { text: createTextInput(text), category: createTextInput(category), focus: 'text' };
}

function needsSecondPress(session: Session, action: PendingConfirm['action'], armed: PendingConfirm | null): boolean {
  if (!session.store.hasUnsavedChanges()) return false;
  if (armed && armed.action === action && session.now() < armed.expiresAt) return false;

  session.state.pendingConfirm = { action, expiresAt: session.now() + session.statusTtlMs };
  const again = formatKeyLabel(session.keymap[action]);
  const save = formatKeyLabel(session.keymap.save);
  setStatus(
    session,
    action === 'quit'
      ? `Unsaved changes. Press ${again} again to quit, ${save} to save`
      : `Unsaved changes. Press ${again} again to reload from disk`
  );
  return true;
}

function saveTodos(session: Session): void {
  const result = session.store.save();
  const failure = formatErrorSummary(result.errors);
  setStatus(session, failure ?? `Saved ${result.written.length} file(s)`);
}

function reloadTodos(session: Session): void {
  try {
    const result = session.store.load();
    clampSelection(session);
    const failure = formatErrorSummary(result.errors);
    setStatus(session, failure ?? `Reloaded ${session.store.allTodos().length} todo(s)`);
  } catch (error) {
    clampSelection(session);
    setStatus(session, `Error: ${describeError(error)}`);
  }
}

export function dispatchAction(session: Session, action: KeyAction): KeyOutcome {
  const { state, store } = session;
  const armed = state.pendingConfirm;
  state.pendingConfirm = null;

  switch (action) {
    case 'quit':
      return needsSecondPress(session, 'quit', armed) ? 'continue' : 'quit';

    case 'save':
      saveTodos(session);
      return 'continue';

    case 'reload':
      if (!needsSecondPress(session, 'reload', armed)) reloadTodos(session);
      return 'continue';

    case 'category_prev':
    case 'category_next': {
      const count = store.sortedCategories().length;
      const delta = action === 'category_next' ? 1 : -1;
      state.activeCategoryIndex = (((state.activeCategoryIndex + delta) % count) + count) % count;
      state.selectedIndex = 0;
      return 'continue';
    }

    case 'move_up':
      state.selectedIndex = Math.max(0, state.selectedIndex - 1);
      return 'continue';

    case 'move_down': {
      const count = getVisibleTodos(session).length;
      state.selectedIndex = clamp(state.selectedIndex + 1, 0, Math.max(0, count - 1));
      return 'continue';
    }

    case 'toggle': {
      const selected = getSelectedTodo(session);
      if (!selected) return 'continue';
      store.toggleTodo(selected.id);
      setStatus(session, `Toggled: ${selected.text}`);
      return 'continue';
    }

    case 'add':
      state.modal = { kind: 'add', fields: createDialogFields('', getActiveCategory(session)) };
      return 'continue';

    case 'edit': {
      const selected = getSelectedTodo(session);
      if (selected) {
        state.modal = {
          kind: 'edit',
          targetId: selected.id,
          fields: createDialogFields(selected.text, selected.category),
        };
      }
      return 'continue';
    }

    case 'delete': {
      const selected = getSelectedTodo(session);
      if (selected) state.modal = { kind: 'delete', targetId: selected.id };
      return 'continue';
    }

    case 'help':
      state.modal = { kind: 'help' };
      return 'continue';
  }
}

export function cancelDialog(session: Session): void {
  session.state.modal = NO_MODAL;
}

export function confirmDialog(session: Session): void {
  const { state, store } = session;
  const modal = state.modal;

  switch (modal.kind) {
    case 'add': {
      state.modal = NO_MODAL;
      const text = modal.fields.text.value.trim();
      if (!text) return;
      const item = store.addTodo(text, modal.fields.category.value);
      selectTodo(session, item);
      setStatus(session, `Added: ${item.text}`);
      return;
    }

    case 'edit': {
      const text = modal.fields.text.value.trim();
      if (!text) {
        setStatus(session, 'Task text is required');
        return;
      }
      state.modal = NO_MODAL;
      const item = store.editTodo(modal.targetId, { text, category: modal.fields.category.value });
      if (!item) {
        clampSelection(session);
        return;
      }
      selectTodo(session, item);
      setStatus(session, `Updated: ${item.text}`);
      return;
    }

    case 'delete': {
      state.modal = NO_MODAL;
      const item = store.getTodo(modal.targetId);
      if (!item || !store.deleteTodo(item.id)) return;
      clampSelection(session);
      setStatus(session, `Deleted: ${item.text}`);
      return;
    }

    case 'help':
    case 'none':
      state.modal = NO_MODAL;
      return;
  }
}

function handleDialogKey(session: Session, fields: DialogFields, name: string): void {
  switch (name) {
    case 'ESCAPE':
      cancelDialog(session);
      return;
    case 'ENTER':
      confirmDialog(session);
      return;
    case 'TAB':
    case 'SHIFT_TAB':
    case 'UP':
    case 'DOWN':
      fields.focus = fields.focus === 'text' ? 'category' : 'text';
      return;
    default: {
      const next = applyTextInputKey(fields[fields.focus], name);
      if (next) fields[fields.focus] = next;
    }
  }
}

/**
 * Route one key event. While browsing, keys go through the keymap; while a
 * dialog is open they belong to the dialog.
 */
export function handleKey(session: Session, name: string): KeyOutcome {
  const modal = session.state.modal;

  switch (modal.kind) {
    case 'none': {
      const action = actionForKey(session.keymap, name);
      if (!action) return 'continue';
      return dispatchAction(session, action);
    }

    case 'help':
      cancelDialog(session);
      return 'continue';

    case 'delete': {
      const lower = name.toLowerCase();
      if (lower === 'y' || name === 'ENTER') confirmDialog(session);
      else if (lower === 'n' || name === 'ESCAPE') cancelDialog(session);
      return 'continue';
    }

    case 'add':
    case 'edit':
      handleDialogKey(session, modal.fields, name);
      return 'continue';
  }
}
