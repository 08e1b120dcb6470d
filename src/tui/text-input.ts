import { isSpaceKeyName } from './key-utils.js';

export interface TextInputState {
  value: string;
  /**
   * Cursor position measured in Unicode codepoints (i.e. `Array.from(value)` index).
   */
  cursor: number;
}

function toChars(value: string): string[] {
  return Array.from(value);
}

function clampCursor(value: string, cursor: number): number {
  return Math.max(0, Math.min(cursor, toChars(value).length));
}

export function createTextInput(initial: string): TextInputState {
  return { value: initial, cursor: toChars(initial).length };
}

function moveTo(state: TextInputState, cursor: number): TextInputState {
  return { value: state.value, cursor: clampCursor(state.value, cursor) };
}

function insertAt(state: TextInputState, text: string): TextInputState {
  const chars = toChars(state.value);
  const inserted = toChars(text);
  chars.splice(state.cursor, 0, ...inserted);
  return { value: chars.join(''), cursor: state.cursor + inserted.length };
}

function deleteRange(state: TextInputState, start: number, end: number): TextInputState {
  const chars = toChars(state.value);
  const from = Math.max(0, Math.min(start, chars.length));
  const to = Math.max(0, Math.min(end, chars.length));
  if (to <= from) return state;
  chars.splice(from, to - from);
  return { value: chars.join(''), cursor: from };
}

function wordStartBefore(state: TextInputState): number {
  const chars = toChars(state.value);
  let i = state.cursor;
  while (i > 0 && /\s/.test(chars[i - 1] ?? '')) i--;
  while (i > 0 && !/\s/.test(chars[i - 1] ?? '')) i--;
  return i;
}

/**
 * Apply an editing key to a single-line input. Returns null for keys the
 * input does not handle (Enter, Escape, Tab, arrows up/down...), which are
 * left to the caller.
 */
export function applyTextInputKey(state: TextInputState, name: string): TextInputState | null {
  const current = moveTo(state, state.cursor);
  const length = toChars(current.value).length;

  switch (name) {
    case 'LEFT':
    case 'CTRL_B':
      return moveTo(current, current.cursor - 1);
    case 'RIGHT':
    case 'CTRL_F':
      return moveTo(current, current.cursor + 1);
    case 'HOME':
    case 'CTRL_A':
      return moveTo(current, 0);
    case 'END':
    case 'CTRL_E':
      return moveTo(current, length);
    case 'BACKSPACE':
      return deleteRange(current, current.cursor - 1, current.cursor);
    case 'DELETE':
    case 'CTRL_D':
      return deleteRange(current, current.cursor, current.cursor + 1);
    case 'CTRL_W':
    case 'ALT_BACKSPACE':
      return deleteRange(current, wordStartBefore(current), current.cursor);
    case 'CTRL_U':
      return deleteRange(current, 0, current.cursor);
    case 'CTRL_K':
      return deleteRange(current, current.cursor, length);
    default:
      break;
  }

  if (isSpaceKeyName(name)) return insertAt(current, ' ');
  if (toChars(name).length === 1) return insertAt(current, name);
  return null;
}
