import terminalKit from 'terminal-kit';
import { KeyActionSchema } from '../schema/index.js';
import { formatKeyLabel } from './key-utils.js';
import {
  getActiveCategory,
  getStatusText,
  getVisibleTodos,
  type DialogFields,
  type Session,
} from './session.js';
import type { TextInputState } from './text-input.js';

export type FrameStyle =
  | 'plain'
  | 'header'
  | 'tab'
  | 'activeTab'
  | 'dim'
  | 'todo'
  | 'done'
  | 'selected'
  | 'footer'
  | 'dialog'
  | 'dialogTitle'
  | 'field'
  | 'focusedField'
  | 'helpKey';

export interface FrameSegment {
  text: string;
  style: FrameStyle;
}

export type FrameRow = FrameSegment[];

export interface FrameOptions {
  width: number;
  height: number;
  configPath?: string;
}

export const APP_TITLE = ' Markdown Todo Manager ';
const CHECKED = '☒';
const UNCHECKED = '☐';
const DIALOG_WIDTH = 60;
const HELP_DIALOG_WIDTH = 50;

function takeByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (terminalKit.stringWidth(text) <= maxWidth) return text;
  let width = 0;
  let out = '';
  for (const ch of Array.from(text)) {
    const w = terminalKit.stringWidth(ch);
    if (width + w > maxWidth) break;
    out += ch;
    width += w;
  }
  return out;
}

function takeEndByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (terminalKit.stringWidth(text) <= maxWidth) return text;
  const chars = Array.from(text);
  let width = 0;
  const out: string[] = [];
  for (let idx = chars.length - 1; idx >= 0; idx--) {
    const ch = chars[idx] ?? '';
    const w = terminalKit.stringWidth(ch);
    if (width + w > maxWidth) break;
    out.push(ch);
    width += w;
  }
  return out.reverse().join('');
}

/** Truncate a row to `width` columns and pad the remainder with `padStyle`. */
export function fitRow(segments: FrameRow, width: number, padStyle: FrameStyle = 'plain'): FrameRow {
  const out: FrameRow = [];
  let remaining = width;
  for (const segment of segments) {
    if (remaining <= 0) break;
    if (!segment.text) continue;
    const shown = takeByWidth(segment.text, remaining);
    if (shown) out.push({ text: shown, style: segment.style });
    remaining -= terminalKit.stringWidth(shown);
    if (shown !== segment.text) break;
  }
  if (remaining > 0) out.push({ text: ' '.repeat(remaining), style: padStyle });
  return out;
}

/** Plain text of a row, without styling. */
export function rowText(row: FrameRow): string {
  return row.map((segment) => segment.text).join('');
}

function centered(text: string, width: number): string {
  const used = terminalKit.stringWidth(text);
  const left = Math.max(0, Math.floor((width - used) / 2));
  return `${' '.repeat(left)}${text}`;
}

function buildTabs(session: Session): FrameRow {
  const categories = session.store.sortedCategories();
  return categories.map((category, idx) => ({
    text: ` ${category} `,
    style: idx === session.state.activeCategoryIndex ? 'activeTab' : 'tab',
  }));
}

function buildListRows(session: Session, width: number, listHeight: number): FrameRow[] {
  const todos = getVisibleTodos(session);
  if (todos.length === 0) {
    const addKey = formatKeyLabel(session.keymap.add);
    const message = `No todos in category '${getActiveCategory(session)}'. Press '${addKey}' to add one.`;
    return [fitRow([{ text: message, style: 'dim' }], width)];
  }

  const selected = session.state.selectedIndex;
  const scrollTop = selected >= listHeight ? selected - listHeight + 1 : 0;

  return todos.slice(scrollTop, scrollTop + listHeight).map((todo, offset) => {
    const isSelected = scrollTop + offset === selected;
    const style: FrameStyle = isSelected ? 'selected' : todo.done ? 'done' : 'todo';
    const line = ` ${todo.done ? CHECKED : UNCHECKED} ${todo.text}`;
    return fitRow([{ text: line, style }], width, isSelected ? 'selected' : 'plain');
  });
}

function fieldSegment(input: TextInputState, focused: boolean, maxWidth: number): FrameSegment {
  const chars = Array.from(input.value);
  const shown = focused
    ? `${chars.slice(0, input.cursor).join('')}|${chars.slice(input.cursor).join('')}`
    : input.value;
  const clipped = takeEndByWidth(shown, maxWidth);
  const pad = Math.max(0, maxWidth - terminalKit.stringWidth(clipped));
  return { text: `${clipped}${' '.repeat(pad)}`, style: focused ? 'focusedField' : 'field' };
}

function buildFieldRows(fields: DialogFields, innerWidth: number): FrameRow[] {
  const labelWidth = 10;
  const valueWidth = Math.max(1, innerWidth - labelWidth);
  return [
    [
      { text: 'Task:'.padEnd(labelWidth), style: 'dialog' },
      fieldSegment(fields.text, fields.focus === 'text', valueWidth),
    ],
    [],
    [
      { text: 'Category:'.padEnd(labelWidth), style: 'dialog' },
      fieldSegment(fields.category, fields.focus === 'category', valueWidth),
    ],
    [],
    [{ text: 'Enter save · Tab switch field · Esc cancel', style: 'dim' }],
  ];
}

function buildDialogBox(session: Session, innerWidth: number, configPath: string | undefined): {
  title: string;
  body: FrameRow[];
} | null {
  const modal = session.state.modal;
  switch (modal.kind) {
    case 'none':
      return null;

    case 'add':
      return { title: ' Add New Todo ', body: buildFieldRows(modal.fields, innerWidth) };

    case 'edit':
      return { title: ' Edit Todo ', body: buildFieldRows(modal.fields, innerWidth) };

    case 'delete': {
      const target = session.store.getTodo(modal.targetId);
      return {
        title: ' Confirm Delete ',
        body: [
          [{ text: `Delete todo: ${target?.text ?? ''}?`, style: 'dialog' }],
          [],
          [{ text: '[y] yes  [n] no', style: 'dim' }],
        ],
      };
    }

    case 'help': {
      const keyWidth = Math.max(
        ...KeyActionSchema.options.map((action) => terminalKit.stringWidth(formatKeyLabel(session.keymap[action])))
      );
      const body: FrameRow[] = KeyActionSchema.options.map((action) => [
        { text: ` ${formatKeyLabel(session.keymap[action]).padEnd(keyWidth)} `, style: 'helpKey' },
        { text: `: ${action.replace(/_/g, ' ')}`, style: 'dialog' },
      ]);
      if (configPath) {
        body.push([], [{ text: `Configuration: ${configPath}`, style: 'dialog' }]);
      }
      body.push([], [{ text: 'Press any key to close', style: 'dim' }]);
      return { title: ' Keybindings ', body };
    }
  }
}

function overlayDialog(rows: FrameRow[], session: Session, options: FrameOptions): void {
  const preferred = session.state.modal.kind === 'help' ? HELP_DIALOG_WIDTH : DIALOG_WIDTH;
  const boxWidth = Math.max(8, Math.min(preferred, options.width - 2));
  const innerWidth = boxWidth - 4;
  const dialog = buildDialogBox(session, innerWidth, options.configPath);
  if (!dialog) return;

  const boxRows: FrameRow[] = [
    [{ text: `┌${'─'.repeat(boxWidth - 2)}┐`, style: 'dialog' }],
    [
      { text: '│ ', style: 'dialog' },
      ...fitRow([{ text: centered(dialog.title, innerWidth), style: 'dialogTitle' }], innerWidth, 'dialog'),
      { text: ' │', style: 'dialog' },
    ],
    ...[[], ...dialog.body].map((body): FrameRow => [
      { text: '│ ', style: 'dialog' },
      ...fitRow(body, innerWidth, 'dialog'),
      { text: ' │', style: 'dialog' },
    ]),
    [{ text: `└${'─'.repeat(boxWidth - 2)}┘`, style: 'dialog' }],
  ];

  const top = Math.max(0, Math.floor((options.height - boxRows.length) / 2));
  const left = ' '.repeat(Math.max(0, Math.floor((options.width - boxWidth) / 2)));
  boxRows.forEach((boxRow, idx) => {
    const target = top + idx;
    if (target >= rows.length) return;
    rows[target] = fitRow([{ text: left, style: 'plain' }, ...boxRow], options.width);
  });
}

/**
 * Lay out one screen: title, category tabs, separator, the active category's
 * todos and the status footer, with any open dialog drawn on top. Always
 * returns `height` rows of exactly `width` columns.
 */
export function buildFrame(session: Session, options: FrameOptions): FrameRow[] {
  const width = Math.max(1, options.width);
  const height = Math.max(4, options.height);
  const listHeight = height - 4;

  const rows: FrameRow[] = [
    fitRow([{ text: centered(APP_TITLE, width), style: 'header' }], width, 'header'),
    fitRow(buildTabs(session), width),
    fitRow([{ text: '─'.repeat(width), style: 'dim' }], width),
  ];

  const listRows = buildListRows(session, width, listHeight);
  for (let i = 0; i < listHeight; i++) {
    rows.push(listRows[i] ?? fitRow([], width));
  }

  rows.push(fitRow([{ text: ` ${getStatusText(session)} `, style: 'footer' }], width, 'footer'));

  overlayDialog(rows, session, { ...options, width, height });
  return rows;
}
