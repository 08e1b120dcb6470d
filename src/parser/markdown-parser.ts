import fs from 'node:fs';
import { DEFAULT_CATEGORY } from '../schema/index.js';
import type { ParsedTodo } from './types.js';

const TODO_REGEX = /^\s*- \[([ xX])\]\s+(.+?)(?:\s+#(\w+))?\s*$/;

export function parseTodoLine(
  line: string,
  fallbackCategory: string = DEFAULT_CATEGORY
): Omit<ParsedTodo, 'lineNumber'> | null {
  const match = line.match(TODO_REGEX);
  if (!match) return null;

  const [, mark, rawText, tag] = match;
  if (mark === undefined || rawText === undefined) return null;

  const text = rawText.trim();
  if (!text) return null;

  return {
    text,
    done: mark.toLowerCase() === 'x',
    category: tag ?? (fallbackCategory.trim() || DEFAULT_CATEGORY),
    tagged: tag !== undefined,
  };
}

/**
 * Extract checkbox lines from markdown text. Anything that is not a
 * `- [ ] text #tag` line is skipped.
 */
export function parseTodoContent(content: string, fallbackCategory: string = DEFAULT_CATEGORY): ParsedTodo[] {
  const lines = content.split(/\r?\n/);
  const todos: ParsedTodo[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line === undefined) continue;

    const parsed = parseTodoLine(line, fallbackCategory);
    if (parsed) {
      todos.push({ ...parsed, lineNumber: i + 1 });
    }
  }

  return todos;
}

/** Throws on a read failure or on bytes that are not valid UTF-8. */
export function parseTodoFile(filePath: string, fallbackCategory: string = DEFAULT_CATEGORY): ParsedTodo[] {
  const content = new TextDecoder('utf-8', { fatal: true }).decode(fs.readFileSync(filePath));
  return parseTodoContent(content, fallbackCategory);
}
