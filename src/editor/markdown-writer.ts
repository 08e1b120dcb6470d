import { DEFAULT_CATEGORY, type TodoItem } from '../schema/index.js';

type WritableTodo = Pick<TodoItem, 'text' | 'done' | 'category'>;

export function categoryTitle(category: string): string {
  const name = category.trim() || DEFAULT_CATEGORY;
  return `${name.charAt(0).toUpperCase()}${name.slice(1).toLowerCase()}`;
}

const TRAILING_TAG_REGEX = /\s#\w+\s*$/;

/**
 * Format one checkbox line. The `#tag` suffix is only written when the item
 * does not belong to the file's own category, since the file name already
 * carries it, or when the text itself ends in something the parser would
 * read as a tag.
 */
export function formatTodoLine(item: WritableTodo, fileCategory: string): string {
  const mark = item.done ? 'x' : ' ';
  const tagged = item.category !== fileCategory || TRAILING_TAG_REGEX.test(item.text);
  const suffix = tagged ? ` #${item.category}` : '';
  return `- [${mark}] ${item.text}${suffix}`;
}

export function serializeTodoFile(items: readonly WritableTodo[], category: string): string {
  const active = items.filter((item) => !item.done);
  const completed = items.filter((item) => item.done);

  const lines: string[] = [`# ${categoryTitle(category)} Tasks`, ''];

  if (active.length > 0) {
    lines.push('## Active', '');
    for (const item of active) lines.push(formatTodoLine(item, category));
    lines.push('');
  }

  if (completed.length > 0) {
    lines.push('## Completed', '');
    for (const item of completed) lines.push(formatTodoLine(item, category));
  }

  return `${lines.join('\n').replace(/\n+$/, '')}\n`;
}
