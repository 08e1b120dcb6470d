import fs from 'node:fs';
import path from 'node:path';
import { TodoFileError } from '../cli/errors.js';
import { serializeTodoFile } from '../editor/markdown-writer.js';
import { parseTodoFile } from '../parser/markdown-parser.js';
import type { ParsedTodo } from '../parser/types.js';
import { DEFAULT_CATEGORY, type TodoItem } from '../schema/index.js';
import {
  categoryFromFileName,
  ensureTodoDir,
  fileNameForCategory,
  getTodoDir,
  listTodoFiles,
} from './todo-files.js';

export interface LoadResult {
  files: string[];
  errors: TodoFileError[];
}

export interface SaveResult {
  written: string[];
  errors: TodoFileError[];
}

export interface TodoChanges {
  text?: string;
  category?: string;
}

export function normalizeCategory(raw: string | undefined): string {
  const cleaned = (raw ?? '')
    .trim()
    .replace(/[\\/]+/g, '')
    .replace(/\s+/g, '-')
    .replace(/^\.+/, '');
  return cleaned || DEFAULT_CATEGORY;
}

/**
 * In-memory view of `<root>/todo/*.md`.
 *
 * Items are addressed by a numeric handle so duplicate task text stays
 * distinguishable. `origin` maps a handle to the basename of the file the
 * item was read from (or last written to).
 *
 * On save every item is routed to `<category>.md`, so changing an item's
 * category moves it to that file. Files that no longer receive any item are
 * rewritten with just their heading. Files that failed to load are never
 * written until a later load reads them.
 */
export class TodoStore {
  readonly rootDir: string;
  readonly todoDir: string;

  private items: TodoItem[] = [];
  private categories = new Set<string>([DEFAULT_CATEGORY]);
  private origin = new Map<number, string>();
  private knownFiles = new Set<string>();
  private unreadableFiles = new Set<string>();
  private nextId = 1;
  private dirty = false;

  constructor(rootDir: string) {
    this.rootDir = rootDir;
    this.todoDir = getTodoDir(rootDir);
  }

  ensureDirectory(): string {
    return ensureTodoDir(this.rootDir);
  }

  load(): LoadResult {
    this.ensureDirectory();

    this.items = [];
    this.origin.clear();
    this.knownFiles.clear();
    this.unreadableFiles.clear();
    this.categories = new Set<string>([DEFAULT_CATEGORY]);

    const files = listTodoFiles(this.todoDir);
    const errors: TodoFileError[] = [];

    for (const fileName of files) {
      const filePath = path.join(this.todoDir, fileName);

      let parsed: ParsedTodo[];
      try {
        parsed = parseTodoFile(filePath, categoryFromFileName(fileName));
      } catch (error) {
        errors.push(new TodoFileError(filePath, 'read', error));
        this.unreadableFiles.add(fileName);
        continue;
      }

      this.knownFiles.add(fileName);
      for (const todo of parsed) {
        const item = this.createItem(todo.text, todo.done, todo.category);
        this.origin.set(item.id, fileName);
      }
    }

    this.dirty = false;
    return { files, errors };
  }

  save(): SaveResult {
    const byFile = new Map<string, TodoItem[]>();
    for (const fileName of this.knownFiles) byFile.set(fileName, []);

    for (const item of this.items) {
      const fileName = fileNameForCategory(item.category);
      this.origin.set(item.id, fileName);
      const bucket = byFile.get(fileName);
      if (bucket) bucket.push(item);
      else byFile.set(fileName, [item]);
    }

    const written: string[] = [];
    const errors: TodoFileError[] = [];

    try {
      this.ensureDirectory();
    } catch (error) {
      errors.push(new TodoFileError(this.todoDir, 'write', error));
      return { written, errors };
    }

    for (const [fileName, items] of byFile) {
      const filePath = path.join(this.todoDir, fileName);
      if (this.unreadableFiles.has(fileName)) {
        errors.push(new TodoFileError(filePath, 'write', new Error('file could not be read at load time')));
        continue;
      }
      try {
        fs.writeFileSync(filePath, serializeTodoFile(items, categoryFromFileName(fileName)), 'utf-8');
        this.knownFiles.add(fileName);
        written.push(fileName);
      } catch (error) {
        errors.push(new TodoFileError(filePath, 'write', error));
      }
    }

    if (errors.length === 0) this.dirty = false;
    return { written, errors };
  }

  addTodo(text: string, category?: string): TodoItem {
    const trimmed = text.trim();
    if (!trimmed) {
      throw new Error('Task text is required');
    }
    const item = this.createItem(trimmed, false, normalizeCategory(category));
    this.dirty = true;
    return item;
  }

  editTodo(id: number, changes: TodoChanges): TodoItem | null {
    const item = this.getTodo(id);
    if (!item) return null;

    if (changes.text !== undefined) {
      const trimmed = changes.text.trim();
      if (!trimmed) {
        throw new Error('Task text is required');
      }
      item.text = trimmed;
    }
    if (changes.category !== undefined) {
      item.category = normalizeCategory(changes.category);
      this.categories.add(item.category);
    }
    this.dirty = true;
    return item;
  }

  toggleTodo(id: number): TodoItem | null {
    const item = this.getTodo(id);
    if (!item) return null;
    item.done = !item.done;
    this.dirty = true;
    return item;
  }

  deleteTodo(id: number): boolean {
    const index = this.items.findIndex((item) => item.id === id);
    if (index === -1) return false;
    this.items.splice(index, 1);
    this.origin.delete(id);
    this.dirty = true;
    return true;
  }

  getTodo(id: number): TodoItem | undefined {
    return this.items.find((item) => item.id === id);
  }

  allTodos(): readonly TodoItem[] {
    return this.items;
  }

  todosInCategory(category: string): TodoItem[] {
    return this.items.filter((item) => item.category === category);
  }

  /** Categories stay listed after their last item is removed, until the next load. */
  sortedCategories(): string[] {
    return [...this.categories].sort();
  }

  originOf(id: number): string | undefined {
    return this.origin.get(id);
  }

  hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  private createItem(text: string, done: boolean, category: string): TodoItem {
    const item: TodoItem = { id: this.nextId++, text, done, category };
    this.items.push(item);
    this.categories.add(category);
    return item;
  }
}
