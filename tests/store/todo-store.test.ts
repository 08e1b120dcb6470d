import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TodoFileError } from '../../src/cli/errors.js';
import { normalizeCategory, TodoStore } from '../../src/store/todo-store.js';

let rootDir: string;

function todoPath(fileName: string): string {
  return path.join(rootDir, 'todo', fileName);
}

function writeTodoFile(fileName: string, content: string): void {
  fs.mkdirSync(path.join(rootDir, 'todo'), { recursive: true });
  fs.writeFileSync(todoPath(fileName), content, 'utf-8');
}

function snapshotItems(store: TodoStore): { text: string; done: boolean; category: string }[] {
  return store.allTodos().map(({ text, done, category }) => ({ text, done, category }));
}

beforeEach(() => {
  rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdtodo-store-'));
});

afterEach(() => {
  fs.rmSync(rootDir, { recursive: true, force: true });
});

describe('TodoStore.load', () => {
  it('creates the todo directory and starts with only the default category', () => {
    const store = new TodoStore(rootDir);
    const result = store.load();

    expect(fs.existsSync(path.join(rootDir, 'todo'))).toBe(true);
    expect(result).toEqual({ files: [], errors: [] });
    expect(store.sortedCategories()).toEqual(['uncategorized']);
    expect(store.allTodos()).toEqual([]);
  });

  it('derives the category from the file name', () => {
    writeTodoFile('work.md', '- [ ] write report\n');
    const store = new TodoStore(rootDir);
    store.load();

    const work = store.todosInCategory('work');
    expect(work).toHaveLength(1);
    expect(work[0]).toMatchObject({ text: 'write report', done: false, category: 'work' });
    expect(store.originOf(work[0]?.id ?? -1)).toBe('work.md');
    expect(store.sortedCategories()).toEqual(['uncategorized', 'work']);
  });

  it('lets an inline tag override the file category', () => {
    writeTodoFile('inbox.md', '- [ ] deploy #work\n- [ ] sort mail\n');
    const store = new TodoStore(rootDir);
    store.load();

    expect(snapshotItems(store)).toEqual([
      { text: 'deploy', done: false, category: 'work' },
      { text: 'sort mail', done: false, category: 'inbox' },
    ]);
    expect(store.sortedCategories()).toEqual(['inbox', 'uncategorized', 'work']);
  });

  it('ignores non-markdown files and directories', () => {
    writeTodoFile('notes.txt', '- [ ] not a todo file\n');
    fs.mkdirSync(todoPath('nested.md'));
    const store = new TodoStore(rootDir);

    expect(store.load().files).toEqual([]);
    expect(store.allTodos()).toHaveLength(0);
  });

  it('returns the same items when loaded twice', () => {
    writeTodoFile('b.md', '- [ ] two\n- [x] three\n');
    writeTodoFile('a.md', '- [ ] one\n');
    const store = new TodoStore(rootDir);

    store.load();
    const first = snapshotItems(store);
    store.load();

    expect(snapshotItems(store)).toEqual(first);
    expect(first.map((t) => t.text)).toEqual(['one', 'two', 'three']);
  });

  it('replaces in-memory changes on reload', () => {
    writeTodoFile('home.md', '- [ ] water plants\n');
    const store = new TodoStore(rootDir);
    store.load();
    store.addTodo('unsaved', 'errands');

    store.load();

    expect(snapshotItems(store)).toEqual([{ text: 'water plants', done: false, category: 'home' }]);
    expect(store.sortedCategories()).toEqual(['home', 'uncategorized']);
    expect(store.hasUnsavedChanges()).toBe(false);
  });
});

describe('TodoStore.load with a bad file', () => {
  const invalidUtf8 = Buffer.from([0x2d, 0x20, 0x5b, 0x20, 0x5d, 0x20, 0x61, 0xff, 0xfe, 0x0a]);

  it('reports a file that is not valid UTF-8 and keeps loading the others', () => {
    fs.mkdirSync(path.join(rootDir, 'todo'), { recursive: true });
    fs.writeFileSync(todoPath('bad.md'), invalidUtf8);
    writeTodoFile('work.md', '- [ ] write report\n');
    const store = new TodoStore(rootDir);

    const result = store.load();

    expect(result.files).toEqual(['bad.md', 'work.md']);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(TodoFileError);
    expect(result.errors[0]).toMatchObject({ filePath: todoPath('bad.md'), operation: 'read' });
    expect(snapshotItems(store)).toEqual([{ text: 'write report', done: false, category: 'work' }]);
    expect(store.sortedCategories()).toEqual(['uncategorized', 'work']);
  });

  it('leaves an unreadable file untouched on save', () => {
    fs.mkdirSync(path.join(rootDir, 'todo'), { recursive: true });
    fs.writeFileSync(todoPath('bad.md'), invalidUtf8);
    const store = new TodoStore(rootDir);
    store.load();
    store.addTodo('other', 'home');

    const result = store.save();

    expect(result.written).toEqual(['home.md']);
    expect(fs.readFileSync(todoPath('bad.md')).equals(invalidUtf8)).toBe(true);
  });

  it('refuses to write new items into an unreadable file', () => {
    fs.mkdirSync(path.join(rootDir, 'todo'), { recursive: true });
    fs.writeFileSync(todoPath('bad.md'), invalidUtf8);
    const store = new TodoStore(rootDir);
    store.load();
    store.addTodo('other', 'bad');

    const result = store.save();

    expect(result.written).toEqual([]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({ filePath: todoPath('bad.md'), operation: 'write' });
    expect(store.hasUnsavedChanges()).toBe(true);
    expect(fs.readFileSync(todoPath('bad.md')).equals(invalidUtf8)).toBe(true);
  });
});

describe('TodoStore.save', () => {
  it('keeps text ending in #word in its own category', () => {
    const store = new TodoStore(rootDir);
    store.load();
    store.addTodo('fix issue #42', 'work');

    store.save();
    store.load();

    expect(fs.readFileSync(todoPath('work.md'), 'utf-8')).toBe('# Work Tasks\n\n## Active\n\n- [ ] fix issue #42 #work\n');
    expect(snapshotItems(store)).toEqual([{ text: 'fix issue #42', done: false, category: 'work' }]);
    expect(store.sortedCategories()).toEqual(['uncategorized', 'work']);
  });

  it('writes a new item to <category>.md under Active', () => {
    const store = new TodoStore(rootDir);
    store.load();
    const item = store.addTodo('buy milk', 'home');
    expect(store.originOf(item.id)).toBeUndefined();

    const result = store.save();

    expect(result.errors).toEqual([]);
    expect(result.written).toEqual(['home.md']);
    expect(store.originOf(item.id)).toBe('home.md');
    expect(fs.readFileSync(todoPath('home.md'), 'utf-8')).toBe('# Home Tasks\n\n## Active\n\n- [ ] buy milk\n');

    store.load();
    expect(snapshotItems(store)).toEqual([{ text: 'buy milk', done: false, category: 'home' }]);
  });

  it('moves a toggled item into the Completed section', () => {
    writeTodoFile('work.md', '# Work Tasks\n\n## Active\n\n- [ ] write report\n- [ ] review PR\n');
    const store = new TodoStore(rootDir);
    store.load();
    const report = store.todosInCategory('work')[0];
    store.toggleTodo(report?.id ?? -1);

    store.save();
    store.load();

    expect(fs.readFileSync(todoPath('work.md'), 'utf-8')).toBe(
      '# Work Tasks\n\n## Active\n\n- [ ] review PR\n\n## Completed\n\n- [x] write report\n'
    );
    expect(snapshotItems(store)).toEqual([
      { text: 'review PR', done: false, category: 'work' },
      { text: 'write report', done: true, category: 'work' },
    ]);
  });

  it('rewrites a file whose last item was deleted so it stays deleted', () => {
    writeTodoFile('home.md', '- [ ] water plants\n');
    const store = new TodoStore(rootDir);
    store.load();
    const plants = store.todosInCategory('home')[0];
    expect(store.deleteTodo(plants?.id ?? -1)).toBe(true);

    store.save();

    expect(fs.readFileSync(todoPath('home.md'), 'utf-8')).toBe('# Home Tasks\n');
    store.load();
    expect(store.allTodos()).toHaveLength(0);
  });

  it('moves an item to the file of its new category', () => {
    writeTodoFile('home.md', '- [ ] call bank\n');
    writeTodoFile('work.md', '- [ ] write report\n');
    const store = new TodoStore(rootDir);
    store.load();
    const bank = store.todosInCategory('home')[0];
    store.editTodo(bank?.id ?? -1, { category: 'work' });

    store.save();

    expect(fs.readFileSync(todoPath('home.md'), 'utf-8')).toBe('# Home Tasks\n');
    expect(fs.readFileSync(todoPath('work.md'), 'utf-8')).toBe(
      '# Work Tasks\n\n## Active\n\n- [ ] call bank\n- [ ] write report\n'
    );
    expect(store.originOf(bank?.id ?? -1)).toBe('work.md');
  });

  it('targets the same file on a second save', () => {
    const store = new TodoStore(rootDir);
    store.load();
    store.addTodo('one', 'misc');
    store.save();
    store.addTodo('two', 'misc');

    expect(store.save().written).toEqual(['misc.md']);
    expect(fs.readFileSync(todoPath('misc.md'), 'utf-8')).toBe('# Misc Tasks\n\n## Active\n\n- [ ] one\n- [ ] two\n');
  });

  it('clears the unsaved flag after a successful save', () => {
    const store = new TodoStore(rootDir);
    store.load();
    store.addTodo('one', 'misc');
    expect(store.hasUnsavedChanges()).toBe(true);

    store.save();

    expect(store.hasUnsavedChanges()).toBe(false);
  });
});

describe('TodoStore mutations', () => {
  it('registers new categories on add and edit', () => {
    const store = new TodoStore(rootDir);
    store.load();
    const item = store.addTodo('  plan sprint  ', 'work');
    expect(item).toMatchObject({ text: 'plan sprint', done: false, category: 'work' });
    expect(store.sortedCategories()).toContain('work');

    store.editTodo(item.id, { category: 'planning' });
    expect(store.sortedCategories()).toEqual(['planning', 'uncategorized', 'work']);
  });

  it('keeps duplicate texts as separate items', () => {
    const store = new TodoStore(rootDir);
    const a = store.addTodo('same', 'x');
    const b = store.addTodo('same', 'x');

    expect(a.id).not.toBe(b.id);
    store.deleteTodo(a.id);
    expect(store.todosInCategory('x')).toEqual([b]);
  });

  it('keeps an emptied category listed until the next load', () => {
    const store = new TodoStore(rootDir);
    store.load();
    const item = store.addTodo('temp', 'scratch');
    store.deleteTodo(item.id);

    expect(store.sortedCategories()).toEqual(['scratch', 'uncategorized']);
    store.load();
    expect(store.sortedCategories()).toEqual(['uncategorized']);
  });

  it('toggles back to the original state', () => {
    const store = new TodoStore(rootDir);
    const item = store.addTodo('flip', 'x');
    store.toggleTodo(item.id);
    expect(item.done).toBe(true);
    store.toggleTodo(item.id);
    expect(item.done).toBe(false);
  });

  it('treats unknown ids as no-ops', () => {
    const store = new TodoStore(rootDir);
    expect(store.deleteTodo(42)).toBe(false);
    expect(store.editTodo(42, { text: 'x' })).toBeNull();
    expect(store.toggleTodo(42)).toBeNull();
  });

  it('rejects blank text', () => {
    const store = new TodoStore(rootDir);
    expect(() => store.addTodo('   ', 'x')).toThrow('Task text is required');
    const item = store.addTodo('keep', 'x');
    expect(() => store.editTodo(item.id, { text: ' ' })).toThrow('Task text is required');
    expect(item.text).toBe('keep');
  });

  it('defaults a blank category to uncategorized', () => {
    const store = new TodoStore(rootDir);
    expect(store.addTodo('loose end', '   ').category).toBe('uncategorized');
  });
});

describe('normalizeCategory', () => {
  it('makes categories safe to use as file names', () => {
    expect(normalizeCategory('  side project ')).toBe('side-project');
    expect(normalizeCategory('../etc/passwd')).toBe('etcpasswd');
    expect(normalizeCategory('')).toBe('uncategorized');
    expect(normalizeCategory(undefined)).toBe('uncategorized');
  });
});
