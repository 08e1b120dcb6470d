import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DirectorySetupError } from '../cli/errors.js';

export const DEFAULT_ROOT_DIR = '~/mdtodo';
export const TODO_SUBDIR = 'todo';
const MARKDOWN_EXT = '.md';

export function expandHome(dir: string): string {
  if (dir === '~') return os.homedir();
  if (dir.startsWith('~/') || dir.startsWith('~\\')) {
    return path.join(os.homedir(), dir.slice(2));
  }
  return dir;
}

export function getTodoDir(rootDir: string): string {
  return path.join(path.resolve(expandHome(rootDir)), TODO_SUBDIR);
}

export function ensureTodoDir(rootDir: string): string {
  const todoDir = getTodoDir(rootDir);
  try {
    fs.mkdirSync(todoDir, { recursive: true });
  } catch (error) {
    throw new DirectorySetupError(todoDir, error);
  }
  return todoDir;
}

/** Markdown file basenames directly under `todoDir`, sorted. */
export function listTodoFiles(todoDir: string): string[] {
  return fs
    .readdirSync(todoDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(MARKDOWN_EXT))
    .map((entry) => entry.name)
    .sort();
}

export function categoryFromFileName(fileName: string): string {
  return path.basename(fileName, MARKDOWN_EXT);
}

export function fileNameForCategory(category: string): string {
  return `${category}${MARKDOWN_EXT}`;
}
