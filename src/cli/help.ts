import { DEFAULT_KEYMAP, getKeymapConfigPath } from '../config/loader.js';
import { KeyActionSchema } from '../schema/index.js';
import { DEFAULT_ROOT_DIR } from '../store/todo-files.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const lines = [
    'mdtodo: Markdown Todo Manager',
    '',
    'Usage: mdtodo [options]',
    '',
    formatSection('Options', [
      ['--dir, -d <path>', `Root directory; todos live in <path>/todo (default: ${DEFAULT_ROOT_DIR})`],
      ['--config, -c <path>', `Keymap file (default: ${getKeymapConfigPath()})`],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection(
      'Default keys',
      KeyActionSchema.options.map((action): [string, string] => [DEFAULT_KEYMAP[action], action.replace(/_/g, ' ')])
    ),
    '',
    formatSection('Notes', [
      ['<dir>/todo/<category>.md', 'One file per category, "- [ ] text" / "- [x] text" lines'],
      ['Ctrl+C', 'Save and exit'],
    ]),
  ];

  console.error(lines.join('\n'));
}

export function printVersion(version: string): void {
  console.log(version);
}

function formatSection(title: string, entries: [string, string][]): string {
  const width = Math.max(...entries.map(([key]) => key.length));
  const body = entries.map(([key, description]) => `  ${key.padEnd(width)}  ${description}`);
  return [`${title}:`, ...body].join('\n');
}
