#!/usr/bin/env node
import { CliUsageError } from './cli/errors.js';
import { parseFlags } from './cli/flag-utils.js';
import { printHelp, printVersion } from './cli/help.js';
import { handleInteractiveCommand } from './cli/interactive-command.js';

const VERSION = '0.1.0';

async function run(argv: string[]): Promise<number> {
  const { switches, rest } = parseFlags(argv, {
    switches: { '--help': 'help', '-h': 'help', '--version': 'version', '-v': 'version' },
  });

  if (switches.has('help')) {
    printHelp();
    return 0;
  }
  if (switches.has('version')) {
    printVersion(VERSION);
    return 0;
  }

  try {
    await handleInteractiveCommand(rest);
    return 0;
  } catch (error) {
    if (error instanceof CliUsageError) {
      printHelp(error.message);
      return 1;
    }
    if (!(error instanceof Error)) throw error;
    console.error(`Error: ${error.message}`);
    return 1;
  }
}

// terminal-kit keeps stdin referenced after the session ends, so exit explicitly.
run(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('Unexpected error:', error);
    process.exit(1);
  }
);
