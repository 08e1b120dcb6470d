export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class DirectorySetupError extends Error {
  constructor(
    public readonly dirPath: string,
    cause?: unknown
  ) {
    super(`Cannot create todo directory ${dirPath}: ${describeError(cause)}`);
    this.name = 'DirectorySetupError';
  }
}

export class TodoFileError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly operation: 'read' | 'write',
    cause?: unknown
  ) {
    super(`Failed to ${operation} ${filePath}: ${describeError(cause)}`);
    this.name = 'TodoFileError';
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly configPath: string,
    detail: string
  ) {
    super(`Invalid keymap config ${configPath}: ${detail}`);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
