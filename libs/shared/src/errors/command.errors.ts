export type CommandParseErrorCode =
  | 'NO_CODE_BLOCK'
  | 'DIRECTIVE_SYNTAX'
  | 'UNRECOGNIZED_DIRECTIVE';

export class CommandParseError extends Error {
  constructor(
    readonly code: CommandParseErrorCode,
    message: string,
    readonly detail?: string,
  ) {
    super(message);
    this.name = 'CommandParseError';
  }

  static noCodeBlock(): CommandParseError {
    return new CommandParseError(
      'NO_CODE_BLOCK',
      'No fenced code block found in message',
    );
  }

  static directiveSyntax(line: string): CommandParseError {
    return new CommandParseError(
      'DIRECTIVE_SYNTAX',
      `Invalid directive "${line}": expected "# key: value"`,
      line,
    );
  }

  static unrecognizedDirective(key: string): CommandParseError {
    return new CommandParseError(
      'UNRECOGNIZED_DIRECTIVE',
      `Unrecognized directive "${key}"`,
      key,
    );
  }
}

export class TemplateError extends Error {
  constructor(
    message: string,
    readonly template: string,
  ) {
    super(message);
    this.name = 'TemplateError';
  }
}

export type ExecutionErrorCode = 'NO_AVAILABLE_EXECUTORS' | 'UNKNOWN_EXECUTOR';

export class ExecutionError extends Error {
  constructor(
    readonly code: ExecutionErrorCode,
    message: string,
    readonly executor?: string,
  ) {
    super(message);
    this.name = 'ExecutionError';
  }

  static noAvailableExecutors(): ExecutionError {
    return new ExecutionError(
      'NO_AVAILABLE_EXECUTORS',
      'No executors are configured',
    );
  }

  static unknownExecutor(name: string): ExecutionError {
    return new ExecutionError(
      'UNKNOWN_EXECUTOR',
      `Unknown executor "${name}"`,
      name,
    );
  }
}

export class QueueFullError extends Error {
  constructor(
    readonly active: number,
    readonly maxSize: number,
  ) {
    super(`Queue is full (${active}/${maxSize})`);
    this.name = 'QueueFullError';
  }
}

export class RegistryLoadError extends Error {
  constructor(
    readonly filePath: string,
    reason: string,
  ) {
    super(`Failed to load executors from ${filePath}: ${reason}`);
    this.name = 'RegistryLoadError';
  }
}
