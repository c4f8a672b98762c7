export class IndexError extends Error {
  constructor(
    message: string,
    public readonly index: number,
    public readonly size: number,
  ) {
    super(message);
    this.name = 'IndexError';
  }
}

export class UnknownConnectionError extends Error {
  constructor(public readonly ref: string) {
    super(`Unknown connection: ${ref}`);
    this.name = 'UnknownConnectionError';
  }
}

export class AmbiguousConnectionError extends Error {
  constructor(
    public readonly ref: string,
    public readonly matches: readonly string[],
  ) {
    super(`Connection name "${ref}" matches ${matches.length} connections (${matches.join(', ')}); use an id`);
    this.name = 'AmbiguousConnectionError';
  }
}

export class ConnectionValidationError extends Error {
  constructor(public readonly problems: readonly string[]) {
    super(`Invalid connection: ${problems.join('; ')}`);
    this.name = 'ConnectionValidationError';
  }
}

/** Bad command-line usage: unknown command, missing argument, unknown flag. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
