export class DaylogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DaylogError';
  }
}

export class ConfigError extends DaylogError {
  constructor(
    public readonly path: string,
    reason: string,
  ) {
    super(`Could not load configuration from ${path}: ${reason}`);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends DaylogError {
  constructor(
    message: string,
    public readonly issues: unknown[],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class InvalidInputError extends DaylogError {
  constructor(
    public readonly input: string,
    reason: string,
  ) {
    super(input ? `Invalid input "${input}": ${reason}` : `Invalid input: ${reason}`);
    this.name = 'InvalidInputError';
  }
}

export class TodoNotFoundError extends DaylogError {
  constructor(index: number, count: number) {
    super(
      count === 0
        ? `Todo #${index} not found: the todo list is empty.`
        : `Todo #${index} not found. Valid indexes are 1 to ${count}; run "daylog todo list" to see them.`,
    );
    this.name = 'TodoNotFoundError';
  }
}

export class MalformedFileError extends DaylogError {
  constructor(
    public readonly path: string,
    public readonly errors: string[],
  ) {
    super(`Refusing to rewrite ${path}: it has ${errors.length} parse error(s). Fix the file by hand first.`);
    this.name = 'MalformedFileError';
  }
}
