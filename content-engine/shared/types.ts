// Core result types shared by all content-engine modules

export type ModuleError = {
  code: string;
  module: string;
  data: Record<string, unknown>;
  correlationId: string;
};

export type Result<T, E> = {
  isSuccess(): this is { value: T };
  isError(): this is { errors: E };
  value?: T;
  errors?: E;
};

class Success<T> {
  constructor(readonly value: T) {}

  isSuccess(): this is { value: T } {
    return true;
  }

  isError(): this is { errors: never } {
    return false;
  }
}

class Failure<E> {
  constructor(readonly errors: E) {}

  isSuccess(): this is { value: never } {
    return false;
  }

  isError(): this is { errors: E } {
    return true;
  }
}

export function Ok<T>(value: T): Result<T, never> {
  return new Success(value);
}

export function Err<E>(errors: E): Result<never, E> {
  return new Failure(errors);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Correlation ids tie the log lines of one generation run together
 */
export function generateCorrelationId(prefix: string = 'asg'): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}
