export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineError';
  }
}

/** The condition could not be evaluated. Not the same as a false condition. */
export class ConditionError extends EngineError {
  constructor(
    message: string,
    public condition: string,
  ) {
    super(message);
    this.name = 'ConditionError';
  }
}

/**
 * A module action failed. `changed` reports whether side effects may
 * already have happened before the failure.
 */
export class ModuleError extends EngineError {
  constructor(
    public description: string,
    public changed: boolean,
  ) {
    super(description);
    this.name = 'ModuleError';
  }
}

export type LookupFailure = 'not_found' | 'non_numeric_index';

export class LookupError extends EngineError {
  constructor(
    public reason: LookupFailure,
    public path: string,
  ) {
    super(
      reason === 'non_numeric_index'
        ? `array index must be numeric at path ${path}`
        : `value not found at path ${path}`,
    );
    this.name = 'LookupError';
  }
}

export class PlaybookLoadError extends EngineError {
  constructor(
    message: string,
    public source: string,
  ) {
    super(message);
    this.name = 'PlaybookLoadError';
  }
}

/** An environment setting failed validation. */
export class ConfigError extends EngineError {
  constructor(
    message: string,
    public variable: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type StackFailure = 'not_found' | 'no_updates' | 'failed_status' | 'unrecognized_status' | 'timed_out' | 'api';

export class StackError extends EngineError {
  constructor(
    message: string,
    public reason: StackFailure,
    public stackName: string,
  ) {
    super(message);
    this.name = 'StackError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
