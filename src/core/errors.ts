export class LambdaError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LambdaError';
  }
}

export class ConfigError extends LambdaError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class StoreError extends LambdaError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORE_ERROR', 'persist', cause);
    this.name = 'StoreError';
  }
}

export class ValidationError extends LambdaError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'VALIDATION_ERROR', 'request');
    this.name = 'ValidationError';
  }
}

export class ImprovementError extends LambdaError {
  constructor(message: string, public readonly kind: string, cause?: Error) {
    super(message, 'IMPROVEMENT_ERROR', 'regenerative', cause);
    this.name = 'ImprovementError';
  }
}

/** Normalize anything thrown into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
