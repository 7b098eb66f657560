// Base error class for all commentlint errors
export class CommentlintError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'CommentlintError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends CommentlintError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for config file issues
export class ConfigError extends CommentlintError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Processing error for a file that could not be read or analyzed
export class ProcessingError extends CommentlintError {
  constructor(
    message: string,
    public readonly file: string
  ) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
