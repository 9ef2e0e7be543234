export class FeedkeeperError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'FeedkeeperError';
  }
}

export class ConfigError extends FeedkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends FeedkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class InvalidSourceTypeError extends FeedkeeperError {
  constructor(
    public readonly sourceType: string,
    validTypes: readonly string[],
  ) {
    super(`Invalid source type: ${sourceType}. Valid types: ${validTypes.join(', ')}`, 'INVALID_SOURCE_TYPE', {
      sourceType,
    });
    this.name = 'InvalidSourceTypeError';
  }
}

export class SourceError extends FeedkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

export class ParseError extends FeedkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}

export class TranscriptionError extends FeedkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSCRIPTION_ERROR', details);
    this.name = 'TranscriptionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
