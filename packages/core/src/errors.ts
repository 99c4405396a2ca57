import type { ConfigError } from './config';

export type StabilizerErrorCode = 'DUPLICATE_NAME' | 'NOT_FOUND' | 'INVALID_CONFIGURATION' | 'INVALID_TIMESTAMP';

export class StabilizerError extends Error {
  readonly code: StabilizerErrorCode;
  readonly debug?: unknown;

  constructor(code: StabilizerErrorCode, message: string, debug?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (debug !== undefined) this.debug = debug;
  }
}

export class DuplicateNameError extends StabilizerError {
  constructor(readonly signalName: string) {
    super('DUPLICATE_NAME', `signal '${signalName}' already exists`, { name: signalName });
  }
}

export class NotFoundError extends StabilizerError {
  constructor(readonly signalName: string) {
    super('NOT_FOUND', `signal '${signalName}' does not exist`, { name: signalName });
  }
}

export class InvalidConfigurationError extends StabilizerError {
  constructor(readonly errors: ConfigError[]) {
    super(
      'INVALID_CONFIGURATION',
      errors.length
        ? `invalid configuration: ${errors.map((e) => `${e.path} (${e.message})`).join('; ')}`
        : 'invalid configuration',
      errors,
    );
  }
}

export class InvalidTimestampError extends StabilizerError {
  constructor(readonly timestamp: number) {
    super('INVALID_TIMESTAMP', `timestamp must be a finite number of seconds, got ${timestamp}`, { timestamp });
  }
}

export function isStabilizerError(err: unknown): err is StabilizerError {
  return err instanceof StabilizerError;
}
