import { ErrorCode } from './codes.js';

/** Plain form of a {@link PermissionEngineError}, as written to logs or a wire. */
export interface PermissionEngineErrorJSON {
  readonly name: 'PermissionEngineError';
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: unknown;
}

export class PermissionEngineError extends Error {
  readonly code: ErrorCode;
  readonly details: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'PermissionEngineError';
    this.code = code;
    this.details = details;
  }

  /** A channel or server the directory does not know. */
  static notFound(entity: 'Channel' | 'Server', id: string): PermissionEngineError {
    return new PermissionEngineError(ErrorCode.NOT_FOUND, `${entity} "${id}" not found`, {
      entity,
      id,
    });
  }

  toJSON(): PermissionEngineErrorJSON {
    return this.details === undefined
      ? { name: 'PermissionEngineError', code: this.code, message: this.message }
      : { name: 'PermissionEngineError', code: this.code, message: this.message, details: this.details };
  }
}
