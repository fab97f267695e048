export type AuditErrorCode =
  | 'MISSING_DEPENDENCY'
  | 'CONFIG_ERROR'
  | 'AUTH_ERROR'
  | 'FETCH_ERROR'
  | 'WRITE_ERROR';

export class AuditError extends Error {
  constructor(
    message: string,
    public code: AuditErrorCode,
    public cause?: Error
  ) {
    super(message);
    this.name = 'AuditError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class MissingDependencyError extends AuditError {
  constructor(message: string, public modules: string[]) {
    super(message, 'MISSING_DEPENDENCY');
    this.name = 'MissingDependencyError';
  }
}

export class ConfigurationError extends AuditError {
  constructor(message: string, public problems: string[] = []) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class AuthenticationError extends AuditError {
  constructor(message: string, cause?: Error) {
    super(message, 'AUTH_ERROR', cause);
    this.name = 'AuthenticationError';
  }
}

/**
 * `permission` failures need a role or consent change; `transient` ones
 * (throttling, 5xx, network) can simply be run again later.
 */
export type FetchFailureKind = 'permission' | 'transient' | 'unknown';

export class DirectoryFetchError extends AuditError {
  constructor(
    message: string,
    public kind: FetchFailureKind,
    public statusCode?: number,
    cause?: Error
  ) {
    super(message, 'FETCH_ERROR', cause);
    this.name = 'DirectoryFetchError';
  }
}

export class ReportWriteError extends AuditError {
  constructor(message: string, public path: string, cause?: Error) {
    super(message, 'WRITE_ERROR', cause);
    this.name = 'ReportWriteError';
  }
}

export const isAuditError = (error: unknown): error is AuditError =>
  error instanceof AuditError;

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
