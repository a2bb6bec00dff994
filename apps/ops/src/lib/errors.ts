// Exit codes follow sysexits(3) so wrapper scripts can tell failure classes apart.
export const ExitCode = {
  FAILURE: 1,
  USAGE: 64,
  NO_INPUT: 66,
  SOFTWARE: 70,
  CONFIG: 78,
} as const;

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public exitCode: number = ExitCode.FAILURE,
    public details?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('CONFIGURATION_ERROR', message, ExitCode.CONFIG, details);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, ExitCode.USAGE, details);
  }
}

export class DataUnavailableError extends AppError {
  constructor(resource: string) {
    super('DATA_UNAVAILABLE', `${resource} not found`, ExitCode.NO_INPUT);
  }
}

export class StoreOperationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('STORE_OPERATION_FAILED', message, ExitCode.SOFTWARE, undefined, { cause });
  }
}

// Postgres SQLSTATE for a statement cancelled by statement_timeout.
const PG_QUERY_CANCELED = '57014';

function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Normalise anything thrown by the driver into a StoreOperationError.
 * AppErrors pass through untouched.
 */
export function toStoreError(error: unknown, operation: string): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (pgErrorCode(error) === PG_QUERY_CANCELED) {
    return new StoreOperationError(`${operation} timed out`, error);
  }
  const reason = error instanceof Error ? error.message : 'Unknown error';
  return new StoreOperationError(`${operation} failed: ${reason}`, error);
}
