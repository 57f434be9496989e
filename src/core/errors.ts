/**
 * Base application error class for consistent error handling.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export const CONFIGURATION_ERROR = 'CONFIGURATION_ERROR';
export const MISSING_SNAPSHOT = 'MISSING_SNAPSHOT';
export const CONNECTWISE_API_ERROR = 'CONNECTWISE_API_ERROR';

/**
 * Raised before any network activity when required settings are absent or invalid.
 */
export class ConfigurationError extends AppError {
  public readonly missingKeys: string[];

  constructor(message: string, missingKeys: string[] = []) {
    super(CONFIGURATION_ERROR, message, { missingKeys });
    this.missingKeys = missingKeys;
  }
}

/**
 * Raised when a stage is resumed but the snapshot of the previous stage is not on disk.
 */
export class MissingSnapshotError extends AppError {
  public readonly snapshotPath: string;

  constructor(snapshotPath: string) {
    super(MISSING_SNAPSHOT, `Snapshot not found: ${snapshotPath}. Run the previous stage first.`, {
      snapshotPath,
    });
    this.snapshotPath = snapshotPath;
  }
}

export type ConnectWiseFailureKind = 'http' | 'network' | 'parse';

export class ConnectWiseApiError extends AppError {
  public readonly kind: ConnectWiseFailureKind;
  public readonly method: string;
  public readonly path: string;
  public readonly status?: number;

  constructor(
    message: string,
    options: { kind: ConnectWiseFailureKind; method: string; path: string; status?: number; responseData?: unknown }
  ) {
    super(CONNECTWISE_API_ERROR, message, {
      kind: options.kind,
      method: options.method,
      path: options.path,
      status: options.status,
      responseData: options.responseData,
    });
    this.kind = options.kind;
    this.method = options.method;
    this.path = options.path;
    this.status = options.status;
  }
}

export const isConnectWiseApiError = (error: unknown): error is ConnectWiseApiError =>
  error instanceof ConnectWiseApiError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
