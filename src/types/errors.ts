/**
 * Type-safe error handling utilities
 */

/**
 * Type guard to check if a value is an Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Convert unknown error to Error instance
 */
export function toError(error: unknown): Error {
  if (isError(error)) {
    return error;
  }
  if (typeof error === 'string') {
    return new Error(error);
  }
  if (typeof error === 'object' && error !== null) {
    return new Error(JSON.stringify(error));
  }
  return new Error(String(error));
}

/**
 * Safely get error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Node.js system error with code
 */
export interface NodeError extends Error {
  code?: string;
  errno?: number;
  syscall?: string;
  path?: string;
}

/**
 * Type guard for Node.js system errors
 */
export function isNodeError(error: unknown): error is NodeError {
  return isError(error) && 'code' in error;
}

/**
 * Error raised by a child process started through execFile
 */
export interface ExecError extends NodeError {
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
}

export function isExecError(error: unknown): error is ExecError {
  return isError(error) && ('stderr' in error || 'killed' in error);
}

/**
 * Stage-level failure codes of a scan job
 */
export const SCAN_ERROR_CODES = [
  'INFRA_ERROR',
  'FETCH_ERROR',
  'FETCH_TIMEOUT',
  'TIMEOUT',
  'MISSING_OUTPUT',
  'MALFORMED_OUTPUT',
  'ARTIFACT_WRITE_ERROR',
] as const;

export type ScanErrorCode = (typeof SCAN_ERROR_CODES)[number];

export class ScanError extends Error {
  readonly code: ScanErrorCode;
  /** Diagnostic output (tool stderr, container logs) when available */
  readonly logs?: string;

  constructor(code: ScanErrorCode, message: string, opts?: { logs?: string; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'ScanError';
    this.code = code;
    this.logs = opts?.logs;
  }
}

export function isScanError(error: unknown): error is ScanError {
  return error instanceof ScanError;
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}
