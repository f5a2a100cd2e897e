/**
 * Error types and codes for envkeep.
 *
 * Core operations return these inside a Result instead of throwing;
 * see ok() / fail() below.
 */
import type { Result } from '../types';

export const ErrorCodes = {
  NOT_FOUND: 'NOT_FOUND',
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  CORRUPT: 'CORRUPT',
  VERSION_MISMATCH: 'VERSION_MISMATCH',
  INCOMPATIBLE_PLATFORM: 'INCOMPATIBLE_PLATFORM',
  INCONSISTENT_STATE: 'INCONSISTENT_STATE',
  INVALID_NAME: 'INVALID_NAME',
  INVALID_REQUIREMENT: 'INVALID_REQUIREMENT',
  BACKEND_FAILED: 'BACKEND_FAILED',
  IO_ERROR: 'IO_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error for everything envkeep reports.
 */
export class EnvKeepError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EnvKeepError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function notFound(name: string, path?: string): EnvKeepError {
  return new EnvKeepError(ErrorCodes.NOT_FOUND, `Environment '${name}' not found`, { name, path });
}

export function alreadyExists(name: string): EnvKeepError {
  return new EnvKeepError(
    ErrorCodes.ALREADY_EXISTS,
    `Environment '${name}' already exists; choose another name or remove it first`,
    { name }
  );
}

export function corrupt(path: string, reason: string): EnvKeepError {
  return new EnvKeepError(ErrorCodes.CORRUPT, `Unreadable data at ${path}: ${reason}`, { path, reason });
}

export function inconsistent(name: string, message: string, path: string): EnvKeepError {
  return new EnvKeepError(ErrorCodes.INCONSISTENT_STATE, message, { name, path });
}

/**
 * Wrap an unexpected failure (fs, child process) as an IO_ERROR.
 */
export function ioError(message: string, cause: unknown): EnvKeepError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new EnvKeepError(ErrorCodes.IO_ERROR, `${message}: ${reason}`, { reason });
}

export function ok<T>(value: T): Extract<Result<T>, { ok: true }> {
  return { ok: true, value };
}

/**
 * A failed Result; assignable to Result<T> for any T.
 */
export function fail(error: EnvKeepError): Extract<Result<never>, { ok: false }> {
  return { ok: false, error };
}
