/**
 * Common Types
 *
 * Shared types used across multiple modules: Result and errors.
 */

// Result Types
export type ApiErrorType =
  | 'network'
  | 'http'
  | 'decoding'
  | 'parse'
  | 'missing_link'
  | 'config'

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  readonly url?: string | undefined
  readonly status?: number | undefined
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }

export function ok<T>(value: T): Result<T> {
  return { ok: true, value }
}

export function fail<T = never>(error: ApiError): Result<T> {
  return { ok: false, error }
}

/**
 * Render an error message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
