/**
 * Application error taxonomy.
 *
 * Services throw `AppError`; the global error middleware in app.ts turns it
 * into `{ success: false, message, code }` with the matching HTTP status.
 * Anything else reaching that middleware is treated as `internal`.
 */
import { ZodError } from 'zod'

export type ErrorKind =
  | 'invalid_argument'
  | 'unauthenticated'
  | 'forbidden'
  | 'not_found'
  | 'invalid_state'
  | 'internal'

const HTTP_STATUS: Record<ErrorKind, number> = {
  invalid_argument: 400,
  unauthenticated: 401,
  forbidden: 403,
  not_found: 404,
  invalid_state: 400,
  internal: 500,
}

const CODES: Record<ErrorKind, string> = {
  invalid_argument: 'INVALID_ARGUMENT',
  unauthenticated: 'UNAUTHENTICATED',
  forbidden: 'FORBIDDEN',
  not_found: 'NOT_FOUND',
  invalid_state: 'INVALID_STATE',
  internal: 'INTERNAL_ERROR',
}

export class AppError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string) {
    super(message)
    this.name = 'AppError'
    this.kind = kind
  }

  get status(): number {
    return HTTP_STATUS[this.kind]
  }

  get code(): string {
    return CODES[this.kind]
  }

  static invalidArgument(message: string): AppError {
    return new AppError('invalid_argument', message)
  }

  static unauthenticated(message: string): AppError {
    return new AppError('unauthenticated', message)
  }

  static forbidden(message: string): AppError {
    return new AppError('forbidden', message)
  }

  static notFound(message: string): AppError {
    return new AppError('not_found', message)
  }

  static invalidState(message: string): AppError {
    return new AppError('invalid_state', message)
  }

  static internal(message: string): AppError {
    return new AppError('internal', message)
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError
}

// "customer_name: Required; quantity: Number must be greater than or equal to 1"
export function formatZodError(err: ZodError): string {
  return err.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}
