import { z } from 'zod'
import { AppError, formatZodError } from './errors'

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

/** True for a real calendar date written as YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false
  const time = Date.parse(`${value}T00:00:00Z`)
  return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value
}

export const isoDate = z.string().refine(isIsoDate, 'Expected a date as YYYY-MM-DD')

export const positiveInt = z.coerce.number().int().positive()

/** Parses untrusted input, turning a schema failure into an invalid_argument error. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value)
  if (!result.success) throw AppError.invalidArgument(formatZodError(result.error))
  return result.data
}

export function parseId(value: string | undefined, label: string): number {
  const result = positiveInt.safeParse(value)
  if (!result.success) throw AppError.invalidArgument(`Invalid ${label} ID`)
  return result.data
}
