import { z } from 'zod'

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/** Kilometres as typed by the user; `,` is accepted as the decimal separator. */
export const targetDistanceKmSchema = z
  .string()
  .trim()
  .transform((raw) => raw.replace(/,/g, '.'))
  .pipe(z.string().regex(DECIMAL_PATTERN))
  .transform((raw) => Number(raw))
  .pipe(z.number().finite().positive())
