import { TimestampParseError } from '../errors/merge.errors'

// YYYY-MM-DD[T ]HH:MM[:SS[.f{1,6}]][±HH[:]MM]
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(?:([+-])(\d{2}):?(\d{2}))?$/

const UTC_OFFSET = '+00:00'

const parseIso = (text: string): Date | null => {
  const match = ISO_PATTERN.exec(text)
  if (!match) return null

  const [, y, mo, d, h, mi, s, frac, sign, offH, offM] = match
  const year = Number(y)
  const month = Number(mo)
  const day = Number(d)
  const hour = Number(h)
  const minute = Number(mi)
  const second = s === undefined ? 0 : Number(s)
  const ms = frac === undefined ? 0 : Math.floor(Number(frac.padEnd(6, '0')) / 1000)

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate()
  if (day < 1 || day > daysInMonth) return null

  // No offset in the text: the value is taken as UTC.
  let offsetMin = 0
  if (sign !== undefined) {
    const oh = Number(offH)
    const om = Number(offM)
    if (oh > 23 || om > 59) return null
    offsetMin = (sign === '-' ? -1 : 1) * (oh * 60 + om)
  }

  const wallClock = Date.UTC(year, month - 1, day, hour, minute, second, ms)
  // Date.UTC maps years 0-99 onto 1900-1999
  const date = new Date(wallClock)
  date.setUTCFullYear(year)
  return new Date(date.getTime() - offsetMin * 60_000)
}

/**
 * Turns GPX timestamp text into an instant.
 *
 * A literal `Z` is rewritten to `+00:00` first. If the result does not parse,
 * everything from the first `.` on is dropped (fractional seconds and any offset
 * after them) and `+00:00` is appended before a second attempt.
 *
 * @throws TimestampParseError when neither attempt succeeds
 */
export const parseInstant = (text: string): Date => {
  const normalized = text.replace(/Z/g, UTC_OFFSET)

  const parsed = parseIso(normalized)
  if (parsed) return parsed

  if (normalized.includes('.')) {
    const truncated = `${normalized.split('.')[0]}${UTC_OFFSET}`
    const retried = parseIso(truncated)
    if (retried) return retried
  }

  throw new TimestampParseError(text)
}

/** `YYYY-MM-DDTHH:MM:SS.000Z`, always in UTC. */
export const formatTcxTime = (date: Date): string =>
  `${date.toISOString().slice(0, 19)}.000Z`

export const secondsBetween = (from: Date, to: Date): number =>
  (to.getTime() - from.getTime()) / 1000
