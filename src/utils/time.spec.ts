import { TimestampParseError } from '../errors/merge.errors'
import { formatTcxTime, parseInstant, secondsBetween } from './time'

describe('parseInstant', () => {
  it('reads a Z suffix as UTC', () => {
    expect(parseInstant('2024-05-01T06:00:00Z').toISOString()).toBe('2024-05-01T06:00:00.000Z')
  })

  it('keeps millisecond precision', () => {
    expect(parseInstant('2024-05-01T06:00:00.123Z').toISOString()).toBe('2024-05-01T06:00:00.123Z')
  })

  it('normalizes explicit offsets to UTC', () => {
    expect(parseInstant('2024-05-01T08:00:00+02:00').toISOString()).toBe('2024-05-01T06:00:00.000Z')
    expect(parseInstant('2024-05-01T06:00:00.5+02:00').toISOString()).toBe('2024-05-01T04:00:00.500Z')
  })

  it('treats a timestamp without offset as UTC', () => {
    expect(parseInstant('2024-05-01T06:00:00').toISOString()).toBe('2024-05-01T06:00:00.000Z')
  })

  it('drops an over-long fraction and retries as UTC', () => {
    expect(parseInstant('2024-05-01T06:00:00.1234567Z').toISOString()).toBe(
      '2024-05-01T06:00:00.000Z',
    )
  })

  it('drops the offset together with an over-long fraction', () => {
    expect(parseInstant('2024-05-01T08:00:00.1234567+02:00').toISOString()).toBe(
      '2024-05-01T08:00:00.000Z',
    )
  })

  it('throws TimestampParseError when both attempts fail', () => {
    expect(() => parseInstant('yesterday')).toThrow(TimestampParseError)
    expect(() => parseInstant('2024-13-01T00:00:00Z')).toThrow(TimestampParseError)
    expect(() => parseInstant('2024-02-30T00:00:00Z')).toThrow(TimestampParseError)
    expect(() => parseInstant('not-a-date.123')).toThrow("Unparseable timestamp: 'not-a-date.123'")
  })
})

describe('formatTcxTime', () => {
  it('prints UTC with a fixed .000 millisecond field', () => {
    expect(formatTcxTime(new Date('2024-05-01T06:00:00.789Z'))).toBe('2024-05-01T06:00:00.000Z')
    expect(formatTcxTime(parseInstant('2024-05-01T08:30:15+02:00'))).toBe('2024-05-01T06:30:15.000Z')
  })
})

describe('secondsBetween', () => {
  it('returns signed fractional seconds', () => {
    const a = new Date('2024-05-01T06:00:00.000Z')
    const b = new Date('2024-05-01T06:00:01.500Z')
    expect(secondsBetween(a, b)).toBe(1.5)
    expect(secondsBetween(b, a)).toBe(-1.5)
  })
})
