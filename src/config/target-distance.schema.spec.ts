import { targetDistanceKmSchema } from './target-distance.schema'

describe('targetDistanceKmSchema', () => {
  it.each([
    ['10', 10],
    ['10.5', 10.5],
    ['10,5', 10.5],
    [' 21.1 ', 21.1],
    ['.5', 0.5],
    ['1e1', 10],
  ])('accepts %p as %p km', (input, expected) => {
    expect(targetDistanceKmSchema.parse(input)).toBe(expected)
  })

  it.each(['', 'abc', '0', '-5', '0x10', '1,2,3', 'Infinity', '12km'])('rejects %p', (input) => {
    expect(targetDistanceKmSchema.safeParse(input).success).toBe(false)
  })
})
