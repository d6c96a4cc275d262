import { EARTH_RADIUS_M, haversineDistance } from './geo'

describe('haversineDistance', () => {
  it('is zero for identical points', () => {
    expect(haversineDistance(21.0122, 52.2297, 21.0122, 52.2297)).toBe(0)
  })

  it('is symmetric', () => {
    const pairs: Array<[number, number, number, number]> = [
      [21.0122, 52.2297, 19.945, 50.0647],
      [-0.1276, 51.5072, 2.3522, 48.8566],
      [179.9, -45, -179.9, 45],
    ]
    for (const [lon1, lat1, lon2, lat2] of pairs) {
      expect(haversineDistance(lon1, lat1, lon2, lat2)).toBeCloseTo(
        haversineDistance(lon2, lat2, lon1, lat1),
        9,
      )
    }
  })

  it('measures one degree of latitude on the equator', () => {
    expect(haversineDistance(0, 0, 0, 1)).toBeCloseTo(111194.927, 2)
  })

  it('stays finite for antipodal points', () => {
    const d = haversineDistance(0, 0, 180, 0)
    expect(Number.isNaN(d)).toBe(false)
    expect(d).toBeCloseTo(Math.PI * EARTH_RADIUS_M, 3)
  })
})
