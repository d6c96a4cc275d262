import type { CorrectedTrackPoint } from '../types/track.types'
import { summarizeTrack } from './metrics'

const point = (sec: number, raw: number, hr: number | null): CorrectedTrackPoint => ({
  time: new Date(Date.UTC(2024, 4, 1, 6, 0, sec)),
  latitude: 52,
  longitude: 21,
  elevationMeters: 0,
  rawDistanceMeters: raw,
  distanceMeters: raw * 2,
  heartRateBpm: hr,
})

describe('summarizeTrack', () => {
  it('summarizes duration, distance and matched heart rate', () => {
    const summary = summarizeTrack({
      ratio: 2,
      points: [point(0, 0, null), point(10, 50, 120), point(20, 100, 131)],
    })

    expect(summary).toMatchObject({
      count: 3,
      durationSec: 20,
      rawDistanceM: 100,
      distanceM: 200,
      ratio: 2,
      hrMatchedCount: 2,
      avgHr: 126,
      maxHr: 131,
    })
    expect(summary.avgPaceSecPerKm).toBeCloseTo(100, 6)
  })

  it('reports no heart rate and no pace for a single bare point', () => {
    expect(summarizeTrack({ ratio: 1, points: [point(0, 0, null)] })).toEqual({
      count: 1,
      durationSec: 0,
      rawDistanceM: 0,
      distanceM: 0,
      ratio: 1,
      hrMatchedCount: 0,
      avgHr: null,
      maxHr: null,
      avgPaceSecPerKm: null,
    })
  })
})
