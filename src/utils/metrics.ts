import type { RescaledTrack } from '../types/track.types'
import type { TrackSummary } from '../types/summary.types'
import { secondsBetween } from './time'

export const summarizeTrack = ({ ratio, points }: RescaledTrack): TrackSummary => {
  if (!points.length) {
    return {
      count: 0,
      durationSec: 0,
      rawDistanceM: 0,
      distanceM: 0,
      ratio,
      hrMatchedCount: 0,
      avgHr: null,
      maxHr: null,
      avgPaceSecPerKm: null,
    }
  }

  const first = points[0]
  const last = points[points.length - 1]
  const heartRates = points
    .map((p) => p.heartRateBpm)
    .filter((hr): hr is number => hr !== null)

  const durationSec = secondsBetween(first.time, last.time)
  const distanceM = last.distanceMeters

  const avgHr =
    heartRates.length > 0
      ? Math.round(heartRates.reduce((sum, hr) => sum + hr, 0) / heartRates.length)
      : null

  const maxHr = heartRates.length > 0 ? Math.max(...heartRates) : null

  const avgPaceSecPerKm = distanceM > 0 ? durationSec / (distanceM / 1000) : null

  return {
    count: points.length,
    durationSec,
    rawDistanceM: last.rawDistanceMeters,
    distanceM,
    ratio,
    hrMatchedCount: heartRates.length,
    avgHr,
    maxHr,
    avgPaceSecPerKm,
  }
}
