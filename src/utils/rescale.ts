import type { RescaledTrack, TrackPoint } from '../types/track.types'

/** 1.0 when the raw total is zero, since nothing can be scaled. */
export const correctionRatio = (rawTotalMeters: number, targetMeters: number): number =>
  rawTotalMeters > 0 ? targetMeters / rawTotalMeters : 1.0

/**
 * Scales every point's raw cumulative distance so the last point lands on
 * `targetMeters`. Returns new points; the input is left untouched.
 */
export const rescaleDistances = (points: TrackPoint[], targetMeters: number): RescaledTrack => {
  const rawTotal = points.length ? points[points.length - 1].rawDistanceMeters : 0
  const ratio = correctionRatio(rawTotal, targetMeters)

  return {
    ratio,
    points: points.map((point) => ({
      ...point,
      distanceMeters: point.rawDistanceMeters * ratio,
    })),
  }
}
