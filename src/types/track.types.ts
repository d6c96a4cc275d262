/**
 * One `trkpt` element as read from a GPX document, before any conversion.
 * Every field is the raw element text, or null when the element is absent.
 */
export type GpxTrackpoint = {
  lat: string | null
  lon: string | null
  ele: string | null
  time: string | null
  hr: string | null
}

export type HeartRateSample = {
  time: Date
  bpm: number
}

export type TrackPoint = {
  time: Date
  latitude: number
  longitude: number
  elevationMeters: number
  rawDistanceMeters: number
  heartRateBpm: number | null
}

export type CorrectedTrackPoint = TrackPoint & {
  distanceMeters: number
}

export type RescaledTrack = {
  ratio: number
  points: CorrectedTrackPoint[]
}
