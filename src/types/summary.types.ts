export type TrackSummary = {
  count: number
  durationSec: number
  rawDistanceM: number
  distanceM: number
  ratio: number
  hrMatchedCount: number
  avgHr: number | null
  maxHr: number | null
  avgPaceSecPerKm: number | null
}
