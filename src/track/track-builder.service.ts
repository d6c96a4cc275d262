import { Injectable } from '@nestjs/common'
import { EmptyTrackError, GpxFormatError } from '../errors/merge.errors'
import { HeartRateIndexService } from '../heart-rate/heart-rate-index.service'
import type { GpxTrackpoint, HeartRateSample, TrackPoint } from '../types/track.types'
import { haversineDistance } from '../utils/geo'
import { parseInstant } from '../utils/time'

type BuildState = {
  previous: TrackPoint | null
  runningDistance: number
  points: TrackPoint[]
}

const toNumber = (raw: string | null, field: string): number | null => {
  if (raw === null) return null
  const value = Number(raw)
  if (!raw.trim() || !Number.isFinite(value)) {
    throw new GpxFormatError(`Trackpoint ${field} '${raw}' is not a number`)
  }
  return value
}

const requireNumber = (raw: string | null, field: string): number => {
  const value = toNumber(raw, field)
  if (value === null) {
    throw new GpxFormatError(`Trackpoint is missing its ${field} attribute`)
  }
  return value
}

@Injectable()
export class TrackBuilderService {
  constructor(private readonly heartRateIndex: HeartRateIndexService) {}

  /**
   * Folds the GPS trackpoints into the merged series: points without a time are
   * dropped, raw distance accumulates point to point and each point gets the
   * closest heart-rate sample.
   *
   * @throws EmptyTrackError when no point has a time
   */
  build(trackpoints: GpxTrackpoint[], samples: HeartRateSample[], source?: string): TrackPoint[] {
    const initial: BuildState = { previous: null, runningDistance: 0, points: [] }

    const { points } = trackpoints.reduce<BuildState>((state, tp) => {
      if (tp.time === null) return state

      const time = parseInstant(tp.time)
      const latitude = requireNumber(tp.lat, 'lat')
      const longitude = requireNumber(tp.lon, 'lon')
      const elevationMeters = toNumber(tp.ele, 'ele') ?? 0.0

      const step = state.previous
        ? haversineDistance(state.previous.longitude, state.previous.latitude, longitude, latitude)
        : 0
      const runningDistance = state.runningDistance + step

      const point: TrackPoint = {
        time,
        latitude,
        longitude,
        elevationMeters,
        rawDistanceMeters: runningDistance,
        heartRateBpm: this.heartRateIndex.closest(time, samples),
      }
      state.points.push(point)

      return { previous: point, runningDistance, points: state.points }
    }, initial)

    if (!points.length) {
      throw new EmptyTrackError(source)
    }
    return points
  }
}
