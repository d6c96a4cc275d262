import { Inject, Injectable, Logger } from '@nestjs/common'
import { MERGE_CONFIG } from '../config/merge.config'
import type { MergeConfig } from '../config/merge.config'
import { GpxFormatError } from '../errors/merge.errors'
import { GpxReaderService } from '../gpx/gpx-reader.service'
import type { GpxTrackpoint, HeartRateSample } from '../types/track.types'
import { findClosestHeartRate } from '../utils/heart-rate'
import { parseInstant } from '../utils/time'

const INTEGER_PATTERN = /^[+-]?\d+$/

@Injectable()
export class HeartRateIndexService {
  private readonly logger = new Logger(HeartRateIndexService.name)

  constructor(
    private readonly gpxReader: GpxReaderService,
    @Inject(MERGE_CONFIG) private readonly config: MergeConfig,
  ) {}

  /**
   * Heart-rate samples in file order. A missing file yields an empty index;
   * the run then carries on without heart rate.
   */
  load(path: string): HeartRateSample[] {
    const trackpoints = this.gpxReader.readOptional(path)
    if (trackpoints === null) {
      this.logger.warn(`Heart-rate file ${path} not found, continuing without heart rate`)
      return []
    }
    return this.toSamples(trackpoints)
  }

  toSamples(trackpoints: GpxTrackpoint[]): HeartRateSample[] {
    return trackpoints.reduce<HeartRateSample[]>((samples, tp) => {
      if (tp.time === null) return samples
      const time = parseInstant(tp.time)
      const bpm = this.parseBpm(tp.hr)
      // 0 bpm is a sensor gap, not a reading
      if (bpm !== null && bpm > 0) samples.push({ time, bpm })
      return samples
    }, [])
  }

  closest(target: Date, samples: HeartRateSample[]): number | null {
    return findClosestHeartRate(target, samples, {
      toleranceSec: this.config.heartRateToleranceSec,
      earlyExitSec: this.config.heartRateEarlyExitSec,
    })
  }

  private parseBpm(raw: string | null): number | null {
    if (raw === null) return null
    const trimmed = raw.trim()
    if (!INTEGER_PATTERN.test(trimmed)) {
      throw new GpxFormatError(`Heart-rate value '${raw}' is not an integer`)
    }
    return Number(trimmed)
  }
}
