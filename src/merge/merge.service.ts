import { Inject, Injectable, Logger } from '@nestjs/common'
import { join } from 'path'
import { MERGE_CONFIG } from '../config/merge.config'
import type { MergeConfig } from '../config/merge.config'
import { GpxReaderService } from '../gpx/gpx-reader.service'
import { HeartRateIndexService } from '../heart-rate/heart-rate-index.service'
import { TcxWriterService } from '../tcx/tcx-writer.service'
import { TrackBuilderService } from '../track/track-builder.service'
import type { TrackSummary } from '../types/summary.types'
import { summarizeTrack } from '../utils/metrics'
import { rescaleDistances } from '../utils/rescale'

export type MergeResult = {
  outputPath: string
  summary: TrackSummary
}

@Injectable()
export class MergeService {
  private readonly logger = new Logger(MergeService.name)

  constructor(
    @Inject(MERGE_CONFIG) private readonly config: MergeConfig,
    private readonly gpxReader: GpxReaderService,
    private readonly heartRateIndex: HeartRateIndexService,
    private readonly trackBuilder: TrackBuilderService,
    private readonly tcxWriter: TcxWriterService,
  ) {}

  get gpsPath(): string {
    return join(this.config.workingDir, this.config.gpsFileName)
  }

  get heartRatePath(): string {
    return join(this.config.workingDir, this.config.heartRateFileName)
  }

  get outputPath(): string {
    return join(this.config.workingDir, this.config.outputFileName)
  }

  /**
   * Runs the whole pipeline once: heart-rate index, GPS track, distance
   * correction, TCX output. Nothing is written unless every earlier stage
   * succeeds.
   */
  merge(targetMeters: number): MergeResult {
    const samples = this.heartRateIndex.load(this.heartRatePath)
    this.logger.log(`Loaded ${samples.length} heart rate points.`)

    const gpsPoints = this.gpxReader.readRequired(this.gpsPath)
    const track = this.trackBuilder.build(gpsPoints, samples, this.gpsPath)

    const rawTotal = track[track.length - 1].rawDistanceMeters
    this.logger.log(`Original GPS Distance: ${(rawTotal / 1000).toFixed(3)} km`)

    const rescaled = rescaleDistances(track, targetMeters)
    this.logger.log(`Correction Factor: ${rescaled.ratio.toFixed(4)}`)

    const summary = summarizeTrack(rescaled)
    this.logger.log(
      `Heart rate matched on ${summary.hrMatchedCount}/${summary.count} points` +
        (summary.avgHr !== null ? ` (avg ${summary.avgHr}, max ${summary.maxHr} bpm)` : ''),
    )

    const outputPath = this.outputPath
    this.tcxWriter.write(outputPath, {
      sport: this.config.sport,
      startTime: rescaled.points[0].time,
      totalTimeSeconds: summary.durationSec,
      distanceMeters: summary.distanceM,
      points: rescaled.points,
    })
    this.logger.log(`Success! Created file: ${outputPath}`)

    return { outputPath, summary }
  }
}
