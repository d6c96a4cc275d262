import { Injectable, Logger } from '@nestjs/common'
import { existsSync } from 'fs'
import { targetDistanceKmSchema } from '../config/target-distance.schema'
import { InvalidArgumentError, MergeError, MissingInputFileError } from '../errors/merge.errors'
import { MergeService } from './merge.service'
import type { MergeResult } from './merge.service'

export const USAGE = 'Usage: gpx-hr-merge <distance_km>'

export type CommandOutcome = {
  exitCode: number
  result: MergeResult | null
}

@Injectable()
export class MergeCommand {
  private readonly logger = new Logger(MergeCommand.name)

  constructor(private readonly mergeService: MergeService) {}

  run(argv: string[]): CommandOutcome {
    try {
      const targetKm = this.parseTargetKm(argv[0])
      this.logger.log(`--- Target Distance: ${targetKm} km ---`)

      // the heart-rate loader tolerates a missing file, the command does not
      for (const path of [this.mergeService.gpsPath, this.mergeService.heartRatePath]) {
        if (!existsSync(path)) throw new MissingInputFileError(path)
      }

      const result = this.mergeService.merge(targetKm * 1000)
      return { exitCode: 0, result }
    } catch (err) {
      if (!(err instanceof MergeError)) throw err

      this.logger.error(`ERROR: ${err.message}`)
      if (err instanceof InvalidArgumentError) this.logger.error(USAGE)
      return { exitCode: 1, result: null }
    }
  }

  private parseTargetKm(arg: string | undefined): number {
    if (arg === undefined) {
      throw new InvalidArgumentError('Target distance is missing!')
    }
    const parsed = targetDistanceKmSchema.safeParse(arg)
    if (!parsed.success) {
      throw new InvalidArgumentError(`'${arg}' is not a valid number.`)
    }
    return parsed.data
  }
}
