import type { HeartRateSample } from '../types/track.types'
import { secondsBetween } from './time'

export type HeartRateMatchOptions = {
  /** samples at or beyond this many seconds from the target never match */
  toleranceSec: number
  /** the scan stops at the first sample closer than this */
  earlyExitSec: number
}

export const DEFAULT_HR_MATCH: HeartRateMatchOptions = {
  toleranceSec: 5,
  earlyExitSec: 0.5,
}

/**
 * Heart rate of the sample closest in time to `target`, scanning `samples` in
 * stored order.
 *
 * Not a true nearest-neighbour search: the first sample within `earlyExitSec`
 * ends the scan even if a later one is closer. Linear in the number of samples.
 */
export const findClosestHeartRate = (
  target: Date,
  samples: HeartRateSample[],
  options: HeartRateMatchOptions = DEFAULT_HR_MATCH,
): number | null => {
  let best: number | null = null
  let minDiff = options.toleranceSec

  for (const sample of samples) {
    const diff = Math.abs(secondsBetween(sample.time, target))
    if (diff < minDiff) {
      minDiff = diff
      best = sample.bpm
    }
    if (diff < options.earlyExitSec) break
  }

  return best
}
