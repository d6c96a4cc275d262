import { z } from 'zod'

export const MERGE_CONFIG = Symbol('MERGE_CONFIG')

export const mergeConfigSchema = z.object({
  workingDir: z.string().min(1),
  gpsFileName: z.string().min(1),
  heartRateFileName: z.string().min(1),
  outputFileName: z.string().min(1),
  heartRateToleranceSec: z.number().positive(),
  heartRateEarlyExitSec: z.number().nonnegative(),
  sport: z.string().min(1),
})

export type MergeConfig = z.infer<typeof mergeConfigSchema>

export const defaultMergeConfig = (): MergeConfig => ({
  workingDir: process.cwd(),
  gpsFileName: 'GPS.gpx',
  heartRateFileName: 'HR.gpx',
  outputFileName: 'output_fixed.tcx',
  heartRateToleranceSec: 5,
  heartRateEarlyExitSec: 0.5,
  sport: 'Running',
})
