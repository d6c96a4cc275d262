import type { CorrectedTrackPoint } from '../types/track.types'
import { formatTcxTime } from '../utils/time'

export const TCX_NAMESPACE = 'http://www.garmin.com/xmlschemas/TrainingCenterDatabase/v2'

export type TcxActivity = {
  sport: string
  startTime: Date
  totalTimeSeconds: number
  distanceMeters: number
  points: CorrectedTrackPoint[]
}

const escapeXml = (s: string) =>
  s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')

const formatDistance = (meters: number) => meters.toFixed(2)

const indent = (depth: number, line: string) => `${'  '.repeat(depth)}${line}`

const trackpointLines = (tp: CorrectedTrackPoint): string[] => {
  const lines = [
    '<Trackpoint>',
    `  <Time>${formatTcxTime(tp.time)}</Time>`,
    '  <Position>',
    `    <LatitudeDegrees>${tp.latitude}</LatitudeDegrees>`,
    `    <LongitudeDegrees>${tp.longitude}</LongitudeDegrees>`,
    '  </Position>',
    `  <AltitudeMeters>${tp.elevationMeters}</AltitudeMeters>`,
    `  <DistanceMeters>${formatDistance(tp.distanceMeters)}</DistanceMeters>`,
  ]
  if (tp.heartRateBpm !== null) {
    lines.push('  <HeartRateBpm>', `    <Value>${tp.heartRateBpm}</Value>`, '  </HeartRateBpm>')
  }
  lines.push('</Trackpoint>')
  return lines
}

/** Single-activity, single-lap TCX document. */
export const buildTcx = (activity: TcxActivity): string => {
  const start = formatTcxTime(activity.startTime)

  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<TrainingCenterDatabase xmlns="${TCX_NAMESPACE}">`,
    indent(1, '<Activities>'),
    indent(2, `<Activity Sport="${escapeXml(activity.sport)}">`),
    indent(3, `<Id>${start}</Id>`),
    indent(3, `<Lap StartTime="${start}">`),
    indent(4, `<TotalTimeSeconds>${activity.totalTimeSeconds}</TotalTimeSeconds>`),
    indent(4, `<DistanceMeters>${formatDistance(activity.distanceMeters)}</DistanceMeters>`),
    indent(4, '<Intensity>Active</Intensity>'),
    indent(4, '<TriggerMethod>Manual</TriggerMethod>'),
    indent(4, '<Track>'),
    ...activity.points.flatMap((tp) => trackpointLines(tp).map((line) => indent(5, line))),
    indent(4, '</Track>'),
    indent(3, '</Lap>'),
    indent(2, '</Activity>'),
    indent(1, '</Activities>'),
    '</TrainingCenterDatabase>',
  ]

  return `${lines.join('\n')}\n`
}
