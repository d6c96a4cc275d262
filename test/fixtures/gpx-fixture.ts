export type FixturePoint = {
  lat: number
  lon: number
  time?: string
  ele?: number
  hr?: number
}

const trkpt = ({ lat, lon, time, ele, hr }: FixturePoint) => {
  const children = [
    ele !== undefined ? `        <ele>${ele}</ele>` : null,
    time !== undefined ? `        <time>${time}</time>` : null,
    hr !== undefined
      ? [
          '        <extensions>',
          '          <gpxtpx:TrackPointExtension>',
          `            <gpxtpx:hr>${hr}</gpxtpx:hr>`,
          '          </gpxtpx:TrackPointExtension>',
          '        </extensions>',
        ].join('\n')
      : null,
  ].filter((line): line is string => line !== null)

  return [`      <trkpt lat="${lat}" lon="${lon}">`, ...children, '      </trkpt>'].join('\n')
}

/** GPX 1.1 document with one track holding one segment per entry of `segments`. */
export const gpxDocument = (...segments: FixturePoint[][]): string =>
  [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<gpx version="1.1" creator="fixture" xmlns="http://www.topografix.com/GPX/1/1"',
    '     xmlns:gpxtpx="http://www.garmin.com/xmlschemas/TrackPointExtension/v1">',
    '  <trk>',
    ...segments.flatMap((points) => ['    <trkseg>', ...points.map(trkpt), '    </trkseg>']),
    '  </trk>',
    '</gpx>',
    '',
  ].join('\n')
