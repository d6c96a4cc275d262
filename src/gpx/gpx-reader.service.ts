import { Injectable } from '@nestjs/common'
import { existsSync, readFileSync } from 'fs'
import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { GpxFormatError, MissingInputFileError } from '../errors/merge.errors'
import type { GpxTrackpoint } from '../types/track.types'

type XmlNode = Record<string, unknown>

const ARRAY_TAGS = new Set(['trk', 'trkseg', 'trkpt'])

const parser = new XMLParser({
  ignoreAttributes: false,
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (tagName) => ARRAY_TAGS.has(tagName),
})

const isNode = (value: unknown): value is XmlNode =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const toArray = (value: unknown): unknown[] => {
  if (value === undefined || value === null) return []
  return Array.isArray(value) ? value : [value]
}

const textOf = (value: unknown): string | null => {
  if (typeof value === 'string') return value.length ? value : null
  if (typeof value === 'number') return String(value)
  if (Array.isArray(value)) return textOf(value[0])
  if (isNode(value)) return textOf(value['#text'])
  return null
}

/** First element named `key` below `node`, in document order. */
const findDescendant = (node: unknown, key: string): unknown => {
  for (const child of toArray(node)) {
    if (!isNode(child)) continue
    for (const [childKey, value] of Object.entries(child)) {
      if (childKey.startsWith('@_') || childKey === '#text') continue
      if (childKey === key) return value
      const found = findDescendant(value, key)
      if (found !== undefined) return found
    }
  }
  return undefined
}

@Injectable()
export class GpxReaderService {
  /**
   * Every `trkpt` of every `trk`/`trkseg`, in document order.
   * Namespace prefixes are dropped, so `gpxtpx:hr` is read as `hr`.
   */
  parse(xml: string, source = 'GPX document'): GpxTrackpoint[] {
    const validation = XMLValidator.validate(xml)
    if (validation !== true) {
      const { msg, line, col } = validation.err
      throw new GpxFormatError(`${source} is not well-formed XML (line ${line}, col ${col}): ${msg}`)
    }

    const result: unknown = parser.parse(xml)
    const gpx = isNode(result) ? result.gpx : undefined
    const trackpoints: GpxTrackpoint[] = []

    for (const trk of toArray(isNode(gpx) ? gpx.trk : undefined)) {
      for (const seg of toArray(isNode(trk) ? trk.trkseg : undefined)) {
        for (const pt of toArray(isNode(seg) ? seg.trkpt : undefined)) {
          if (!isNode(pt)) continue
          trackpoints.push({
            lat: textOf(pt['@_lat']),
            lon: textOf(pt['@_lon']),
            ele: textOf(pt.ele),
            time: textOf(pt.time),
            hr: textOf(findDescendant(pt.extensions, 'hr')),
          })
        }
      }
    }

    return trackpoints
  }

  /** @throws MissingInputFileError */
  readRequired(path: string): GpxTrackpoint[] {
    if (!existsSync(path)) {
      throw new MissingInputFileError(path)
    }
    return this.parse(readFileSync(path, 'utf8'), path)
  }

  /** `null` when the file does not exist. */
  readOptional(path: string): GpxTrackpoint[] | null {
    if (!existsSync(path)) return null
    return this.parse(readFileSync(path, 'utf8'), path)
  }
}
