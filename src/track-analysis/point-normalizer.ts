import type { NormalizedTrack, RawTrackPoint, TrackPoint } from '../types/track.types'
import { haversineDistanceM } from '../utils/geo'
import type { AnalysisConfig } from './analysis.config'
import { InsufficientDataError, MalformedPointError, TemporalOrderError } from './track-analysis.errors'

export type NormalizeOptions = {
  // timestamps feed the prediction, so a regression is an error instead of being dropped
  enforceTemporalOrder?: boolean
}

type WorkingPoint = {
  sourceIndex: number
  lat: number
  lon: number
  elevation: number | null
  timestampMs: number | null
}

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value)

function validatePoint(raw: RawTrackPoint, index: number, config: AnalysisConfig): WorkingPoint {
  const { minElevationM, maxElevationM } = config.normalizer

  if (!isFiniteNumber(raw.lat) || raw.lat < -90 || raw.lat > 90) {
    throw new MalformedPointError(`Point ${index}: latitude out of range`, index)
  }
  if (!isFiniteNumber(raw.lon) || raw.lon < -180 || raw.lon > 180) {
    throw new MalformedPointError(`Point ${index}: longitude out of range`, index)
  }

  let elevation: number | null = null
  if (raw.elevation != null) {
    if (!isFiniteNumber(raw.elevation) || raw.elevation < minElevationM || raw.elevation > maxElevationM) {
      throw new MalformedPointError(`Point ${index}: elevation out of range`, index)
    }
    elevation = raw.elevation
  }

  let timestampMs: number | null = null
  if (raw.timestamp != null) {
    timestampMs = Date.parse(raw.timestamp)
    if (!Number.isFinite(timestampMs)) {
      throw new MalformedPointError(`Point ${index}: unparseable timestamp`, index)
    }
  }

  return { sourceIndex: index, lat: raw.lat, lon: raw.lon, elevation, timestampMs }
}

function collapseDuplicates(points: WorkingPoint[]): WorkingPoint[] {
  const result: WorkingPoint[] = []
  for (const point of points) {
    const last = result[result.length - 1]
    if (last && last.lat === point.lat && last.lon === point.lon) {
      if (last.elevation === null && point.elevation !== null) last.elevation = point.elevation
      continue
    }
    result.push({ ...point })
  }
  return result
}

function orderTimestamps(points: WorkingPoint[], enforce: boolean): void {
  let lastMs: number | null = null
  for (const point of points) {
    if (point.timestampMs === null) continue
    if (lastMs !== null && point.timestampMs < lastMs) {
      if (enforce) {
        throw new TemporalOrderError(
          `Point ${point.sourceIndex}: timestamp earlier than the preceding point`,
          point.sourceIndex,
        )
      }
      point.timestampMs = null
      continue
    }
    lastMs = point.timestampMs
  }
}

function fillElevation(points: WorkingPoint[], config: AnalysisConfig): number[] {
  const known = points.flatMap((p, i) => (p.elevation === null ? [] : [i]))
  if (known.length === 0) return points.map(() => 0)

  const cumulativeM: number[] = [0]
  for (let i = 1; i < points.length; i++) {
    cumulativeM.push(
      cumulativeM[i - 1]! + haversineDistanceM(points[i - 1]!, points[i]!, config.geometry.earthRadiusKm),
    )
  }

  const elevations: number[] = []
  let k = 0 // position in `known` of the next known index at or after i
  for (let i = 0; i < points.length; i++) {
    const own = points[i]!.elevation
    if (own !== null) {
      elevations.push(own)
      if (known[k] === i) k++
      continue
    }

    const prevIdx = k > 0 ? known[k - 1] : undefined
    const nextIdx = known[k]

    // boundary gap: clamp to the nearest known value
    if (prevIdx === undefined || nextIdx === undefined) {
      const nearest = prevIdx ?? nextIdx
      elevations.push(nearest === undefined ? 0 : points[nearest]!.elevation ?? 0)
      continue
    }

    const from = points[prevIdx]!.elevation ?? 0
    const to = points[nextIdx]!.elevation ?? 0
    const span = cumulativeM[nextIdx]! - cumulativeM[prevIdx]!
    const fraction = span > 0 ? (cumulativeM[i]! - cumulativeM[prevIdx]!) / span : 0
    elevations.push(from + (to - from) * fraction)
  }
  return elevations
}

/**
 * Validates and cleans a raw point sequence into a NormalizedTrack.
 * Points are never reordered.
 */
export function normalizeTrack(
  raw: readonly RawTrackPoint[],
  config: AnalysisConfig,
  opts: NormalizeOptions = {},
): NormalizedTrack {
  const validated = raw.map((p, i) => validatePoint(p, i, config))
  const points = collapseDuplicates(validated)

  if (points.length < 2) {
    throw new InsufficientDataError(
      `Track needs at least 2 distinct points, got ${points.length}`,
    )
  }

  orderTimestamps(points, opts.enforceTemporalOrder ?? false)
  const elevations = fillElevation(points, config)

  const normalized: TrackPoint[] = points.map((p, i) => ({
    lat: p.lat,
    lon: p.lon,
    elevation: elevations[i]!,
    timestampMs: p.timestampMs,
  }))

  return {
    points: normalized,
    elevationKnown: points.some((p) => p.elevation !== null),
    timestamped: points.every((p) => p.timestampMs !== null),
  }
}
