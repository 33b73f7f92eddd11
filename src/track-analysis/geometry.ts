import type { GeometrySummary } from '../types/analysis.types'
import type { NormalizedTrack, SlopeSample, TrackSegment } from '../types/track.types'
import { haversineDistanceM, roundTo } from '../utils/geo'
import type { AnalysisConfig } from './analysis.config'

export type CommittedElevation = {
  gainM: number
  lossM: number
  // signed committed legs in traversal order (> 0 climbing, < 0 descending)
  legsM: number[]
}

export type GeometryAnalysis = {
  summary: GeometrySummary
  segments: TrackSegment[]
  slopeSamples: SlopeSample[]
}

export function computeSegments(track: NormalizedTrack, config: AnalysisConfig): TrackSegment[] {
  const segments: TrackSegment[] = []
  let startKm = 0

  for (let i = 1; i < track.points.length; i++) {
    const from = track.points[i - 1]!
    const to = track.points[i]!
    const distanceM = haversineDistanceM(from, to, config.geometry.earthRadiusKm)
    segments.push({
      fromIndex: i - 1,
      startKm,
      distanceM,
      elevationDeltaM: to.elevation - from.elevation,
    })
    startKm += distanceM / 1000
  }

  return segments
}

/**
 * Noise-rejecting elevation accumulation.
 *
 * Until the profile has spanned `thresholdM` nothing is committed; the first
 * leg then starts at the opposite extreme of that opening span. A leg extends
 * to its extreme and is committed once the track turns back by at least
 * `thresholdM`. The leg in progress at the end is committed up to its
 * extreme. Sub-threshold movement before the first turning point and after
 * the last one is dropped at both ends alike, so reversing a profile swaps
 * gain and loss, and a clean monotonic climb commits its full rise.
 */
export function commitElevation(elevations: readonly number[], thresholdM: number): CommittedElevation {
  const legsM: number[] = []
  const first = elevations[0]
  if (first === undefined) return { gainM: 0, lossM: 0, legsM }

  const commit = (deltaM: number) => {
    if (deltaM !== 0) legsM.push(deltaM)
  }

  let low = first
  let high = first
  let anchor = first
  let extreme = first
  let trend: -1 | 0 | 1 = 0

  for (let i = 1; i < elevations.length; i++) {
    const e = elevations[i]!

    if (trend === 0) {
      low = Math.min(low, e)
      high = Math.max(high, e)
      if (high > low && high - low >= thresholdM) {
        // e is the new high or the new low of the opening span
        trend = e === high ? 1 : -1
        anchor = trend === 1 ? low : high
        extreme = e
      }
      continue
    }

    if (trend * (e - extreme) > 0) {
      extreme = e
    } else if (e !== extreme && Math.abs(extreme - e) >= thresholdM) {
      commit(extreme - anchor)
      anchor = extreme
      extreme = e
      trend = trend === 1 ? -1 : 1
    }
  }

  if (trend !== 0) commit(extreme - anchor)

  let gainM = 0
  let lossM = 0
  for (const leg of legsM) {
    if (leg > 0) gainM += leg
    else lossM -= leg
  }

  return { gainM, lossM, legsM }
}

/**
 * Groups consecutive segments into windows of at least `windowM` metres.
 * A short remainder is folded into the preceding window.
 */
export function computeSlopeSamples(segments: readonly TrackSegment[], windowM: number): SlopeSample[] {
  const windows: Array<{ distanceM: number; elevationDeltaM: number }> = []
  let distanceM = 0
  let elevationDeltaM = 0

  for (const segment of segments) {
    distanceM += segment.distanceM
    elevationDeltaM += segment.elevationDeltaM
    if (distanceM >= windowM && distanceM > 0) {
      windows.push({ distanceM, elevationDeltaM })
      distanceM = 0
      elevationDeltaM = 0
    }
  }

  if (distanceM > 0) {
    const previous = windows[windows.length - 1]
    if (previous) {
      previous.distanceM += distanceM
      previous.elevationDeltaM += elevationDeltaM
    } else {
      windows.push({ distanceM, elevationDeltaM })
    }
  }

  return windows.map((w) => ({ ...w, slopePct: (w.elevationDeltaM / w.distanceM) * 100 }))
}

export function computeGeometry(track: NormalizedTrack, config: AnalysisConfig): GeometryAnalysis {
  const segments = computeSegments(track, config)
  const slopeSamples = computeSlopeSamples(segments, config.geometry.slopeWindowM)
  const elevations = track.points.map((p) => p.elevation)
  const committed = commitElevation(elevations, config.geometry.elevationNoiseThresholdM)

  const totalM = segments.reduce((sum, s) => sum + s.distanceM, 0)

  let maxSlope = 0
  let uphillRiseM = 0
  let uphillRunM = 0
  for (const sample of slopeSamples) {
    maxSlope = Math.max(maxSlope, Math.abs(sample.slopePct))
    if (sample.elevationDeltaM > 0) {
      uphillRiseM += sample.elevationDeltaM
      uphillRunM += sample.distanceM
    }
  }

  const longestClimb = committed.legsM.reduce((best, leg) => Math.max(best, leg), 0)

  const summary: GeometrySummary = {
    totalDistanceKm: roundTo(totalM / 1000, 3),
    elevationGainM: roundTo(committed.gainM, 1),
    elevationLossM: roundTo(committed.lossM, 1),
    maxAltitudeM: roundTo(elevations.reduce((max, e) => Math.max(max, e), -Infinity), 1),
    minAltitudeM: roundTo(elevations.reduce((min, e) => Math.min(min, e), Infinity), 1),
    avgAltitudeM: roundTo(elevations.reduce((sum, e) => sum + e, 0) / elevations.length, 1),
    maxSlopePct: roundTo(maxSlope, 1),
    avgUphillSlopePct: uphillRunM > 0 ? roundTo((uphillRiseM / uphillRunM) * 100, 1) : 0,
    longestClimbM: roundTo(longestClimb, 1),
  }

  return { summary, segments, slopeSamples }
}

export function summarizeGeometry(track: NormalizedTrack, config: AnalysisConfig): GeometrySummary {
  return computeGeometry(track, config).summary
}
