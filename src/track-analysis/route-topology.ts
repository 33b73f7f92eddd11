import type { GeometrySummary, RouteType, TopologyReport } from '../types/analysis.types'
import type { NormalizedTrack, TrackPoint } from '../types/track.types'
import {
  distanceToSegmentM,
  haversineDistanceM,
  interpolateLatLon,
  roundTo,
  type LatLon,
} from '../utils/geo'
import type { AnalysisConfig } from './analysis.config'

type Overlap = {
  ratio: number
  medianDistanceM: number | null
}

/**
 * Resamples a polyline at `count` equally spaced positions along its length,
 * first and last vertex included.
 */
export function resampleByDistance(
  points: readonly LatLon[],
  count: number,
  earthRadiusKm: number,
): LatLon[] {
  const first = points[0]
  if (!first) return []
  if (points.length === 1 || count < 2) return [first]

  const cumulative: number[] = [0]
  for (let i = 1; i < points.length; i++) {
    cumulative.push(cumulative[i - 1]! + haversineDistanceM(points[i - 1]!, points[i]!, earthRadiusKm))
  }
  const total = cumulative[cumulative.length - 1]!
  if (total === 0) return [first]

  const samples: LatLon[] = []
  let seg = 1
  for (let k = 0; k < count; k++) {
    const target = (total * k) / (count - 1)
    while (seg < points.length - 1 && cumulative[seg]! < target) seg++
    const start = cumulative[seg - 1]!
    const span = cumulative[seg]! - start
    const fraction = span > 0 ? Math.min(1, Math.max(0, (target - start) / span)) : 0
    samples.push(interpolateLatLon(points[seg - 1]!, points[seg]!, fraction))
  }
  return samples
}

function median(values: number[]): number | null {
  if (values.length === 0) return null
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  return sorted.length % 2 === 1 ? sorted[mid]! : (sorted[mid - 1]! + sorted[mid]!) / 2
}

function farthestFromStart(points: readonly TrackPoint[], earthRadiusKm: number): number {
  const start = points[0]!
  let bestIdx = 0
  let bestM = -1
  for (let i = 1; i < points.length; i++) {
    const d = haversineDistanceM(start, points[i]!, earthRadiusKm)
    if (d > bestM) {
      bestM = d
      bestIdx = i
    }
  }
  return bestIdx
}

/**
 * How much of the outbound leg (start → turnaround) is retraced by the
 * return leg. Both legs are resampled to at most `maxOverlapSamples`
 * positions, so the work is bounded whatever the track length.
 */
export function measureOverlap(track: NormalizedTrack, config: AnalysisConfig): Overlap {
  const { maxOverlapSamples, overlapDistanceM } = config.topology
  const radius = config.geometry.earthRadiusKm
  const turn = farthestFromStart(track.points, radius)

  const outbound = track.points.slice(0, turn + 1)
  const inbound = track.points.slice(turn)
  if (outbound.length < 2 || inbound.length < 2) {
    return { ratio: 0, medianDistanceM: null }
  }

  const outSamples = resampleByDistance(outbound, maxOverlapSamples, radius)
  const backSamples = resampleByDistance(inbound, maxOverlapSamples, radius)
  if (backSamples.length < 2) return { ratio: 0, medianDistanceM: null }

  const nearest = outSamples.map((p) => {
    let best = Infinity
    for (let j = 1; j < backSamples.length; j++) {
      best = Math.min(best, distanceToSegmentM(p, backSamples[j - 1]!, backSamples[j]!, radius))
    }
    return best
  })

  const within = nearest.filter((d) => d <= overlapDistanceM).length
  return { ratio: within / nearest.length, medianDistanceM: median(nearest) }
}

export function classifyRoute(
  track: NormalizedTrack,
  geometry: GeometrySummary,
  config: AnalysisConfig,
): TopologyReport {
  const cfg = config.topology
  const first = track.points[0]!
  const last = track.points[track.points.length - 1]!
  const closureM = haversineDistanceM(first, last, config.geometry.earthRadiusKm)
  const totalM = geometry.totalDistanceKm * 1000

  const loopCandidate = closureM <= cfg.loopClosureRatio * totalM
  const closesForOutAndBack = closureM <= cfg.outAndBackClosureRatio * totalM

  const overlap: Overlap = closesForOutAndBack ? measureOverlap(track, config) : { ratio: 0, medianDistanceM: null }
  const retraced =
    overlap.medianDistanceM !== null &&
    overlap.medianDistanceM < cfg.overlapDistanceM &&
    overlap.ratio > cfg.overlapMajority

  let routeType: RouteType
  if (loopCandidate) {
    routeType = retraced && overlap.ratio > cfg.outAndBackPrecedenceRatio ? 'OUT_AND_BACK' : 'LOOP'
  } else if (closesForOutAndBack && retraced) {
    routeType = 'OUT_AND_BACK'
  } else {
    routeType = 'POINT_TO_POINT'
  }

  return {
    routeType,
    closureDistanceM: roundTo(closureM, 1),
    overlapRatio: roundTo(overlap.ratio, 3),
    medianOverlapDistanceM: overlap.medianDistanceM === null ? null : roundTo(overlap.medianDistanceM, 1),
  }
}
