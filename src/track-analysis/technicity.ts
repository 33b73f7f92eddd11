import type {
  EnvironmentTag,
  Exposure,
  GeometrySummary,
  MudIndex,
  TechnicityProfile,
} from '../types/analysis.types'
import type { SlopeSample } from '../types/track.types'
import { roundTo } from '../utils/geo'
import type { AnalysisConfig } from './analysis.config'

export type TechnicityOptions = {
  slopeSamples?: readonly SlopeSample[]
  elevationKnown?: boolean
}

// x / (x + scale): 0.5 at the scale, still rising beyond it
const soften = (value: number, scale: number) => (value > 0 ? value / (value + scale) : 0)

/**
 * Distance-weighted standard deviation of window slopes (%).
 */
export function slopeStdDev(samples: readonly SlopeSample[]): number {
  const totalM = samples.reduce((sum, s) => sum + s.distanceM, 0)
  if (totalM <= 0) return 0

  const mean = samples.reduce((sum, s) => sum + s.slopePct * s.distanceM, 0) / totalM
  const variance = samples.reduce((sum, s) => sum + (s.slopePct - mean) ** 2 * s.distanceM, 0) / totalM
  return Math.sqrt(variance)
}

export function computeTechnicityScore(
  geometry: GeometrySummary,
  config: AnalysisConfig,
  slopeSamples: readonly SlopeSample[] = [],
): number {
  const { weights, scales } = config.technicity
  const altitudeRangeM = Math.max(0, geometry.maxAltitudeM - geometry.minAltitudeM)

  const weighted =
    weights.maxSlope * soften(geometry.maxSlopePct, scales.maxSlopePct) +
    weights.avgUphillSlope * soften(geometry.avgUphillSlopePct, scales.avgUphillSlopePct) +
    weights.altitudeRange * soften(altitudeRangeM, scales.altitudeRangeM) +
    weights.slopeVariability * soften(slopeStdDev(slopeSamples), scales.slopeStdDevPct)

  return roundTo(Math.max(0, Math.min(100, weighted * 100)), 1)
}

export function deriveEnvironmentTags(
  geometry: GeometrySummary,
  config: AnalysisConfig,
  elevationKnown = true,
): EnvironmentTag[] {
  const t = config.technicity.tags
  const tags = new Set<EnvironmentTag>()

  // every tag reads altitude, so nothing is derived without it
  if (elevationKnown) {
    if (geometry.maxSlopePct <= t.urbanMaxSlopePct && geometry.minAltitudeM <= t.urbanMaxMinAltitudeM) {
      tags.add('URBAN')
    }

    if (geometry.maxAltitudeM >= t.highMountainMinAltitudeM) {
      tags.add('HIGH_MOUNTAIN')
      if (geometry.maxSlopePct >= t.skyrunningMinSlopePct) tags.add('SKYRUNNING')
    }

    const gainPerKm = geometry.totalDistanceKm > 0 ? geometry.elevationGainM / geometry.totalDistanceKm : 0
    if (gainPerKm >= t.verticalMinGainPerKmM) tags.add('VERTICAL')

    if (geometry.minAltitudeM <= t.coastalMaxMinAltitudeM) tags.add('COASTAL')

    if (
      geometry.avgAltitudeM >= t.forestMinAvgAltitudeM &&
      geometry.avgAltitudeM <= t.forestMaxAvgAltitudeM &&
      geometry.avgUphillSlopePct >= t.forestMinAvgUphillSlopePct
    ) {
      tags.add('FOREST')
    }
  }

  return [...tags].sort()
}

// Advisory: gentle low-altitude terrain holds water, steep or high terrain drains.
export function estimateMudIndex(
  geometry: GeometrySummary,
  tags: readonly EnvironmentTag[],
  config: AnalysisConfig,
): MudIndex {
  const m = config.technicity.mud
  if (tags.includes('URBAN')) return 'LOW'
  if (geometry.maxAltitudeM >= m.drainingMinAltitudeM || geometry.avgUphillSlopePct >= m.drainingMinAvgUphillSlopePct) {
    return 'LOW'
  }
  if (tags.includes('FOREST') && geometry.avgUphillSlopePct < m.wetForestMaxAvgUphillSlopePct) return 'HIGH'
  return 'MEDIUM'
}

export function estimateExposure(geometry: GeometrySummary, config: AnalysisConfig): Exposure {
  const x = config.technicity.exposure
  const { maxAltitudeM, maxSlopePct } = geometry
  if (
    maxAltitudeM >= x.extremeMinAltitudeM ||
    (maxAltitudeM >= x.extremeSteepMinAltitudeM && maxSlopePct >= x.extremeSteepMinSlopePct)
  ) {
    return 'EXTREME'
  }
  if (maxAltitudeM >= x.highMinAltitudeM || maxSlopePct >= x.highMinSlopePct) return 'HIGH'
  if (maxAltitudeM >= x.moderateMinAltitudeM || maxSlopePct >= x.moderateMinSlopePct) return 'MODERATE'
  return 'LOW'
}

export function scoreTechnicity(
  geometry: GeometrySummary,
  config: AnalysisConfig,
  opts: TechnicityOptions = {},
): TechnicityProfile {
  const elevationKnown = opts.elevationKnown ?? true
  const environmentTags = deriveEnvironmentTags(geometry, config, elevationKnown)

  return {
    technicityScore: computeTechnicityScore(geometry, config, opts.slopeSamples),
    environmentTags,
    mudIndex: elevationKnown ? estimateMudIndex(geometry, environmentTags, config) : 'UNKNOWN',
    exposure: elevationKnown ? estimateExposure(geometry, config) : 'UNKNOWN',
  }
}
