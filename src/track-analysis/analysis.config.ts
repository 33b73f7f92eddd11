import type { Archetype } from '../types/analysis.types'

export type FitnessCurvePoint = {
  readonly index: number
  readonly speedKmh: number
}

export type NormalizerConfig = {
  readonly minElevationM: number
  readonly maxElevationM: number
}

export type GeometryConfig = {
  readonly earthRadiusKm: number
  readonly elevationNoiseThresholdM: number
  readonly slopeWindowM: number
}

export type TopologyConfig = {
  readonly loopClosureRatio: number
  readonly outAndBackClosureRatio: number
  readonly overlapDistanceM: number
  readonly overlapMajority: number
  readonly outAndBackPrecedenceRatio: number
  readonly maxOverlapSamples: number
}

export type TechnicityConfig = {
  readonly weights: {
    readonly maxSlope: number
    readonly avgUphillSlope: number
    readonly altitudeRange: number
    readonly slopeVariability: number
  }
  readonly scales: {
    readonly maxSlopePct: number
    readonly avgUphillSlopePct: number
    readonly altitudeRangeM: number
    readonly slopeStdDevPct: number
  }
  readonly tags: {
    readonly highMountainMinAltitudeM: number
    readonly skyrunningMinSlopePct: number
    readonly verticalMinGainPerKmM: number
    readonly coastalMaxMinAltitudeM: number
    readonly forestMinAvgAltitudeM: number
    readonly forestMaxAvgAltitudeM: number
    readonly forestMinAvgUphillSlopePct: number
    readonly urbanMaxSlopePct: number
    readonly urbanMaxMinAltitudeM: number
  }
  readonly mud: {
    // high or steep ground drains
    readonly drainingMinAltitudeM: number
    readonly drainingMinAvgUphillSlopePct: number
    // gentle forest holds water
    readonly wetForestMaxAvgUphillSlopePct: number
  }
  readonly exposure: {
    readonly extremeMinAltitudeM: number
    readonly extremeSteepMinAltitudeM: number
    readonly extremeSteepMinSlopePct: number
    readonly highMinAltitudeM: number
    readonly highMinSlopePct: number
    readonly moderateMinAltitudeM: number
    readonly moderateMinSlopePct: number
  }
}

export type PredictionConfig = {
  readonly climbPenaltyM: number
  readonly archetypeFlatSpeedKmh: Readonly<Record<Archetype, number>>
  readonly technicitySensitivity: Readonly<Record<Archetype, number>>
  readonly fitnessCurve: readonly FitnessCurvePoint[]
  readonly minFitnessIndex: number
  readonly maxFitnessIndex: number
  readonly minSpeedKmh: number
  readonly steepSlopePct: number
  readonly steepMultiplier: number
  readonly fatigueStartKm: number
  readonly fatigueStepKm: number
  readonly fatigueRatePerStep: number
  readonly fatigueMaxDrop: number
  readonly checkpointIntervalKm: number
  readonly useRecordedTimes: boolean
  readonly movingSpeedThresholdKmh: number
  // race-pace multipliers for the easier and harder scenarios
  readonly scenarioSpeedFactors: {
    readonly endurance: number
    readonly push: number
  }
  readonly vo2maxIndexDivisor: number
}

export type StrategyConfig = {
  readonly defaultStartTime: string // HH:MM
  readonly defaultFatigueDrift: number
  readonly aggressiveFatigueDrift: number
  readonly conservativeFatigueDrift: number
  readonly startSnapKm: number
  readonly finishToleranceKm: number
}

export type AnalysisConfig = {
  readonly normalizer: NormalizerConfig
  readonly geometry: GeometryConfig
  readonly topology: TopologyConfig
  readonly technicity: TechnicityConfig
  readonly prediction: PredictionConfig
  readonly strategy: StrategyConfig
  readonly timeBudgetMs: number
}

export const ANALYSIS_CONFIG = Symbol('ANALYSIS_CONFIG')

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child)
    Object.freeze(value)
  }
  return value
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = deepFreeze({
  normalizer: {
    minElevationM: -500,
    maxElevationM: 9000,
  },
  geometry: {
    earthRadiusKm: 6371.0088,
    elevationNoiseThresholdM: 2,
    slopeWindowM: 50,
  },
  topology: {
    loopClosureRatio: 0.05,
    outAndBackClosureRatio: 0.1,
    overlapDistanceM: 100,
    overlapMajority: 0.5,
    outAndBackPrecedenceRatio: 0.6,
    maxOverlapSamples: 200,
  },
  technicity: {
    weights: {
      maxSlope: 0.35,
      avgUphillSlope: 0.25,
      altitudeRange: 0.2,
      slopeVariability: 0.2,
    },
    scales: {
      maxSlopePct: 40,
      avgUphillSlopePct: 25,
      altitudeRangeM: 2000,
      slopeStdDevPct: 15,
    },
    tags: {
      highMountainMinAltitudeM: 2000,
      skyrunningMinSlopePct: 30,
      verticalMinGainPerKmM: 150,
      coastalMaxMinAltitudeM: 50,
      forestMinAvgAltitudeM: 300,
      forestMaxAvgAltitudeM: 1800,
      forestMinAvgUphillSlopePct: 3,
      urbanMaxSlopePct: 4,
      urbanMaxMinAltitudeM: 500,
    },
    mud: {
      drainingMinAltitudeM: 2000,
      drainingMinAvgUphillSlopePct: 15,
      wetForestMaxAvgUphillSlopePct: 8,
    },
    exposure: {
      extremeMinAltitudeM: 3000,
      extremeSteepMinAltitudeM: 2000,
      extremeSteepMinSlopePct: 40,
      highMinAltitudeM: 2000,
      highMinSlopePct: 35,
      moderateMinAltitudeM: 1000,
      moderateMinSlopePct: 20,
    },
  },
  prediction: {
    climbPenaltyM: 100, // 100 m D+ ~ 1 km flat
    archetypeFlatSpeedKmh: { HIKER: 4, RUNNER: 8, ELITE: 12 },
    technicitySensitivity: { HIKER: 0.35, RUNNER: 0.25, ELITE: 0.15 },
    fitnessCurve: [
      { index: 100, speedKmh: 2.5 },
      { index: 200, speedKmh: 3 },
      { index: 300, speedKmh: 3.5 },
      { index: 400, speedKmh: 5.6 },
      { index: 500, speedKmh: 8 },
      { index: 600, speedKmh: 10.4 },
      { index: 700, speedKmh: 12.8 },
      { index: 800, speedKmh: 15.2 },
      { index: 1000, speedKmh: 20 },
    ],
    minFitnessIndex: 100,
    maxFitnessIndex: 1000,
    minSpeedKmh: 2.5,
    steepSlopePct: 20,
    steepMultiplier: 1.2,
    fatigueStartKm: 40,
    fatigueStepKm: 20,
    fatigueRatePerStep: 0.05,
    fatigueMaxDrop: 0.4,
    checkpointIntervalKm: 5,
    useRecordedTimes: true,
    movingSpeedThresholdKmh: 1,
    scenarioSpeedFactors: { endurance: 0.85, push: 1.15 },
    vo2maxIndexDivisor: 11.6,
  },
  strategy: {
    defaultStartTime: '06:00',
    defaultFatigueDrift: 1,
    aggressiveFatigueDrift: 1.25, // going out too hard
    conservativeFatigueDrift: 1, // even effort
    startSnapKm: 0.1,
    finishToleranceKm: 0.5,
  },
  timeBudgetMs: 2000,
})
