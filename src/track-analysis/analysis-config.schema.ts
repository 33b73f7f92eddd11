import { readFileSync } from 'fs'
import { z } from 'zod'
import { ARCHETYPES } from '../types/analysis.types'
import { DEFAULT_ANALYSIS_CONFIG, deepFreeze, type AnalysisConfig } from './analysis.config'

const positive = z.number().finite().positive()
const ratio = z.number().min(0).max(1)

export const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM')

const perArchetype = (value: z.ZodNumber) =>
  z.object({ HIKER: value, RUNNER: value, ELITE: value })

const fitnessCurveSchema = z
  .array(z.object({ index: positive, speedKmh: positive }))
  .min(2)
  .refine(
    (curve) => curve.every((p, i) => i === 0 || p.index > curve[i - 1]!.index),
    { message: 'fitnessCurve must be sorted by strictly increasing index' },
  )

export const analysisConfigSchema = z
  .object({
    normalizer: z.object({
      minElevationM: z.number().finite(),
      maxElevationM: z.number().finite(),
    }),
    geometry: z.object({
      earthRadiusKm: positive,
      elevationNoiseThresholdM: z.number().min(0),
      slopeWindowM: z.number().min(0),
    }),
    topology: z.object({
      loopClosureRatio: ratio,
      outAndBackClosureRatio: ratio,
      overlapDistanceM: positive,
      overlapMajority: ratio,
      outAndBackPrecedenceRatio: ratio,
      maxOverlapSamples: z.number().int().min(2).max(5000),
    }),
    technicity: z.object({
      weights: z.object({
        maxSlope: z.number().min(0),
        avgUphillSlope: z.number().min(0),
        altitudeRange: z.number().min(0),
        slopeVariability: z.number().min(0),
      }),
      scales: z.object({
        maxSlopePct: positive,
        avgUphillSlopePct: positive,
        altitudeRangeM: positive,
        slopeStdDevPct: positive,
      }),
      tags: z.object({
        highMountainMinAltitudeM: z.number(),
        skyrunningMinSlopePct: z.number(),
        verticalMinGainPerKmM: z.number(),
        coastalMaxMinAltitudeM: z.number(),
        forestMinAvgAltitudeM: z.number(),
        forestMaxAvgAltitudeM: z.number(),
        forestMinAvgUphillSlopePct: z.number(),
        urbanMaxSlopePct: z.number(),
        urbanMaxMinAltitudeM: z.number(),
      }),
      mud: z.object({
        drainingMinAltitudeM: z.number(),
        drainingMinAvgUphillSlopePct: z.number(),
        wetForestMaxAvgUphillSlopePct: z.number(),
      }),
      exposure: z.object({
        extremeMinAltitudeM: z.number(),
        extremeSteepMinAltitudeM: z.number(),
        extremeSteepMinSlopePct: z.number(),
        highMinAltitudeM: z.number(),
        highMinSlopePct: z.number(),
        moderateMinAltitudeM: z.number(),
        moderateMinSlopePct: z.number(),
      }),
    }),
    prediction: z.object({
      climbPenaltyM: positive,
      archetypeFlatSpeedKmh: perArchetype(positive),
      technicitySensitivity: perArchetype(z.number().min(0).max(0.9)),
      fitnessCurve: fitnessCurveSchema,
      minFitnessIndex: positive,
      maxFitnessIndex: positive,
      minSpeedKmh: positive,
      steepSlopePct: positive,
      steepMultiplier: z.number().min(1),
      fatigueStartKm: z.number().min(0),
      fatigueStepKm: positive,
      fatigueRatePerStep: ratio,
      fatigueMaxDrop: z.number().min(0).max(0.9),
      checkpointIntervalKm: positive,
      useRecordedTimes: z.boolean(),
      movingSpeedThresholdKmh: z.number().min(0),
      scenarioSpeedFactors: z.object({ endurance: positive, push: positive }),
      vo2maxIndexDivisor: positive,
    }),
    strategy: z.object({
      defaultStartTime: clockTime,
      defaultFatigueDrift: positive,
      aggressiveFatigueDrift: positive,
      conservativeFatigueDrift: positive,
      startSnapKm: z.number().min(0),
      finishToleranceKm: z.number().min(0),
    }),
    timeBudgetMs: positive,
  })
  .refine((c) => c.normalizer.minElevationM < c.normalizer.maxElevationM, {
    message: 'normalizer.minElevationM must be below maxElevationM',
  })
  .refine((c) => c.prediction.minFitnessIndex < c.prediction.maxFitnessIndex, {
    message: 'prediction.minFitnessIndex must be below maxFitnessIndex',
  })
  .refine(
    (c) =>
      ARCHETYPES.every(
        (a, i) =>
          i === 0 ||
          c.prediction.archetypeFlatSpeedKmh[a] > c.prediction.archetypeFlatSpeedKmh[ARCHETYPES[i - 1]!],
      ),
    { message: 'archetypeFlatSpeedKmh must increase HIKER < RUNNER < ELITE' },
  )
  .refine((c) => c.prediction.scenarioSpeedFactors.endurance <= 1 && c.prediction.scenarioSpeedFactors.push >= 1, {
    message: 'scenarioSpeedFactors must keep endurance <= 1 <= push',
  }) satisfies z.ZodType<AnalysisConfig>

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Overlays user-supplied settings on the defaults key by key.
 * Arrays and scalars replace, objects merge, missing keys keep the default.
 */
export function mergeOverDefaults(base: unknown, override: unknown): unknown {
  if (override === undefined) return base
  if (!isPlainObject(base) || !isPlainObject(override)) return override

  const merged: Record<string, unknown> = { ...base }
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeOverDefaults(base[key], value)
  }
  return merged
}

export function parseAnalysisConfig(overrides: unknown): AnalysisConfig {
  const parsed = analysisConfigSchema.safeParse(mergeOverDefaults(DEFAULT_ANALYSIS_CONFIG, overrides))
  if (!parsed.success) {
    throw new Error(`Invalid analysis configuration: ${JSON.stringify(parsed.error.format())}`)
  }
  return deepFreeze(parsed.data)
}

type ConfigEnv = {
  ANALYSIS_CONFIG_PATH?: string
  ANALYSIS_TIME_BUDGET_MS?: string
}

/**
 * Reads the optional JSON override file and env overrides once at start-up.
 * Without either the frozen defaults are returned as is.
 */
export function loadAnalysisConfig(env: ConfigEnv = process.env): AnalysisConfig {
  const path = env.ANALYSIS_CONFIG_PATH?.trim()
  const budget = Number(env.ANALYSIS_TIME_BUDGET_MS)
  const hasBudget = env.ANALYSIS_TIME_BUDGET_MS !== undefined && Number.isFinite(budget) && budget > 0

  if (!path && !hasBudget) return DEFAULT_ANALYSIS_CONFIG

  let overrides: unknown = {}
  if (path) {
    try {
      overrides = JSON.parse(readFileSync(path, 'utf8'))
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new Error(`Cannot read analysis configuration from ${path}: ${reason}`)
    }
  }

  if (hasBudget) {
    overrides = mergeOverDefaults(overrides, { timeBudgetMs: budget })
  }

  return parseAnalysisConfig(overrides)
}
