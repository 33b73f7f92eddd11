import { z } from 'zod'
import {
  ARCHETYPES,
  ENVIRONMENT_TAGS,
  EXPOSURE_LEVELS,
  MUD_INDEX_LEVELS,
  ROUTE_TYPES,
  WAYPOINT_TYPES,
  type AnalysisResult,
} from '../types/analysis.types'

const nonNegative = z.number().finite().min(0)

const geometrySummarySchema = z.object({
  totalDistanceKm: nonNegative,
  elevationGainM: nonNegative,
  elevationLossM: nonNegative,
  maxAltitudeM: z.number().finite(),
  minAltitudeM: z.number().finite(),
  avgAltitudeM: z.number().finite(),
  maxSlopePct: nonNegative,
  avgUphillSlopePct: nonNegative,
  longestClimbM: nonNegative,
})

const routeTypeSchema = z.enum(ROUTE_TYPES)

const predictionSchema = z.object({
  archetype: z.enum(ARCHETYPES).nullable(),
  fitnessIndex: z.number().nullable(),
  vo2maxEstimate: z.number().positive().nullable(),
  flatSpeedKmh: z.number().positive(),
  totalTimeSec: nonNegative,
  totalTimeLabel: z.string(),
  scenarios: z
    .object({ enduranceSec: nonNegative, raceSec: nonNegative, pushSec: nonNegative })
    .refine((s) => s.pushSec <= s.raceSec && s.raceSec <= s.enduranceSec, {
      message: 'scenario times must order push <= race <= endurance',
    }),
  checkpointSplits: z
    .array(z.object({ distanceKm: nonNegative, cumulativeTimeSec: nonNegative }))
    .min(1)
    .refine(
      (splits) => splits.every((s, i) => i === 0 || s.cumulativeTimeSec >= splits[i - 1]!.cumulativeTimeSec),
      { message: 'checkpoint times must not decrease' },
    ),
})

const timeOfDay = z.string().regex(/^\d{2}:\d{2}$/)

const strategySchema = z.object({
  targetTimeSec: z.number().positive(),
  fatigueDrift: z.number().positive(),
  startTime: timeOfDay,
  points: z
    .array(
      z.object({
        name: z.string(),
        type: z.enum(WAYPOINT_TYPES),
        km: nonNegative,
        altitudeM: z.number().finite(),
        dPlusCumulM: nonNegative,
        segmentDistanceKm: nonNegative,
        segmentDPlusM: nonNegative,
        segmentDMinusM: nonNegative,
        segmentTimeSec: nonNegative,
        raceTimeSec: nonNegative,
        raceTimeLabel: z.string(),
        timeOfDay,
        aggressiveTimeOfDay: timeOfDay,
        conservativeTimeOfDay: timeOfDay,
      }),
    )
    .min(2),
})

export const analysisResultSchema = z.object({
  geometry: geometrySummarySchema,
  routeType: routeTypeSchema,
  topology: z.object({
    routeType: routeTypeSchema,
    closureDistanceM: nonNegative,
    overlapRatio: z.number().min(0).max(1),
    medianOverlapDistanceM: nonNegative.nullable(),
  }),
  technicity: z.object({
    technicityScore: z.number().min(0).max(100),
    environmentTags: z.array(z.enum(ENVIRONMENT_TAGS)),
    mudIndex: z.enum(MUD_INDEX_LEVELS),
    exposure: z.enum(EXPOSURE_LEVELS),
  }),
  effort: z.object({
    effortKm: nonNegative,
    ibpIndex: z.number().int().min(0),
    itraPoints: z.number().int().min(0).max(6),
  }),
  predictions: z.array(predictionSchema).min(1),
  recording: z
    .object({
      elapsedTimeSec: nonNegative,
      movingTimeSec: nonNegative,
    })
    .nullable(),
  strategy: strategySchema.nullable(),
}) satisfies z.ZodType<AnalysisResult>
