import {
  ARCHETYPES,
  type Archetype,
  type CheckpointSplit,
  type EffortSummary,
  type GeometrySummary,
  type PaceScenarios,
  type PredictionResult,
  type RecordingSummary,
  type RunnerProfile,
  type TechnicityProfile,
} from '../types/analysis.types'
import type { NormalizedTrack, SlopeSample, TrackSegment } from '../types/track.types'
import { roundTo } from '../utils/geo'
import type { AnalysisConfig, FitnessCurvePoint } from './analysis.config'
import { InvalidProfileError } from './track-analysis.errors'

// km-effort brackets for the ITRA-like 0..6 points estimate
const ITRA_BRACKETS_KM = [25, 40, 65, 90, 140, 190]

export type ResolvedProfile = {
  archetype: Archetype | null
  fitnessIndex: number | null
  flatSpeedKmh: number
  technicitySensitivity: number
}

export type PredictionInput = {
  geometry: GeometrySummary
  technicity: TechnicityProfile
  slopeSamples: readonly SlopeSample[]
}

const effortKmOf = (geometry: GeometrySummary, config: AnalysisConfig) =>
  geometry.totalDistanceKm + geometry.elevationGainM / config.prediction.climbPenaltyM

export function computeEffort(geometry: GeometrySummary, config: AnalysisConfig): EffortSummary {
  const effortKm = effortKmOf(geometry, config)
  const ibpBonus = geometry.avgUphillSlopePct > 10 ? 1.1 : 1

  return {
    effortKm: roundTo(effortKm, 1),
    ibpIndex: Math.floor(effortKm * ibpBonus),
    itraPoints: ITRA_BRACKETS_KM.filter((km) => effortKm >= km).length,
  }
}

export function interpolateCurve(curve: readonly FitnessCurvePoint[], index: number): number {
  const first = curve[0]
  const last = curve[curve.length - 1]
  if (!first || !last) return 0
  if (index <= first.index) return first.speedKmh
  if (index >= last.index) return last.speedKmh

  for (let i = 1; i < curve.length; i++) {
    const lo = curve[i - 1]!
    const hi = curve[i]!
    if (index <= hi.index) {
      const fraction = (index - lo.index) / (hi.index - lo.index)
      return lo.speedKmh + (hi.speedKmh - lo.speedKmh) * fraction
    }
  }
  return last.speedKmh
}

function sensitivityForSpeed(flatSpeedKmh: number, config: AnalysisConfig): number {
  const { archetypeFlatSpeedKmh: speeds, technicitySensitivity: sens } = config.prediction
  const fraction = Math.max(0, Math.min(1, (flatSpeedKmh - speeds.HIKER) / (speeds.ELITE - speeds.HIKER)))
  return sens.HIKER + (sens.ELITE - sens.HIKER) * fraction
}

export function resolveProfile(profile: RunnerProfile, config: AnalysisConfig): ResolvedProfile {
  const cfg = config.prediction
  const archetype = profile.archetype ?? null
  const fitnessIndex = profile.fitnessIndex ?? null

  if (fitnessIndex !== null) {
    if (!Number.isFinite(fitnessIndex) || fitnessIndex < cfg.minFitnessIndex || fitnessIndex > cfg.maxFitnessIndex) {
      throw new InvalidProfileError(
        `fitnessIndex ${fitnessIndex} outside plausible range ${cfg.minFitnessIndex}..${cfg.maxFitnessIndex}`,
      )
    }
    const flatSpeedKmh = interpolateCurve(cfg.fitnessCurve, fitnessIndex)
    return {
      archetype,
      fitnessIndex,
      flatSpeedKmh,
      technicitySensitivity:
        archetype !== null ? cfg.technicitySensitivity[archetype] : sensitivityForSpeed(flatSpeedKmh, config),
    }
  }

  if (archetype === null) {
    throw new InvalidProfileError('Runner profile needs an archetype or a fitnessIndex')
  }

  return {
    archetype,
    fitnessIndex: null,
    flatSpeedKmh: cfg.archetypeFlatSpeedKmh[archetype],
    technicitySensitivity: cfg.technicitySensitivity[archetype],
  }
}

/**
 * A missing or empty list, and any profile carrying neither an archetype nor
 * a fitness index, stands for the three reference archetypes.
 */
export function expandProfiles(profiles?: readonly RunnerProfile[] | null): RunnerProfile[] {
  const all: RunnerProfile[] = ARCHETYPES.map((archetype) => ({ archetype }))
  if (!profiles || profiles.length === 0) return all

  return profiles.flatMap((p) => (p.archetype == null && p.fitnessIndex == null ? all : [p]))
}

export function fatigueFactor(effortKm: number, config: AnalysisConfig): number {
  const { fatigueStartKm, fatigueStepKm, fatigueRatePerStep, fatigueMaxDrop } = config.prediction
  if (effortKm <= fatigueStartKm) return 1
  const drop = ((effortKm - fatigueStartKm) / fatigueStepKm) * fatigueRatePerStep
  return 1 - Math.min(drop, fatigueMaxDrop)
}

export function formatDuration(totalSec: number): string {
  if (totalSec > 99 * 3600) return '>99h'
  const h = Math.floor(totalSec / 3600)
  const m = Math.floor((totalSec % 3600) / 60)
  return `${h}h${String(m).padStart(2, '0')}`
}

/**
 * The same course at an easier and a harder intensity. Speed is scaled, so
 * time is divided by the factor.
 */
export function paceScenarios(raceSec: number, config: AnalysisConfig): PaceScenarios {
  const { endurance, push } = config.prediction.scenarioSpeedFactors
  return {
    enduranceSec: Math.round(raceSec / endurance),
    raceSec,
    pushSec: Math.round(raceSec / push),
  }
}

// rough VO2max (ml/kg/min) read off the performance index
export function estimateVo2max(fitnessIndex: number | null, config: AnalysisConfig): number | null {
  if (fitnessIndex == null) return null
  return roundTo(fitnessIndex / config.prediction.vo2maxIndexDivisor, 1)
}

type CostWindow = {
  startKm: number
  endKm: number
  costKm: number
}

/**
 * Flat-equivalent cost of every slope window. Climbs are scaled so their sum
 * matches the committed (noise-filtered) gain; steep windows cost extra.
 */
export function buildCostWindows(
  slopeSamples: readonly SlopeSample[],
  geometry: GeometrySummary,
  config: AnalysisConfig,
): CostWindow[] {
  const cfg = config.prediction
  const rawRiseM = slopeSamples.reduce((sum, s) => sum + Math.max(0, s.elevationDeltaM), 0)
  const climbScale = rawRiseM > 0 ? geometry.elevationGainM / rawRiseM : 0

  const windows: CostWindow[] = []
  let startKm = 0
  for (const sample of slopeSamples) {
    const distanceKm = sample.distanceM / 1000
    const climbKm = (Math.max(0, sample.elevationDeltaM) * climbScale) / cfg.climbPenaltyM
    const steep = Math.abs(sample.slopePct) > cfg.steepSlopePct ? cfg.steepMultiplier : 1
    windows.push({ startKm, endKm: startKm + distanceKm, costKm: (distanceKm + climbKm) * steep })
    startKm += distanceKm
  }
  return windows
}

function checkpointDistances(totalKm: number, intervalKm: number): number[] {
  const marks: number[] = []
  for (let km = intervalKm; km < totalKm - 1e-9; km += intervalKm) {
    marks.push(km)
  }
  marks.push(totalKm)
  return marks
}

export function predictForProfile(
  resolved: ResolvedProfile,
  windows: readonly CostWindow[],
  input: PredictionInput,
  config: AnalysisConfig,
): PredictionResult {
  const cfg = config.prediction
  const techSlowdown = 1 - resolved.technicitySensitivity * (input.technicity.technicityScore / 100)
  const speedKmh = Math.max(
    cfg.minSpeedKmh,
    resolved.flatSpeedKmh * techSlowdown * fatigueFactor(effortKmOf(input.geometry, config), config),
  )

  const totalKm = windows.length > 0 ? windows[windows.length - 1]!.endKm : 0
  const marks = checkpointDistances(totalKm, cfg.checkpointIntervalKm)

  const splits: CheckpointSplit[] = []
  let elapsedSec = 0
  let mark = 0
  for (const w of windows) {
    const windowSec = (w.costKm / speedKmh) * 3600
    const spanKm = w.endKm - w.startKm
    while (mark < marks.length - 1 && marks[mark]! <= w.endKm) {
      const fraction = spanKm > 0 ? (marks[mark]! - w.startKm) / spanKm : 1
      splits.push({
        distanceKm: roundTo(marks[mark]!, 3),
        cumulativeTimeSec: Math.round(elapsedSec + windowSec * fraction),
      })
      mark++
    }
    elapsedSec += windowSec
  }

  const totalTimeSec = Math.round(elapsedSec)
  splits.push({ distanceKm: input.geometry.totalDistanceKm, cumulativeTimeSec: totalTimeSec })

  return {
    archetype: resolved.archetype,
    fitnessIndex: resolved.fitnessIndex,
    vo2maxEstimate: estimateVo2max(resolved.fitnessIndex, config),
    flatSpeedKmh: roundTo(resolved.flatSpeedKmh, 2),
    totalTimeSec,
    totalTimeLabel: formatDuration(totalTimeSec),
    scenarios: paceScenarios(totalTimeSec, config),
    checkpointSplits: splits,
  }
}

export function predictTimes(
  input: PredictionInput,
  profiles: readonly RunnerProfile[] | null | undefined,
  config: AnalysisConfig,
): PredictionResult[] {
  // resolve everything first so a bad profile fails the whole request
  const resolved = expandProfiles(profiles).map((p) => resolveProfile(p, config))
  const windows = buildCostWindows(input.slopeSamples, input.geometry, config)
  return resolved.map((r) => predictForProfile(r, windows, input, config))
}

export function summarizeRecording(
  track: NormalizedTrack,
  segments: readonly TrackSegment[],
  config: AnalysisConfig,
): RecordingSummary | null {
  if (!track.timestamped) return null

  const first = track.points[0]?.timestampMs
  const last = track.points[track.points.length - 1]?.timestampMs
  if (first == null || last == null) return null

  let movingMs = 0
  for (const segment of segments) {
    const from = track.points[segment.fromIndex]?.timestampMs
    const to = track.points[segment.fromIndex + 1]?.timestampMs
    if (from == null || to == null || to <= from) continue
    const speedKmh = (segment.distanceM / 1000) / ((to - from) / 3_600_000)
    if (speedKmh >= config.prediction.movingSpeedThresholdKmh) movingMs += to - from
  }

  return {
    elapsedTimeSec: Math.round((last - first) / 1000),
    movingTimeSec: Math.round(movingMs / 1000),
  }
}
