import type { AnalysisResult, RunnerProfile, StrategyRequest } from '../types/analysis.types'
import type { RawTrackPoint } from '../types/track.types'
import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from './analysis.config'
import { computeGeometry } from './geometry'
import { computeEffort, predictTimes, summarizeRecording } from './pacing-predictor'
import { normalizeTrack } from './point-normalizer'
import { planRaceStrategy } from './race-strategy'
import { classifyRoute } from './route-topology'
import { scoreTechnicity } from './technicity'
import { TrackAnalysisError, type AnalysisError } from './track-analysis.errors'

export type AnalysisOutcome =
  | { success: true; data: AnalysisResult }
  | { success: false; error: AnalysisError }

const hasEveryTimestamp = (points: readonly RawTrackPoint[]) =>
  points.length > 0 && points.every((p) => p.timestamp != null)

function runAnalysis(
  rawPoints: readonly RawTrackPoint[],
  profiles: readonly RunnerProfile[] | null | undefined,
  strategy: StrategyRequest | null | undefined,
  config: AnalysisConfig,
): AnalysisResult {
  // recorded times only matter to the predictor when every point carries one
  const timesUsed = config.prediction.useRecordedTimes && hasEveryTimestamp(rawPoints)

  const track = normalizeTrack(rawPoints, config, { enforceTemporalOrder: timesUsed })
  const { summary: geometry, segments, slopeSamples } = computeGeometry(track, config)
  const topology = classifyRoute(track, geometry, config)
  const technicity = scoreTechnicity(geometry, config, {
    slopeSamples,
    elevationKnown: track.elevationKnown,
  })
  const predictions = predictTimes({ geometry, technicity, slopeSamples }, profiles, config)

  return {
    geometry,
    routeType: topology.routeType,
    topology,
    technicity,
    effort: computeEffort(geometry, config),
    predictions,
    recording: timesUsed ? summarizeRecording(track, segments, config) : null,
    strategy: strategy ? planRaceStrategy(track, segments, strategy, config) : null,
  }
}

/**
 * Runs the whole pipeline on one raw track. Either every field of the
 * result is produced or a single typed error is returned.
 */
export function analyzeTrack(
  rawPoints: readonly RawTrackPoint[],
  profiles?: readonly RunnerProfile[] | null,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
  strategy?: StrategyRequest | null,
): AnalysisOutcome {
  try {
    return { success: true, data: runAnalysis(rawPoints, profiles, strategy, config) }
  } catch (err) {
    if (err instanceof TrackAnalysisError) {
      return { success: false, error: err.toAnalysisError() }
    }
    throw err
  }
}
