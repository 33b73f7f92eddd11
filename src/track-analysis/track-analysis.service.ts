import {
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  UnprocessableEntityException,
} from '@nestjs/common'
import type { AnalysisResult, RunnerProfile, StrategyRequest } from '../types/analysis.types'
import type { RawTrackPoint } from '../types/track.types'
import { CLOCK, type Clock } from '../utils/clock'
import { ANALYSIS_CONFIG, type AnalysisConfig } from './analysis.config'
import { analyzeTrack } from './analyze-track'
import { analysisResultSchema } from './track-analysis.schema'

@Injectable()
export class TrackAnalysisService {
  private readonly logger = new Logger(TrackAnalysisService.name)

  constructor(
    @Inject(ANALYSIS_CONFIG) private readonly config: AnalysisConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  getConfig(): AnalysisConfig {
    return this.config
  }

  analyze(
    points: readonly RawTrackPoint[],
    profiles?: readonly RunnerProfile[] | null,
    strategy?: StrategyRequest | null,
  ): AnalysisResult {
    const startedMs = this.clock.now()
    const outcome = analyzeTrack(points, profiles, this.config, strategy)
    const tookMs = this.clock.now() - startedMs

    if (!outcome.success) {
      this.logger.warn(`Analysis rejected (${outcome.error.code}): ${outcome.error.message}`)
      throw new UnprocessableEntityException({
        statusCode: 422,
        error: outcome.error.code,
        message: outcome.error.message,
        ...(outcome.error.pointIndex !== undefined ? { pointIndex: outcome.error.pointIndex } : {}),
      })
    }

    // the pipeline cannot be interrupted, so an overrun is reported after the fact
    if (tookMs > this.config.timeBudgetMs) {
      this.logger.warn(`Analysis of ${points.length} points took ${tookMs.toFixed(0)} ms`)
      throw new UnprocessableEntityException({
        statusCode: 422,
        error: 'PROCESSING_BUDGET_EXCEEDED',
        message: `Analysis exceeded the ${this.config.timeBudgetMs} ms budget`,
      })
    }

    const parsed = analysisResultSchema.safeParse(outcome.data)
    if (!parsed.success) {
      throw new InternalServerErrorException(
        `AnalysisResult validation failed: ${JSON.stringify(parsed.error.format())}`,
      )
    }

    this.logger.debug(
      `Analyzed ${points.length} points, ${parsed.data.geometry.totalDistanceKm} km, ` +
        `${parsed.data.routeType} in ${tookMs.toFixed(1)} ms`,
    )
    return parsed.data
  }
}
