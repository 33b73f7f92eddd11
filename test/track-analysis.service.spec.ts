import { HttpException, UnprocessableEntityException } from '@nestjs/common'
import { Test } from '@nestjs/testing'
import { ANALYSIS_CONFIG, DEFAULT_ANALYSIS_CONFIG } from '../src/track-analysis/analysis.config'
import { TrackAnalysisService } from '../src/track-analysis/track-analysis.service'
import { analysisResultSchema } from '../src/track-analysis/track-analysis.schema'
import { CLOCK, type Clock } from '../src/utils/clock'
import { flatTrack, squareLoop } from './track-fixtures'

function captureHttpError(fn: () => unknown): HttpException {
  try {
    fn()
  } catch (err) {
    if (err instanceof HttpException) return err
    throw err
  }
  throw new Error('expected an HttpException')
}

describe('TrackAnalysisService', () => {
  let ticks: number[]
  let clock: Clock
  let service: TrackAnalysisService

  beforeEach(async () => {
    ticks = []
    clock = { now: () => ticks.shift() ?? 0 }

    const mod = await Test.createTestingModule({
      providers: [
        TrackAnalysisService,
        { provide: ANALYSIS_CONFIG, useValue: DEFAULT_ANALYSIS_CONFIG },
        { provide: CLOCK, useValue: clock },
      ],
    }).compile()

    service = mod.get(TrackAnalysisService)
  })

  it('returns a schema-valid result', () => {
    const result = service.analyze(squareLoop(1))

    expect(analysisResultSchema.safeParse(result).success).toBe(true)
    expect(result.routeType).toBe('LOOP')
    expect(result.predictions.map((p) => p.archetype)).toEqual(['HIKER', 'RUNNER', 'ELITE'])
  })

  it('returns a schema-valid result with a race strategy', () => {
    const result = service.analyze(flatTrack(10, 1000), null, { targetTimeSec: 4500, startTime: '08:00' })

    expect(analysisResultSchema.safeParse(result).success).toBe(true)
    expect(result.strategy?.points.at(-1)).toMatchObject({
      name: 'Finish',
      raceTimeSec: 4500,
      timeOfDay: '09:15',
    })
  })

  it('passes requested profiles through', () => {
    const result = service.analyze(flatTrack(10, 1000), [{ archetype: 'RUNNER' }])
    expect(result.predictions).toHaveLength(1)
    expect(result.predictions[0]!.totalTimeSec).toBe(4500)
  })

  it('maps an analysis error to 422 with its code', () => {
    const err = captureHttpError(() => service.analyze([{ lat: 45, lon: 6 }]))

    expect(err).toBeInstanceOf(UnprocessableEntityException)
    expect(err.getStatus()).toBe(422)
    expect(err.getResponse()).toEqual({
      statusCode: 422,
      error: 'INSUFFICIENT_DATA',
      message: 'Track needs at least 2 distinct points, got 1',
    })
  })

  it('includes the offending point index', () => {
    const err = captureHttpError(() => service.analyze([{ lat: 45, lon: 6 }, { lat: 45, lon: 200 }]))

    expect(err.getResponse()).toMatchObject({ error: 'MALFORMED_POINT', pointIndex: 1 })
  })

  it('reports a run over the time budget', () => {
    ticks = [0, DEFAULT_ANALYSIS_CONFIG.timeBudgetMs + 1]
    const err = captureHttpError(() => service.analyze(flatTrack(2, 100)))

    expect(err.getStatus()).toBe(422)
    expect(err.getResponse()).toMatchObject({ error: 'PROCESSING_BUDGET_EXCEEDED' })
  })

  it('accepts a run right at the budget', () => {
    ticks = [0, DEFAULT_ANALYSIS_CONFIG.timeBudgetMs]
    expect(service.analyze(flatTrack(2, 100)).geometry.totalDistanceKm).toBe(2)
  })

  it('exposes the active configuration', () => {
    expect(service.getConfig()).toBe(DEFAULT_ANALYSIS_CONFIG)
  })
})
