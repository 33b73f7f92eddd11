import type { GeometrySummary, TechnicityProfile } from '../types/analysis.types'
import type { SlopeSample } from '../types/track.types'
import { DEFAULT_ANALYSIS_CONFIG } from './analysis.config'
import {
  buildCostWindows,
  computeEffort,
  estimateVo2max,
  expandProfiles,
  fatigueFactor,
  formatDuration,
  interpolateCurve,
  paceScenarios,
  predictTimes,
  resolveProfile,
} from './pacing-predictor'
import { InvalidProfileError } from './track-analysis.errors'

const config = DEFAULT_ANALYSIS_CONFIG

const geometry = (overrides: Partial<GeometrySummary> = {}): GeometrySummary => ({
  totalDistanceKm: 10,
  elevationGainM: 0,
  elevationLossM: 0,
  maxAltitudeM: 1000,
  minAltitudeM: 1000,
  avgAltitudeM: 1000,
  maxSlopePct: 0,
  avgUphillSlopePct: 0,
  longestClimbM: 0,
  ...overrides,
})

const technicity = (technicityScore: number): TechnicityProfile => ({
  technicityScore,
  environmentTags: [],
  mudIndex: 'MEDIUM',
  exposure: 'MODERATE',
})

const flatWindows = (count: number): SlopeSample[] =>
  Array.from({ length: count }, () => ({ distanceM: 1000, elevationDeltaM: 0, slopePct: 0 }))

describe('computeEffort', () => {
  it('adds one km of effort per 100 m of climbing', () => {
    expect(computeEffort(geometry({ totalDistanceKm: 20, elevationGainM: 1000, avgUphillSlopePct: 5 }), config)).toEqual({
      effortKm: 30,
      ibpIndex: 30,
      itraPoints: 1,
    })
  })

  it('raises the difficulty index on steep courses', () => {
    const effort = computeEffort(geometry({ totalDistanceKm: 20, elevationGainM: 1000, avgUphillSlopePct: 12 }), config)
    expect(effort.ibpIndex).toBe(33)
  })

  it('caps the points estimate at 6', () => {
    const effort = computeEffort(geometry({ totalDistanceKm: 100, elevationGainM: 10000 }), config)
    expect(effort.effortKm).toBe(200)
    expect(effort.itraPoints).toBe(6)
  })
})

describe('interpolateCurve', () => {
  const curve = config.prediction.fitnessCurve

  it('interpolates between curve points', () => {
    expect(interpolateCurve(curve, 450)).toBeCloseTo(6.8, 9)
  })

  it('clamps outside the curve', () => {
    expect(interpolateCurve(curve, 50)).toBe(2.5)
    expect(interpolateCurve(curve, 1200)).toBe(20)
  })

  it('hits curve points exactly', () => {
    expect(interpolateCurve(curve, 500)).toBe(8)
  })
})

describe('resolveProfile', () => {
  it('maps an archetype to its reference speed', () => {
    expect(resolveProfile({ archetype: 'HIKER' }, config)).toEqual({
      archetype: 'HIKER',
      fitnessIndex: null,
      flatSpeedKmh: 4,
      technicitySensitivity: 0.35,
    })
  })

  it('derives speed and sensitivity from a fitness index', () => {
    const resolved = resolveProfile({ fitnessIndex: 500 }, config)
    expect(resolved.flatSpeedKmh).toBe(8)
    expect(resolved.technicitySensitivity).toBeCloseTo(0.25, 9)
    expect(resolved.archetype).toBeNull()
  })

  it('keeps the archetype sensitivity when both fields are given', () => {
    const resolved = resolveProfile({ fitnessIndex: 700, archetype: 'ELITE' }, config)
    expect(resolved.flatSpeedKmh).toBe(12.8)
    expect(resolved.technicitySensitivity).toBe(0.15)
  })

  it.each([50, 1500, Number.NaN])('rejects fitness index %p', (fitnessIndex) => {
    expect(() => resolveProfile({ fitnessIndex }, config)).toThrow(InvalidProfileError)
  })

  it('rejects a profile with neither field', () => {
    expect(() => resolveProfile({}, config)).toThrow(InvalidProfileError)
  })
})

describe('expandProfiles', () => {
  it('falls back to the three archetypes', () => {
    const all = [{ archetype: 'HIKER' }, { archetype: 'RUNNER' }, { archetype: 'ELITE' }]
    expect(expandProfiles()).toEqual(all)
    expect(expandProfiles([])).toEqual(all)
    expect(expandProfiles([{ archetype: null, fitnessIndex: null }])).toEqual(all)
  })

  it('keeps explicit profiles as given', () => {
    expect(expandProfiles([{ fitnessIndex: 420 }])).toEqual([{ fitnessIndex: 420 }])
  })

  it('expands an empty entry in place among explicit profiles', () => {
    expect(expandProfiles([{ fitnessIndex: 420 }, {}])).toEqual([
      { fitnessIndex: 420 },
      { archetype: 'HIKER' },
      { archetype: 'RUNNER' },
      { archetype: 'ELITE' },
    ])
  })
})

describe('paceScenarios', () => {
  it('derives endurance and push times from the race time', () => {
    expect(paceScenarios(9000, config)).toEqual({ enduranceSec: 10588, raceSec: 9000, pushSec: 7826 })
  })

  it('keeps a zero race time at zero', () => {
    expect(paceScenarios(0, config)).toEqual({ enduranceSec: 0, raceSec: 0, pushSec: 0 })
  })
})

describe('estimateVo2max', () => {
  it('reads VO2max off the fitness index', () => {
    expect(estimateVo2max(500, config)).toBe(43.1)
    expect(estimateVo2max(696, config)).toBe(60)
  })

  it('is null without a fitness index', () => {
    expect(estimateVo2max(null, config)).toBeNull()
  })
})

describe('fatigueFactor', () => {
  it('leaves short efforts untouched', () => {
    expect(fatigueFactor(30, config)).toBe(1)
    expect(fatigueFactor(40, config)).toBe(1)
  })

  it('slows long efforts down progressively', () => {
    expect(fatigueFactor(80, config)).toBeCloseTo(0.9, 9)
  })

  it('caps the slowdown', () => {
    expect(fatigueFactor(1000, config)).toBeCloseTo(0.6, 9)
  })
})

describe('formatDuration', () => {
  it.each([
    [0, '0h00'],
    [3900, '1h05'],
    [4500, '1h15'],
    [99 * 3600, '99h00'],
    [99 * 3600 + 1, '>99h'],
  ])('%p s -> %s', (sec, label) => {
    expect(formatDuration(sec)).toBe(label)
  })
})

describe('buildCostWindows', () => {
  it('charges steep windows extra', () => {
    const [window] = buildCostWindows(
      [{ distanceM: 1000, elevationDeltaM: 250, slopePct: 25 }],
      geometry({ elevationGainM: 250 }),
      config,
    )
    expect(window!.costKm).toBeCloseTo(4.2, 9)
  })

  it('scales climbs to the committed gain', () => {
    const [window] = buildCostWindows(
      [{ distanceM: 1000, elevationDeltaM: 200, slopePct: 20 }],
      geometry({ elevationGainM: 100 }),
      config,
    )
    expect(window!.costKm).toBeCloseTo(2, 9)
  })

  it('lays windows end to end', () => {
    const windows = buildCostWindows(flatWindows(3), geometry({ totalDistanceKm: 3 }), config)
    expect(windows.map((w) => [w.startKm, w.endKm])).toEqual([
      [0, 1],
      [1, 2],
      [2, 3],
    ])
  })
})

describe('predictTimes', () => {
  const flatInput = { geometry: geometry(), technicity: technicity(0), slopeSamples: flatWindows(10) }

  it('predicts the reference archetypes on flat ground', () => {
    const [hiker, runner, elite] = predictTimes(flatInput, undefined, config)

    expect(hiker).toEqual({
      archetype: 'HIKER',
      fitnessIndex: null,
      vo2maxEstimate: null,
      flatSpeedKmh: 4,
      totalTimeSec: 9000,
      totalTimeLabel: '2h30',
      scenarios: { enduranceSec: 10588, raceSec: 9000, pushSec: 7826 },
      checkpointSplits: [
        { distanceKm: 5, cumulativeTimeSec: 4500 },
        { distanceKm: 10, cumulativeTimeSec: 9000 },
      ],
    })
    expect(runner!.totalTimeSec).toBe(4500)
    expect(runner!.checkpointSplits).toEqual([
      { distanceKm: 5, cumulativeTimeSec: 2250 },
      { distanceKm: 10, cumulativeTimeSec: 4500 },
    ])
    expect(elite!.totalTimeSec).toBe(3000)
    expect(elite!.totalTimeLabel).toBe('0h50')
  })

  it('orders hiker, runner and elite times on technical ground', () => {
    const input = { ...flatInput, technicity: technicity(50) }
    const [hiker, runner, elite] = predictTimes(input, null, config)

    expect(runner!.totalTimeSec).toBe(5143)
    expect(hiker!.totalTimeSec).toBeGreaterThanOrEqual(runner!.totalTimeSec)
    expect(runner!.totalTimeSec).toBeGreaterThanOrEqual(elite!.totalTimeSec)
  })

  it('slows down as technicity rises', () => {
    const easy = predictTimes({ ...flatInput, technicity: technicity(10) }, [{ archetype: 'RUNNER' }], config)
    const hard = predictTimes({ ...flatInput, technicity: technicity(70) }, [{ archetype: 'RUNNER' }], config)
    expect(hard[0]!.totalTimeSec).toBeGreaterThan(easy[0]!.totalTimeSec)
  })

  it('predicts a fitness-index profile', () => {
    const [prediction] = predictTimes(flatInput, [{ fitnessIndex: 500 }], config)
    expect(prediction).toMatchObject({
      archetype: null,
      fitnessIndex: 500,
      vo2maxEstimate: 43.1,
      flatSpeedKmh: 8,
      totalTimeSec: 4500,
      scenarios: { enduranceSec: 5294, raceSec: 4500, pushSec: 3913 },
    })
  })

  it('fails the whole request on one bad profile', () => {
    expect(() => predictTimes(flatInput, [{ archetype: 'RUNNER' }, { fitnessIndex: 5 }], config)).toThrow(
      InvalidProfileError,
    )
  })
})
