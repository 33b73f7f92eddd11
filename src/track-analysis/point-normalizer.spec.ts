import { DEFAULT_ANALYSIS_CONFIG } from './analysis.config'
import { normalizeTrack } from './point-normalizer'
import {
  InsufficientDataError,
  MalformedPointError,
  TemporalOrderError,
  TrackAnalysisError,
} from './track-analysis.errors'

const config = DEFAULT_ANALYSIS_CONFIG

function captureError(fn: () => unknown): TrackAnalysisError | undefined {
  try {
    fn()
  } catch (err) {
    if (err instanceof TrackAnalysisError) return err
    throw err
  }
  return undefined
}

describe('normalizeTrack', () => {
  it('collapses consecutive duplicates and keeps the first', () => {
    const track = normalizeTrack(
      [
        { lat: 45, lon: 6, elevation: 1000, timestamp: '2024-06-01T06:00:00Z' },
        { lat: 45, lon: 6, elevation: 1001, timestamp: '2024-06-01T06:00:05Z' },
        { lat: 45.001, lon: 6, elevation: 1010, timestamp: '2024-06-01T06:01:00Z' },
      ],
      config,
    )

    expect(track.points).toHaveLength(2)
    expect(track.points[0]).toEqual({
      lat: 45,
      lon: 6,
      elevation: 1000,
      timestampMs: Date.parse('2024-06-01T06:00:00Z'),
    })
    expect(track.timestamped).toBe(true)
  })

  it('keeps a point revisited later in the track', () => {
    const track = normalizeTrack(
      [
        { lat: 45, lon: 6 },
        { lat: 45.001, lon: 6 },
        { lat: 45, lon: 6 },
      ],
      config,
    )
    expect(track.points).toHaveLength(3)
  })

  it('takes a duplicate elevation when the first copy has none', () => {
    const track = normalizeTrack(
      [
        { lat: 45, lon: 6, elevation: null },
        { lat: 45, lon: 6, elevation: 640 },
        { lat: 45.001, lon: 6, elevation: 650 },
      ],
      config,
    )
    expect(track.points.map((p) => p.elevation)).toEqual([640, 650])
  })

  it('needs two distinct points', () => {
    const err = captureError(() =>
      normalizeTrack(
        [
          { lat: 45, lon: 6 },
          { lat: 45, lon: 6 },
        ],
        config,
      ),
    )
    expect(err).toBeInstanceOf(InsufficientDataError)
    expect(err?.message).toBe('Track needs at least 2 distinct points, got 1')
  })

  it('rejects an empty track', () => {
    expect(() => normalizeTrack([], config)).toThrow(InsufficientDataError)
  })

  it('interpolates missing interior elevation by distance', () => {
    const track = normalizeTrack(
      [
        { lat: 0, lon: 0, elevation: 100 },
        { lat: 0, lon: 0.001, elevation: null },
        { lat: 0, lon: 0.003, elevation: 130 },
      ],
      config,
    )
    expect(track.points[1]!.elevation).toBeCloseTo(110, 6)
    expect(track.elevationKnown).toBe(true)
  })

  it('clamps missing boundary elevation to the nearest known value', () => {
    const track = normalizeTrack(
      [
        { lat: 0, lon: 0 },
        { lat: 0, lon: 0.001, elevation: 100 },
        { lat: 0, lon: 0.002, elevation: 120 },
        { lat: 0, lon: 0.003 },
      ],
      config,
    )
    expect(track.points.map((p) => p.elevation)).toEqual([100, 100, 120, 120])
  })

  it('zeroes elevation when none is known', () => {
    const track = normalizeTrack(
      [
        { lat: 0, lon: 0 },
        { lat: 0, lon: 0.001 },
      ],
      config,
    )
    expect(track.points.map((p) => p.elevation)).toEqual([0, 0])
    expect(track.elevationKnown).toBe(false)
    expect(track.timestamped).toBe(false)
  })

  it.each([
    [{ lat: 91, lon: 0 }, 'Point 1: latitude out of range'],
    [{ lat: 0, lon: -181 }, 'Point 1: longitude out of range'],
    [{ lat: 0, lon: 0.5, elevation: 9500 }, 'Point 1: elevation out of range'],
    [{ lat: 0, lon: 0.5, timestamp: 'not-a-date' }, 'Point 1: unparseable timestamp'],
  ])('rejects malformed point %o', (bad, message) => {
    const err = captureError(() => normalizeTrack([{ lat: 0, lon: 0 }, bad, { lat: 0, lon: 1 }], config))

    expect(err).toBeInstanceOf(MalformedPointError)
    expect(err?.toAnalysisError()).toEqual({ code: 'MALFORMED_POINT', message, pointIndex: 1 })
  })

  describe('timestamps', () => {
    const points = [
      { lat: 0, lon: 0, timestamp: '2024-06-01T06:00:00Z' },
      { lat: 0, lon: 0.01, timestamp: '2024-06-01T06:10:00Z' },
      { lat: 0, lon: 0.02, timestamp: '2024-06-01T06:05:00Z' },
      { lat: 0, lon: 0.03, timestamp: '2024-06-01T06:20:00Z' },
    ]

    it('drops a regressing timestamp by default', () => {
      const track = normalizeTrack(points, config)

      expect(track.points.map((p) => p.timestampMs)).toEqual([
        Date.parse('2024-06-01T06:00:00Z'),
        Date.parse('2024-06-01T06:10:00Z'),
        null,
        Date.parse('2024-06-01T06:20:00Z'),
      ])
      expect(track.timestamped).toBe(false)
    })

    it('fails on a regression when order is enforced', () => {
      const err = captureError(() => normalizeTrack(points, config, { enforceTemporalOrder: true }))

      expect(err).toBeInstanceOf(TemporalOrderError)
      expect(err?.pointIndex).toBe(2)
    })
  })

  it('never reorders points', () => {
    const raw = [
      { lat: 0, lon: 0.003 },
      { lat: 0, lon: 0 },
      { lat: 0, lon: 0.002 },
    ]
    expect(normalizeTrack(raw, config).points.map((p) => p.lon)).toEqual([0.003, 0, 0.002])
  })
})
