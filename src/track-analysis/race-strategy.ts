import type {
  RaceStrategy,
  RaceWaypoint,
  StrategyPoint,
  StrategyRequest,
  WaypointType,
} from '../types/analysis.types'
import type { NormalizedTrack, TrackSegment } from '../types/track.types'
import { roundTo } from '../utils/geo'
import type { AnalysisConfig } from './analysis.config'
import { clockTime } from './analysis-config.schema'
import { formatDuration } from './pacing-predictor'
import { InvalidStrategyError } from './track-analysis.errors'

// cumulative distance may land a hair short of an exact waypoint km
const KM_EPSILON = 1e-6
const DAY_SEC = 24 * 3600

export type Stop = {
  km: number
  name: string
  type: WaypointType
}

export type StrategyLeg = {
  to: Stop
  distanceKm: number
  dPlusM: number
  dMinusM: number
  costKm: number
  endAltitudeM: number
}

function validateRequest(request: StrategyRequest): void {
  if (!Number.isFinite(request.targetTimeSec) || request.targetTimeSec <= 0) {
    throw new InvalidStrategyError(`targetTimeSec must be a positive number of seconds, got ${request.targetTimeSec}`)
  }
  if (request.fatigueDrift != null && (!Number.isFinite(request.fatigueDrift) || request.fatigueDrift <= 0)) {
    throw new InvalidStrategyError(`fatigueDrift must be positive, got ${request.fatigueDrift}`)
  }
  if (request.startTime != null && !clockTime.safeParse(request.startTime).success) {
    throw new InvalidStrategyError(`startTime must be HH:MM, got "${request.startTime}"`)
  }
  for (const wp of request.waypoints ?? []) {
    if (!Number.isFinite(wp.km)) throw new InvalidStrategyError(`waypoint km must be finite, got ${wp.km}`)
  }
}

/**
 * Sorted stops from start to finish. Waypoints beyond the finish tolerance
 * are ignored. A start and a finish are added unless a waypoint already sits
 * there.
 */
export function resolveStops(
  waypoints: readonly RaceWaypoint[],
  totalKm: number,
  config: AnalysisConfig,
): Stop[] {
  const { startSnapKm, finishToleranceKm } = config.strategy
  const kept = waypoints
    .filter((wp) => wp.km >= 0 && wp.km <= totalKm + finishToleranceKm)
    .sort((a, b) => a.km - b.km)
    .map((wp): Stop => ({ km: wp.km, name: wp.name ?? `km ${roundTo(wp.km, 1)}`, type: wp.type ?? 'AID_STATION' }))

  const stops: Stop[] = []
  const first = kept[0]
  if (!first || first.km > startSnapKm) stops.push({ km: 0, name: 'Start', type: 'START' })
  stops.push(...kept)

  const last = stops[stops.length - 1]
  if (!last || stops.length < 2 || Math.abs(last.km - totalKm) > finishToleranceKm) {
    stops.push({ km: totalKm, name: 'Finish', type: 'FINISH' })
  }
  return stops
}

/**
 * Accumulates segment distance, climb, descent and flat-equivalent cost
 * between consecutive stops. A leg closes on the first segment whose end
 * reaches its stop; legs still open at the end of the track close there.
 */
export function buildLegs(
  track: NormalizedTrack,
  segments: readonly TrackSegment[],
  stops: readonly Stop[],
  config: AnalysisConfig,
): StrategyLeg[] {
  const { climbPenaltyM, steepSlopePct, steepMultiplier } = config.prediction
  const legs: StrategyLeg[] = []
  let next = 1
  let acc = { distanceKm: 0, dPlusM: 0, dMinusM: 0, costKm: 0 }

  const close = (altitudeM: number) => {
    const to = stops[next]
    if (!to) return
    legs.push({ to, ...acc, endAltitudeM: altitudeM })
    acc = { distanceKm: 0, dPlusM: 0, dMinusM: 0, costKm: 0 }
    next++
  }

  for (const segment of segments) {
    const distanceKm = segment.distanceM / 1000
    const dPlusM = Math.max(0, segment.elevationDeltaM)
    const slopePct = segment.distanceM > 0 ? (segment.elevationDeltaM / segment.distanceM) * 100 : 0
    const steep = Math.abs(slopePct) > steepSlopePct ? steepMultiplier : 1

    acc.distanceKm += distanceKm
    acc.dPlusM += dPlusM
    acc.dMinusM += Math.max(0, -segment.elevationDeltaM)
    acc.costKm += (distanceKm + dPlusM / climbPenaltyM) * steep

    const endKm = segment.startKm + distanceKm
    const altitudeM = track.points[segment.fromIndex + 1]?.elevation ?? 0
    while (next < stops.length && endKm + KM_EPSILON >= stops[next]!.km) close(altitudeM)
  }

  const finishAltitudeM = track.points[track.points.length - 1]?.elevation ?? 0
  while (next < stops.length) close(finishAltitudeM)
  return legs
}

/**
 * Splits `targetSec` over the legs in proportion to their cost, scaled by a
 * drift that grows linearly from 1 at the start to `fatigueDrift` at the
 * finish. Returns seconds per leg.
 */
export function distributeTime(legs: readonly StrategyLeg[], targetSec: number, fatigueDrift: number): number[] {
  if (legs.length === 0) return []

  const totalCost = legs.reduce((sum, leg) => sum + leg.costKm, 0)
  if (totalCost <= 0) return legs.map(() => targetSec / legs.length)

  let costBefore = 0
  const weighted = legs.map((leg) => {
    const drift = 1 + (costBefore / totalCost) * (fatigueDrift - 1)
    costBefore += leg.costKm
    return leg.costKm * drift
  })
  const weightedTotal = weighted.reduce((sum, w) => sum + w, 0)
  return weighted.map((w) => (w / weightedTotal) * targetSec)
}

const parseClock = (hhmm: string): number => {
  const [h = 0, m = 0] = hhmm.split(':').map(Number)
  return h * 3600 + m * 60
}

export function timeOfDay(startSec: number, elapsedSec: number): string {
  const t = (((startSec + Math.round(elapsedSec)) % DAY_SEC) + DAY_SEC) % DAY_SEC
  const h = Math.floor(t / 3600)
  const m = Math.floor((t % 3600) / 60)
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`
}

const cumulative = (values: readonly number[]): number[] => {
  let sum = 0
  return values.map((v) => (sum += v))
}

/**
 * Pacing plan for a target finish time over the race's waypoints, with the
 * aggressive (fast start, fading finish) and conservative (even effort)
 * variants reaching the same target.
 */
export function planRaceStrategy(
  track: NormalizedTrack,
  segments: readonly TrackSegment[],
  request: StrategyRequest,
  config: AnalysisConfig,
): RaceStrategy {
  validateRequest(request)
  const cfg = config.strategy
  const startTime = request.startTime ?? cfg.defaultStartTime
  const fatigueDrift = request.fatigueDrift ?? cfg.defaultFatigueDrift
  const { targetTimeSec } = request

  const totalKm = segments.reduce((sum, s) => sum + s.distanceM, 0) / 1000
  const stops = resolveStops(request.waypoints ?? [], totalKm, config)
  const legs = buildLegs(track, segments, stops, config)

  const main = cumulative(distributeTime(legs, targetTimeSec, fatigueDrift))
  const aggressive = cumulative(distributeTime(legs, targetTimeSec, cfg.aggressiveFatigueDrift))
  const conservative = cumulative(distributeTime(legs, targetTimeSec, cfg.conservativeFatigueDrift))

  const startSec = parseClock(startTime)
  const start = stops[0]!
  const startTod = timeOfDay(startSec, 0)
  const points: StrategyPoint[] = [
    {
      name: start.name,
      type: start.type,
      km: 0,
      altitudeM: Math.round(track.points[0]?.elevation ?? 0),
      dPlusCumulM: 0,
      segmentDistanceKm: 0,
      segmentDPlusM: 0,
      segmentDMinusM: 0,
      segmentTimeSec: 0,
      raceTimeSec: 0,
      raceTimeLabel: formatDuration(0),
      timeOfDay: startTod,
      aggressiveTimeOfDay: startTod,
      conservativeTimeOfDay: startTod,
    },
  ]

  let dPlusCumulM = 0
  let previousSec = 0
  legs.forEach((leg, i) => {
    dPlusCumulM += leg.dPlusM
    // rounded cumulatively so leg times add up to the target exactly
    const raceTimeSec = Math.round(main[i] ?? 0)
    points.push({
      name: leg.to.name,
      type: leg.to.type,
      km: roundTo(leg.to.km, 2),
      altitudeM: Math.round(leg.endAltitudeM),
      dPlusCumulM: Math.round(dPlusCumulM),
      segmentDistanceKm: roundTo(leg.distanceKm, 2),
      segmentDPlusM: Math.round(leg.dPlusM),
      segmentDMinusM: Math.round(leg.dMinusM),
      segmentTimeSec: raceTimeSec - previousSec,
      raceTimeSec,
      raceTimeLabel: formatDuration(raceTimeSec),
      timeOfDay: timeOfDay(startSec, main[i] ?? 0),
      aggressiveTimeOfDay: timeOfDay(startSec, aggressive[i] ?? 0),
      conservativeTimeOfDay: timeOfDay(startSec, conservative[i] ?? 0),
    })
    previousSec = raceTimeSec
  })

  return { targetTimeSec, fatigueDrift, startTime, points }
}
