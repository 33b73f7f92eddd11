export type GeometrySummary = {
  totalDistanceKm: number
  elevationGainM: number
  elevationLossM: number
  maxAltitudeM: number
  minAltitudeM: number
  avgAltitudeM: number
  maxSlopePct: number
  avgUphillSlopePct: number
  longestClimbM: number
}

export const ROUTE_TYPES = ['LOOP', 'OUT_AND_BACK', 'POINT_TO_POINT'] as const
export type RouteType = (typeof ROUTE_TYPES)[number]

export type TopologyReport = {
  routeType: RouteType
  closureDistanceM: number
  overlapRatio: number
  medianOverlapDistanceM: number | null
}

export const ENVIRONMENT_TAGS = [
  'COASTAL',
  'FOREST',
  'HIGH_MOUNTAIN',
  'SKYRUNNING',
  'URBAN',
  'VERTICAL',
] as const
export type EnvironmentTag = (typeof ENVIRONMENT_TAGS)[number]

export const MUD_INDEX_LEVELS = ['UNKNOWN', 'LOW', 'MEDIUM', 'HIGH'] as const
export type MudIndex = (typeof MUD_INDEX_LEVELS)[number]

export const EXPOSURE_LEVELS = ['UNKNOWN', 'LOW', 'MODERATE', 'HIGH', 'EXTREME'] as const
export type Exposure = (typeof EXPOSURE_LEVELS)[number]

export type TechnicityProfile = {
  technicityScore: number // 0..100
  environmentTags: EnvironmentTag[]
  mudIndex: MudIndex
  exposure: Exposure
}

export const ARCHETYPES = ['HIKER', 'RUNNER', 'ELITE'] as const
export type Archetype = (typeof ARCHETYPES)[number]

export type RunnerProfile = {
  fitnessIndex?: number | null
  archetype?: Archetype | null
}

export type EffortSummary = {
  effortKm: number
  ibpIndex: number
  itraPoints: number
}

export type CheckpointSplit = {
  distanceKm: number
  cumulativeTimeSec: number
}

export type PaceScenarios = {
  enduranceSec: number
  raceSec: number
  pushSec: number
}

export type PredictionResult = {
  archetype: Archetype | null
  fitnessIndex: number | null
  vo2maxEstimate: number | null
  flatSpeedKmh: number
  totalTimeSec: number
  totalTimeLabel: string // e.g. "4h05"
  scenarios: PaceScenarios
  checkpointSplits: CheckpointSplit[]
}

export type RecordingSummary = {
  elapsedTimeSec: number
  movingTimeSec: number
}

export const WAYPOINT_TYPES = ['START', 'AID_STATION', 'CHECKPOINT', 'FINISH'] as const
export type WaypointType = (typeof WAYPOINT_TYPES)[number]

export type RaceWaypoint = {
  km: number
  name?: string | null
  type?: WaypointType | null
}

export type StrategyRequest = {
  targetTimeSec: number
  waypoints?: RaceWaypoint[] | null
  startTime?: string | null // HH:MM
  fatigueDrift?: number | null // pace multiplier reached at the finish
}

export type StrategyPoint = {
  name: string
  type: WaypointType
  km: number
  altitudeM: number
  dPlusCumulM: number
  segmentDistanceKm: number
  segmentDPlusM: number
  segmentDMinusM: number
  segmentTimeSec: number
  raceTimeSec: number
  raceTimeLabel: string
  timeOfDay: string
  aggressiveTimeOfDay: string
  conservativeTimeOfDay: string
}

export type RaceStrategy = {
  targetTimeSec: number
  fatigueDrift: number
  startTime: string
  points: StrategyPoint[]
}

export type AnalysisResult = {
  geometry: GeometrySummary
  routeType: RouteType
  topology: TopologyReport
  technicity: TechnicityProfile
  effort: EffortSummary
  predictions: PredictionResult[]
  recording: RecordingSummary | null
  strategy: RaceStrategy | null
}
