export type RawTrackPoint = {
  lat: number
  lon: number
  elevation?: number | null
  timestamp?: string | null // ISO-8601
}

export type TrackPoint = {
  readonly lat: number
  readonly lon: number
  readonly elevation: number
  readonly timestampMs: number | null
}

export type NormalizedTrack = {
  readonly points: readonly TrackPoint[]
  readonly elevationKnown: boolean // false when no raw point carried an elevation
  readonly timestamped: boolean // every point has a timestamp
}

export type TrackSegment = {
  fromIndex: number
  startKm: number
  distanceM: number
  elevationDeltaM: number
}

export type SlopeSample = {
  distanceM: number
  elevationDeltaM: number
  slopePct: number
}
