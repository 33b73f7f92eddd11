export type AnalysisErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'TEMPORAL_ORDER'
  | 'INVALID_PROFILE'
  | 'MALFORMED_POINT'
  | 'INVALID_STRATEGY'

export type AnalysisError = {
  code: AnalysisErrorCode
  message: string
  pointIndex?: number
}

export abstract class TrackAnalysisError extends Error {
  abstract readonly code: AnalysisErrorCode

  constructor(message: string, readonly pointIndex?: number) {
    super(message)
    this.name = new.target.name
  }

  toAnalysisError(): AnalysisError {
    return this.pointIndex === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, pointIndex: this.pointIndex }
  }
}

export class InsufficientDataError extends TrackAnalysisError {
  readonly code = 'INSUFFICIENT_DATA' as const
}

export class TemporalOrderError extends TrackAnalysisError {
  readonly code = 'TEMPORAL_ORDER' as const
}

export class InvalidProfileError extends TrackAnalysisError {
  readonly code = 'INVALID_PROFILE' as const
}

export class MalformedPointError extends TrackAnalysisError {
  readonly code = 'MALFORMED_POINT' as const
}

export class InvalidStrategyError extends TrackAnalysisError {
  readonly code = 'INVALID_STRATEGY' as const
}
