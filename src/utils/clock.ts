export interface Clock {
  // monotonic milliseconds
  now(): number
}

export const CLOCK = Symbol('CLOCK')

export class SystemClock implements Clock {
  now(): number {
    return performance.now()
  }
}
