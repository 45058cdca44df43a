/**
 * Timing helpers used for measuring work and stamping log entries
 */

/** Factors for translating nanoseconds -> microseconds */
const NANO_PER_MICRO = 1_000n
const MICRO_PER_SECOND = 1_000_000
const MICRO_PER_MILLI = 1_000

/**
 * Represents an elapsed amount of time at microsecond resolution
 */
export class Duration {
  private readonly _microseconds: number

  private constructor(nanoseconds: bigint) {
    this._microseconds = Number(nanoseconds / NANO_PER_MICRO)
  }

  /**
   * @returns The number of seconds with 6 decimal places for microsecond resolution
   */
  seconds(): number {
    return this._microseconds / MICRO_PER_SECOND
  }

  /**
   * @returns The number of milliseconds with 3 decimal places for microsecond resolution
   */
  milliseconds(): number {
    return this._microseconds / MICRO_PER_MILLI
  }

  microseconds(): number {
    return this._microseconds
  }

  toString(): string {
    return `${this.seconds()}s`
  }

  /**
   * Create a {@link Duration} from a nanosecond measurement such as the
   * difference of two `process.hrtime.bigint()` calls
   */
  static ofNano(nanoseconds: bigint): Duration {
    return nanoseconds > 0n ? new Duration(nanoseconds) : Duration.ZERO
  }

  /**
   * Create a {@link Duration} from a millisecond measurement
   */
  static ofMilli(milliseconds: number): Duration {
    return Duration.ofNano(BigInt(Math.round(milliseconds * 1_000_000)))
  }

  static readonly ZERO: Duration = new Duration(0n)
}

/**
 * Tracks the elapsed {@link Duration} between a start and stop
 */
export class Timer {
  private _started?: bigint

  /**
   * @returns A new {@link Timer} that has been started
   */
  static startNew(): Timer {
    const timer = new Timer()
    timer.start()
    return timer
  }

  get running(): boolean {
    return this._started !== undefined
  }

  /**
   * Starts the timer, a running timer is left untouched
   */
  start(): void {
    this._started ??= process.hrtime.bigint()
  }

  /**
   * Stop the timer
   *
   * @returns The {@link Duration} the timer was running or
   * {@link Duration.ZERO} if it was not started
   */
  stop(): Duration {
    const elapsed = this.elapsed()
    this._started = undefined
    return elapsed
  }

  /**
   * @returns The {@link Duration} the timer has been running or
   * {@link Duration.ZERO} if it was not started
   */
  elapsed(): Duration {
    return this._started !== undefined
      ? Duration.ofNano(process.hrtime.bigint() - this._started)
      : Duration.ZERO
  }
}

/**
 * A point in time with nanosecond precision anchored to the wall clock when
 * the process loaded this module
 */
export class Timestamp {
  private static readonly ORIGIN_HR: bigint = process.hrtime.bigint()
  private static readonly ORIGIN_UTC: number = Date.now()

  constructor(readonly nanoseconds: bigint) {}

  /**
   * Calculate the {@link Duration} until a later {@link Timestamp}
   *
   * @param other The later {@link Timestamp}
   * @returns The elapsed {@link Duration} or {@link Duration.ZERO} if `other`
   * is not later than this one
   */
  until(other: Timestamp): Duration {
    return Duration.ofNano(other.nanoseconds - this.nanoseconds)
  }

  toISOString(): string {
    const offset = Number((this.nanoseconds - Timestamp.ORIGIN_HR) / 1_000_000n)
    return new Date(Timestamp.ORIGIN_UTC + offset).toISOString()
  }
}

/**
 * A clock that can be used to track time at sub-millisecond precision
 */
export class HiResClock {
  static timestamp(): Timestamp {
    return new Timestamp(process.hrtime.bigint())
  }
}
