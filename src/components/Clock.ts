import { Timers } from './Timers'

const MS_PER_SECOND = 1000

/**
 * A task that fires at a fixed frequency against wall-clock time.
 *
 * The phase counts elapsed milliseconds multiplied by the frequency, so one
 * full period is always 1000 units and integer inputs never accumulate
 * rounding error.
 */
export class PeriodicTask {

  frequency: number
  private phase: number = 0

  constructor(frequency: number) {
    this.frequency = frequency
  }

  /** Number of firings due within the next elapsedMs */
  due(elapsedMs: number): number {
    return Math.floor((this.phase + elapsedMs * this.frequency) / MS_PER_SECOND)
  }

  /** Offset in ms, from the start of the interval, of the nth (1-based) firing */
  offsetOf(n: number): number {
    return (n * MS_PER_SECOND - this.phase) / this.frequency
  }

  advance(elapsedMs: number): void {
    const total = this.phase + elapsedMs * this.frequency
    this.phase = total - Math.floor(total / MS_PER_SECOND) * MS_PER_SECOND
  }

  reset(): void {
    this.phase = 0
  }

}

export interface ClockHandlers {
  /** Execute one instruction. Returning false stops instructions for the rest of the interval. */
  instruction: () => boolean
  timer: () => void
}

export interface ClockResult {
  /** Instructions executed, not counting the call that returned false */
  instructions: number
  timerTicks: number
}

/**
 * Clock driver: instruction stepping at a configurable rate and timer ticks
 * at a fixed 60Hz, both scheduled from the same elapsed wall time and
 * interleaved in the order they fall due. A timer tick and an instruction
 * due at the same instant run timer first. Catch-up is capped for
 * instructions only.
 */
export class Clock {

  static TIMER_FREQUENCY: number = Timers.FREQUENCY
  static MAX_CATCH_UP_MS: number = 250

  private cpuTask: PeriodicTask
  private timerTask: PeriodicTask = new PeriodicTask(Clock.TIMER_FREQUENCY)

  constructor(frequency: number) {
    Clock.validateFrequency(frequency)
    this.cpuTask = new PeriodicTask(frequency)
  }

  static validateFrequency(frequency: number): void {
    if (!Number.isFinite(frequency) || frequency <= 0) {
      throw new RangeError(`Invalid frequency: ${frequency}`)
    }
  }

  get frequency(): number {
    return this.cpuTask.frequency
  }

  set frequency(frequency: number) {
    Clock.validateFrequency(frequency)
    this.cpuTask.frequency = frequency
  }

  advance(elapsedMs: number, handlers: ClockHandlers): ClockResult {
    // Only instructions are capped; timers always follow wall time
    const elapsed = Math.max(elapsedMs, 0)
    const cpuElapsed = Math.min(elapsed, Clock.MAX_CATCH_UP_MS)
    const cpuDue = this.cpuTask.due(cpuElapsed)
    const timerDue = this.timerTask.due(elapsed)

    let cpuFired = 0
    let timerFired = 0
    let instructions = 0

    while (cpuFired < cpuDue || timerFired < timerDue) {
      const cpuAt = cpuFired < cpuDue ? this.cpuTask.offsetOf(cpuFired + 1) : Infinity
      const timerAt = timerFired < timerDue ? this.timerTask.offsetOf(timerFired + 1) : Infinity

      if (timerAt <= cpuAt) {
        handlers.timer()
        timerFired++
      } else {
        cpuFired++
        if (handlers.instruction()) {
          instructions++
        } else {
          cpuFired = cpuDue
        }
      }
    }

    this.cpuTask.advance(cpuElapsed)
    this.timerTask.advance(elapsed)

    return { instructions, timerTicks: timerFired }
  }

  reset(): void {
    this.cpuTask.reset()
    this.timerTask.reset()
  }

}
