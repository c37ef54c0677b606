import { CPU, Quirks } from './CPU'
import { Clock, ClockResult } from './Clock'
import { Display } from './Display'
import { Keypad } from './Keypad'
import { MachineError } from './MachineError'
import { Memory } from './Memory'
import { Timers } from './Timers'
import { readFile } from 'fs/promises'

export interface MachineOptions {
  frequency?: number
  quirks?: Partial<Quirks>
  random?: () => number
}

export class Machine {

  static MAX_FPS: number = 60
  static FRAME_INTERVAL_MS: number = 1000 / Machine.MAX_FPS
  static DEFAULT_FREQUENCY: number = 700 // instructions per second

  cpu: CPU
  memory: Memory
  display: Display
  keypad: Keypad
  timers: Timers
  clock: Clock

  /** The last image loaded, restored on reset */
  program: Uint8Array = new Uint8Array(0)

  isAlive: boolean = false
  isRunning: boolean = false
  frames: number = 0
  startTime: number = Date.now()
  previousTime: number = performance.now()

  private frameAccumulatorMs: number = 0

  render?: (display: Display) => void
  onHalt?: (fault: MachineError) => void

  //
  // Initialization
  //

  constructor(options: MachineOptions = {}) {
    this.memory = new Memory()
    this.display = new Display()
    this.keypad = new Keypad()
    this.timers = new Timers()
    this.clock = new Clock(options.frequency ?? Machine.DEFAULT_FREQUENCY)
    this.cpu = new CPU(this.memory, this.display, this.keypad, this.timers, {
      quirks: options.quirks,
      random: options.random,
    })
  }

  get frequency(): number {
    return this.clock.frequency
  }

  set frequency(frequency: number) {
    this.clock.frequency = frequency
  }

  get isHalted(): boolean {
    return this.cpu.isHalted
  }

  //
  // Methods
  //

  loadProgram = async (path: string): Promise<void> => {
    this.load(new Uint8Array(await readFile(path)))
  }

  /**
   * Reset the machine and copy a program image to $200.
   * Throws ImageTooLarge, leaving the previous image in place.
   */
  load(program: ArrayLike<number>): void {
    Memory.checkImage(program)
    this.program = Uint8Array.from(program)
    this.reset()
  }

  start(): void {
    this.startTime = Date.now()
    this.previousTime = performance.now()
    this.isRunning = true
    this.isAlive = true
    this.loop()
  }

  end(): void {
    this.isRunning = false
    this.isAlive = false
  }

  run(): void {
    if (this.isHalted) { return }
    this.isRunning = true
  }

  stop(): void {
    this.isRunning = false
  }

  /**
   * Execute one instruction. Returns false if the machine halted.
   */
  step(): boolean {
    if (this.isHalted) { return false }
    try {
      this.cpu.step()
      return true
    } catch (error) {
      if (!(error instanceof MachineError)) { throw error }
      this.halt(error)
      return false
    }
  }

  /**
   * One 60Hz timer tick
   */
  tick(): void {
    this.timers.tick()
  }

  /**
   * Run everything that falls due within elapsedMs of wall time
   */
  advance(elapsedMs: number): ClockResult {
    return this.clock.advance(elapsedMs, {
      instruction: () => this.isRunning && this.step(),
      timer: () => {
        if (!this.isHalted) { this.tick() }
      },
    })
  }

  onKeyDown(key: number): void {
    this.keypad.setKey(key, true)
  }

  onKeyUp(key: number): void {
    this.keypad.setKey(key, false)
  }

  //
  // Loop Operations
  //

  private halt(fault: MachineError): void {
    this.isRunning = false
    if (this.onHalt) {
      this.onHalt(fault)
    }
  }

  private loop(): void {
    if (!this.isAlive) { return }

    const now = performance.now()
    const elapsedMs = now - this.previousTime
    this.previousTime = now

    if (this.isRunning) {
      this.advance(elapsedMs)
    }

    this.frameAccumulatorMs += elapsedMs
    if (this.frameAccumulatorMs >= Machine.FRAME_INTERVAL_MS) {
      this.frameAccumulatorMs %= Machine.FRAME_INTERVAL_MS
      if (this.render) {
        this.render(this.display)
        this.display.isDirty = false
        this.frames += 1
      }
    }

    setTimeout(() => this.loop(), 1)
  }

  reset(): void {
    this.memory.reset()
    this.memory.load(this.program)
    this.display.reset()
    this.keypad.reset()
    this.timers.reset()
    this.clock.reset()
    this.cpu.reset()
  }

}
