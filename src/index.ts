#! /usr/bin/env node

import figlet from 'figlet'
import { Command } from 'commander'
import { emitKeypressEvents, Key } from 'readline'
import { Machine } from './components/Machine'
import { Quirks } from './components/CPU'
import { MachineError } from './components/MachineError'
import { TerminalInput } from './components/TerminalInput'
import { TerminalRenderer } from './components/TerminalRenderer'
import { formatAddress, formatWord } from './components/Disassembler'

const VERSION = '1.0.0'

type EmulatorOptions = {
  freq: string
  keyHold: string
  shiftInPlace?: boolean
  keepIndex?: boolean
  resetVf?: boolean
  jumpVx?: boolean
  clipSprites?: boolean
}

class Emulator {
  private machine: Machine
  private renderer: TerminalRenderer
  private input: TerminalInput
  private options: EmulatorOptions
  private programPath: string
  private fault?: MachineError
  private isShuttingDown: boolean = false

  constructor(programPath: string, options: EmulatorOptions) {
    this.programPath = programPath
    this.options = options
    this.machine = new Machine({ quirks: this.quirks() })
    this.renderer = new TerminalRenderer((text) => process.stdout.write(text))
    this.input = new TerminalInput(this.machine.keypad)
  }

  async initialize(): Promise<void> {
    this.configureFrequency()
    this.configureKeyHold()
    await this.loadProgram()
    this.setupTerminal()
    this.setupKeyboard()
  }

  private quirks(): Partial<Quirks> {
    const quirks: Partial<Quirks> = {}
    if (this.options.shiftInPlace) { quirks.shiftUsesVy = false }
    if (this.options.keepIndex) { quirks.memoryIncrementsIndex = false }
    if (this.options.resetVf) { quirks.logicResetsFlag = true }
    if (this.options.jumpVx) { quirks.jumpUsesVx = true }
    if (this.options.clipSprites) { quirks.clipSprites = true }
    return quirks
  }

  private configureFrequency(): void {
    const frequency = Number(this.options.freq)

    if (isNaN(frequency) || frequency <= 0) {
      console.log()
      console.error(`Aborting... Error Invalid Frequency: '${this.options.freq}'`)
      process.exit(1)
    }

    this.machine.frequency = frequency
    console.log(`Frequency: ${frequency} Hz`)
  }

  private configureKeyHold(): void {
    const holdMs = Number(this.options.keyHold)

    if (isNaN(holdMs) || holdMs < 0) {
      console.log()
      console.error(`Aborting... Error Invalid Key Hold: '${this.options.keyHold}'`)
      process.exit(1)
    }

    this.input.holdMs = holdMs
    console.log(`Key Hold: ${holdMs} ms`)
  }

  private async loadProgram(): Promise<void> {
    await this.machine.loadProgram(this.programPath)
    console.log(`Loaded Program: ${this.programPath} (${this.machine.program.length} bytes)`)
  }

  private setupTerminal(): void {
    if (!process.stdin.isTTY || !process.stdout.isTTY) {
      console.error('Aborting... Error: an interactive terminal is required')
      process.exit(1)
    }

    this.renderer.enter()

    this.machine.render = () => {
      this.input.releaseExpired(performance.now())
      this.renderer.render(this.machine)
    }

    this.machine.onHalt = (fault: MachineError) => {
      this.fault = fault
      this.shutdown()
    }
  }

  private setupKeyboard(): void {
    emitKeypressEvents(process.stdin)
    process.stdin.setRawMode(true)
    process.stdin.resume()

    process.stdin.on('keypress', (character: string | undefined, key: Key | undefined) => {
      if (key && (key.name === 'escape' || (key.ctrl && key.name === 'c'))) {
        this.shutdown()
        return
      }

      const name = character ?? key?.name
      if (name) {
        this.input.press(name, performance.now())
      }
    })
  }

  private shutdown(): void {
    if (this.isShuttingDown) { return }
    this.isShuttingDown = true

    this.machine.end()
    this.input.releaseAll()

    process.stdin.setRawMode(false)
    process.stdin.pause()
    this.renderer.leave()

    const uptime = Date.now() - this.machine.startTime

    console.log()
    console.log('Result:')
    console.table({
      'Time Elapsed': uptime / 1000,
      'Instructions': this.machine.cpu.cycles,
      'Frames': this.machine.frames,
      'Avg FPS': parseFloat((this.machine.frames / (uptime / 1000)).toFixed(2))
    })

    if (this.fault) {
      const { kind, pc, opcode, message } = this.fault
      const at = pc === undefined ? '' : ` at ${formatAddress(pc)}`
      const word = opcode === undefined ? '' : ` (${formatWord(opcode)})`
      console.error(`Halted: ${kind}${at}${word}`)
      console.error(message)
      process.exit(1)
    }

    process.exit(0)
  }

  start(): void {
    this.machine.start()
  }
}

// Parse command line arguments
const program = new Command()
program
  .name('chip8')
  .description('CHIP-8 interpreter for the terminal.')
  .version(VERSION, '-v, --version', 'Output the current emulator version')
  .helpOption('-h, --help', 'Output help / options')
  .argument('<program>', 'Path to a CHIP-8 program image')
  .option('-f, --freq <freq>', 'Set the instruction rate in Hz', String(Machine.DEFAULT_FREQUENCY))
  .option('-k, --key-hold <ms>', 'How long a key press holds a keypad key down', String(TerminalInput.DEFAULT_HOLD_MS))
  .option('--shift-in-place', 'Shift Vx in place for 8xy6 / 8xyE instead of shifting Vy')
  .option('--keep-index', 'Leave I unchanged after Fx55 / Fx65')
  .option('--reset-vf', 'Clear VF after 8xy1 / 8xy2 / 8xy3')
  .option('--jump-vx', 'Jump to nnn + Vx for Bnnn instead of nnn + V0')
  .option('--clip-sprites', 'Clip sprites at the screen edge instead of wrapping')
  .addHelpText('beforeAll', figlet.textSync('CHIP-8', { font: 'Standard' }) + '\n' + `Version: ${VERSION}\n`)
  .parse(process.argv)

const options = program.opts<EmulatorOptions>()
const [programPath] = program.args

// Main initialization function
async function main() {
  const emulator = new Emulator(programPath, options)
  await emulator.initialize()
  emulator.start()
}

// Run the main function
main().catch((error) => {
  console.error('Error:', error instanceof Error ? error.message : error)
  process.exit(1)
})
