import { Display } from './Display'
import { Instruction, decode } from './Decoder'
import { Keypad } from './Keypad'
import { FaultKind, MachineError } from './MachineError'
import { Memory } from './Memory'
import { Registers } from './Registers'
import { Timers } from './Timers'

/**
 * Behaviours that differ between CHIP-8 interpreters
 */
export interface Quirks {
  /** 8xy6 / 8xyE shift Vy into Vx (COSMAC VIP) instead of shifting Vx in place */
  shiftUsesVy: boolean
  /** Fx55 / Fx65 leave I pointing past the last register transferred */
  memoryIncrementsIndex: boolean
  /** 8xy1 / 8xy2 / 8xy3 clear VF */
  logicResetsFlag: boolean
  /** Bnnn jumps to nnn + Vx, x being the top nibble of nnn (SUPER-CHIP) */
  jumpUsesVx: boolean
  /** Sprites are clipped at the screen edge instead of wrapping */
  clipSprites: boolean
}

export const DEFAULT_QUIRKS: Quirks = {
  shiftUsesVy: true,
  memoryIncrementsIndex: true,
  logicResetsFlag: false,
  jumpUsesVx: false,
  clipSprites: false,
}

export type CPUState =
  | { kind: 'RUNNING' }
  | { kind: 'AWAITING_KEY', register: number }
  | { kind: 'HALTED', fault: MachineError }

export interface CPUOptions {
  quirks?: Partial<Quirks>
  /** Source of random bytes for Cxkk, 0-255 */
  random?: () => number
}

const randomByte = (): number => Math.floor(Math.random() * 0x100)

export class CPU {

  static INSTRUCTION_SIZE: number = 2

  registers: Registers = new Registers()
  state: CPUState = { kind: 'RUNNING' }
  quirks: Quirks
  cycles: number = 0 // instructions executed

  private random: () => number

  constructor(
    private memory: Memory,
    private display: Display,
    private keypad: Keypad,
    private timers: Timers,
    options: CPUOptions = {}
  ) {
    this.quirks = { ...DEFAULT_QUIRKS, ...options.quirks }
    this.random = options.random ?? randomByte
  }

  get isHalted(): boolean {
    return this.state.kind === 'HALTED'
  }

  get isAwaitingKey(): boolean {
    return this.state.kind === 'AWAITING_KEY'
  }

  reset(): void {
    this.registers.reset()
    this.state = { kind: 'RUNNING' }
    this.cycles = 0
  }

  /**
   * Decode the instruction at PC without executing it
   */
  peek(): Instruction {
    return decode(this.memory.readWord(this.registers.pc))
  }

  /**
   * Fetch, decode and execute one instruction.
   *
   * A fault restores PC, halts the CPU and is thrown to the caller. Every
   * instruction validates before its first mutation, so nothing else needs
   * to be rolled back. Stepping a halted CPU throws the same fault again.
   */
  step(): void {
    switch (this.state.kind) {
      case 'HALTED':
        throw this.state.fault
      case 'AWAITING_KEY':
        this.resumeOnKey(this.state.register)
        return
      case 'RUNNING':
        break
    }

    const pc = this.registers.pc
    let word: number | undefined

    try {
      word = this.memory.readWord(pc)
      const instruction = decode(word)
      this.registers.pc = pc + CPU.INSTRUCTION_SIZE
      this.execute(instruction)
      this.cycles++
    } catch (error) {
      if (!(error instanceof MachineError)) { throw error }

      this.registers.pc = pc
      error.pc = pc
      error.opcode = error.opcode ?? word
      this.state = { kind: 'HALTED', fault: error }
      throw error
    }
  }

  private resumeOnKey(register: number): void {
    const key = this.keypad.takePressedKey()
    if (key === null) { return }

    this.registers.v[register] = key
    this.registers.pc += CPU.INSTRUCTION_SIZE
    this.state = { kind: 'RUNNING' }
    this.cycles++
  }

  private skipIf(condition: boolean): void {
    if (condition) {
      this.registers.pc += CPU.INSTRUCTION_SIZE
    }
  }

  execute(instruction: Instruction): void {
    const r = this.registers
    const v = r.v

    switch (instruction.op) {

      // Control flow

      case 'SYS':
        // Machine code routine on the original hardware, ignored
        return
      case 'CLS':
        this.display.clear()
        return
      case 'RET':
        r.pc = r.pop()
        return
      case 'JP':
        r.pc = instruction.address
        return
      case 'CALL':
        r.push(r.pc)
        r.pc = instruction.address
        return
      case 'SE_BYTE':
        this.skipIf(v[instruction.x] === instruction.byte)
        return
      case 'SNE_BYTE':
        this.skipIf(v[instruction.x] !== instruction.byte)
        return
      case 'SE_REG':
        this.skipIf(v[instruction.x] === v[instruction.y])
        return
      case 'SNE_REG':
        this.skipIf(v[instruction.x] !== v[instruction.y])
        return
      case 'JP_V0': {
        const offset = this.quirks.jumpUsesVx ? v[(instruction.address & 0xF00) >> 8] : v[0]
        const target = instruction.address + offset
        this.memory.check(target)
        r.pc = target
        return
      }

      // Loads and arithmetic

      case 'LD_BYTE':
        v[instruction.x] = instruction.byte
        return
      case 'ADD_BYTE':
        v[instruction.x] = (v[instruction.x] + instruction.byte) & 0xFF
        return
      case 'LD_REG':
        v[instruction.x] = v[instruction.y]
        return
      case 'OR':
        v[instruction.x] |= v[instruction.y]
        if (this.quirks.logicResetsFlag) { r.flag = 0 }
        return
      case 'AND':
        v[instruction.x] &= v[instruction.y]
        if (this.quirks.logicResetsFlag) { r.flag = 0 }
        return
      case 'XOR':
        v[instruction.x] ^= v[instruction.y]
        if (this.quirks.logicResetsFlag) { r.flag = 0 }
        return
      case 'ADD_REG': {
        const sum = v[instruction.x] + v[instruction.y]
        v[instruction.x] = sum & 0xFF
        r.flag = sum > 0xFF ? 1 : 0
        return
      }
      case 'SUB': {
        const noBorrow = v[instruction.x] >= v[instruction.y]
        v[instruction.x] = (v[instruction.x] - v[instruction.y]) & 0xFF
        r.flag = noBorrow ? 1 : 0
        return
      }
      case 'SUBN': {
        const noBorrow = v[instruction.y] >= v[instruction.x]
        v[instruction.x] = (v[instruction.y] - v[instruction.x]) & 0xFF
        r.flag = noBorrow ? 1 : 0
        return
      }
      case 'SHR': {
        const source = this.quirks.shiftUsesVy ? v[instruction.y] : v[instruction.x]
        // Flag first: 8Fy6 leaves the shifted value in VF
        r.flag = source & 0x01
        v[instruction.x] = source >> 1
        return
      }
      case 'SHL': {
        const source = this.quirks.shiftUsesVy ? v[instruction.y] : v[instruction.x]
        r.flag = (source & 0x80) >> 7
        v[instruction.x] = (source << 1) & 0xFF
        return
      }
      case 'RND':
        v[instruction.x] = this.random() & instruction.byte
        return

      // Index register and memory

      case 'LD_I':
        r.i = instruction.address
        return
      case 'ADD_I':
        r.i = (r.i + v[instruction.x]) & 0xFFF
        return
      case 'LD_F':
        r.i = this.memory.fontAddress(v[instruction.x])
        return
      case 'LD_B': {
        const value = v[instruction.x]
        this.memory.check(r.i, 3)
        this.memory.write(r.i, Math.floor(value / 100))
        this.memory.write(r.i + 1, Math.floor(value / 10) % 10)
        this.memory.write(r.i + 2, value % 10)
        return
      }
      case 'LD_MEM_VX':
        this.memory.check(r.i, instruction.x + 1)
        for (let k = 0; k <= instruction.x; k++) {
          this.memory.write(r.i + k, v[k])
        }
        if (this.quirks.memoryIncrementsIndex) { r.i = (r.i + instruction.x + 1) & 0xFFF }
        return
      case 'LD_VX_MEM':
        this.memory.check(r.i, instruction.x + 1)
        for (let k = 0; k <= instruction.x; k++) {
          v[k] = this.memory.read(r.i + k)
        }
        if (this.quirks.memoryIncrementsIndex) { r.i = (r.i + instruction.x + 1) & 0xFFF }
        return

      // Display

      case 'DRW': {
        this.memory.check(r.i, instruction.n)
        const sprite = this.memory.data.subarray(r.i, r.i + instruction.n)
        const collision = this.display.drawSprite(v[instruction.x], v[instruction.y], sprite, this.quirks.clipSprites)
        r.flag = collision ? 1 : 0
        return
      }

      // Input

      case 'SKP':
        this.skipIf(this.keypad.isPressed(v[instruction.x]))
        return
      case 'SKNP':
        this.skipIf(!this.keypad.isPressed(v[instruction.x]))
        return
      case 'LD_VX_K':
        // Stay on this instruction until a key goes down
        r.pc -= CPU.INSTRUCTION_SIZE
        this.keypad.clearPressedKey()
        this.state = { kind: 'AWAITING_KEY', register: instruction.x }
        return

      // Timers

      case 'LD_VX_DT':
        v[instruction.x] = this.timers.delay
        return
      case 'LD_DT_VX':
        this.timers.delay = v[instruction.x]
        return
      case 'LD_ST_VX':
        this.timers.sound = v[instruction.x]
        return

      case 'INVALID':
        throw new MachineError(
          FaultKind.INVALID_OPCODE,
          `Invalid opcode: 0x${instruction.word.toString(16).toUpperCase().padStart(4, '0')}`,
          { opcode: instruction.word }
        )

      default: {
        const unhandled: never = instruction
        throw new Error(`Unhandled instruction: ${JSON.stringify(unhandled)}`)
      }
    }
  }

}
