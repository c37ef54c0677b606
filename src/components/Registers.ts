import { Memory } from './Memory'
import { FaultKind, MachineError } from './MachineError'

/**
 * Register file: V0-VF, the index register, the program counter and the call stack
 */
export class Registers {

  static COUNT: number = 16
  static FLAG: number = 0xF // VF doubles as carry / borrow / collision flag
  static STACK_DEPTH: number = 16

  v: Uint8Array = new Uint8Array(Registers.COUNT)
  i: number = 0x000
  pc: number = Memory.PROGRAM_START
  stack: number[] = []

  get sp(): number {
    return this.stack.length
  }

  get flag(): number {
    return this.v[Registers.FLAG]
  }

  set flag(value: number) {
    this.v[Registers.FLAG] = value
  }

  /**
   * Throws StackOverflow when a push would exceed the stack depth
   */
  checkPush(): void {
    if (this.stack.length >= Registers.STACK_DEPTH) {
      throw new MachineError(
        FaultKind.STACK_OVERFLOW,
        `Stack overflow: more than ${Registers.STACK_DEPTH} nested calls`
      )
    }
  }

  push(address: number): void {
    this.checkPush()
    this.stack.push(address)
  }

  pop(): number {
    const address = this.stack.pop()
    if (address === undefined) {
      throw new MachineError(FaultKind.STACK_UNDERFLOW, 'Stack underflow: return with an empty stack')
    }
    return address
  }

  reset(): void {
    this.v.fill(0x00)
    this.i = 0x000
    this.pc = Memory.PROGRAM_START
    this.stack = []
  }

}
