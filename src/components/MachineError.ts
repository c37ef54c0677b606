export enum FaultKind {
  INVALID_OPCODE = 'InvalidOpcode',
  STACK_OVERFLOW = 'StackOverflow',
  STACK_UNDERFLOW = 'StackUnderflow',
  ADDRESS_OUT_OF_RANGE = 'AddressOutOfRange',
  IMAGE_TOO_LARGE = 'ImageTooLarge',
}

export interface FaultContext {
  /** Program counter of the faulting instruction */
  pc?: number
  /** The offending address, for AddressOutOfRange */
  address?: number
  /** The 16-bit instruction word being executed */
  opcode?: number
}

/**
 * A fatal machine condition. Once raised, the CPU stays halted until reset.
 */
export class MachineError extends Error {

  kind: FaultKind
  pc?: number
  address?: number
  opcode?: number

  constructor(kind: FaultKind, message: string, context: FaultContext = {}) {
    super(message)
    this.name = 'MachineError'
    this.kind = kind
    this.pc = context.pc
    this.address = context.address
    this.opcode = context.opcode
  }

}
