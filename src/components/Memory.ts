import FONT from './font.json'
import { FaultKind, MachineError } from './MachineError'

/**
 * Memory - 4KB flat address space
 *
 * Address Map:
 * $000-$04F: Font sprites for hex digits 0-F (read-only)
 * $050-$1FF: Reserved
 * $200-$FFF: Program image and data
 */
export class Memory {

  static START: number = 0x000
  static END: number = 0xFFF
  static SIZE: number = Memory.END - Memory.START + 1
  static PROGRAM_START: number = 0x200
  static MAX_PROGRAM_SIZE: number = Memory.SIZE - Memory.PROGRAM_START
  static FONT_START: number = 0x000
  static FONT_SPRITE_SIZE: number = 5
  static FONT_END: number = Memory.FONT_START + FONT.length * Memory.FONT_SPRITE_SIZE - 1

  data: Uint8Array = new Uint8Array(Memory.SIZE)

  constructor() {
    this.reset()
  }

  read(address: number): number {
    this.check(address)
    return this.data[address]
  }

  /**
   * Writes into the font table are dropped, the same way a write to ROM is
   */
  write(address: number, data: number): void {
    this.check(address)
    if (address >= Memory.FONT_START && address <= Memory.FONT_END) { return }
    this.data[address] = data & 0xFF
  }

  /**
   * Read a big-endian 16-bit word
   */
  readWord(address: number): number {
    this.check(address, 2)
    return (this.data[address] << 8) | this.data[address + 1]
  }

  /**
   * Throws AddressOutOfRange unless [address, address + length) fits in memory
   */
  check(address: number, length: number = 1): void {
    const last = address + length - 1
    if (address < Memory.START || last > Memory.END) {
      const bad = address < Memory.START ? address : Math.max(address, Memory.END + 1)
      throw new MachineError(
        FaultKind.ADDRESS_OUT_OF_RANGE,
        `Address out of range: 0x${bad.toString(16).toUpperCase()}`,
        { address: bad }
      )
    }
  }

  /**
   * Copy a program image to $200. Nothing is written if it does not fit.
   */
  load(program: ArrayLike<number>): void {
    Memory.checkImage(program)
    for (let i = 0; i < program.length; i++) {
      this.data[Memory.PROGRAM_START + i] = program[i] & 0xFF
    }
  }

  /**
   * Throws ImageTooLarge if the image does not fit above $200
   */
  static checkImage(program: ArrayLike<number>): void {
    if (program.length > Memory.MAX_PROGRAM_SIZE) {
      throw new MachineError(
        FaultKind.IMAGE_TOO_LARGE,
        `Program image is ${program.length} bytes, the limit is ${Memory.MAX_PROGRAM_SIZE} bytes`
      )
    }
  }

  fontAddress(digit: number): number {
    return Memory.FONT_START + (digit & 0x0F) * Memory.FONT_SPRITE_SIZE
  }

  reset(): void {
    this.data.fill(0x00)
    FONT.forEach((sprite, digit) => {
      this.data.set(sprite, this.fontAddress(digit))
    })
  }

}
