import { CPU, CPUOptions, DEFAULT_QUIRKS } from '../components/CPU'
import { decode } from '../components/Decoder'
import { formatWord } from '../components/Disassembler'
import { Display } from '../components/Display'
import { Keypad } from '../components/Keypad'
import { FaultKind } from '../components/MachineError'
import { Memory } from '../components/Memory'
import { Timers } from '../components/Timers'
import { catchFault } from './helpers'

const image = (...words: number[]): number[] => words.flatMap((word) => [word >> 8, word & 0xFF])

describe('CPU', () => {
  let memory: Memory
  let display: Display
  let keypad: Keypad
  let timers: Timers
  let cpu: CPU

  const boot = (words: number[], options: CPUOptions = {}): void => {
    memory = new Memory()
    display = new Display()
    keypad = new Keypad()
    timers = new Timers()
    memory.load(image(...words))
    cpu = new CPU(memory, display, keypad, timers, options)
  }

  const run = (steps: number): void => {
    for (let i = 0; i < steps; i++) {
      cpu.step()
    }
  }

  describe('Initialization', () => {
    test('starts running at 0x200 with default quirks', () => {
      boot([])
      expect(cpu.registers.pc).toBe(0x200)
      expect(cpu.state).toEqual({ kind: 'RUNNING' })
      expect(cpu.quirks).toEqual(DEFAULT_QUIRKS)
      expect(cpu.cycles).toBe(0)
    })

    test('partial quirks override the defaults', () => {
      boot([], { quirks: { jumpUsesVx: true } })
      expect(cpu.quirks).toEqual({ ...DEFAULT_QUIRKS, jumpUsesVx: true })
    })
  })

  describe('Scenarios', () => {
    test('load and add', () => {
      boot([0x6005, 0x6103, 0x8014])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(8)
      expect(cpu.registers.v[0xF]).toBe(0)
      expect(cpu.registers.pc).toBe(0x206)
      expect(cpu.cycles).toBe(3)
    })

    test('00E0 clears the screen', () => {
      boot([0x00E0])
      display.drawSprite(0, 0, [0xFF, 0xFF])
      display.drawSprite(40, 20, [0x81])
      run(1)
      expect(display.pixels.every((pixel) => pixel === 0)).toBe(true)
    })

    test('call 0x200 then return', () => {
      boot([0x2200])
      run(1)
      expect(cpu.registers.pc).toBe(0x200)
      expect(cpu.registers.stack).toEqual([0x202])

      cpu.execute(decode(0x00EE))
      expect(cpu.registers.pc).toBe(0x202)
      expect(cpu.registers.sp).toBe(0)
    })
  })

  describe('Control Flow', () => {
    test('0nnn is ignored', () => {
      boot([0x0123])
      run(1)
      expect(cpu.registers.pc).toBe(0x202)
      expect(cpu.isHalted).toBe(false)
    })

    test('1nnn jumps', () => {
      boot([0x1300])
      run(1)
      expect(cpu.registers.pc).toBe(0x300)
    })

    test('2nnn / 00EE nest and unwind', () => {
      boot([0x2204, 0x0000, 0x00EE])
      run(1)
      expect(cpu.registers.pc).toBe(0x204)
      run(1)
      expect(cpu.registers.pc).toBe(0x202)
      expect(cpu.registers.sp).toBe(0)
    })

    test('3xkk skips when equal', () => {
      boot([0x6042, 0x3042])
      run(2)
      expect(cpu.registers.pc).toBe(0x206)
    })

    test('3xkk does not skip when different', () => {
      boot([0x6042, 0x3043])
      run(2)
      expect(cpu.registers.pc).toBe(0x204)
    })

    test('4xkk skips when different', () => {
      boot([0x6042, 0x4043])
      run(2)
      expect(cpu.registers.pc).toBe(0x206)
    })

    test('4xkk does not skip when equal', () => {
      boot([0x6042, 0x4042])
      run(2)
      expect(cpu.registers.pc).toBe(0x204)
    })

    test('5xy0 skips when registers are equal', () => {
      boot([0x6042, 0x6142, 0x5010])
      run(3)
      expect(cpu.registers.pc).toBe(0x208)
    })

    test('9xy0 skips when registers differ', () => {
      boot([0x6042, 0x6143, 0x9010])
      run(3)
      expect(cpu.registers.pc).toBe(0x208)
    })

    test('9xy0 does not skip when registers are equal', () => {
      boot([0x6042, 0x6142, 0x9010])
      run(3)
      expect(cpu.registers.pc).toBe(0x206)
    })

    test('Bnnn jumps to nnn + V0', () => {
      boot([0x6004, 0xB300])
      run(2)
      expect(cpu.registers.pc).toBe(0x304)
    })

    test('Bnnn jumps to nnn + Vx with the jump quirk', () => {
      boot([0x6004, 0x6310, 0xB300], { quirks: { jumpUsesVx: true } })
      run(3)
      expect(cpu.registers.pc).toBe(0x310)
    })

    test('Bnnn past the end of memory is AddressOutOfRange', () => {
      boot([0x60FF, 0xBF01])
      run(1)
      const fault = catchFault(() => cpu.step())
      expect(fault?.kind).toBe(FaultKind.ADDRESS_OUT_OF_RANGE)
      expect(fault?.address).toBe(0x1000)
      expect(fault?.pc).toBe(0x202)
      expect(cpu.registers.pc).toBe(0x202)
    })
  })

  describe('Arithmetic', () => {
    test('6xkk loads a byte', () => {
      boot([0x6A42])
      run(1)
      expect(cpu.registers.v[0xA]).toBe(0x42)
    })

    test('7xkk wraps and leaves VF alone', () => {
      boot([0x60FF, 0x6F05, 0x7002])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0x01)
      expect(cpu.registers.v[0xF]).toBe(0x05)
    })

    test('8xy0 copies', () => {
      boot([0x6042, 0x8100])
      run(2)
      expect(cpu.registers.v[0x1]).toBe(0x42)
    })

    test('8xy1 ORs and leaves VF alone by default', () => {
      boot([0x60F0, 0x610F, 0x6F07, 0x8011])
      run(4)
      expect(cpu.registers.v[0x0]).toBe(0xFF)
      expect(cpu.registers.v[0xF]).toBe(0x07)
    })

    test('8xy1 clears VF with the logic quirk', () => {
      boot([0x60F0, 0x610F, 0x6F07, 0x8011], { quirks: { logicResetsFlag: true } })
      run(4)
      expect(cpu.registers.v[0x0]).toBe(0xFF)
      expect(cpu.registers.v[0xF]).toBe(0x00)
    })

    test('8xy2 ANDs', () => {
      boot([0x60F0, 0x613C, 0x8012])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0x30)
    })

    test('8xy3 XORs', () => {
      boot([0x60F0, 0x613C, 0x8013])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0xCC)
    })

    test('8xy4 sets VF on carry', () => {
      boot([0x60FF, 0x6102, 0x8014])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0x01)
      expect(cpu.registers.v[0xF]).toBe(1)
    })

    test('8xy5 sets VF when there is no borrow', () => {
      boot([0x6005, 0x6103, 0x8015])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0x02)
      expect(cpu.registers.v[0xF]).toBe(1)
    })

    test('8xy5 with equal operands has no borrow', () => {
      boot([0x6003, 0x6103, 0x8015])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0x00)
      expect(cpu.registers.v[0xF]).toBe(1)
    })

    test('8xy5 clears VF on borrow', () => {
      boot([0x6003, 0x6105, 0x8015])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0xFE)
      expect(cpu.registers.v[0xF]).toBe(0)
    })

    test('8xy7 subtracts Vx from Vy', () => {
      boot([0x6003, 0x6105, 0x8017])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0x02)
      expect(cpu.registers.v[0xF]).toBe(1)
    })

    test('8xy7 clears VF on borrow', () => {
      boot([0x6005, 0x6103, 0x8017])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0xFE)
      expect(cpu.registers.v[0xF]).toBe(0)
    })

    test('8xy6 shifts Vy right into Vx', () => {
      boot([0x6000, 0x6105, 0x8016])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0x02)
      expect(cpu.registers.v[0x1]).toBe(0x05)
      expect(cpu.registers.v[0xF]).toBe(1)
    })

    test('8xy6 shifts Vx in place with the shift quirk', () => {
      boot([0x6005, 0x6100, 0x8016], { quirks: { shiftUsesVy: false } })
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0x02)
      expect(cpu.registers.v[0xF]).toBe(1)
    })

    test('8xyE shifts Vy left into Vx', () => {
      boot([0x6000, 0x6181, 0x801E])
      run(3)
      expect(cpu.registers.v[0x0]).toBe(0x02)
      expect(cpu.registers.v[0xF]).toBe(1)
    })

    test('8xyE shifts Vx in place with the shift quirk', () => {
      boot([0x6040, 0x801E], { quirks: { shiftUsesVy: false } })
      run(2)
      expect(cpu.registers.v[0x0]).toBe(0x80)
      expect(cpu.registers.v[0xF]).toBe(0)
    })

    test('8xy6 into VF leaves the shifted value', () => {
      boot([0x6102, 0x8F16])
      run(2)
      expect(cpu.registers.v[0xF]).toBe(0x01)
    })

    test('8xyE into VF leaves the shifted value', () => {
      boot([0x6181, 0x8F1E])
      run(2)
      expect(cpu.registers.v[0xF]).toBe(0x02)
    })

    test('VF is written after the result when VF is the target', () => {
      boot([0x6F01, 0x6103, 0x8F15])
      run(3)
      expect(cpu.registers.v[0xF]).toBe(0)
    })

    test('8xy4 into VF leaves the carry', () => {
      boot([0x6FFF, 0x6102, 0x8F14])
      run(3)
      expect(cpu.registers.v[0xF]).toBe(1)
    })

    test('Cxkk masks the random byte', () => {
      boot([0xC00F], { random: () => 0xAB })
      run(1)
      expect(cpu.registers.v[0x0]).toBe(0x0B)
    })

    test('Cxkk never sets bits outside the mask with the default source', () => {
      const masks = [0x00, 0x01, 0x0F, 0xF0, 0x55, 0xAA, 0x3C, 0xFF]
      const words: number[] = []
      for (let round = 0; round < 32; round++) {
        masks.forEach((mask) => words.push(0xC000 | mask))
      }
      boot(words)

      words.forEach((word) => {
        cpu.step()
        expect(cpu.registers.v[0x0] & ~word & 0xFF).toBe(0)
      })
    })
  })

  describe('Index and Memory', () => {
    test('Annn loads I', () => {
      boot([0xA123])
      run(1)
      expect(cpu.registers.i).toBe(0x123)
    })

    test('Fx1E adds to I within 12 bits and leaves VF alone', () => {
      boot([0xAFFF, 0x6002, 0xF01E])
      run(3)
      expect(cpu.registers.i).toBe(0x001)
      expect(cpu.registers.v[0xF]).toBe(0)
    })

    test('Fx29 points I at the font sprite for the low nibble of Vx', () => {
      boot([0x601A, 0xF029])
      run(2)
      expect(cpu.registers.i).toBe(0x32)
    })

    test('Fx33 stores BCD at I', () => {
      boot([0x609C, 0xA300, 0xF033])
      run(3)
      expect(memory.read(0x300)).toBe(1)
      expect(memory.read(0x301)).toBe(5)
      expect(memory.read(0x302)).toBe(6)
      expect(cpu.registers.i).toBe(0x300)
    })

    test('Fx33 past the end of memory faults without writing', () => {
      boot([0x60FF, 0xAFFE, 0xF033])
      run(2)
      expect(catchFault(() => cpu.step())?.kind).toBe(FaultKind.ADDRESS_OUT_OF_RANGE)
      expect(memory.read(0xFFE)).toBe(0)
      expect(memory.read(0xFFF)).toBe(0)
    })

    test('Fx55 stores V0..Vx and advances I', () => {
      boot([0x6011, 0x6122, 0x6233, 0x6344, 0xA300, 0xF255])
      run(6)
      expect(memory.read(0x300)).toBe(0x11)
      expect(memory.read(0x301)).toBe(0x22)
      expect(memory.read(0x302)).toBe(0x33)
      expect(memory.read(0x303)).toBe(0x00)
      expect(cpu.registers.i).toBe(0x303)
    })

    test('Fx55 leaves I alone with the index quirk', () => {
      boot([0x6011, 0xA300, 0xF055], { quirks: { memoryIncrementsIndex: false } })
      run(3)
      expect(memory.read(0x300)).toBe(0x11)
      expect(cpu.registers.i).toBe(0x300)
    })

    test('Fx65 loads V0..Vx and advances I', () => {
      boot([0xA300, 0xF265])
      memory.write(0x300, 0xAA)
      memory.write(0x301, 0xBB)
      memory.write(0x302, 0xCC)
      memory.write(0x303, 0xDD)
      run(2)
      expect(Array.from(cpu.registers.v.subarray(0, 4))).toEqual([0xAA, 0xBB, 0xCC, 0x00])
      expect(cpu.registers.i).toBe(0x303)
    })

    test('Fx55 past the end of memory faults without writing', () => {
      boot([0x6011, 0x6122, 0x6233, 0xAFFE, 0xF255])
      run(4)
      const fault = catchFault(() => cpu.step())
      expect(fault?.kind).toBe(FaultKind.ADDRESS_OUT_OF_RANGE)
      expect(fault?.address).toBe(0x1000)
      expect(memory.read(0xFFE)).toBe(0)
      expect(cpu.registers.i).toBe(0xFFE)
    })
  })

  describe('Display', () => {
    test('Dxyn draws from I and reports no collision', () => {
      boot([0x6005, 0x6103, 0xA000, 0xD015])
      run(4)
      expect(display.getPixel(5, 3)).toBe(true)
      expect(display.getPixel(8, 3)).toBe(true)
      expect(display.getPixel(9, 3)).toBe(false)
      expect(display.getPixel(5, 4)).toBe(true)
      expect(display.getPixel(6, 4)).toBe(false)
      expect(cpu.registers.v[0xF]).toBe(0)
    })

    test('drawing twice erases and sets VF', () => {
      boot([0x6005, 0x6103, 0xA000, 0xD015, 0xD015])
      run(5)
      expect(display.pixels.every((pixel) => pixel === 0)).toBe(true)
      expect(cpu.registers.v[0xF]).toBe(1)
    })

    test('Dxy0 draws nothing', () => {
      boot([0x6F01, 0xA000, 0xD000])
      run(3)
      expect(display.pixels.every((pixel) => pixel === 0)).toBe(true)
      expect(cpu.registers.v[0xF]).toBe(0)
    })

    test('sprites wrap by default', () => {
      boot([0x603E, 0x6100, 0xA000, 0xD011])
      run(4)
      expect(display.getPixel(63, 0)).toBe(true)
      expect(display.getPixel(0, 0)).toBe(true)
    })

    test('sprites clip with the clip quirk', () => {
      boot([0x603E, 0x6100, 0xA000, 0xD011], { quirks: { clipSprites: true } })
      run(4)
      expect(display.getPixel(63, 0)).toBe(true)
      expect(display.getPixel(0, 0)).toBe(false)
    })

    test('a sprite read past the end of memory faults without drawing', () => {
      boot([0xAFFE, 0xD003])
      run(1)
      expect(catchFault(() => cpu.step())?.kind).toBe(FaultKind.ADDRESS_OUT_OF_RANGE)
      expect(display.pixels.every((pixel) => pixel === 0)).toBe(true)
    })
  })

  describe('Input', () => {
    test('Ex9E skips when the key is down', () => {
      boot([0x6005, 0xE09E])
      keypad.setKey(0x5, true)
      run(2)
      expect(cpu.registers.pc).toBe(0x206)
    })

    test('Ex9E does not skip when the key is up', () => {
      boot([0x6005, 0xE09E])
      run(2)
      expect(cpu.registers.pc).toBe(0x204)
    })

    test('ExA1 skips when the key is up', () => {
      boot([0x6005, 0xE0A1])
      run(2)
      expect(cpu.registers.pc).toBe(0x206)
    })

    test('key values above 0xF are never pressed', () => {
      boot([0x6010, 0xE09E, 0xE0A1])
      keypad.update(new Array(16).fill(true))
      run(3)
      expect(cpu.registers.pc).toBe(0x208)
    })

    describe('Fx0A', () => {
      test('waits in place until a key goes down', () => {
        boot([0xF30A])
        run(1)
        expect(cpu.isAwaitingKey).toBe(true)
        expect(cpu.registers.pc).toBe(0x200)

        run(3)
        expect(cpu.isAwaitingKey).toBe(true)
        expect(cpu.registers.pc).toBe(0x200)

        keypad.setKey(0x7, true)
        run(1)
        expect(cpu.state).toEqual({ kind: 'RUNNING' })
        expect(cpu.registers.v[0x3]).toBe(0x7)
        expect(cpu.registers.pc).toBe(0x202)
      })

      test('a key already held does not satisfy the wait', () => {
        boot([0xF30A])
        keypad.setKey(0x7, true)
        run(2)
        expect(cpu.isAwaitingKey).toBe(true)

        keypad.setKey(0x7, false)
        keypad.setKey(0x7, true)
        run(1)
        expect(cpu.registers.v[0x3]).toBe(0x7)
        expect(cpu.isAwaitingKey).toBe(false)
      })
    })
  })

  describe('Timers', () => {
    test('Fx15 sets the delay timer', () => {
      boot([0x6020, 0xF015])
      run(2)
      expect(timers.delay).toBe(0x20)
    })

    test('Fx18 sets the sound timer', () => {
      boot([0x6020, 0xF018])
      run(2)
      expect(timers.sound).toBe(0x20)
    })

    test('Fx07 reads the delay timer', () => {
      boot([0xF007])
      timers.delay = 0x33
      run(1)
      expect(cpu.registers.v[0x0]).toBe(0x33)
    })
  })

  describe('Faults', () => {
    test('an invalid opcode halts with PC on the faulting instruction', () => {
      boot([0xFFFF])
      const fault = catchFault(() => cpu.step())
      expect(fault?.kind).toBe(FaultKind.INVALID_OPCODE)
      expect(fault?.opcode).toBe(0xFFFF)
      expect(fault?.pc).toBe(0x200)
      expect(cpu.registers.pc).toBe(0x200)
      expect(cpu.isHalted).toBe(true)
      expect(cpu.cycles).toBe(0)
    })

    test('stepping a halted CPU throws the same fault', () => {
      boot([0x5121])
      const fault = catchFault(() => cpu.step())
      expect(catchFault(() => cpu.step())).toBe(fault)
      expect(cpu.registers.pc).toBe(0x200)
    })

    test('the 17th nested call is StackOverflow', () => {
      boot([0x2200])
      run(16)
      expect(cpu.registers.sp).toBe(16)

      const fault = catchFault(() => cpu.step())
      expect(fault?.kind).toBe(FaultKind.STACK_OVERFLOW)
      expect(fault?.opcode).toBe(0x2200)
      expect(cpu.registers.sp).toBe(16)
      expect(cpu.registers.pc).toBe(0x200)
    })

    test('returning with an empty stack is StackUnderflow', () => {
      boot([0x00EE])
      expect(catchFault(() => cpu.step())?.kind).toBe(FaultKind.STACK_UNDERFLOW)
      expect(cpu.registers.pc).toBe(0x200)
    })

    test('fetching past the end of memory is AddressOutOfRange', () => {
      boot([])
      cpu.registers.pc = 0xFFF
      const fault = catchFault(() => cpu.step())
      expect(fault?.kind).toBe(FaultKind.ADDRESS_OUT_OF_RANGE)
      expect(fault?.opcode).toBeUndefined()
      expect(cpu.registers.pc).toBe(0xFFF)
    })
  })

  describe('reset()', () => {
    test('clears a halt and the register file', () => {
      boot([0x6042, 0xFFFF])
      run(1)
      catchFault(() => cpu.step())
      cpu.reset()
      expect(cpu.state).toEqual({ kind: 'RUNNING' })
      expect(cpu.registers.v[0x0]).toBe(0)
      expect(cpu.registers.pc).toBe(0x200)
      expect(cpu.cycles).toBe(0)
    })
  })

  test('peek() decodes the next instruction without executing it', () => {
    boot([0x6042])
    expect(cpu.peek()).toEqual({ op: 'LD_BYTE', x: 0, byte: 0x42 })
    expect(cpu.registers.pc).toBe(0x200)
  })

  describe('Determinism', () => {
    const WORDS = [
      0x00E0, 0x00EE, 0x0123, 0x1300, 0x2300, 0x3012, 0x4012, 0x5010, 0x6042, 0x7042,
      0x8010, 0x8011, 0x8012, 0x8013, 0x8014, 0x8015, 0x8016, 0x8017, 0x801E, 0x9010,
      0xA300, 0xB300, 0xC0F0, 0xD015, 0xE09E, 0xE0A1, 0xF007, 0xF00A, 0xF015, 0xF018,
      0xF01E, 0xF029, 0xF033, 0xF355, 0xF365, 0xFFFF,
    ]

    const prepare = (word: number): void => {
      boot([word], { random: () => 0x5A })
      cpu.registers.v.set([0x02, 0x34, 0x56, 0x78, 0x9A, 0xBC, 0xDE, 0xF0, 0x11, 0x22, 0x33, 0x44, 0x55, 0x66, 0x77, 0x01])
      cpu.registers.i = 0x300
      cpu.registers.push(0x240)
      for (let offset = 0; offset < 16; offset++) {
        memory.write(0x300 + offset, offset * 17)
      }
      display.drawSprite(4, 4, [0xAA, 0x55])
      timers.delay = 9
      timers.sound = 4
      keypad.setKey(0x2, true)
    }

    const state = () => ({
      v: Array.from(cpu.registers.v),
      i: cpu.registers.i,
      pc: cpu.registers.pc,
      stack: [...cpu.registers.stack],
      memory: Array.from(memory.data),
      pixels: Array.from(display.pixels),
      delay: timers.delay,
      sound: timers.sound,
      keys: keypad.snapshot(),
      state: cpu.state.kind,
    })

    test.each(WORDS.map((word): [string, number] => [formatWord(word), word]))('%s gives the same result from the same state', (_, word) => {
      prepare(word)
      catchFault(() => cpu.step())
      const first = state()

      prepare(word)
      catchFault(() => cpu.step())
      expect(state()).toEqual(first)
    })
  })

  test('execution is deterministic for the same image and random source', () => {
    const words = [0xC0FF, 0xC1FF, 0x8014, 0xA300, 0xF155]
    const source = (): (() => number) => {
      let seed = 7
      return () => (seed = (seed * 31 + 11) & 0xFF)
    }

    boot(words, { random: source() })
    run(5)
    const first = { v: Array.from(cpu.registers.v), i: cpu.registers.i, ram: Array.from(memory.data) }

    boot(words, { random: source() })
    run(5)
    expect({ v: Array.from(cpu.registers.v), i: cpu.registers.i, ram: Array.from(memory.data) }).toEqual(first)
  })
})
