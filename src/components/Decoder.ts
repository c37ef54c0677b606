/**
 * CHIP-8 instruction decoder
 *
 * Every instruction is two bytes, big-endian. Operand fields:
 *   nnn - lowest 12 bits (address)
 *   kk  - lowest 8 bits (byte)
 *   n   - lowest 4 bits (nibble)
 *   x   - bits 8-11 (register)
 *   y   - bits 4-7 (register)
 *
 * Reference: https://github.com/mattmikolay/chip-8/wiki/CHIP%E2%80%908-Instruction-Set
 */

export type Instruction =
  | { op: 'SYS', address: number }                  // 0nnn
  | { op: 'CLS' }                                   // 00E0
  | { op: 'RET' }                                   // 00EE
  | { op: 'JP', address: number }                   // 1nnn
  | { op: 'CALL', address: number }                 // 2nnn
  | { op: 'SE_BYTE', x: number, byte: number }      // 3xkk
  | { op: 'SNE_BYTE', x: number, byte: number }     // 4xkk
  | { op: 'SE_REG', x: number, y: number }          // 5xy0
  | { op: 'LD_BYTE', x: number, byte: number }      // 6xkk
  | { op: 'ADD_BYTE', x: number, byte: number }     // 7xkk
  | { op: 'LD_REG', x: number, y: number }          // 8xy0
  | { op: 'OR', x: number, y: number }              // 8xy1
  | { op: 'AND', x: number, y: number }             // 8xy2
  | { op: 'XOR', x: number, y: number }             // 8xy3
  | { op: 'ADD_REG', x: number, y: number }         // 8xy4
  | { op: 'SUB', x: number, y: number }             // 8xy5
  | { op: 'SHR', x: number, y: number }             // 8xy6
  | { op: 'SUBN', x: number, y: number }            // 8xy7
  | { op: 'SHL', x: number, y: number }             // 8xyE
  | { op: 'SNE_REG', x: number, y: number }         // 9xy0
  | { op: 'LD_I', address: number }                 // Annn
  | { op: 'JP_V0', address: number }                // Bnnn
  | { op: 'RND', x: number, byte: number }          // Cxkk
  | { op: 'DRW', x: number, y: number, n: number }  // Dxyn
  | { op: 'SKP', x: number }                        // Ex9E
  | { op: 'SKNP', x: number }                       // ExA1
  | { op: 'LD_VX_DT', x: number }                   // Fx07
  | { op: 'LD_VX_K', x: number }                    // Fx0A
  | { op: 'LD_DT_VX', x: number }                   // Fx15
  | { op: 'LD_ST_VX', x: number }                   // Fx18
  | { op: 'ADD_I', x: number }                      // Fx1E
  | { op: 'LD_F', x: number }                       // Fx29
  | { op: 'LD_B', x: number }                       // Fx33
  | { op: 'LD_MEM_VX', x: number }                  // Fx55
  | { op: 'LD_VX_MEM', x: number }                  // Fx65
  | { op: 'INVALID', word: number }

export function decode(word: number): Instruction {
  const address = word & 0x0FFF
  const byte = word & 0x00FF
  const n = word & 0x000F
  const x = (word & 0x0F00) >> 8
  const y = (word & 0x00F0) >> 4

  switch (word & 0xF000) {
    case 0x0000:
      switch (address) {
        case 0x0E0: return { op: 'CLS' }
        case 0x0EE: return { op: 'RET' }
        default: return { op: 'SYS', address }
      }
    case 0x1000: return { op: 'JP', address }
    case 0x2000: return { op: 'CALL', address }
    case 0x3000: return { op: 'SE_BYTE', x, byte }
    case 0x4000: return { op: 'SNE_BYTE', x, byte }
    case 0x5000:
      return n === 0x0 ? { op: 'SE_REG', x, y } : { op: 'INVALID', word }
    case 0x6000: return { op: 'LD_BYTE', x, byte }
    case 0x7000: return { op: 'ADD_BYTE', x, byte }
    case 0x8000:
      switch (n) {
        case 0x0: return { op: 'LD_REG', x, y }
        case 0x1: return { op: 'OR', x, y }
        case 0x2: return { op: 'AND', x, y }
        case 0x3: return { op: 'XOR', x, y }
        case 0x4: return { op: 'ADD_REG', x, y }
        case 0x5: return { op: 'SUB', x, y }
        case 0x6: return { op: 'SHR', x, y }
        case 0x7: return { op: 'SUBN', x, y }
        case 0xE: return { op: 'SHL', x, y }
        default: return { op: 'INVALID', word }
      }
    case 0x9000:
      return n === 0x0 ? { op: 'SNE_REG', x, y } : { op: 'INVALID', word }
    case 0xA000: return { op: 'LD_I', address }
    case 0xB000: return { op: 'JP_V0', address }
    case 0xC000: return { op: 'RND', x, byte }
    case 0xD000: return { op: 'DRW', x, y, n }
    case 0xE000:
      switch (byte) {
        case 0x9E: return { op: 'SKP', x }
        case 0xA1: return { op: 'SKNP', x }
        default: return { op: 'INVALID', word }
      }
    case 0xF000:
      switch (byte) {
        case 0x07: return { op: 'LD_VX_DT', x }
        case 0x0A: return { op: 'LD_VX_K', x }
        case 0x15: return { op: 'LD_DT_VX', x }
        case 0x18: return { op: 'LD_ST_VX', x }
        case 0x1E: return { op: 'ADD_I', x }
        case 0x29: return { op: 'LD_F', x }
        case 0x33: return { op: 'LD_B', x }
        case 0x55: return { op: 'LD_MEM_VX', x }
        case 0x65: return { op: 'LD_VX_MEM', x }
        default: return { op: 'INVALID', word }
      }
    default:
      return { op: 'INVALID', word }
  }
}
