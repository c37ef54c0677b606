import { Instruction } from './Decoder'

const hex = (value: number, width: number): string =>
  '0x' + value.toString(16).toUpperCase().padStart(width, '0')

const reg = (index: number): string => `V${index.toString(16).toUpperCase()}`

export function formatWord(word: number): string {
  return hex(word, 4)
}

export function formatAddress(address: number): string {
  return hex(address, 3)
}

/**
 * Render an instruction in the usual CHIP-8 assembly syntax
 */
export function disassemble(instruction: Instruction): string {
  switch (instruction.op) {
    case 'SYS': return `SYS ${formatAddress(instruction.address)}`
    case 'CLS': return 'CLS'
    case 'RET': return 'RET'
    case 'JP': return `JP ${formatAddress(instruction.address)}`
    case 'CALL': return `CALL ${formatAddress(instruction.address)}`
    case 'SE_BYTE': return `SE ${reg(instruction.x)}, ${hex(instruction.byte, 2)}`
    case 'SNE_BYTE': return `SNE ${reg(instruction.x)}, ${hex(instruction.byte, 2)}`
    case 'SE_REG': return `SE ${reg(instruction.x)}, ${reg(instruction.y)}`
    case 'LD_BYTE': return `LD ${reg(instruction.x)}, ${hex(instruction.byte, 2)}`
    case 'ADD_BYTE': return `ADD ${reg(instruction.x)}, ${hex(instruction.byte, 2)}`
    case 'LD_REG': return `LD ${reg(instruction.x)}, ${reg(instruction.y)}`
    case 'OR': return `OR ${reg(instruction.x)}, ${reg(instruction.y)}`
    case 'AND': return `AND ${reg(instruction.x)}, ${reg(instruction.y)}`
    case 'XOR': return `XOR ${reg(instruction.x)}, ${reg(instruction.y)}`
    case 'ADD_REG': return `ADD ${reg(instruction.x)}, ${reg(instruction.y)}`
    case 'SUB': return `SUB ${reg(instruction.x)}, ${reg(instruction.y)}`
    case 'SHR': return `SHR ${reg(instruction.x)}, ${reg(instruction.y)}`
    case 'SUBN': return `SUBN ${reg(instruction.x)}, ${reg(instruction.y)}`
    case 'SHL': return `SHL ${reg(instruction.x)}, ${reg(instruction.y)}`
    case 'SNE_REG': return `SNE ${reg(instruction.x)}, ${reg(instruction.y)}`
    case 'LD_I': return `LD I, ${formatAddress(instruction.address)}`
    case 'JP_V0': return `JP V0, ${formatAddress(instruction.address)}`
    case 'RND': return `RND ${reg(instruction.x)}, ${hex(instruction.byte, 2)}`
    case 'DRW': return `DRW ${reg(instruction.x)}, ${reg(instruction.y)}, ${instruction.n}`
    case 'SKP': return `SKP ${reg(instruction.x)}`
    case 'SKNP': return `SKNP ${reg(instruction.x)}`
    case 'LD_VX_DT': return `LD ${reg(instruction.x)}, DT`
    case 'LD_VX_K': return `LD ${reg(instruction.x)}, K`
    case 'LD_DT_VX': return `LD DT, ${reg(instruction.x)}`
    case 'LD_ST_VX': return `LD ST, ${reg(instruction.x)}`
    case 'ADD_I': return `ADD I, ${reg(instruction.x)}`
    case 'LD_F': return `LD F, ${reg(instruction.x)}`
    case 'LD_B': return `LD B, ${reg(instruction.x)}`
    case 'LD_MEM_VX': return `LD [I], ${reg(instruction.x)}`
    case 'LD_VX_MEM': return `LD ${reg(instruction.x)}, [I]`
    case 'INVALID': return `DW ${formatWord(instruction.word)}`
  }
}
