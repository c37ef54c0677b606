import { decode } from './Decoder'
import { disassemble, formatAddress } from './Disassembler'
import { Display } from './Display'
import { Machine } from './Machine'
import { Memory } from './Memory'

// ANSI control sequences
const ESC = '\x1b['
const ENTER_ALT_SCREEN = `${ESC}?1049h`
const LEAVE_ALT_SCREEN = `${ESC}?1049l`
const HIDE_CURSOR = `${ESC}?25l`
const SHOW_CURSOR = `${ESC}?25h`
const CLEAR_SCREEN = `${ESC}2J`
const CLEAR_LINE = `${ESC}2K`
const moveTo = (row: number, column: number): string => `${ESC}${row + 1};${column + 1}H`

// Two pixel rows per text row
const FULL_BLOCK = '█'
const UPPER_HALF = '▀'
const LOWER_HALF = '▄'
const EMPTY = ' '

/**
 * Draws the frame buffer into a terminal using half-block characters,
 * 64 columns by 16 rows, followed by a one-line status bar.
 */
export class TerminalRenderer {

  static ROWS: number = Display.HEIGHT / 2
  static STATUS_ROW: number = TerminalRenderer.ROWS

  private write: (text: string) => void

  constructor(write: (text: string) => void) {
    this.write = write
  }

  static frameLines(display: Display): string[] {
    const lines: string[] = []
    for (let row = 0; row < TerminalRenderer.ROWS; row++) {
      let line = ''
      for (let x = 0; x < Display.WIDTH; x++) {
        const top = display.getPixel(x, row * 2)
        const bottom = display.getPixel(x, row * 2 + 1)
        if (top && bottom) {
          line += FULL_BLOCK
        } else if (top) {
          line += UPPER_HALF
        } else if (bottom) {
          line += LOWER_HALF
        } else {
          line += EMPTY
        }
      }
      lines.push(line)
    }
    return lines
  }

  static statusLine(machine: Machine): string {
    const { cpu, timers, memory } = machine
    const { pc, i } = cpu.registers
    const next = pc + 1 <= Memory.END ? disassemble(decode(memory.readWord(pc))) : '----'

    let status = `PC ${formatAddress(pc)}  I ${formatAddress(i)}  DT ${timers.delay}  ST ${timers.sound}  ${next}`
    if (cpu.state.kind === 'AWAITING_KEY') {
      status += '  WAITING FOR KEY'
    } else if (cpu.state.kind === 'HALTED') {
      status += `  HALTED: ${cpu.state.fault.kind}`
    }
    return status
  }

  enter(): void {
    this.write(ENTER_ALT_SCREEN + HIDE_CURSOR + CLEAR_SCREEN)
  }

  leave(): void {
    this.write(SHOW_CURSOR + LEAVE_ALT_SCREEN)
  }

  /**
   * Redraw the screen if it changed since the last frame, then the status bar
   */
  render(machine: Machine): void {
    let output = ''
    if (machine.display.isDirty) {
      TerminalRenderer.frameLines(machine.display).forEach((line, row) => {
        output += moveTo(row, 0) + line
      })
    }
    output += moveTo(TerminalRenderer.STATUS_ROW, 0) + CLEAR_LINE + TerminalRenderer.statusLine(machine)
    this.write(output)
  }

}
