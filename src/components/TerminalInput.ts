import { Keypad } from './Keypad'

/**
 * Keyboard to keypad mapping (left side of a QWERTY keyboard)
 *
 *   1 2 3 4      1 2 3 C
 *   q w e r  ->  4 5 6 D
 *   a s d f      7 8 9 E
 *   z x c v      A 0 B F
 */
export const KEY_MAP: ReadonlyMap<string, number> = new Map([
  ['1', 0x1], ['2', 0x2], ['3', 0x3], ['4', 0xC],
  ['q', 0x4], ['w', 0x5], ['e', 0x6], ['r', 0xD],
  ['a', 0x7], ['s', 0x8], ['d', 0x9], ['f', 0xE],
  ['z', 0xA], ['x', 0x0], ['c', 0xB], ['v', 0xF],
])

/**
 * Terminals only report key presses, never releases. Each press holds the
 * mapped keypad key down for holdMs; auto-repeat keeps extending it.
 */
export class TerminalInput {

  static DEFAULT_HOLD_MS: number = 150

  holdMs: number
  private keypad: Keypad
  private pressedAt: Map<number, number> = new Map()

  constructor(keypad: Keypad, holdMs: number = TerminalInput.DEFAULT_HOLD_MS) {
    this.keypad = keypad
    this.holdMs = holdMs
  }

  /**
   * @returns false if the character is not mapped to a keypad key
   */
  press(character: string, now: number): boolean {
    const key = KEY_MAP.get(character.toLowerCase())
    if (key === undefined) { return false }

    this.keypad.setKey(key, true)
    this.pressedAt.set(key, now)
    return true
  }

  releaseExpired(now: number): void {
    for (const [key, pressedAt] of this.pressedAt) {
      if (now - pressedAt >= this.holdMs) {
        this.keypad.setKey(key, false)
        this.pressedAt.delete(key)
      }
    }
  }

  releaseAll(): void {
    for (const key of this.pressedAt.keys()) {
      this.keypad.setKey(key, false)
    }
    this.pressedAt.clear()
  }

}
