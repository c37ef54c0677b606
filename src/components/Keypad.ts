/**
 * Keypad - 16-key hex input latch
 *
 * Layout of the original COSMAC VIP keypad:
 *
 *   1 2 3 C
 *   4 5 6 D
 *   7 8 9 E
 *   A 0 B F
 *
 * The latch is written by the host's input code and read by the CPU.
 * Besides the level of each key it remembers the most recent press
 * (a released -> pressed transition) so the key-wait instruction only
 * accepts keys pressed after it started waiting.
 */
export class Keypad {

  static KEY_COUNT: number = 16

  private keys: boolean[] = new Array(Keypad.KEY_COUNT).fill(false)
  private pressedKey: number | null = null

  isPressed(key: number): boolean {
    if (key < 0 || key >= Keypad.KEY_COUNT) { return false }
    return this.keys[key]
  }

  setKey(key: number, pressed: boolean): void {
    if (key < 0 || key >= Keypad.KEY_COUNT) { return }
    if (pressed && !this.keys[key]) {
      this.pressedKey = key
    }
    this.keys[key] = pressed
  }

  /**
   * Replace the whole latch, typically once per host frame
   */
  update(states: readonly boolean[]): void {
    for (let key = 0; key < Keypad.KEY_COUNT; key++) {
      this.setKey(key, states[key] ?? false)
    }
  }

  /**
   * Return and forget the most recent key press, if any
   */
  takePressedKey(): number | null {
    const key = this.pressedKey
    this.pressedKey = null
    return key
  }

  clearPressedKey(): void {
    this.pressedKey = null
  }

  snapshot(): boolean[] {
    return [...this.keys]
  }

  reset(): void {
    this.keys.fill(false)
    this.pressedKey = null
  }

}
