/**
 * Delay and sound timers. Both count down toward zero at 60Hz.
 * The sound timer is kept for programs that read it back; no tone is produced.
 */
export class Timers {

  static FREQUENCY: number = 60

  private delayValue: number = 0
  private soundValue: number = 0

  get delay(): number {
    return this.delayValue
  }

  set delay(value: number) {
    this.delayValue = value & 0xFF
  }

  get sound(): number {
    return this.soundValue
  }

  set sound(value: number) {
    this.soundValue = value & 0xFF
  }

  tick(): void {
    if (this.delayValue > 0) { this.delayValue-- }
    if (this.soundValue > 0) { this.soundValue-- }
  }

  reset(): void {
    this.delayValue = 0
    this.soundValue = 0
  }

}
