/**
 * 64x32 monochrome frame buffer
 *
 * Pixels are stored row-major, one byte per pixel (0 = off, 1 = on).
 * Only the clear and draw instructions mutate it; renderers read it.
 */
export class Display {

  static WIDTH: number = 64
  static HEIGHT: number = 32
  static SPRITE_WIDTH: number = 8

  pixels: Uint8Array = new Uint8Array(Display.WIDTH * Display.HEIGHT)

  /** Set whenever the buffer changes, cleared by the renderer */
  isDirty: boolean = true

  getPixel(x: number, y: number): boolean {
    return this.pixels[y * Display.WIDTH + x] === 1
  }

  setPixel(x: number, y: number, on: boolean): void {
    this.pixels[y * Display.WIDTH + x] = on ? 1 : 0
    this.isDirty = true
  }

  clear(): void {
    this.pixels.fill(0)
    this.isDirty = true
  }

  /**
   * XOR a sprite onto the buffer. Each byte is one 8-pixel row, MSB leftmost.
   * The origin wraps to the screen; pixels past the edge wrap as well unless
   * clip is set, in which case they are dropped.
   *
   * @returns true if any lit pixel was turned off
   */
  drawSprite(x: number, y: number, sprite: ArrayLike<number>, clip: boolean = false): boolean {
    const originX = x % Display.WIDTH
    const originY = y % Display.HEIGHT
    let collision = false

    for (let row = 0; row < sprite.length; row++) {
      let py = originY + row
      if (py >= Display.HEIGHT) {
        if (clip) { break }
        py %= Display.HEIGHT
      }

      const bits = sprite[row]
      for (let col = 0; col < Display.SPRITE_WIDTH; col++) {
        if ((bits & (0x80 >> col)) === 0) { continue }

        let px = originX + col
        if (px >= Display.WIDTH) {
          if (clip) { break }
          px %= Display.WIDTH
        }

        const index = py * Display.WIDTH + px
        if (this.pixels[index] === 1) {
          collision = true
        }
        this.pixels[index] ^= 1
      }
    }

    this.isDirty = true
    return collision
  }

  /**
   * Copy of the buffer as rows of booleans, indexed [y][x]
   */
  snapshot(): boolean[][] {
    const rows: boolean[][] = []
    for (let y = 0; y < Display.HEIGHT; y++) {
      const row: boolean[] = []
      for (let x = 0; x < Display.WIDTH; x++) {
        row.push(this.getPixel(x, y))
      }
      rows.push(row)
    }
    return rows
  }

  reset(): void {
    this.clear()
  }

}
