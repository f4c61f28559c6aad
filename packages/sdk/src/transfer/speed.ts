/**
 * Periodic throughput sampling for one leg
 */

export class SpeedSampler {
  private timer?: NodeJS.Timeout
  private lastBytes = 0

  constructor(
    private readonly interval: number,
    private readonly readBytes: () => number,
    private readonly update: (bytesPerSecond: number) => void
  ) {}

  get running(): boolean {
    return this.timer !== undefined
  }

  start(): void {
    if (this.timer) {
      return
    }
    this.lastBytes = this.readBytes()
    this.timer = setInterval(() => this.sample(), this.interval)
    this.timer.unref()
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }
  }

  private sample(): void {
    const bytes = this.readBytes()
    // A rewind after a cancelled chunk can move the counter backwards
    const delta = Math.max(0, bytes - this.lastBytes)
    this.lastBytes = bytes
    this.update((delta * 1000) / this.interval)
  }
}
