/**
 * Accumulates wall-clock time per named phase of an analysis run.
 */
export class PhaseTimer {
  private timings: Map<string, { start: number | null; total: number; count: number }> = new Map()

  constructor(private now: () => number = () => performance.now()) {}

  reset(): void {
    this.timings.clear()
  }

  start(name: string): void {
    const existing = this.timings.get(name)
    if (existing) {
      existing.start = this.now()
    } else {
      this.timings.set(name, { start: this.now(), total: 0, count: 0 })
    }
  }

  end(name: string): void {
    const timing = this.timings.get(name)
    if (timing && timing.start !== null) {
      timing.total += this.now() - timing.start
      timing.count++
      timing.start = null
    }
  }

  /**
   * Time an async section. The phase is closed even when `fn` throws.
   */
  async time<T>(name: string, fn: () => Promise<T>): Promise<T> {
    this.start(name)
    try {
      return await fn()
    } finally {
      this.end(name)
    }
  }

  /**
   * Timing report lines, one per phase in the order phases first started.
   */
  lines(prefix: string = '[compile-stats]'): string[] {
    if (this.timings.size === 0) {
      return []
    }

    const lines = [`${prefix} Timing report:`]
    for (const [name, timing] of this.timings) {
      const avg = timing.count > 0 ? timing.total / timing.count : 0
      lines.push(`  ${name}: ${timing.total.toFixed(2)}ms total, ${timing.count} calls, ${avg.toFixed(2)}ms avg`)
    }
    return lines
  }

  report(write: (line: string) => void = line => console.error(line)): void {
    for (const line of this.lines()) {
      write(line)
    }
  }
}
