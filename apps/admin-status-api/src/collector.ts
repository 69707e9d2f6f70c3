export type TimingStats = {
  count: number
  totalMs: number
  minMs: number
  maxMs: number
}

export type TimingCollector = {
  record: (name: string, durationMs: number) => void
  results: () => Record<string, TimingStats>
  reset: () => void
}

export class InMemoryTimingCollector implements TimingCollector {
  private readonly stats = new Map<string, TimingStats>()

  public record(name: string, durationMs: number) {
    const duration = Math.max(0, durationMs)
    const current = this.stats.get(name)
    if (!current) {
      this.stats.set(name, {count: 1, totalMs: duration, minMs: duration, maxMs: duration})
      return
    }

    current.count += 1
    current.totalMs += duration
    current.minMs = Math.min(current.minMs, duration)
    current.maxMs = Math.max(current.maxMs, duration)
  }

  public results(): Record<string, TimingStats> {
    return Object.fromEntries([...this.stats.entries()].map(([name, stats]) => [name, {...stats}]))
  }

  public reset() {
    this.stats.clear()
  }
}
