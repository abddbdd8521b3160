/**
 * Wall-clock profiling of simulation phases (oracle, agents, twap, controller).
 * One instance per run; pass it to the scheduler to turn profiling on.
 */

export interface ProfileEntry {
  name: string;
  count: number;
  totalTime: number;
  minTime: number;
  maxTime: number;
  avgTime: number;
}

export type Clock = () => number;

export class Profiler {
  private profiles: Map<string, ProfileEntry> = new Map();
  private readonly clock: Clock;

  constructor(clock: Clock = () => performance.now()) {
    this.clock = clock;
  }

  /**
   * Run `fn` and add its duration to the `name` bucket
   */
  time<T>(name: string, fn: () => T): T {
    const startTime = this.clock();
    try {
      return fn();
    } finally {
      this.record(name, this.clock() - startTime);
    }
  }

  record(name: string, duration: number): void {
    const entry = this.profiles.get(name) ?? {
      name,
      count: 0,
      totalTime: 0,
      minTime: Infinity,
      maxTime: 0,
      avgTime: 0,
    };

    entry.count++;
    entry.totalTime += duration;
    entry.minTime = Math.min(entry.minTime, duration);
    entry.maxTime = Math.max(entry.maxTime, duration);
    entry.avgTime = entry.totalTime / entry.count;

    this.profiles.set(name, entry);
  }

  getStats(name: string): ProfileEntry | undefined {
    return this.profiles.get(name);
  }

  /**
   * All entries, slowest total first
   */
  getAllStats(): ProfileEntry[] {
    return Array.from(this.profiles.values()).sort((a, b) => b.totalTime - a.totalTime);
  }

  getTopConsumers(count: number = 10): Array<{ name: string; percentage: number; totalTime: number }> {
    const stats = this.getAllStats();
    const totalTime = stats.reduce((sum, s) => sum + s.totalTime, 0);

    return stats.slice(0, count).map((stat) => ({
      name: stat.name,
      percentage: totalTime > 0 ? (stat.totalTime / totalTime) * 100 : 0,
      totalTime: stat.totalTime,
    }));
  }

  formatStats(limit: number = 20): string[] {
    const stats = this.getAllStats();
    const lines = [
      "=== Profiling Statistics ===",
      [
        "Name".padEnd(24),
        "Count".padStart(10),
        "Total(ms)".padStart(12),
        "Avg(ms)".padStart(10),
        "Min(ms)".padStart(10),
        "Max(ms)".padStart(10),
      ].join(" "),
      "-".repeat(79),
    ];

    for (const stat of stats.slice(0, limit)) {
      lines.push(
        [
          stat.name.padEnd(24),
          stat.count.toString().padStart(10),
          stat.totalTime.toFixed(2).padStart(12),
          stat.avgTime.toFixed(3).padStart(10),
          stat.minTime.toFixed(3).padStart(10),
          stat.maxTime.toFixed(3).padStart(10),
        ].join(" ")
      );
    }

    if (stats.length > limit) {
      lines.push(`... and ${stats.length - limit} more entries`);
    }

    const totalTime = stats.reduce((sum, s) => sum + s.totalTime, 0);
    lines.push(`Total profiled time: ${totalTime.toFixed(2)}ms`);
    return lines;
  }

  printStats(limit: number = 20): void {
    console.log(`\n${this.formatStats(limit).join("\n")}`);
  }

  reset(): void {
    this.profiles.clear();
  }
}
