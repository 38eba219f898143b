import type { PerformanceTracker } from './types';

export class DefaultPerformanceTracker implements PerformanceTracker {
  private readonly started = new Map<string, number>();
  private readonly durations: Record<string, number> = {};

  start(name: string): void {
    this.started.set(name, performance.now());
  }

  end(name: string): number {
    const startedAt = this.started.get(name);
    if (startedAt === undefined) return 0;

    const duration = performance.now() - startedAt;
    this.started.delete(name);
    this.durations[name] = duration;
    return duration;
  }

  getMetrics(): Record<string, number> {
    return { ...this.durations };
  }
}
