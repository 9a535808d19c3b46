export type MetricsSnapshot = {
  counters: Record<string, number>;
  gauges: Record<string, number>;
};

export class Metrics {
  private readonly counters: Record<string, number> = Object.create(null);
  private readonly gauges: Record<string, number> = Object.create(null);

  inc(name: string, by: number = 1): void {
    if (!Number.isFinite(by)) throw new Error('Metrics: increment must be finite');
    this.counters[name] = (this.counters[name] ?? 0) + by;
  }

  counter(name: string): number {
    return this.counters[name] ?? 0;
  }

  // Ledger values are bigint; gauges are approximate by nature.
  setGauge(name: string, value: number | bigint): void {
    const v = typeof value === 'bigint' ? Number(value) : value;
    if (!Number.isFinite(v)) throw new Error('Metrics: gauge value must be finite');
    this.gauges[name] = v;
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: { ...this.counters },
      gauges: { ...this.gauges },
    };
  }
}
