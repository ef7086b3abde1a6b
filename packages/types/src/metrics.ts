/**
 * In-process metrics: counters, gauges and histograms collected in a
 * {@link MetricsRegistry}. The solver reports its round and subset counts
 * here; callers read them back with {@link MetricsRegistry.snapshot}.
 */

// ─── Snapshots ───────────────────────────────────────────────────────────────────

/** Point-in-time view of a {@link Histogram}. */
export interface HistogramSnapshot {
  count: number;
  sum: number;
  /** `Infinity` when nothing has been observed. */
  min: number;
  /** `-Infinity` when nothing has been observed. */
  max: number;
  /** 0 when nothing has been observed. */
  avg: number;
  /** Cumulative counts keyed `le_<boundary>`. */
  bucketCounts: Record<string, number>;
}

/** Point-in-time view of every metric in a registry. */
export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  histograms: Record<string, HistogramSnapshot>;
}

// ─── Counter ─────────────────────────────────────────────────────────────────────

/** A monotonically increasing counter. */
export class Counter {
  readonly name: string;
  readonly description: string;
  private value = 0;

  constructor(name: string, description?: string) {
    this.name = name;
    this.description = description ?? '';
  }

  /** Add `value` (default 1). Negative amounts are rejected. */
  increment(value = 1): void {
    if (value < 0) {
      throw new RangeError(`Counter ${this.name} cannot be decremented (got ${value})`);
    }
    this.value += value;
  }

  get(): number {
    return this.value;
  }

  reset(): void {
    this.value = 0;
  }
}

// ─── Gauge ───────────────────────────────────────────────────────────────────────

/** A value that can move in both directions. */
export class Gauge {
  readonly name: string;
  readonly description: string;
  private value = 0;

  constructor(name: string, description?: string) {
    this.name = name;
    this.description = description ?? '';
  }

  set(value: number): void {
    this.value = value;
  }

  get(): number {
    return this.value;
  }
}

// ─── Histogram ───────────────────────────────────────────────────────────────────

/** Bucket boundaries suited to round counts of small markets. */
export const DEFAULT_BUCKETS: readonly number[] = [0, 1, 2, 5, 10, 25, 50, 100, 250, 1000];

/** Records observations into cumulative buckets. */
export class Histogram {
  readonly name: string;
  readonly description: string;
  readonly buckets: readonly number[];
  private count = 0;
  private sum = 0;
  private min = Infinity;
  private max = -Infinity;
  private bucketHits: number[];

  constructor(name: string, buckets?: readonly number[], description?: string) {
    this.name = name;
    this.description = description ?? '';
    this.buckets = buckets ? [...buckets].sort((a, b) => a - b) : DEFAULT_BUCKETS;
    this.bucketHits = this.buckets.map(() => 0);
  }

  observe(value: number): void {
    this.count += 1;
    this.sum += value;
    if (value < this.min) this.min = value;
    if (value > this.max) this.max = value;
    this.buckets.forEach((boundary, i) => {
      if (value <= boundary) {
        this.bucketHits[i] += 1;
      }
    });
  }

  get(): HistogramSnapshot {
    const bucketCounts: Record<string, number> = {};
    this.buckets.forEach((boundary, i) => {
      bucketCounts[`le_${boundary}`] = this.bucketHits[i];
    });
    return {
      count: this.count,
      sum: this.sum,
      min: this.min,
      max: this.max,
      avg: this.count === 0 ? 0 : this.sum / this.count,
      bucketCounts,
    };
  }

  reset(): void {
    this.count = 0;
    this.sum = 0;
    this.min = Infinity;
    this.max = -Infinity;
    this.bucketHits = this.buckets.map(() => 0);
  }
}

// ─── Registry ────────────────────────────────────────────────────────────────────

/**
 * Named metrics with get-or-create semantics: asking twice for the same
 * name returns the same instance.
 */
export class MetricsRegistry {
  private counters = new Map<string, Counter>();
  private gauges = new Map<string, Gauge>();
  private histograms = new Map<string, Histogram>();

  counter(name: string, description?: string): Counter {
    let c = this.counters.get(name);
    if (!c) {
      c = new Counter(name, description);
      this.counters.set(name, c);
    }
    return c;
  }

  gauge(name: string, description?: string): Gauge {
    let g = this.gauges.get(name);
    if (!g) {
      g = new Gauge(name, description);
      this.gauges.set(name, g);
    }
    return g;
  }

  /** Buckets are fixed by the first call for a given name. */
  histogram(name: string, buckets?: readonly number[], description?: string): Histogram {
    let h = this.histograms.get(name);
    if (!h) {
      h = new Histogram(name, buckets, description);
      this.histograms.set(name, h);
    }
    return h;
  }

  snapshot(): MetricsSnapshot {
    const counters: Record<string, number> = {};
    for (const [name, c] of this.counters) {
      counters[name] = c.get();
    }

    const gauges: Record<string, number> = {};
    for (const [name, g] of this.gauges) {
      gauges[name] = g.get();
    }

    const histograms: Record<string, HistogramSnapshot> = {};
    for (const [name, h] of this.histograms) {
      histograms[name] = h.get();
    }

    return { counters, gauges, histograms };
  }

  reset(): void {
    for (const c of this.counters.values()) c.reset();
    for (const g of this.gauges.values()) g.set(0);
    for (const h of this.histograms.values()) h.reset();
  }
}

export function createMetricsRegistry(): MetricsRegistry {
  return new MetricsRegistry();
}
