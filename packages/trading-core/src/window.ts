import { mean, stdev, sum } from "./stats";

/**
 * Fixed-capacity FIFO over the most recent values of a series.
 *
 * Aggregates return `null` until `capacity` values have been pushed, so
 * indicator code can tell "insufficient history" apart from a real zero.
 */
export class RollingWindow {
  private readonly buffer: number[];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`RollingWindow capacity must be a positive integer, received ${capacity}`);
    }
    this.buffer = new Array<number>(capacity).fill(0);
  }

  push(value: number): void {
    this.buffer[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
  }

  get isReady(): boolean {
    return this.count === this.capacity;
  }

  get size(): number {
    return this.count;
  }

  /** Values currently held, oldest first. */
  values(): number[] {
    const out: number[] = [];
    const start = this.isReady ? this.head : 0;
    for (let offset = 0; offset < this.count; offset += 1) {
      out.push(this.buffer[(start + offset) % this.capacity] ?? 0);
    }
    return out;
  }

  sum(): number | null {
    return this.isReady ? sum(this.values()) : null;
  }

  mean(): number | null {
    return this.isReady ? mean(this.values()) : null;
  }

  /** Sample standard deviation (n - 1), matching rolling volatility conventions. */
  sampleStdev(): number | null {
    if (!this.isReady) return null;
    if (this.capacity < 2) return 0;
    const population = stdev(this.values());
    return population * Math.sqrt(this.capacity / (this.capacity - 1));
  }

  reset(): void {
    this.buffer.fill(0);
    this.head = 0;
    this.count = 0;
  }
}

/**
 * Rolling mean of `values` over `period`, `null` until the window is full.
 * Non-finite inputs are skipped (they do not enter the window).
 */
export function rollingMean(
  values: readonly (number | null)[],
  period: number,
): (number | null)[] {
  const window = new RollingWindow(period);
  return values.map((value) => {
    if (value === null || !Number.isFinite(value)) return window.mean();
    window.push(value);
    return window.mean();
  });
}

/** Rolling sample standard deviation, `null` until the window is full. */
export function rollingStdev(
  values: readonly (number | null)[],
  period: number,
): (number | null)[] {
  const window = new RollingWindow(period);
  return values.map((value) => {
    if (value === null || !Number.isFinite(value)) return window.sampleStdev();
    window.push(value);
    return window.sampleStdev();
  });
}
