export const DEFAULT_BUCKET_COUNT = 10;

interface Bucket {
  requests: number;
  failures: number;
}

export interface WindowCounts {
  requests: number;
  failures: number;
}

/**
 * Request/failure totals over a trailing time window.
 *
 * The window is split into fixed-duration buckets held in a ring. `head` is
 * the bucket receiving new events; it covers [anchor, anchor + bucketMs).
 * Each elapsed bucket interval advances the head by one slot and evicts
 * whatever that slot held, so an event leaves the totals no later than one
 * full window after it was recorded.
 */
export class RollingWindowCounter {
  readonly windowMs: number;
  readonly bucketCount: number;
  readonly bucketMs: number;

  private readonly buckets: Bucket[];
  private head = 0;
  private anchor: number;
  private totalRequests = 0;
  private totalFailures = 0;

  constructor(windowMs: number, bucketCount = DEFAULT_BUCKET_COUNT) {
    this.windowMs = windowMs;
    this.bucketCount =
      Number.isInteger(bucketCount) && bucketCount > 0 ? bucketCount : DEFAULT_BUCKET_COUNT;
    this.bucketMs = Math.max(Math.floor(windowMs / this.bucketCount), 1);
    this.buckets = Array.from({ length: this.bucketCount }, () => ({ requests: 0, failures: 0 }));
    this.anchor = Date.now();
  }

  recordSuccess(): void {
    this.rotate();
    this.buckets[this.head].requests++;
    this.totalRequests++;
  }

  recordFailure(): void {
    this.rotate();
    const bucket = this.buckets[this.head];
    bucket.requests++;
    bucket.failures++;
    this.totalRequests++;
    this.totalFailures++;
  }

  counts(): WindowCounts {
    this.rotate();
    return { requests: this.totalRequests, failures: this.totalFailures };
  }

  reset(): void {
    for (const bucket of this.buckets) {
      bucket.requests = 0;
      bucket.failures = 0;
    }
    this.head = 0;
    this.totalRequests = 0;
    this.totalFailures = 0;
    this.anchor = Date.now();
  }

  private rotate(): void {
    const elapsed = Date.now() - this.anchor;
    if (elapsed < this.bucketMs) return;

    const steps = Math.floor(elapsed / this.bucketMs);
    const evictions = Math.min(steps, this.bucketCount);
    for (let i = 0; i < evictions; i++) {
      this.head = (this.head + 1) % this.bucketCount;
      const bucket = this.buckets[this.head];
      this.totalRequests -= bucket.requests;
      this.totalFailures -= bucket.failures;
      bucket.requests = 0;
      bucket.failures = 0;
    }

    // Keep the partial interval so bucket boundaries don't drift.
    this.anchor += steps * this.bucketMs;
  }
}
