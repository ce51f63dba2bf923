/**
 * Run-length counter for call outcomes.
 * A success breaks a failure streak and vice versa; lifetime totals only
 * go down on `reset()`.
 */
export class ConsecutiveCounter {
  private successStreak = 0;
  private failureStreak = 0;
  private successTotal = 0;
  private failureTotal = 0;

  recordSuccess(): void {
    this.successStreak++;
    this.failureStreak = 0;
    this.successTotal++;
  }

  recordFailure(): void {
    this.failureStreak++;
    this.successStreak = 0;
    this.failureTotal++;
  }

  get consecutiveSuccesses(): number {
    return this.successStreak;
  }

  get consecutiveFailures(): number {
    return this.failureStreak;
  }

  totals(): { successes: number; failures: number } {
    return { successes: this.successTotal, failures: this.failureTotal };
  }

  reset(): void {
    this.successStreak = 0;
    this.failureStreak = 0;
    this.successTotal = 0;
    this.failureTotal = 0;
  }
}
