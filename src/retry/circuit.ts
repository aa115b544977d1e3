/**
 * Counts consecutive fatal application outcomes within one run. Once the
 * count reaches the threshold the circuit stays open for the rest of the run
 * and applications that have not started are skipped.
 */
export class CircuitBreaker {
  private consecutive = 0;
  private tripped = false;

  constructor(readonly threshold: number = 3) {
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new RangeError(`Circuit threshold must be a positive integer, got ${threshold}`);
    }
  }

  get isOpen(): boolean {
    return this.tripped;
  }

  get consecutiveFailures(): number {
    return this.consecutive;
  }

  recordSuccess(): void {
    if (!this.tripped) {
      this.consecutive = 0;
    }
  }

  recordFatal(): void {
    this.consecutive += 1;
    if (this.consecutive >= this.threshold) {
      this.tripped = true;
    }
  }
}
