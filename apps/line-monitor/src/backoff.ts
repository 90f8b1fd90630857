/** Exponential reconnect delay: initial, ×factor per attempt, capped. */
export class ReconnectBackoff {
  private attempt = 0;

  constructor(
    private readonly initialMs: number = 1000,
    private readonly maxMs: number = 30000,
    private readonly factor: number = 2,
  ) {}

  next(): number {
    const delay = Math.min(this.maxMs, this.initialMs * this.factor ** this.attempt);
    this.attempt += 1;
    return delay;
  }

  reset(): void {
    this.attempt = 0;
  }

  get attempts(): number {
    return this.attempt;
  }
}
