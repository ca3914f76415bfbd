/**
 * One measurement for a candidate address. Ordered by origin RTT first, then
 * candidate RTT.
 */
export class LatencyRecord {
  private constructor(
    private readonly _originRttMs: number,
    private readonly _candidateRttMs: number,
  ) {}

  static create(originRttMs: number, candidateRttMs: number): LatencyRecord {
    if (!Number.isSafeInteger(originRttMs) || originRttMs < 0) {
      throw new Error(`Origin RTT must be a non-negative integer, got ${originRttMs}`);
    }
    if (!Number.isSafeInteger(candidateRttMs) || candidateRttMs < 0) {
      throw new Error(`Candidate RTT must be a non-negative integer, got ${candidateRttMs}`);
    }
    return new LatencyRecord(originRttMs, candidateRttMs);
  }

  static compare(a: LatencyRecord, b: LatencyRecord): number {
    return a._originRttMs - b._originRttMs || a._candidateRttMs - b._candidateRttMs;
  }

  get originRttMs(): number {
    return this._originRttMs;
  }

  get candidateRttMs(): number {
    return this._candidateRttMs;
  }

  isFasterThan(other: LatencyRecord): boolean {
    return LatencyRecord.compare(this, other) < 0;
  }

  equals(other: LatencyRecord): boolean {
    return LatencyRecord.compare(this, other) === 0;
  }

  toString(): string {
    return `origin ${this._originRttMs}ms / candidate ${this._candidateRttMs}ms`;
  }
}
