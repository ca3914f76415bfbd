import type { LatencyRecord } from '../value-objects/latency-record.vo';

export interface ProbeTarget {
  readonly address: string;
  /** Local tunnel listener routed to this address. */
  readonly listenerPort: number;
}

export interface ProbePort {
  /**
   * Measures every target concurrently. The result has one entry per target,
   * in order; null marks a failed pair.
   */
  run(targets: readonly ProbeTarget[]): Promise<Array<LatencyRecord | null>>;
}
