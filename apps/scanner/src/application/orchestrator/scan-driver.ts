import {
  type AddressRange,
  type BatchCompletedEventData,
  batchCompletedEvent,
  type CursorBatch,
  createChildLogger,
  type LatencyRecord,
  type LoggerPort,
  type ProbePort,
  type ProgressPort,
  type ResultStore,
  type ScanCursor,
  type ScanProgress,
  type ScanStatePort,
  type TunnelPort,
  withTunnel,
} from '@ces/domain';

const defaultLog = createChildLogger('scan-driver');

export interface ScanDriverDeps {
  ranges: readonly AddressRange[];
  cursor: ScanCursor;
  store: ResultStore;
  tunnel: TunnelPort;
  probe: ProbePort;
  state: ScanStatePort;
  progress: ProgressPort;
  log?: LoggerPort;
}

export interface ScanDriverOptions {
  batchSize: number;
  portBase: number;
}

export interface ScanSummary {
  batches: number;
  probed: number;
  succeeded: number;
  /** False when the loop stopped on request before the scan depth was exhausted. */
  completed: boolean;
}

/**
 * One batch per iteration: pull addresses from the cursor, start a tunnel for
 * them, probe, fold the results into the store and persist. State on disk is
 * only ever written between batches.
 */
export class ScanDriver {
  private stopRequested = false;
  private readonly log: LoggerPort;

  constructor(
    private readonly deps: ScanDriverDeps,
    private readonly options: ScanDriverOptions,
  ) {
    this.log = deps.log ?? defaultLog;
  }

  /** The current batch finishes and is persisted before the loop exits. */
  requestStop(): void {
    this.stopRequested = true;
  }

  async run(): Promise<ScanSummary> {
    const { cursor, progress: progressPort } = this.deps;
    const summary: ScanSummary = { batches: 0, probed: 0, succeeded: 0, completed: false };
    let progress = cursor.progress();

    progressPort.start(progress);
    try {
      while (!this.stopRequested && !cursor.finished) {
        const batch = cursor.nextBatch(this.options.batchSize);
        const successCount = await this.runBatch(batch);

        progress = batch.crossedThreshold ? cursor.progress() : advance(progress, batch.entries.length);
        if (batch.crossedThreshold) {
          progressPort.reset(progress);
          this.log.info('Warm-up finished, probing enabled ranges only', {
            enabledRanges: this.deps.ranges.filter((range) => range.enabled).length,
            total: progress.total,
          });
        }
        // A row can end without yielding anything, e.g. at the threshold or the final offset.
        if (batch.entries.length === 0) {
          continue;
        }

        summary.batches++;
        summary.probed += batch.entries.length;
        summary.succeeded += successCount;

        const event = batchCompletedEvent(
          batch.entries.length,
          successCount,
          cursor.position,
          cursor.maxOffset,
          cursor.rangeCount,
          progress,
        );
        progressPort.batchCompleted(event);
        progressPort.println(formatBatchSummary(event));
      }
    } finally {
      progressPort.stop();
    }

    summary.completed = cursor.finished;
    return summary;
  }

  /** Probes a non-empty batch and persists the outcome. The cursor is saved either way. */
  private async runBatch(batch: CursorBatch): Promise<number> {
    const { cursor, store, state, ranges, progress } = this.deps;
    if (batch.entries.length === 0) {
      await state.saveCursor(cursor.position);
      return 0;
    }

    const targets = batch.entries.map((entry) => ({ address: entry.address }));

    this.log.debug(`Probing ${batch.entries.length} addresses`, { position: cursor.position });
    const records = await withTunnel(this.deps.tunnel, targets, () =>
      this.deps.probe.run(
        batch.entries.map((entry, index) => ({
          address: entry.address,
          listenerPort: this.options.portBase + index,
        })),
      ),
    );

    let successCount = 0;
    batch.entries.forEach((entry, index) => {
      const record: LatencyRecord | null | undefined = records[index];
      if (!record) {
        return;
      }
      store.addResult(entry.address, record);
      successCount++;
      progress.println(formatSuccess(entry.address, record));
      if (cursor.isWarmUpOffset(entry.offset)) {
        ranges[entry.rangeIndex]?.enable();
      }
    });

    if (store.commit()) {
      await state.saveResults(store);
    }
    await state.saveCursor(cursor.position);
    return successCount;
  }
}

export function formatSuccess(address: string, record: LatencyRecord): string {
  return `ip: ${address}, origin_rtt: ${record.originRttMs} ms, candidate_rtt: ${record.candidateRttMs} ms`;
}

export function formatBatchSummary(event: BatchCompletedEventData): string {
  return (
    `Batch success count: ${event.successCount}/${event.batchSize} ` +
    `range: ${event.position.rangeIndex}/${event.rangeCount} offset: ${event.position.offset}/${event.maxOffset}`
  );
}

function advance(progress: ScanProgress, count: number): ScanProgress {
  return { done: Math.min(progress.done + count, progress.total), total: progress.total };
}
