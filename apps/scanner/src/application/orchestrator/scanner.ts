import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import {
  type AddressRange,
  ConfigError,
  createChildLogger,
  type CursorPosition,
  enableCoveredRanges,
  FileSystemError,
  INITIAL_POSITION,
  type LoggerPort,
  maxRangeOffset,
  parseAddressRanges,
  ResultStore,
  ScanCursor,
  selectRanges,
} from '@ces/domain';
import type { ScannerContainer } from '@ces/scanner/infrastructure/di/module-registry';
import { ScanDriver, type ScanSummary } from './scan-driver';
import { ScannerBase } from './scanner-base';

const defaultLog = createChildLogger('scanner');

interface LoadedState {
  store: ResultStore;
  position: CursorPosition;
}

export class Scanner extends ScannerBase {
  private driver: ScanDriver | null = null;
  private stopRequested = false;

  constructor(
    container: ScannerContainer,
    private readonly log: LoggerPort = defaultLog,
  ) {
    super(container);
  }

  /**
   * Prepares the range list and persisted state, then scans until the cursor
   * is exhausted or {@link stop} is called.
   */
  async run(): Promise<ScanSummary> {
    const ranges = await this.loadRanges();
    const maxOffset = maxRangeOffset(ranges, this.config.scan.maxRangeLength);
    const state = this.getState();
    const { store, position } = await this.loadState();

    const cursor = ScanCursor.restore(
      ranges,
      { maxOffset, autoSkip: this.options.autoSkip, enableThreshold: this.options.enableThreshold },
      position,
      state.cursorLocation,
    );

    if (this.options.autoSkip) {
      const enabled = enableCoveredRanges(ranges, store.addresses());
      this.log.debug(`${enabled} range(s) already have results`);
    }

    this.log.info('Scan prepared', {
      ranges: ranges.length,
      maxOffset,
      knownResults: store.size,
      position: cursor.position,
    });

    await state.saveResults(store);
    await state.saveCursor(cursor.position);

    let summary: ScanSummary = { batches: 0, probed: 0, succeeded: 0, completed: true };
    if (cursor.finished) {
      this.log.info('Scan already complete, nothing to probe');
    } else {
      this.driver = new ScanDriver(
        {
          ranges,
          cursor,
          store,
          tunnel: this.getTunnel(),
          probe: this.getProbe(),
          state,
          progress: this.getProgress(),
        },
        { batchSize: this.config.probe.maxConnectionCount, portBase: this.config.probe.portBase },
      );
      if (this.stopRequested) {
        this.driver.requestStop();
      }
      summary = await this.driver.run();
      this.log.info(summary.completed ? 'Scan complete' : 'Scan stopped', { ...summary, position: cursor.position });
    }

    this.reportTop(store);
    return summary;
  }

  /** Lets the in-flight batch finish and persist, then ends {@link run}. */
  stop(): void {
    this.stopRequested = true;
    this.driver?.requestStop();
  }

  private async loadRanges(): Promise<AddressRange[]> {
    const file = path.resolve(this.options.addressFile);
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (error) {
      throw FileSystemError.from(file, error);
    }

    const parsed = parseAddressRanges(text, this.getMatcher(), this.log);
    const ranges = selectRanges(parsed, this.options.rangeCount);
    if (ranges.length === 0) {
      throw new ConfigError(`No address ranges found in ${file}`);
    }
    if (ranges.length < parsed.length) {
      this.log.info(`Using ${ranges.length} of ${parsed.length} ranges`);
    }
    return ranges;
  }

  private async loadState(): Promise<LoadedState> {
    if (this.options.noCache) {
      this.log.info('Cache disabled, starting from scratch');
      return { store: new ResultStore(), position: INITIAL_POSITION };
    }

    const state = this.getState();
    const [store, position] = await Promise.all([state.loadResults(), state.loadCursor()]);
    return { store: store ?? new ResultStore(), position: position ?? INITIAL_POSITION };
  }

  private reportTop(store: ResultStore): void {
    const top = store.top(this.config.scan.topResults);
    if (top.length === 0) {
      this.log.info('No successful measurements yet');
      return;
    }

    const lines = top.map(
      ({ address, record }, index) =>
        `${index + 1}. ${address} origin ${record.originRttMs} ms, candidate ${record.candidateRttMs} ms`,
    );
    this.log.info(`Fastest ${top.length} of ${store.size} address(es):\n${lines.join('\n')}`);
  }
}
