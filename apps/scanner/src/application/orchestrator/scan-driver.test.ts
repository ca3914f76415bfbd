import {
  AddressRange,
  type BatchCompletedEventData,
  type CursorPosition,
  LatencyRecord,
  type LoggerPort,
  maxRangeOffset,
  ProcessLaunchError,
  type ProbePort,
  type ProbeTarget,
  type ProgressPort,
  ResultStore,
  ScanCursor,
  type ScanProgress,
  type ScanStatePort,
  type TunnelPort,
  type TunnelTarget,
} from '@ces/domain';
import { describe, expect, it, vi } from 'vitest';
import { ScanDriver } from './scan-driver';

class MemoryState implements ScanStatePort {
  readonly resultsLocation = 'memory:result.txt';
  readonly cursorLocation = 'memory:cursor.json';
  readonly savedCursors: CursorPosition[] = [];
  readonly savedResults: string[] = [];

  async loadResults(): Promise<ResultStore | null> {
    return null;
  }

  async saveResults(store: ResultStore): Promise<void> {
    this.savedResults.push(store.toText());
  }

  async loadCursor(): Promise<CursorPosition | null> {
    return null;
  }

  async saveCursor(position: CursorPosition): Promise<void> {
    this.savedCursors.push(position);
  }
}

class RecordingProgress implements ProgressPort {
  readonly started: ScanProgress[] = [];
  readonly resets: ScanProgress[] = [];
  readonly events: BatchCompletedEventData[] = [];
  readonly lines: string[] = [];
  stopped = 0;

  start(progress: ScanProgress): void {
    this.started.push(progress);
  }

  reset(progress: ScanProgress): void {
    this.resets.push(progress);
  }

  batchCompleted(event: BatchCompletedEventData): void {
    this.events.push(event);
  }

  println(line: string): void {
    this.lines.push(line);
  }

  stop(): void {
    this.stopped++;
  }
}

class FakeTunnel implements TunnelPort {
  readonly batches: string[][] = [];
  stops = 0;

  async start(targets: readonly TunnelTarget[]) {
    this.batches.push(targets.map((target) => target.address));
    return {
      pid: 1000 + this.batches.length,
      stop: async () => {
        this.stops++;
      },
    };
  }
}

/** Answers from a table; addresses missing from it fail. */
class TableProbe implements ProbePort {
  readonly calls: ProbeTarget[][] = [];

  constructor(private readonly table: Record<string, [number, number]>) {}

  async run(targets: readonly ProbeTarget[]): Promise<Array<LatencyRecord | null>> {
    this.calls.push([...targets]);
    return targets.map((target) => {
      const rtt = this.table[target.address];
      return rtt ? LatencyRecord.create(rtt[0], rtt[1]) : null;
    });
  }
}

const quietLog = (): LoggerPort => ({
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  child: vi.fn(quietLog),
  setLevel: vi.fn(),
  getLevel: () => 'fatal',
});

function setup(tokens: string[], table: Record<string, [number, number]>, cursorOptions: { maxRangeLength: number; autoSkip?: boolean; enableThreshold?: number; batchSize?: number }) {
  const ranges = tokens.map((token) => AddressRange.parse(token));
  const cursor = new ScanCursor(ranges, {
    maxOffset: maxRangeOffset(ranges, cursorOptions.maxRangeLength),
    autoSkip: cursorOptions.autoSkip ?? false,
    enableThreshold: cursorOptions.enableThreshold ?? 10,
  });
  const deps = {
    ranges,
    cursor,
    store: new ResultStore(),
    tunnel: new FakeTunnel(),
    probe: new TableProbe(table),
    state: new MemoryState(),
    progress: new RecordingProgress(),
    log: quietLog(),
  };
  return { ...deps, driver: new ScanDriver(deps, { batchSize: cursorOptions.batchSize ?? 3, portBase: 20_000 }) };
}

describe('ScanDriver', () => {
  it('keeps scanning after a failed pair and persists every batch', async () => {
    const { driver, tunnel, probe, store, state, progress } = setup(
      ['192.0.2.0/30', '198.51.100.0/30', '203.0.113.0/30'],
      {
        '192.0.2.0': [20, 5],
        '203.0.113.0': [10, 7],
        '192.0.2.1': [30, 1],
        '198.51.100.1': [5, 5],
        '203.0.113.1': [40, 2],
      },
      { maxRangeLength: 2 },
    );

    const summary = await driver.run();

    expect(summary).toEqual({ batches: 2, probed: 6, succeeded: 5, completed: true });
    expect(tunnel.batches).toEqual([
      ['192.0.2.0', '198.51.100.0', '203.0.113.0'],
      ['192.0.2.1', '198.51.100.1', '203.0.113.1'],
    ]);
    expect(tunnel.stops).toBe(2);
    expect(probe.calls[0]).toEqual([
      { address: '192.0.2.0', listenerPort: 20_000 },
      { address: '198.51.100.0', listenerPort: 20_001 },
      { address: '203.0.113.0', listenerPort: 20_002 },
    ]);
    expect(store.addresses()).toEqual(['198.51.100.1', '203.0.113.0', '192.0.2.0', '192.0.2.1', '203.0.113.1']);
    expect(state.savedCursors).toEqual([
      { rangeIndex: 0, offset: 1 },
      { rangeIndex: 0, offset: 2 },
    ]);
    expect(state.savedResults).toHaveLength(2);
    expect(state.savedResults[0]).toBe(
      'address: 203.0.113.0, origin_rtt: 10, candidate_rtt: 7\naddress: 192.0.2.0, origin_rtt: 20, candidate_rtt: 5\n',
    );
    expect(progress.started).toEqual([{ done: 0, total: 6 }]);
    expect(progress.events.map((event) => [event.batchSize, event.successCount, event.progress])).toEqual([
      [3, 2, { done: 3, total: 6 }],
      [3, 3, { done: 6, total: 6 }],
    ]);
    expect(progress.lines.slice(0, 3)).toEqual([
      'ip: 192.0.2.0, origin_rtt: 20 ms, candidate_rtt: 5 ms',
      'ip: 203.0.113.0, origin_rtt: 10 ms, candidate_rtt: 7 ms',
      'Batch success count: 2/3 range: 0/3 offset: 1/2',
    ]);
    expect(progress.lines.at(-1)).toBe('Batch success count: 3/3 range: 0/3 offset: 2/2');
    expect(progress.stopped).toBe(1);
  });

  it('skips the result write when a batch produced nothing', async () => {
    const { driver, state } = setup(['192.0.2.0/30'], {}, { maxRangeLength: 4 });

    const summary = await driver.run();

    expect(summary).toEqual({ batches: 2, probed: 4, succeeded: 0, completed: true });
    expect(state.savedResults).toEqual([]);
    expect(state.savedCursors).toEqual([
      { rangeIndex: 0, offset: 3 },
      { rangeIndex: 0, offset: 4 },
    ]);
  });

  it('stops after the current batch when asked to', async () => {
    const { driver, tunnel, state } = setup(['192.0.2.0/30', '198.51.100.0/30'], {}, { maxRangeLength: 4 });
    const start = tunnel.start.bind(tunnel);
    vi.spyOn(tunnel, 'start').mockImplementation(async (targets) => {
      driver.requestStop();
      return start(targets);
    });

    const summary = await driver.run();

    expect(summary).toEqual({ batches: 1, probed: 3, succeeded: 0, completed: false });
    expect(state.savedCursors).toEqual([{ rangeIndex: 1, offset: 1 }]);
  });

  it('narrows to ranges enabled during warm-up', async () => {
    const { driver, ranges, tunnel, progress } = setup(
      ['10.1.0.0/30', '10.2.0.0/30'],
      { '10.2.0.0': [5, 5], '10.2.0.1': [6, 6], '10.2.0.2': [7, 7], '10.2.0.3': [8, 8] },
      { maxRangeLength: 4, autoSkip: true, enableThreshold: 1 },
    );

    await driver.run();

    expect(tunnel.batches).toEqual([['10.1.0.0', '10.2.0.0'], ['10.2.0.1', '10.2.0.2', '10.2.0.3']]);
    expect(ranges.map((range) => range.enabled)).toEqual([false, true]);
    expect(progress.started).toEqual([{ done: 0, total: 8 }]);
    expect(progress.resets).toEqual([{ done: 2, total: 5 }]);
    expect(progress.events.map((event) => event.progress)).toEqual([
      { done: 2, total: 5 },
      { done: 5, total: 5 },
    ]);
  });

  it('moves past a threshold row that yields no address', async () => {
    const { driver, tunnel, state, progress } = setup(
      ['10.1.0.0/30', '10.9.9.9/32'],
      {
        '10.1.0.0': [1, 1],
        '10.1.0.1': [2, 2],
        '10.1.0.2': [3, 3],
        '10.1.0.3': [4, 4],
        '10.9.9.9': [5, 5],
      },
      { maxRangeLength: 256, autoSkip: true, enableThreshold: 2, batchSize: 1 },
    );

    const summary = await driver.run();

    expect(summary).toEqual({ batches: 5, probed: 5, succeeded: 5, completed: true });
    expect(tunnel.batches).toEqual([['10.1.0.0'], ['10.9.9.9'], ['10.1.0.1'], ['10.1.0.2'], ['10.1.0.3']]);
    expect(state.savedCursors).toEqual([
      { rangeIndex: 1, offset: 0 },
      { rangeIndex: 0, offset: 1 },
      { rangeIndex: 1, offset: 1 },
      { rangeIndex: 0, offset: 2 },
      { rangeIndex: 1, offset: 2 },
      { rangeIndex: 1, offset: 3 },
      { rangeIndex: 0, offset: 4 },
    ]);
    expect(progress.resets).toHaveLength(1);
  });

  it('propagates tunnel launch failures before touching persisted state', async () => {
    const { driver, tunnel, state, progress } = setup(['192.0.2.0/30'], {}, { maxRangeLength: 4 });
    const failure = new ProcessLaunchError('./tunnel', 'exited (code 1) before becoming ready', 'FATAL bad config');
    vi.spyOn(tunnel, 'start').mockRejectedValue(failure);

    await expect(driver.run()).rejects.toBe(failure);
    expect(state.savedCursors).toEqual([]);
    expect(progress.stopped).toBe(1);
  });

  it('does nothing when the scan is already complete', async () => {
    const ranges = [AddressRange.parse('192.0.2.0/30')];
    const cursor = ScanCursor.restore(ranges, { maxOffset: 4, autoSkip: false, enableThreshold: 10 }, { rangeIndex: 0, offset: 4 }, 'cursor.json');
    const tunnel = new FakeTunnel();
    const driver = new ScanDriver(
      {
        ranges,
        cursor,
        store: new ResultStore(),
        tunnel,
        probe: new TableProbe({}),
        state: new MemoryState(),
        progress: new RecordingProgress(),
        log: quietLog(),
      },
      { batchSize: 3, portBase: 20_000 },
    );

    await expect(driver.run()).resolves.toEqual({ batches: 0, probed: 0, succeeded: 0, completed: true });
    expect(tunnel.batches).toEqual([]);
  });
});
