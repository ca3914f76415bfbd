import { DeserializeError } from '../errors/scan-error';
import { formatAddress, parseAddress } from '../value-objects/address-range.vo';
import { LatencyRecord } from '../value-objects/latency-record.vo';

const RESULT_LINE = /^address: (\S+), origin_rtt: (\d+), candidate_rtt: (\d+)$/;

export interface RankedResult {
  readonly address: string;
  readonly record: LatencyRecord;
}

/**
 * Latency results keyed by address, with an index kept sorted by
 * {@link LatencyRecord.compare}.
 *
 * New measurements are staged by {@link addResult} and folded into the index by
 * {@link commit}, which sorts only the staged addresses and merges them with the
 * existing order. Between the two calls the index may still list staged
 * addresses at their old positions.
 */
export class ResultStore {
  private readonly records = new Map<string, LatencyRecord>();
  private ordered: string[] = [];
  private readonly staged = new Set<string>();

  get size(): number {
    return this.records.size;
  }

  get pendingCount(): number {
    return this.staged.size;
  }

  get(address: string): LatencyRecord | undefined {
    return this.records.get(address);
  }

  /** Latest measurement wins, even when the address already has one. */
  addResult(address: string, record: LatencyRecord): void {
    this.records.set(address, record);
    this.staged.add(address);
  }

  /**
   * Folds staged addresses into the sorted index in O(n + m log m).
   * On equal keys the staged address is placed before the existing one.
   * Returns false when nothing was staged.
   */
  commit(): boolean {
    if (this.staged.size === 0) {
      return false;
    }

    const incoming = [...this.staged].sort((a, b) => LatencyRecord.compare(this.recordOf(a), this.recordOf(b)));
    const merged: string[] = [];
    let i = 0;
    let j = 0;

    while (i < this.ordered.length || j < incoming.length) {
      const current = this.ordered[i];
      if (current !== undefined && this.staged.has(current)) {
        i++;
        continue;
      }

      const next = incoming[j];
      if (next === undefined) {
        if (current !== undefined) {
          merged.push(current);
        }
        i++;
        continue;
      }

      if (current !== undefined && this.recordOf(current).isFasterThan(this.recordOf(next))) {
        merged.push(current);
        i++;
      } else {
        merged.push(next);
        j++;
      }
    }

    this.ordered = merged;
    this.staged.clear();
    return true;
  }

  /** Committed addresses, fastest first. */
  addresses(): readonly string[] {
    return this.ordered;
  }

  top(count: number): RankedResult[] {
    return this.ordered.slice(0, Math.max(0, count)).map((address) => ({ address, record: this.recordOf(address) }));
  }

  /** One line per committed address, in rank order. */
  toText(): string {
    return this.ordered
      .map((address) => {
        const record = this.recordOf(address);
        return `address: ${address}, origin_rtt: ${record.originRttMs}, candidate_rtt: ${record.candidateRttMs}\n`;
      })
      .join('');
  }

  /**
   * Rebuilds a store from {@link toText} output. Any malformed line rejects the
   * whole text. The file order is re-checked with a stable sort, so a valid file
   * loads unchanged.
   */
  static fromText(text: string, source = 'result file'): ResultStore {
    const store = new ResultStore();
    const lines = text.split('\n');

    lines.forEach((rawLine, index) => {
      const line = rawLine.replace(/\r$/, '');
      if (line.length === 0) {
        return;
      }
      const lineNumber = index + 1;

      const match = RESULT_LINE.exec(line);
      if (!match) {
        throw new DeserializeError(source, `unexpected line ${JSON.stringify(line)}`, lineNumber);
      }
      const [, written = '', originRtt = '', candidateRtt = ''] = match;

      const parsed = parseAddress(written);
      if (!parsed) {
        throw new DeserializeError(source, `invalid address ${JSON.stringify(written)}`, lineNumber);
      }
      // Keyed like freshly probed addresses, so `0:0::1` and `::1` are one entry.
      const address = formatAddress(parsed.family, parsed.value);
      if (store.records.has(address)) {
        throw new DeserializeError(source, `duplicate address ${address}`, lineNumber);
      }

      let record: LatencyRecord;
      try {
        record = LatencyRecord.create(Number(originRtt), Number(candidateRtt));
      } catch (error) {
        throw new DeserializeError(source, (error as Error).message, lineNumber, { cause: error });
      }

      store.records.set(address, record);
      store.ordered.push(address);
    });

    store.ordered.sort((a, b) => LatencyRecord.compare(store.recordOf(a), store.recordOf(b)));
    return store;
  }

  private recordOf(address: string): LatencyRecord {
    const record = this.records.get(address);
    if (!record) {
      throw new Error(`No latency record for ${address}`);
    }
    return record;
  }
}
