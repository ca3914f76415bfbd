import { CursorMismatchError } from '../errors/scan-error';
import type { AddressRange } from '../value-objects/address-range.vo';

export interface CursorPosition {
  readonly rangeIndex: number;
  readonly offset: number;
}

export interface CursorOptions {
  /** Global per-range offset ceiling; the scan ends when the offset reaches it. */
  readonly maxOffset: number;
  readonly autoSkip: boolean;
  /** Offsets below this are warm-up: every range is probed. */
  readonly enableThreshold: number;
}

export interface BatchEntry {
  readonly address: string;
  readonly rangeIndex: number;
  /** Offset the address was picked at. */
  readonly offset: number;
}

export interface CursorBatch {
  readonly entries: BatchEntry[];
  /** True when this batch ended by moving the offset onto the enable threshold. */
  readonly crossedThreshold: boolean;
}

export interface ScanProgress {
  readonly done: number;
  readonly total: number;
}

export const INITIAL_POSITION: CursorPosition = { rangeIndex: 0, offset: 0 };

/**
 * Round-robin walk over the ranges: every range at offset 0, then every range
 * at offset 1, and so on. The position only changes inside {@link nextBatch},
 * so persisting it between batches is enough to resume exactly.
 */
export class ScanCursor {
  private _rangeIndex: number;
  private _offset: number;

  constructor(
    private readonly ranges: readonly AddressRange[],
    private readonly options: CursorOptions,
    position: CursorPosition = INITIAL_POSITION,
  ) {
    this._rangeIndex = position.rangeIndex;
    this._offset = position.offset;
  }

  /**
   * Resumes from a persisted position, rejecting positions that cannot belong
   * to the current range list.
   */
  static restore(
    ranges: readonly AddressRange[],
    options: CursorOptions,
    position: CursorPosition,
    source: string,
  ): ScanCursor {
    const { rangeIndex, offset } = position;
    if (!Number.isSafeInteger(rangeIndex) || rangeIndex < 0 || (rangeIndex > 0 && rangeIndex >= ranges.length)) {
      throw new CursorMismatchError(
        `Cursor in ${source} points at range ${rangeIndex}, but only ${ranges.length} range(s) are loaded`,
      );
    }
    if (!Number.isSafeInteger(offset) || offset < 0 || offset > options.maxOffset) {
      throw new CursorMismatchError(
        `Cursor in ${source} has offset ${offset}, but the maximum range offset is ${options.maxOffset}`,
      );
    }
    return new ScanCursor(ranges, options, position);
  }

  get position(): CursorPosition {
    return { rangeIndex: this._rangeIndex, offset: this._offset };
  }

  get rangeIndex(): number {
    return this._rangeIndex;
  }

  get offset(): number {
    return this._offset;
  }

  get maxOffset(): number {
    return this.options.maxOffset;
  }

  get rangeCount(): number {
    return this.ranges.length;
  }

  get finished(): boolean {
    return this.ranges.length === 0 || this._offset >= this.options.maxOffset;
  }

  get inWarmUp(): boolean {
    return this._offset < this.options.enableThreshold;
  }

  isEligible(range: AddressRange): boolean {
    return !this.options.autoSkip || this.inWarmUp || range.enabled;
  }

  /**
   * Whether a success for an entry picked at `offset` should mark its range
   * as viable.
   */
  isWarmUpOffset(offset: number): boolean {
    return offset < this.options.enableThreshold;
  }

  /**
   * Collects up to `maxCount` addresses, advancing the position as it goes.
   * With auto-skip on, a batch also ends where the offset reaches the enable
   * threshold, so warm-up results are applied before eligibility narrows.
   */
  nextBatch(maxCount: number): CursorBatch {
    const entries: BatchEntry[] = [];
    let crossedThreshold = false;

    while (entries.length < maxCount && !this.finished) {
      const range = this.ranges[this._rangeIndex];
      if (range && this.isEligible(range)) {
        const address = range.getIp(this._offset);
        if (address !== null) {
          entries.push({ address, rangeIndex: this._rangeIndex, offset: this._offset });
        }
      }

      this._rangeIndex++;
      if (this._rangeIndex >= this.ranges.length) {
        this._rangeIndex = 0;
        this._offset++;
        if (this.options.autoSkip && this._offset === this.options.enableThreshold) {
          crossedThreshold = true;
          break;
        }
      }
    }

    return { entries, crossedThreshold };
  }

  /**
   * Exact done/total counts for the current position. Ranges pruned by
   * auto-skip only count the offsets they were probed at during warm-up.
   */
  progress(): ScanProgress {
    let done = 0;
    let total = 0;

    this.ranges.forEach((range, index) => {
      const planned = this.plannedLength(range);
      total += planned;
      done += Math.min(planned, this._offset + (index < this._rangeIndex ? 1 : 0));
    });

    return { done, total };
  }

  private plannedLength(range: AddressRange): number {
    const capped = range.cappedCapacity(this.options.maxOffset);
    if (this.isEligible(range)) {
      return capped;
    }
    return Math.min(capped, this.options.enableThreshold);
  }
}
