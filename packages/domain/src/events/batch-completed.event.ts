import type { CursorPosition, ScanProgress } from '../services/scan-cursor.service';

export interface BatchCompletedEventData {
  readonly type: 'batch-completed';
  readonly batchSize: number;
  readonly successCount: number;
  readonly position: CursorPosition;
  readonly maxOffset: number;
  readonly rangeCount: number;
  readonly progress: ScanProgress;
}

export function batchCompletedEvent(
  batchSize: number,
  successCount: number,
  position: CursorPosition,
  maxOffset: number,
  rangeCount: number,
  progress: ScanProgress,
): BatchCompletedEventData {
  return {
    type: 'batch-completed',
    batchSize,
    successCount,
    position,
    maxOffset,
    rangeCount,
    progress,
  };
}
