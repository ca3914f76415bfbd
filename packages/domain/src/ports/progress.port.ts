import type { BatchCompletedEventData } from '../events/batch-completed.event';
import type { ScanProgress } from '../services/scan-cursor.service';

export interface ProgressPort {
  start(progress: ScanProgress): void;
  /** Called when the total changes discontinuously (auto-skip threshold). */
  reset(progress: ScanProgress): void;
  batchCompleted(event: BatchCompletedEventData): void;
  /** Prints a line without corrupting the progress display. */
  println(line: string): void;
  stop(): void;
}
