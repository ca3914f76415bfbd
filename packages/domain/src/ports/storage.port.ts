import type { CursorPosition } from '../services/scan-cursor.service';
import type { ResultStore } from '../services/result-store.service';

/** Persisted state of a scan. `load*` resolves null when nothing was saved yet. */
export interface ScanStatePort {
  loadResults(): Promise<ResultStore | null>;
  saveResults(store: ResultStore): Promise<void>;
  loadCursor(): Promise<CursorPosition | null>;
  saveCursor(position: CursorPosition): Promise<void>;
  readonly resultsLocation: string;
  readonly cursorLocation: string;
}
