import type { BatchCompletedEventData, ProgressPort, ScanProgress } from '@ces/domain';
import cliProgress, { type MultiBar, type SingleBar } from 'cli-progress';

export interface CliProgressOptions {
  stream?: NodeJS.WritableStream;
}

const FORMAT = 'Scanning | {bar} | {percentage}% | {value}/{total} | offset {offset}/{maxOffset} | found {found} | ETA: {eta}s';

/** Terminal progress bar. Renders nothing when the stream is not a TTY. */
export class CliProgressAdapter implements ProgressPort {
  private readonly stream: NodeJS.WritableStream;
  private multiBar: MultiBar | null = null;
  private bar: SingleBar | null = null;
  private found = 0;

  constructor(options: CliProgressOptions = {}) {
    this.stream = options.stream ?? process.stderr;
  }

  start(progress: ScanProgress): void {
    this.stop();
    this.found = 0;
    if (!this.interactive) {
      return;
    }
    this.multiBar = new cliProgress.MultiBar(
      {
        format: FORMAT,
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
        stream: this.stream,
      },
      cliProgress.Presets.shades_classic,
    );
    this.bar = this.multiBar.create(progress.total, progress.done, { offset: 0, maxOffset: 0, found: 0 });
  }

  reset(progress: ScanProgress): void {
    this.bar?.setTotal(progress.total);
    this.bar?.update(progress.done);
  }

  batchCompleted(event: BatchCompletedEventData): void {
    this.found += event.successCount;
    this.bar?.update(event.progress.done, {
      offset: event.position.offset,
      maxOffset: event.maxOffset,
      found: this.found,
    });
  }

  /** Lines logged while the bar is drawn are flushed on its next redraw. */
  println(line: string): void {
    if (this.multiBar) {
      this.multiBar.log(`${line}\n`);
      return;
    }
    this.stream.write(`${line}\n`);
  }

  private get interactive(): boolean {
    return 'isTTY' in this.stream && this.stream.isTTY === true;
  }

  stop(): void {
    this.multiBar?.stop();
    this.multiBar = null;
    this.bar = null;
  }
}
