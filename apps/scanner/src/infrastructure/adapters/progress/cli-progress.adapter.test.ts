import { PassThrough } from 'node:stream';
import { batchCompletedEvent } from '@ces/domain';
import { describe, expect, it } from 'vitest';
import { CliProgressAdapter } from './cli-progress.adapter';

function capture(): { stream: PassThrough; text: () => string } {
  const stream = new PassThrough();
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
  return { stream, text: () => chunks.join('') };
}

describe('CliProgressAdapter', () => {
  it('prints lines straight to a non-interactive stream', async () => {
    const output = capture();
    const progress = new CliProgressAdapter({ stream: output.stream });

    progress.start({ done: 0, total: 10 });
    progress.batchCompleted(batchCompletedEvent(4, 2, { rangeIndex: 0, offset: 1 }, 8, 4, { done: 4, total: 10 }));
    progress.reset({ done: 4, total: 6 });
    progress.println('192.0.2.1 origin 10 ms');
    progress.stop();
    progress.println('done');
    await new Promise<void>((resolve) => setImmediate(resolve));

    expect(output.text()).toBe('192.0.2.1 origin 10 ms\ndone\n');
  });
});
