import { ConfigError } from '@ces/domain';
import { describe, expect, it } from 'vitest';
import { parseCliArgs } from './args';

describe('parseCliArgs', () => {
  it('applies defaults', () => {
    expect(parseCliArgs(['--address-file', 'ranges.txt'])).toEqual({
      kind: 'scan',
      options: {
        addressFile: 'ranges.txt',
        rangeCount: 0,
        noCache: false,
        dataDir: 'data',
        autoSkip: false,
        enableThreshold: 10,
        ignoreBodyWarning: false,
      },
    });
  });

  it('reads every flag', () => {
    const command = parseCliArgs([
      '--address-file=ranges.txt',
      '--range-count',
      '25',
      '--no-cache',
      '--data-dir',
      'state',
      '--config',
      'state/custom.json',
      '--auto-skip',
      '--enable-threshold',
      '3',
      '--ignore-body-warning',
    ]);

    expect(command).toEqual({
      kind: 'scan',
      options: {
        addressFile: 'ranges.txt',
        rangeCount: 25,
        noCache: true,
        dataDir: 'state',
        configPath: 'state/custom.json',
        autoSkip: true,
        enableThreshold: 3,
        ignoreBodyWarning: true,
      },
    });
  });

  it('returns help without requiring other flags', () => {
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('requires an address file', () => {
    expect(() => parseCliArgs([])).toThrow(ConfigError);
    expect(() => parseCliArgs([])).toThrow(/addressFile: --address-file is required/);
  });

  it('rejects negative or non-numeric counts', () => {
    expect(() => parseCliArgs(['--address-file', 'r.txt', '--range-count=-2'])).toThrow(/rangeCount/);
    expect(() => parseCliArgs(['--address-file', 'r.txt', '--enable-threshold', 'many'])).toThrow(/enableThreshold/);
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--address-file', 'r.txt', '--subnet-count', '4'])).toThrow(ConfigError);
  });
});
