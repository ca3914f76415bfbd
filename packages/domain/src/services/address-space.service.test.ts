import { describe, expect, it, vi } from 'vitest';
import { AddressRange } from '../value-objects/address-range.vo';
import {
  AddressRangeMatcher,
  enableCoveredRanges,
  maxRangeOffset,
  parseAddressRanges,
  selectRanges,
} from './address-space.service';

describe('parseAddressRanges', () => {
  const matcher = new AddressRangeMatcher();

  it('keeps valid ranges and skips malformed ones with a warning', () => {
    const log = { warn: vi.fn() };
    const text = `192.168.1.1
      192.167.2.0/24
      192.167.3.3/24
      1.2.3.456/24
      1.2.3.4/24
      1.2.3.4a/24
      1.2.3.a5/12
    `;

    const ranges = parseAddressRanges(text, matcher, log);

    expect(ranges.map(String)).toEqual(['192.167.2.0/24', '192.167.3.0/24', '1.2.3.0/24']);
    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn.mock.calls[0]?.[0]).toContain('"1.2.3.456/24"');
  });

  it('finds ipv4 and ipv6 tokens in text order', () => {
    const text = 'ranges: 203.0.113.0/24, 2001:db8::/120 and 198.51.100.9/30';

    expect(parseAddressRanges(text, matcher).map(String)).toEqual([
      '203.0.113.0/24',
      '2001:db8::/120',
      '198.51.100.8/30',
    ]);
  });

  it('collapses duplicates onto the first occurrence', () => {
    const text = '10.0.1.0/24 10.0.0.1/24 10.0.1.77/24 10.0.0.200/24';

    expect(parseAddressRanges(text, matcher).map(String)).toEqual(['10.0.1.0/24', '10.0.0.0/24']);
  });

  it('reuses one matcher across calls', () => {
    expect(parseAddressRanges('10.0.0.0/8', matcher)).toHaveLength(1);
    expect(parseAddressRanges('10.0.0.0/8', matcher)).toHaveLength(1);
  });

  it('accepts a custom pattern', () => {
    const ipv4Only = new AddressRangeMatcher(/\d{1,3}(?:\.\d{1,3}){3}\/\d{1,2}/);

    expect(parseAddressRanges('2001:db8::/64 10.0.0.0/8', ipv4Only).map(String)).toEqual(['10.0.0.0/8']);
  });
});

describe('selectRanges', () => {
  const ranges = ['10.0.0.0/24', '10.0.1.0/24', '10.0.2.0/24'].map((token) => AddressRange.parse(token));

  it('keeps every range for 0', () => {
    expect(selectRanges(ranges, 0)).toHaveLength(3);
  });

  it('keeps the first n ranges', () => {
    expect(selectRanges(ranges, 2).map(String)).toEqual(['10.0.0.0/24', '10.0.1.0/24']);
  });
});

describe('maxRangeOffset', () => {
  it('takes the largest capacity under the cap', () => {
    const ranges = [AddressRange.parse('10.0.0.0/30'), AddressRange.parse('10.0.1.0/28')];

    expect(maxRangeOffset(ranges, 256)).toBe(16);
    expect(maxRangeOffset(ranges, 8)).toBe(8);
    expect(maxRangeOffset([], 8)).toBe(0);
  });
});

describe('enableCoveredRanges', () => {
  it('enables ranges containing a measured address', () => {
    const ranges = ['10.0.0.0/24', '10.0.1.0/24', '2001:db8::/126'].map((token) => AddressRange.parse(token));

    const enabled = enableCoveredRanges(ranges, ['10.0.1.5', 'garbage', '2001:db8::2', '10.0.1.6']);

    expect(enabled).toBe(2);
    expect(ranges.map((range) => range.enabled)).toEqual([false, true, true]);
  });
});
