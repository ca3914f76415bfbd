import type { LoggerPort } from '../infrastructure/logger.port';
import { AddressRange, parseAddress } from '../value-objects/address-range.vo';

const IPV4_RANGE = String.raw`\d{1,3}(?:\.\d{1,3}){3}/\d{1,3}`;
const IPV6_RANGE = String.raw`(?:[0-9a-f]{0,4}:){2,7}[0-9a-f]{0,4}/\d{1,3}`;

/**
 * Finds `address/prefix` tokens in free-form text. Built once at startup and
 * handed to the parser; `matchAll` clones the pattern, so one instance can be
 * shared.
 */
export class AddressRangeMatcher {
  private readonly pattern: RegExp;

  constructor(pattern: RegExp = new RegExp(`${IPV4_RANGE}|${IPV6_RANGE}`, 'gi')) {
    this.pattern = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
  }

  *tokens(text: string): Generator<string> {
    for (const match of text.matchAll(this.pattern)) {
      yield match[0];
    }
  }
}

/**
 * Extracts every range token from `text`. Malformed tokens are logged and
 * skipped; duplicates collapse onto their first occurrence, which fixes the
 * enumeration order.
 */
export function parseAddressRanges(
  text: string,
  matcher: AddressRangeMatcher,
  log?: Pick<LoggerPort, 'warn'>,
): AddressRange[] {
  const ranges = new Map<string, AddressRange>();

  for (const token of matcher.tokens(text)) {
    let range: AddressRange;
    try {
      range = AddressRange.parse(token);
    } catch (error) {
      log?.warn(`Skipping malformed address range ${JSON.stringify(token)}: ${(error as Error).message}`);
      continue;
    }

    const key = range.toString();
    if (!ranges.has(key)) {
      ranges.set(key, range);
    }
  }

  return [...ranges.values()];
}

/** Keeps the first `count` ranges; 0 keeps all. */
export function selectRanges(ranges: AddressRange[], count: number): AddressRange[] {
  if (count <= 0 || count >= ranges.length) {
    return ranges;
  }
  return ranges.slice(0, count);
}

/** Global offset ceiling: the largest range capacity, capped by `maxRangeLength`. */
export function maxRangeOffset(ranges: readonly AddressRange[], maxRangeLength: number): number {
  return ranges.reduce((max, range) => Math.max(max, range.cappedCapacity(maxRangeLength)), 0);
}

/**
 * Marks every range containing at least one already measured address.
 * Returns how many ranges were newly enabled.
 */
export function enableCoveredRanges(ranges: readonly AddressRange[], addresses: Iterable<string>): number {
  let enabled = 0;
  const pending = ranges.filter((range) => !range.enabled);
  if (pending.length === 0) {
    return 0;
  }

  for (const address of addresses) {
    const parsed = parseAddress(address);
    if (!parsed) {
      continue;
    }
    for (const range of pending) {
      if (!range.enabled && range.contains(parsed)) {
        range.enable();
        enabled++;
      }
    }
    if (enabled === pending.length) {
      break;
    }
  }
  return enabled;
}
