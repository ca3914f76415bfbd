import ipaddr from 'ipaddr.js';

export type AddressFamily = 'ipv4' | 'ipv6';

const FAMILY_BITS: Record<AddressFamily, number> = {
  ipv4: 32,
  ipv6: 128,
};

export interface NumericAddress {
  readonly family: AddressFamily;
  readonly value: bigint;
}

const DOTTED_QUAD = /^\d{1,3}(?:\.\d{1,3}){3}$/;

/** Strict parse: IPv4 must be a dotted quad, IPv6 any valid textual form. */
export function parseAddress(address: string): NumericAddress | null {
  const isDotted = !address.includes(':');
  if ((isDotted && !DOTTED_QUAD.test(address)) || !ipaddr.isValid(address)) {
    return null;
  }
  const parsed = ipaddr.parse(address);
  return { family: parsed.kind(), value: bytesToBigInt(parsed.toByteArray()) };
}

export function formatAddress(family: AddressFamily, value: bigint): string {
  const byteCount = FAMILY_BITS[family] / 8;
  const bytes: number[] = new Array<number>(byteCount);
  let remaining = value;
  for (let i = byteCount - 1; i >= 0; i--) {
    bytes[i] = Number(remaining & 0xffn);
    remaining >>= 8n;
  }
  return ipaddr.fromByteArray(bytes).toString();
}

function bytesToBigInt(bytes: number[]): bigint {
  return bytes.reduce((acc, byte) => (acc << 8n) | BigInt(byte), 0n);
}

/**
 * A CIDR block of candidate addresses. The base is always the network address;
 * `enabled` only ever flips from false to true.
 */
export class AddressRange {
  private _enabled = false;

  private constructor(
    private readonly _family: AddressFamily,
    private readonly _base: bigint,
    private readonly _prefixLength: number,
  ) {}

  static create(family: AddressFamily, base: bigint, prefixLength: number): AddressRange {
    const bits = FAMILY_BITS[family];
    if (!Number.isInteger(prefixLength) || prefixLength < 0 || prefixLength > bits) {
      throw new Error(`Prefix length ${prefixLength} is out of range for ${family}`);
    }
    const hostBits = BigInt(bits - prefixLength);
    const network = (base >> hostBits) << hostBits;
    return new AddressRange(family, network, prefixLength);
  }

  /** Parses `address/prefix`; throws on malformed input. */
  static parse(token: string): AddressRange {
    const [address, prefixLength] = ipaddr.parseCIDR(token.trim());
    return AddressRange.create(address.kind(), bytesToBigInt(address.toByteArray()), prefixLength);
  }

  get family(): AddressFamily {
    return this._family;
  }

  get base(): bigint {
    return this._base;
  }

  get prefixLength(): number {
    return this._prefixLength;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  enable(): void {
    this._enabled = true;
  }

  capacity(): bigint {
    return 1n << BigInt(FAMILY_BITS[this._family] - this._prefixLength);
  }

  cappedCapacity(max: number): number {
    const capacity = this.capacity();
    return capacity > BigInt(max) ? max : Number(capacity);
  }

  getIp(index: number): string | null {
    if (!Number.isSafeInteger(index) || index < 0) {
      return null;
    }
    const offset = BigInt(index);
    if (offset >= this.capacity()) {
      return null;
    }
    return formatAddress(this._family, this._base + offset);
  }

  contains(address: string | NumericAddress): boolean {
    const parsed = typeof address === 'string' ? parseAddress(address) : address;
    if (!parsed || parsed.family !== this._family) {
      return false;
    }
    return parsed.value >= this._base && parsed.value < this._base + this.capacity();
  }

  equals(other: AddressRange): boolean {
    return this._family === other._family && this._base === other._base && this._prefixLength === other._prefixLength;
  }

  toString(): string {
    return `${formatAddress(this._family, this._base)}/${this._prefixLength}`;
  }
}
