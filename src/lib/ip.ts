import { isIPv4, isIPv6 } from 'net';

export interface ParsedAddress {
  address: string;
  family: 4 | 6;
  // dotted-quad form when the address is ipv4 or ipv4-mapped ipv6
  v4: string | null;
}

const MAPPED_V4 = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

export function parseAddress(input: string): ParsedAddress | null {
  const address = input.trim();
  if (isIPv4(address)) {
    return { address, family: 4, v4: address };
  }
  if (isIPv6(address)) {
    const mapped = MAPPED_V4.exec(address);
    return {
      address: address.toLowerCase(),
      family: 6,
      v4: mapped && isIPv4(mapped[1]) ? mapped[1] : null
    };
  }
  return null;
}

export function ipv4ToBytes(address: string): Buffer {
  if (!isIPv4(address)) {
    throw new TypeError(`not an ipv4 address: ${address}`);
  }
  return Buffer.from(address.split('.').map(octet => parseInt(octet, 10)));
}

export function bytesToIpv4(bytes: Uint8Array): string {
  return Array.from(bytes.subarray(0, 4)).join('.');
}
