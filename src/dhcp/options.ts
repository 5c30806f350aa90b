import { ipv4ToBytes, bytesToIpv4 } from '../lib/ip.js';

// dhcpv4 option codes we read or write (rfc 2132, 3004, 4578)
export const OptionCode = {
  Pad: 0,
  SubnetMask: 1,
  Router: 3,
  HostName: 12,
  RequestedIPAddress: 50,
  IPAddressLeaseTime: 51,
  MessageType: 53,
  ServerIdentifier: 54,
  ParameterRequestList: 55,
  ClassIdentifier: 60,
  ClientIdentifier: 61,
  BootfileName: 67,
  UserClassInformation: 77,
  ClientSystemArchitectureType: 93,
  End: 255
} as const;

export const MessageType = {
  Discover: 1,
  Offer: 2,
  Request: 3,
  Decline: 4,
  Ack: 5,
  Nak: 6,
  Release: 7,
  Inform: 8
} as const;

export type MessageTypeValue = typeof MessageType[keyof typeof MessageType];

const MESSAGE_TYPE_NAMES = new Map<number, string>(
  Object.entries(MessageType).map(([name, value]) => [value, name.toUpperCase()])
);

export function messageTypeName(type: number | undefined): string {
  if (type === undefined) return 'NONE';
  return MESSAGE_TYPE_NAMES.get(type) ?? `UNKNOWN(${type})`;
}

// raw option values keyed by code, kept in insertion order for encoding
export class DhcpOptions {
  private values = new Map<number, Buffer>();

  get(code: number): Buffer | undefined {
    return this.values.get(code);
  }

  has(code: number): boolean {
    return this.values.has(code);
  }

  // replaces any existing value
  set(code: number, value: Uint8Array): this {
    this.values.set(code, Buffer.from(value));
    return this;
  }

  // rfc 3396: a split option is the concatenation of its parts
  append(code: number, value: Uint8Array): this {
    const existing = this.values.get(code);
    this.values.set(code, existing ? Buffer.concat([existing, value]) : Buffer.from(value));
    return this;
  }

  codes(): number[] {
    return [...this.values.keys()];
  }

  getString(code: number): string | undefined {
    return this.values.get(code)?.toString('latin1');
  }

  setString(code: number, value: string): this {
    return this.set(code, Buffer.from(value, 'latin1'));
  }

  getIp(code: number): string | undefined {
    const value = this.values.get(code);
    return value && value.length >= 4 ? bytesToIpv4(value) : undefined;
  }

  setIp(code: number, address: string): this {
    return this.set(code, ipv4ToBytes(address));
  }

  getUint16(code: number): number | undefined {
    const value = this.values.get(code);
    return value && value.length >= 2 ? value.readUInt16BE(0) : undefined;
  }

  setUint32(code: number, n: number): this {
    const buf = Buffer.alloc(4);
    buf.writeUInt32BE(n >>> 0);
    return this.set(code, buf);
  }

  getUint32(code: number): number | undefined {
    const value = this.values.get(code);
    return value && value.length >= 4 ? value.readUInt32BE(0) : undefined;
  }

  messageType(): number | undefined {
    return this.values.get(OptionCode.MessageType)?.[0];
  }

  setMessageType(type: MessageTypeValue): this {
    return this.set(OptionCode.MessageType, Uint8Array.of(type));
  }
}
