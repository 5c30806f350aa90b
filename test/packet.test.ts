import { describe, it, expect } from 'vitest';
import {
  BOOTREPLY,
  BOOTREQUEST,
  FLAG_BROADCAST,
  createMessage,
  decodeMessage,
  encodeMessage,
  hardwareAddressOf,
  newReplyFromRequest
} from '../src/dhcp/packet.js';
import { MessageType, OptionCode } from '../src/dhcp/options.js';
import { PacketError } from '../src/lib/errors.js';

// a pxe client discover, built byte by byte
function rawDiscover(): Buffer {
  const header = Buffer.alloc(236);
  header[0] = BOOTREQUEST;
  header[1] = 1;
  header[2] = 6;
  header.writeUInt32BE(0x3903f326, 4);
  header.writeUInt16BE(4, 8);
  header.writeUInt16BE(FLAG_BROADCAST, 10);
  Buffer.from('000b8201fc42', 'hex').copy(header, 28);

  const options = Buffer.from([
    99, 130, 83, 99,
    53, 1, 1,
    0, 0,
    93, 2, 0, 7,
    77, 4, 0x69, 0x50, 0x58, 0x45,
    255
  ]);
  return Buffer.concat([header, options]);
}

describe('decodeMessage', () => {
  it('reads the header and options of a discover', () => {
    const msg = decodeMessage(rawDiscover());

    expect(msg.op).toBe(BOOTREQUEST);
    expect(msg.xid).toBe(0x3903f326);
    expect(msg.secs).toBe(4);
    expect(msg.flags).toBe(FLAG_BROADCAST);
    expect(msg.clientIp).toBe('0.0.0.0');
    expect(hardwareAddressOf(msg)).toBe('00:0b:82:01:fc:42');
    expect(msg.options.messageType()).toBe(MessageType.Discover);
    expect(msg.options.getUint16(OptionCode.ClientSystemArchitectureType)).toBe(7);
    expect(msg.options.getString(OptionCode.UserClassInformation)).toBe('iPXE');
    expect(msg.options.codes()).toEqual([53, 93, 77]);
  });

  it('rejects a truncated packet', () => {
    expect(() => decodeMessage(Buffer.alloc(100))).toThrow(PacketError);
  });

  it('rejects a packet without the magic cookie', () => {
    const buf = rawDiscover();
    buf[236] = 0;
    expect(() => decodeMessage(buf)).toThrow(PacketError);
  });

  it('rejects an option that runs past the end', () => {
    const buf = Buffer.concat([rawDiscover().subarray(0, 240), Buffer.from([67, 10, 0x61])]);
    expect(() => decodeMessage(buf)).toThrow(PacketError);
  });
});

describe('encodeMessage', () => {
  it('pads short packets to the bootp minimum', () => {
    const buf = encodeMessage(createMessage());
    expect(buf.length).toBe(300);
    expect(buf.subarray(236, 240)).toEqual(Buffer.from([99, 130, 83, 99]));
    expect(buf[240]).toBe(255);
  });

  it('splits options longer than 255 bytes', () => {
    const url = `http://bss.example/boot/v1/bootscript?mac=a4:bf:01:2e:7f:aa&pad=${'x'.repeat(260)}`;
    const msg = createMessage();
    msg.options.setString(OptionCode.BootfileName, url);

    const buf = encodeMessage(msg);
    // first chunk header right after the cookie
    expect(buf[240]).toBe(OptionCode.BootfileName);
    expect(buf[241]).toBe(255);
    expect(buf[240 + 2 + 255]).toBe(OptionCode.BootfileName);
    expect(buf[240 + 2 + 255 + 1]).toBe(url.length - 255);

    expect(decodeMessage(buf).options.getString(OptionCode.BootfileName)).toBe(url);
  });

  it('writes header addresses and hardware address', () => {
    const msg = createMessage({
      op: BOOTREPLY,
      xid: 0xdeadbeef,
      yourIp: '10.100.1.7',
      serverIp: '10.100.0.1',
      clientHwAddr: Buffer.from('a4bf012e7faa', 'hex')
    });

    const buf = encodeMessage(msg);
    expect(buf.readUInt32BE(4)).toBe(0xdeadbeef);
    expect([...buf.subarray(16, 20)]).toEqual([10, 100, 1, 7]);
    expect([...buf.subarray(20, 24)]).toEqual([10, 100, 0, 1]);
    expect(buf.subarray(28, 34).toString('hex')).toBe('a4bf012e7faa');
  });
});

describe('newReplyFromRequest', () => {
  it('copies the fields a reply must echo', () => {
    const req = decodeMessage(rawDiscover());
    req.gatewayIp = '10.1.0.1';

    const resp = newReplyFromRequest(req);
    expect(resp.op).toBe(BOOTREPLY);
    expect(resp.xid).toBe(req.xid);
    expect(resp.flags).toBe(FLAG_BROADCAST);
    expect(resp.gatewayIp).toBe('10.1.0.1');
    expect(hardwareAddressOf(resp)).toBe('00:0b:82:01:fc:42');
    expect(resp.options.codes()).toEqual([]);
  });
});
