// dhcpv4 wire format (rfc 2131): fixed bootp header, magic cookie, tlv options

import { PacketError } from '../lib/errors.js';
import { formatHardwareAddress } from '../lib/hwaddr.js';
import { bytesToIpv4, ipv4ToBytes } from '../lib/ip.js';
import { DhcpOptions, OptionCode, messageTypeName } from './options.js';

export const BOOTREQUEST = 1;
export const BOOTREPLY = 2;
export const FLAG_BROADCAST = 0x8000;

const HEADER_LENGTH = 236;
const MAGIC_COOKIE = Buffer.from([99, 130, 83, 99]);
const MIN_PACKET_LENGTH = 300;
const MAX_OPTION_CHUNK = 255;

const OFFSET = {
  op: 0,
  htype: 1,
  hlen: 2,
  hops: 3,
  xid: 4,
  secs: 8,
  flags: 10,
  ciaddr: 12,
  yiaddr: 16,
  siaddr: 20,
  giaddr: 24,
  chaddr: 28,
  sname: 44,
  file: 108,
  cookie: 236,
  options: 240
} as const;

export interface DhcpMessage {
  op: number;
  htype: number;
  hlen: number;
  hops: number;
  xid: number;
  secs: number;
  flags: number;
  clientIp: string;
  yourIp: string;
  serverIp: string;
  gatewayIp: string;
  clientHwAddr: Buffer;
  serverName: string;
  bootFileName: string;
  options: DhcpOptions;
}

export function createMessage(fields: Partial<DhcpMessage> = {}): DhcpMessage {
  return {
    op: BOOTREQUEST,
    htype: 1,
    hlen: 6,
    hops: 0,
    xid: 0,
    secs: 0,
    flags: 0,
    clientIp: '0.0.0.0',
    yourIp: '0.0.0.0',
    serverIp: '0.0.0.0',
    gatewayIp: '0.0.0.0',
    clientHwAddr: Buffer.alloc(6),
    serverName: '',
    bootFileName: '',
    options: new DhcpOptions(),
    ...fields
  };
}

export function decodeMessage(buf: Buffer): DhcpMessage {
  if (buf.length < OFFSET.options) {
    throw new PacketError(`packet too short: ${buf.length} bytes`);
  }
  if (!buf.subarray(OFFSET.cookie, OFFSET.options).equals(MAGIC_COOKIE)) {
    throw new PacketError('missing dhcp magic cookie');
  }

  const hlen = buf[OFFSET.hlen];
  if (hlen > 16) {
    throw new PacketError(`invalid hardware address length ${hlen}`);
  }

  return {
    op: buf[OFFSET.op],
    htype: buf[OFFSET.htype],
    hlen,
    hops: buf[OFFSET.hops],
    xid: buf.readUInt32BE(OFFSET.xid),
    secs: buf.readUInt16BE(OFFSET.secs),
    flags: buf.readUInt16BE(OFFSET.flags),
    clientIp: bytesToIpv4(buf.subarray(OFFSET.ciaddr, OFFSET.ciaddr + 4)),
    yourIp: bytesToIpv4(buf.subarray(OFFSET.yiaddr, OFFSET.yiaddr + 4)),
    serverIp: bytesToIpv4(buf.subarray(OFFSET.siaddr, OFFSET.siaddr + 4)),
    gatewayIp: bytesToIpv4(buf.subarray(OFFSET.giaddr, OFFSET.giaddr + 4)),
    clientHwAddr: Buffer.from(buf.subarray(OFFSET.chaddr, OFFSET.chaddr + hlen)),
    serverName: cString(buf.subarray(OFFSET.sname, OFFSET.file)),
    bootFileName: cString(buf.subarray(OFFSET.file, OFFSET.cookie)),
    options: decodeOptions(buf.subarray(OFFSET.options))
  };
}

function decodeOptions(buf: Buffer): DhcpOptions {
  const options = new DhcpOptions();
  let i = 0;
  while (i < buf.length) {
    const code = buf[i];
    if (code === OptionCode.Pad) {
      i++;
      continue;
    }
    if (code === OptionCode.End) {
      break;
    }
    if (i + 1 >= buf.length) {
      throw new PacketError(`truncated option ${code}`);
    }
    const length = buf[i + 1];
    const end = i + 2 + length;
    if (end > buf.length) {
      throw new PacketError(`option ${code} claims ${length} bytes past end of packet`);
    }
    options.append(code, buf.subarray(i + 2, end));
    i = end;
  }
  return options;
}

export function encodeMessage(msg: DhcpMessage): Buffer {
  const header = Buffer.alloc(HEADER_LENGTH);
  header[OFFSET.op] = msg.op;
  header[OFFSET.htype] = msg.htype;
  header[OFFSET.hlen] = msg.hlen;
  header[OFFSET.hops] = msg.hops;
  header.writeUInt32BE(msg.xid >>> 0, OFFSET.xid);
  header.writeUInt16BE(msg.secs, OFFSET.secs);
  header.writeUInt16BE(msg.flags, OFFSET.flags);
  ipv4ToBytes(msg.clientIp).copy(header, OFFSET.ciaddr);
  ipv4ToBytes(msg.yourIp).copy(header, OFFSET.yiaddr);
  ipv4ToBytes(msg.serverIp).copy(header, OFFSET.siaddr);
  ipv4ToBytes(msg.gatewayIp).copy(header, OFFSET.giaddr);
  msg.clientHwAddr.copy(header, OFFSET.chaddr, 0, Math.min(msg.clientHwAddr.length, 16));
  header.write(msg.serverName.slice(0, 63), OFFSET.sname, 'latin1');
  header.write(msg.bootFileName.slice(0, 127), OFFSET.file, 'latin1');

  const parts: Buffer[] = [header, MAGIC_COOKIE];
  for (const code of msg.options.codes()) {
    const value = msg.options.get(code);
    if (!value) continue;
    parts.push(...encodeOption(code, value));
  }
  parts.push(Buffer.from([OptionCode.End]));

  const packet = Buffer.concat(parts);
  if (packet.length < MIN_PACKET_LENGTH) {
    return Buffer.concat([packet, Buffer.alloc(MIN_PACKET_LENGTH - packet.length)]);
  }
  return packet;
}

// values over 255 bytes go out as consecutive instances of the same option
function encodeOption(code: number, value: Buffer): Buffer[] {
  if (value.length === 0) {
    return [Buffer.from([code, 0])];
  }
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < value.length; offset += MAX_OPTION_CHUNK) {
    const chunk = value.subarray(offset, offset + MAX_OPTION_CHUNK);
    chunks.push(Buffer.from([code, chunk.length]), chunk);
  }
  return chunks;
}

export function newReplyFromRequest(req: DhcpMessage): DhcpMessage {
  return createMessage({
    op: BOOTREPLY,
    htype: req.htype,
    hlen: req.hlen,
    xid: req.xid,
    flags: req.flags,
    gatewayIp: req.gatewayIp,
    clientHwAddr: Buffer.from(req.clientHwAddr)
  });
}

export function hardwareAddressOf(msg: DhcpMessage): string {
  return formatHardwareAddress(msg.clientHwAddr.subarray(0, msg.hlen));
}

// compact form for debug logs
export function summarize(msg: DhcpMessage): Record<string, unknown> {
  return {
    op: msg.op === BOOTREQUEST ? 'BOOTREQUEST' : 'BOOTREPLY',
    type: messageTypeName(msg.options.messageType()),
    xid: `0x${msg.xid.toString(16).padStart(8, '0')}`,
    mac: hardwareAddressOf(msg),
    ciaddr: msg.clientIp,
    yiaddr: msg.yourIp,
    giaddr: msg.gatewayIp,
    options: msg.options.codes()
  };
}

function cString(buf: Buffer): string {
  const nul = buf.indexOf(0);
  return buf.toString('latin1', 0, nul === -1 ? buf.length : nul);
}
