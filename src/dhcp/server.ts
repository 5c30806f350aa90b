// dhcpv4 server - receives requests on udp, builds the offer/ack skeleton and runs
// the handler chain over it. a handler that signals terminate drops the reply.

import dgram from 'dgram';
import { logger } from '../lib/logger.js';
import { PacketError } from '../lib/errors.js';
import {
  BOOTREQUEST,
  decodeMessage,
  encodeMessage,
  hardwareAddressOf,
  newReplyFromRequest,
  summarize,
  type DhcpMessage
} from './packet.js';
import { MessageType, OptionCode, messageTypeName, type MessageTypeValue } from './options.js';

export const SERVER_PORT = 67;
export const CLIENT_PORT = 68;
const UNSPECIFIED = '0.0.0.0';
const BROADCAST = '255.255.255.255';

export interface HandlerResult {
  resp: DhcpMessage;
  terminate: boolean;
}

export type Handler4 = (req: DhcpMessage, resp: DhcpMessage) => HandlerResult | Promise<HandlerResult>;

export interface DhcpServerOptions {
  listenAddress: string;
  port: number;
  leaseTimeSeconds: number;
  serverIdentifier?: string;
  subnetMask?: string;
  router?: string;
  handlers: Handler4[];
}

export interface OutgoingPacket {
  payload: Buffer;
  address: string;
  port: number;
}

const REPLY_TYPES = new Map<number, MessageTypeValue>([
  [MessageType.Discover, MessageType.Offer],
  [MessageType.Request, MessageType.Ack]
]);

export class DhcpServer {
  private options: DhcpServerOptions;
  private socket: dgram.Socket | null = null;

  constructor(options: DhcpServerOptions) {
    this.options = options;
  }

  start(): Promise<void> {
    if (this.socket) {
      logger.warn('dhcp server already running');
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });
      socket.once('error', reject);
      socket.on('message', (msg) => this.onMessage(msg));

      socket.bind(this.options.port, this.options.listenAddress, () => {
        socket.off('error', reject);
        socket.on('error', (err) => logger.error({ err }, 'dhcp socket error'));
        socket.setBroadcast(true);
        this.socket = socket;
        logger.info({ address: this.options.listenAddress, port: this.options.port }, 'dhcp server listening');
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) return Promise.resolve();
    this.socket = null;

    return new Promise(resolve => {
      socket.close(() => {
        logger.info('dhcp server stopped');
        resolve();
      });
    });
  }

  /**
   * Turns one datagram into the reply to send, or null when there is nothing to send
   * (undecodable, not a request we answer, or a handler terminated it).
   */
  async process(packet: Buffer): Promise<OutgoingPacket | null> {
    let req: DhcpMessage;
    try {
      req = decodeMessage(packet);
    } catch (err) {
      if (!(err instanceof PacketError)) throw err;
      logger.debug({ err }, 'dropping malformed dhcp packet');
      return null;
    }

    if (req.op !== BOOTREQUEST) {
      return null;
    }

    const type = req.options.messageType();
    const replyType = type === undefined ? undefined : REPLY_TYPES.get(type);
    if (!replyType) {
      logger.debug({ mac: hardwareAddressOf(req), type: messageTypeName(type) }, 'ignoring dhcp message type');
      return null;
    }

    let resp = this.buildReply(req, replyType);
    for (const handler of this.options.handlers) {
      const result = await handler(req, resp);
      resp = result.resp;
      if (result.terminate) {
        logger.debug({ mac: hardwareAddressOf(req) }, 'handler terminated request, dropping reply');
        return null;
      }
    }

    if (resp.yourIp === UNSPECIFIED) {
      logger.debug({ mac: hardwareAddressOf(req) }, 'no address assigned, dropping reply');
      return null;
    }

    logger.debug({ response: summarize(resp) }, 'sending dhcp reply');
    return { payload: encodeMessage(resp), ...destinationFor(req) };
  }

  private buildReply(req: DhcpMessage, replyType: MessageTypeValue): DhcpMessage {
    const { serverIdentifier, leaseTimeSeconds, subnetMask, router, listenAddress } = this.options;
    const resp = newReplyFromRequest(req);
    resp.options.setMessageType(replyType);

    const serverId = serverIdentifier || (listenAddress !== UNSPECIFIED ? listenAddress : '');
    if (serverId) {
      resp.options.setIp(OptionCode.ServerIdentifier, serverId);
      // stage 1 loaders are fetched over tftp from the next-server
      resp.serverIp = serverId;
    }
    resp.options.setUint32(OptionCode.IPAddressLeaseTime, leaseTimeSeconds);
    if (subnetMask) resp.options.setIp(OptionCode.SubnetMask, subnetMask);
    if (router) resp.options.setIp(OptionCode.Router, router);
    return resp;
  }

  private onMessage(msg: Buffer): void {
    this.process(msg)
      .then(out => {
        if (out) this.send(out);
      })
      .catch(err => {
        logger.error({ err }, 'failed to process dhcp packet');
      });
  }

  private send(out: OutgoingPacket): void {
    if (!this.socket) return;
    this.socket.send(out.payload, out.port, out.address, (err) => {
      if (err) {
        logger.error({ err, address: out.address, port: out.port }, 'failed to send dhcp reply');
      }
    });
  }
}

// rfc 2131 4.1: relay agent first, then a configured client, otherwise broadcast
export function destinationFor(req: DhcpMessage): { address: string; port: number } {
  if (req.gatewayIp !== UNSPECIFIED) {
    return { address: req.gatewayIp, port: SERVER_PORT };
  }
  if (req.clientIp !== UNSPECIFIED) {
    return { address: req.clientIp, port: CLIENT_PORT };
  }
  return { address: BROADCAST, port: CLIENT_PORT };
}
