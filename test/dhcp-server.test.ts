import { describe, it, expect } from 'vitest';
import { DhcpServer, destinationFor, type Handler4 } from '../src/dhcp/server.js';
import { decodeMessage, encodeMessage } from '../src/dhcp/packet.js';
import { MessageType, OptionCode } from '../src/dhcp/options.js';
import { bootRequest } from './helpers.js';

const assignFixed: Handler4 = (req, resp) => {
  resp.yourIp = '10.100.1.7';
  return { resp, terminate: false };
};

function server(handlers: Handler4[]): DhcpServer {
  return new DhcpServer({
    listenAddress: '0.0.0.0',
    port: 6767,
    serverIdentifier: '10.100.0.1',
    leaseTimeSeconds: 3600,
    subnetMask: '255.255.0.0',
    router: '10.100.0.254',
    handlers
  });
}

describe('DhcpServer.process', () => {
  it('answers a discover with an offer', async () => {
    const req = bootRequest({ mac: 'a4:bf:01:2e:7f:aa', xid: 42 });
    const out = await server([assignFixed]).process(encodeMessage(req));

    expect(out).not.toBeNull();
    expect(out?.address).toBe('255.255.255.255');
    expect(out?.port).toBe(68);

    const reply = decodeMessage(out?.payload ?? Buffer.alloc(0));
    expect(reply.xid).toBe(42);
    expect(reply.yourIp).toBe('10.100.1.7');
    expect(reply.serverIp).toBe('10.100.0.1');
    expect(reply.options.messageType()).toBe(MessageType.Offer);
    expect(reply.options.getIp(OptionCode.ServerIdentifier)).toBe('10.100.0.1');
    expect(reply.options.getUint32(OptionCode.IPAddressLeaseTime)).toBe(3600);
    expect(reply.options.getIp(OptionCode.SubnetMask)).toBe('255.255.0.0');
    expect(reply.options.getIp(OptionCode.Router)).toBe('10.100.0.254');
  });

  it('answers a request with an ack', async () => {
    const req = bootRequest({ mac: 'a4:bf:01:2e:7f:aa', type: MessageType.Request });
    const out = await server([assignFixed]).process(encodeMessage(req));

    expect(decodeMessage(out?.payload ?? Buffer.alloc(0)).options.messageType()).toBe(MessageType.Ack);
  });

  it('ignores message types it does not answer', async () => {
    const req = bootRequest({ mac: 'a4:bf:01:2e:7f:aa', type: MessageType.Release });
    await expect(server([assignFixed]).process(encodeMessage(req))).resolves.toBeNull();
  });

  it('drops the reply when a handler terminates', async () => {
    let secondCalled = false;
    const stop: Handler4 = (req, resp) => ({ resp, terminate: true });
    const second: Handler4 = (req, resp) => {
      secondCalled = true;
      return { resp, terminate: false };
    };

    const req = bootRequest({ mac: 'a4:bf:01:2e:7f:aa' });
    await expect(server([assignFixed, stop, second]).process(encodeMessage(req))).resolves.toBeNull();
    expect(secondCalled).toBe(false);
  });

  it('drops the reply when nothing assigned an address', async () => {
    const req = bootRequest({ mac: 'a4:bf:01:2e:7f:aa' });
    await expect(server([]).process(encodeMessage(req))).resolves.toBeNull();
  });

  it('drops undecodable datagrams', async () => {
    await expect(server([assignFixed]).process(Buffer.from('hello'))).resolves.toBeNull();
  });
});

describe('destinationFor', () => {
  it('prefers the relay agent', () => {
    const req = bootRequest({ mac: 'a4:bf:01:2e:7f:aa' });
    req.gatewayIp = '10.1.0.1';
    req.clientIp = '10.100.1.7';
    expect(destinationFor(req)).toEqual({ address: '10.1.0.1', port: 67 });
  });

  it('unicasts to a client that already has an address', () => {
    const req = bootRequest({ mac: 'a4:bf:01:2e:7f:aa' });
    req.clientIp = '10.100.1.7';
    expect(destinationFor(req)).toEqual({ address: '10.100.1.7', port: 68 });
  });
});
