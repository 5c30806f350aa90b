import type { InventorySource } from '../src/lib/inventory-client.js';
import type { Component, NetworkInterface } from '../src/lib/types.js';
import { createMessage, type DhcpMessage } from '../src/dhcp/packet.js';
import { MessageType, OptionCode, type MessageTypeValue } from '../src/dhcp/options.js';

// in-process stand-in for the inventory service
export class FakeInventorySource implements InventorySource {
  components: Component[] = [];
  interfaces: NetworkInterface[] = [];
  componentError: Error | null = null;
  interfaceError: Error | null = null;
  componentCalls = 0;
  interfaceCalls = 0;
  // when set, fetches wait for it before answering
  gate: Promise<void> | null = null;

  constructor(components: Component[] = [], interfaces: NetworkInterface[] = []) {
    this.components = components;
    this.interfaces = interfaces;
  }

  async fetchComponents(): Promise<Component[]> {
    this.componentCalls++;
    if (this.gate) await this.gate;
    if (this.componentError) throw this.componentError;
    return this.components.map(c => ({ ...c }));
  }

  async fetchEthernetInterfaces(): Promise<NetworkInterface[]> {
    this.interfaceCalls++;
    if (this.gate) await this.gate;
    if (this.interfaceError) throw this.interfaceError;
    return this.interfaces.map(ei => ({ ...ei, ipAddresses: [...ei.ipAddresses] }));
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

// lets queued promise callbacks and io callbacks run
export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export const fixtures = {
  node(id: string, nid: number): Component {
    return { id, type: 'Node', nid };
  },

  iface(mac: string, componentId: string, ipAddresses: string[]): NetworkInterface {
    return { hardwareAddress: mac, componentId, ipAddresses };
  }
};

export interface RequestOptions {
  mac: string;
  type?: MessageTypeValue;
  arch?: number;
  userClass?: string;
  xid?: number;
}

export function bootRequest(opts: RequestOptions): DhcpMessage {
  const msg = createMessage({
    xid: opts.xid ?? 0x1234abcd,
    clientHwAddr: Buffer.from(opts.mac.replace(/:/g, ''), 'hex')
  });
  msg.options.setMessageType(opts.type ?? MessageType.Discover);
  if (opts.arch !== undefined) {
    const arch = Buffer.alloc(2);
    arch.writeUInt16BE(opts.arch);
    msg.options.set(OptionCode.ClientSystemArchitectureType, arch);
  }
  if (opts.userClass !== undefined) {
    msg.options.setString(OptionCode.UserClassInformation, opts.userClass);
  }
  return msg;
}
