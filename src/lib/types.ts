// shared types between the cache, resolver and handlers

import type { ParsedAddress } from './ip.js';

// inventory kind for compute nodes; only these get an nid hostname
export const COMPUTE_NODE = 'Node';

export interface Component {
  id: string;
  type: string;
  nid?: number;  // compute nodes only
}

export interface NetworkInterface {
  componentId: string;
  hardwareAddress: string;  // normalized colon-hex
  ipAddresses: string[];    // as delivered by the inventory service
}

export interface InventorySnapshot {
  readonly interfaces: ReadonlyMap<string, NetworkInterface>;
  readonly components: ReadonlyMap<string, Component>;
  readonly refreshedAt: Date | null;
}

export interface AssignmentRecord {
  hardwareAddress: string;
  componentId: string;
  componentType: string;
  nid?: number;
  ipAddresses: ParsedAddress[];
}

export const EMPTY_SNAPSHOT: InventorySnapshot = Object.freeze({
  interfaces: new Map<string, NetworkInterface>(),
  components: new Map<string, Component>(),
  refreshedAt: null
});
