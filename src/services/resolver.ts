import { logger } from '../lib/logger.js';
import { ResolutionError } from '../lib/errors.js';
import { normalizeHardwareAddress } from '../lib/hwaddr.js';
import { parseAddress, type ParsedAddress } from '../lib/ip.js';
import { COMPUTE_NODE, type AssignmentRecord, type InventorySnapshot } from '../lib/types.js';

/**
 * Looks up the assignment for a hardware address in one snapshot.
 *
 * Address strings that don't parse are skipped with a warning. An interface whose
 * addresses all fail to parse is treated the same as one with no addresses.
 *
 * @throws ResolutionError with reason NotFound, DanglingReference or NoAddresses
 */
export function resolve(snapshot: InventorySnapshot, hardwareAddress: string): AssignmentRecord {
  const mac = normalizeHardwareAddress(hardwareAddress) ?? hardwareAddress;

  const ei = snapshot.interfaces.get(mac);
  if (!ei) {
    throw new ResolutionError('NotFound', mac, `no EthernetInterfaces were found in cache for hardware address ${mac}`);
  }
  logger.debug({ mac, componentId: ei.componentId }, 'ethernet interface found in cache');

  const comp = snapshot.components.get(ei.componentId);
  if (!comp) {
    throw new ResolutionError(
      'DanglingReference',
      mac,
      `no Component ${ei.componentId} found in cache for EthernetInterface hardware address ${mac}`
    );
  }

  const record: AssignmentRecord = {
    hardwareAddress: mac,
    componentId: comp.id,
    componentType: comp.type,
    ipAddresses: []
  };
  if (comp.type === COMPUTE_NODE) {
    record.nid = comp.nid;
  }

  if (ei.ipAddresses.length === 0) {
    throw new ResolutionError(
      'NoAddresses',
      mac,
      `EthernetInterface for Component ${comp.id} (type ${comp.type}) contains no IP addresses for hardware address ${mac}`
    );
  }

  const parsed: ParsedAddress[] = [];
  for (const raw of ei.ipAddresses) {
    const ip = parseAddress(raw);
    if (ip) {
      parsed.push(ip);
    } else {
      logger.warn({ mac, componentId: comp.id, ip: raw }, 'ignoring unparseable IP address from inventory');
    }
  }
  if (parsed.length === 0) {
    throw new ResolutionError(
      'NoAddresses',
      mac,
      `EthernetInterface for Component ${comp.id} (type ${comp.type}) has no valid IP addresses for hardware address ${mac}`
    );
  }

  record.ipAddresses = parsed;
  return record;
}
