// boot handler - assigns the inventory address and walks the two-stage ipxe boot
//
//   START -> RESOLVED -> BOOT_DECISION -> STAGE1_BOOTLOADER | STAGE2_SCRIPT -> DONE
//
// any step can end in ABORTED, which tells the server to drop the reply

import { logger } from '../lib/logger.js';
import { ProtocolError, ResolutionError } from '../lib/errors.js';
import { joinPath } from '../lib/url.js';
import { COMPUTE_NODE, type AssignmentRecord, type InventorySnapshot } from '../lib/types.js';
import { resolve } from './resolver.js';
import { Arch, archName } from '../dhcp/arch.js';
import { OptionCode } from '../dhcp/options.js';
import { hardwareAddressOf, summarize, type DhcpMessage } from '../dhcp/packet.js';
import type { Handler4, HandlerResult } from '../dhcp/server.js';

export type BootState =
  | 'START'
  | 'RESOLVED'
  | 'BOOT_DECISION'
  | 'STAGE1_BOOTLOADER'
  | 'STAGE2_SCRIPT'
  | 'DONE'
  | 'ABORTED';

export interface BootResult extends HandlerResult {
  // last state before DONE/ABORTED
  state: BootState;
}

// anything that can hand out a snapshot under a read lock; InventoryCache in practice
export interface SnapshotReader {
  read<T>(fn: (snapshot: InventorySnapshot) => T | Promise<T>): Promise<T>;
}

export interface BootHandlerOptions {
  cache: SnapshotReader;
  bootScriptBaseUrl: URL;
}

// iPXE identifies itself with this user class once the stage 1 loader is running
export const IPXE_USER_CLASS = 'iPXE';
export const BOOT_SCRIPT_PATH = '/boot/v1/bootscript';

export const BOOTLOADERS: ReadonlyMap<number, string> = new Map<number, string>([
  [Arch.EFI_IA32, 'undionly.kpxe'],
  [Arch.EFI_X86_64, 'ipxe.efi']
]);

// three characters wide including any sign: nid007, nid-05
export function nidHostname(nid: number): string {
  if (nid < 0) {
    return `nid-${String(-nid).padStart(2, '0')}`;
  }
  return `nid${String(nid).padStart(3, '0')}`;
}

export function bootScriptUrl(base: URL, mac: string): string {
  const url = joinPath(base, BOOT_SCRIPT_PATH);
  url.search = `mac=${mac}`;
  return url.toString();
}

export function createBootHandler(options: BootHandlerOptions): Handler4 {
  const { cache, bootScriptBaseUrl } = options;

  // the read lock covers the whole request so it sees exactly one snapshot
  return (req, resp) => cache.read(snapshot => handleBootRequest(snapshot, req, resp, bootScriptBaseUrl));
}

export function handleBootRequest(
  snapshot: InventorySnapshot,
  req: DhcpMessage,
  resp: DhcpMessage,
  bootScriptBaseUrl: URL
): BootResult {
  logger.debug({ request: summarize(req) }, 'boot handler called');

  // START -> RESOLVED
  const mac = hardwareAddressOf(req);
  let record: AssignmentRecord;
  try {
    record = resolve(snapshot, mac);
  } catch (err) {
    if (!(err instanceof ResolutionError)) throw err;
    logger.error({ mac, reason: err.reason }, `IP lookup failed: ${err.message}`);
    return abort(resp, 'START');
  }

  const assigned = record.ipAddresses[0];
  if (!assigned.v4) {
    const err = new ProtocolError(`first address ${assigned.address} for ${mac} is not IPv4`);
    logger.error({ err, mac, componentId: record.componentId }, 'cannot assign address');
    return abort(resp, 'RESOLVED');
  }
  resp.yourIp = assigned.v4;
  logger.info({ ip: assigned.v4, mac, type: record.componentType }, `assigning ${assigned.v4} to ${mac}`);

  if (record.componentType === COMPUTE_NODE) {
    if (record.nid === undefined) {
      logger.warn({ mac, componentId: record.componentId }, 'compute node has no NID, not setting hostname');
    } else {
      resp.options.setString(OptionCode.HostName, nidHostname(record.nid));
    }
  }

  // BOOT_DECISION
  const userClass = req.options.getString(OptionCode.UserClassInformation);
  const result = userClass === IPXE_USER_CLASS
    ? serveBootScript(resp, mac, bootScriptBaseUrl)
    : serveBootloader(req, resp, mac);

  logger.debug({ response: summarize(result.resp), terminate: result.terminate }, 'boot handler finished');
  return result;
}

// stage 1: hand out the ipxe binary that matches the client firmware
function serveBootloader(req: DhcpMessage, resp: DhcpMessage, mac: string): BootResult {
  const arch = req.options.getUint16(OptionCode.ClientSystemArchitectureType);
  if (arch === undefined) {
    const err = new ProtocolError('client did not present an architecture, unable to provide correct iPXE bootloader');
    logger.error({ err, mac }, 'unable to serve bootloader');
    return abort(resp, 'STAGE1_BOOTLOADER');
  }
  logger.debug({ mac, arch, name: archName(arch) }, 'client architecture');

  const bootloader = BOOTLOADERS.get(arch);
  if (!bootloader) {
    const err = new ProtocolError(`no iPXE bootloader available for unknown architecture: ${arch} (${archName(arch)})`);
    logger.error({ err, mac, arch }, 'unable to serve bootloader');
    return abort(resp, 'STAGE1_BOOTLOADER');
  }

  resp.options.setString(OptionCode.BootfileName, bootloader);
  return { resp, terminate: false, state: 'STAGE1_BOOTLOADER' };
}

// stage 2: ipxe is running, point it at the boot script service
function serveBootScript(resp: DhcpMessage, mac: string, base: URL): BootResult {
  const url = bootScriptUrl(base, mac);
  resp.options.setString(OptionCode.BootfileName, url);
  logger.debug({ mac, url }, 'serving boot script url');
  return { resp, terminate: false, state: 'STAGE2_SCRIPT' };
}

function abort(resp: DhcpMessage, state: BootState): BootResult {
  return { resp, terminate: true, state };
}
