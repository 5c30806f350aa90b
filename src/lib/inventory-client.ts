// inventory service client
// pulls components and ethernet interfaces from the state manager (smd) rest api

import { readFileSync } from 'fs';
import { Agent, fetch, type Dispatcher, type Response } from 'undici';
import { z } from 'zod';
import { logger } from './logger.js';
import { ConfigError, FetchError, errorMessage } from './errors.js';
import { normalizeHardwareAddress } from './hwaddr.js';
import { joinPath } from './url.js';
import type { Component, NetworkInterface } from './types.js';

export const COMPONENTS_PATH = '/hsm/v2/State/Components';
export const ETHERNET_INTERFACES_PATH = '/hsm/v2/Inventory/EthernetInterfaces';

/**
 * Where the cache gets its data. Either call may reject with a FetchError;
 * callers decide what to do about it, the source never retries.
 */
export interface InventorySource {
  fetchComponents(): Promise<Component[]>;
  fetchEthernetInterfaces(): Promise<NetworkInterface[]>;
}

const SmdComponentSchema = z.object({
  ID: z.string(),
  Type: z.string(),
  NID: z.number().int().optional()
}).passthrough();

const SmdComponentListSchema = z.object({
  Components: z.array(SmdComponentSchema).nullish()
});

const SmdEthernetInterfaceSchema = z.object({
  ID: z.string().optional(),
  MACAddress: z.string(),
  ComponentID: z.string().default(''),
  IPAddresses: z.array(z.object({
    IPAddress: z.string(),
    Network: z.string().optional()
  })).nullish()
}).passthrough();

const SmdEthernetInterfaceListSchema = z.array(SmdEthernetInterfaceSchema);

export interface SmdClientOptions {
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

export class SmdClient implements InventorySource {
  readonly baseUrl: URL;
  private timeoutMs: number;
  private dispatcher?: Dispatcher;

  constructor(baseUrl: URL, options: SmdClientOptions = {}) {
    this.baseUrl = baseUrl;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.dispatcher = options.dispatcher;
  }

  // trust only the given pem bundle instead of the system roots
  useCACert(path: string): void {
    let ca: string;
    try {
      ca = readFileSync(path, 'utf8');
    } catch (err) {
      throw new ConfigError(`failed to read CA certificate ${path}: ${errorMessage(err)}`, { cause: err });
    }
    if (!ca.includes('-----BEGIN CERTIFICATE-----')) {
      throw new ConfigError(`CA certificate ${path} does not contain a PEM certificate`);
    }
    this.dispatcher = new Agent({ connect: { ca } });
  }

  async fetchComponents(): Promise<Component[]> {
    const body = await this.getJson(COMPONENTS_PATH);
    const parsed = SmdComponentListSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError(`malformed component payload: ${parsed.error.message}`, COMPONENTS_PATH);
    }

    return (parsed.data.Components ?? []).map(c => ({
      id: c.ID,
      type: c.Type,
      nid: c.NID
    }));
  }

  async fetchEthernetInterfaces(): Promise<NetworkInterface[]> {
    const body = await this.getJson(ETHERNET_INTERFACES_PATH);
    const parsed = SmdEthernetInterfaceListSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError(`malformed ethernet interface payload: ${parsed.error.message}`, ETHERNET_INTERFACES_PATH);
    }

    const interfaces: NetworkInterface[] = [];
    for (const ei of parsed.data) {
      const hardwareAddress = normalizeHardwareAddress(ei.MACAddress);
      if (!hardwareAddress) {
        logger.warn({ id: ei.ID, mac: ei.MACAddress }, 'skipping ethernet interface with unusable MAC address');
        continue;
      }
      interfaces.push({
        componentId: ei.ComponentID,
        hardwareAddress,
        ipAddresses: (ei.IPAddresses ?? []).map(ip => ip.IPAddress)
      });
    }
    return interfaces;
  }

  private async getJson(path: string): Promise<unknown> {
    const url = joinPath(this.baseUrl, path);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json' },
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      throw new FetchError(`request to ${url.href} failed: ${describeCause(err)}`, path, { cause: err });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new FetchError(
        `request to ${url.href} returned ${response.status}${text ? `: ${text.slice(0, 200)}` : ''}`,
        path,
        { status: response.status }
      );
    }

    try {
      return await response.json();
    } catch (err) {
      throw new FetchError(`response from ${url.href} is not valid JSON`, path, { cause: err });
    }
  }
}

// undici wraps the socket/tls error as the cause of a generic "fetch failed"
function describeCause(err: unknown): string {
  if (err instanceof Error && err.cause instanceof Error) {
    return `${err.message} (${err.cause.message})`;
  }
  return errorMessage(err);
}
