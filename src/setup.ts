// wires the inventory client, cache and boot handler together from the four setup values:
//   inventory base url, boot script base url, ca cert path ('' = system trust), refresh interval

import { logger } from './lib/logger.js';
import { ConfigError, errorMessage } from './lib/errors.js';
import { parseHttpUrl } from './lib/url.js';
import { SmdClient, type InventorySource } from './lib/inventory-client.js';
import { InventoryCache } from './services/cache.js';
import { createBootHandler } from './services/boot-handler.js';
import type { Handler4 } from './dhcp/server.js';

export interface BootSetup {
  handler: Handler4;
  cache: InventoryCache;
  source: InventorySource;
  bootScriptBaseUrl: URL;
}

export interface SetupDeps {
  // swaps the smd client out, used by tests and the lookup command
  source?: InventorySource;
  inventoryTimeoutMs?: number;
  // false skips starting the refresh loop
  startRefreshLoop?: boolean;
}

export function setupBootHandler(args: string[], deps: SetupDeps = {}): BootSetup {
  if (args.length !== 4) {
    throw new ConfigError('expected 4 arguments: base URL, boot script base URL, CA certificate path, cache duration');
  }
  const [baseUrlArg, bootScriptUrlArg, caCertPath, cacheDuration] = args;

  logger.debug('generating new SmdClient');
  const baseUrl = parseHttpUrl(baseUrlArg, 'base URL');

  let source: InventorySource;
  if (deps.source) {
    source = deps.source;
  } else {
    const client = new SmdClient(baseUrl, { timeoutMs: deps.inventoryTimeoutMs });
    if (caCertPath !== '') {
      client.useCACert(caCertPath);
      logger.info({ caCertPath }, 'set CA certificate for SMD');
    } else {
      logger.info('CA certificate path was empty, using system trust');
    }
    source = client;
  }

  // plain http is fine here: ipxe fetches its script without a certificate
  logger.debug('parsing boot script base URL');
  const bootScriptBaseUrl = parseHttpUrl(bootScriptUrlArg, 'boot script base URL');

  logger.debug('generating new Cache');
  let cache: InventoryCache;
  try {
    cache = new InventoryCache(cacheDuration, source);
  } catch (err) {
    throw new ConfigError(`failed to create new cache: ${errorMessage(err)}`, { cause: err });
  }

  if (deps.startRefreshLoop !== false) {
    cache.refreshLoop();
  }

  logger.info(
    { baseUrl: baseUrl.href, bootScriptBaseUrl: bootScriptBaseUrl.href, duration: cache.duration },
    'boot handler initialized'
  );

  return {
    handler: createBootHandler({ cache, bootScriptBaseUrl }),
    cache,
    source,
    bootScriptBaseUrl
  };
}

export function setupBootHandler6(): never {
  throw new ConfigError('DHCPv6 is not supported');
}
