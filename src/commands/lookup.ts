// lookup command - one refresh against the inventory service, then resolve a single mac
// handy for checking what a node would be told without sending it dhcp traffic

import { logger } from '../lib/logger.js';
import { ResolutionError } from '../lib/errors.js';
import { COMPUTE_NODE } from '../lib/types.js';
import { resolve } from '../services/resolver.js';
import { bootScriptUrl, nidHostname } from '../services/boot-handler.js';
import { loadSettings, setupFromSettings, type StartOptions } from './start.js';

export async function lookupCommand(mac: string, options: Pick<StartOptions, 'config' | 'inventoryUrl' | 'caCert'>) {
  try {
    const settings = loadSettings(options);
    const setup = setupFromSettings(settings, false);

    const refreshed = await setup.cache.refresh();
    if (!refreshed) {
      console.error(`\nfailed to fetch inventory: ${setup.cache.status().lastError}`);
      process.exit(1);
    }

    const record = await setup.cache.read(snapshot => resolve(snapshot, mac));

    console.log(`\nhardware address: ${record.hardwareAddress}`);
    console.log(`component: ${record.componentId} (${record.componentType})`);
    if (record.componentType === COMPUTE_NODE && record.nid !== undefined) {
      console.log(`nid: ${record.nid}`);
      console.log(`hostname: ${nidHostname(record.nid)}`);
    }
    console.log(`addresses: ${record.ipAddresses.map(ip => ip.address).join(', ')}`);
    console.log(`boot script: ${bootScriptUrl(setup.bootScriptBaseUrl, record.hardwareAddress)}`);
    console.log('');
  } catch (err) {
    if (err instanceof ResolutionError) {
      console.error(`\n${err.reason}: ${err.message}`);
      process.exit(1);
    }
    logger.error({ err }, 'lookup failed');
    process.exit(1);
  }
}
