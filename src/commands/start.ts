import { logger } from '../lib/logger.js';
import { ServerConfig, type ServerSettings } from '../lib/config.js';
import { parseDuration } from '../lib/duration.js';
import { setupBootHandler, type BootSetup } from '../setup.js';
import { DhcpServer } from '../dhcp/server.js';
import { StatusAPIServer } from '../api/server.js';

export interface StartOptions {
  config?: string;
  inventoryUrl?: string;
  bootScriptUrl?: string;
  caCert?: string;
  refreshInterval?: string;
  listen?: string;
  port?: string;
  apiPort?: string;
  verbose?: boolean;
}

export function loadSettings(options: StartOptions): ServerSettings {
  return ServerConfig.load({
    configPath: options.config,
    overrides: {
      inventoryUrl: options.inventoryUrl,
      bootScriptUrl: options.bootScriptUrl,
      caCert: options.caCert,
      refreshInterval: options.refreshInterval,
      listenAddress: options.listen,
      port: options.port !== undefined ? parseInt(options.port, 10) : undefined,
      apiPort: options.apiPort !== undefined ? parseInt(options.apiPort, 10) : undefined
    }
  });
}

export function setupFromSettings(settings: ServerSettings, startRefreshLoop = true): BootSetup {
  return setupBootHandler(
    [settings.inventory.url, settings.bootScript.url, settings.inventory.caCert, settings.cache.refreshInterval],
    { inventoryTimeoutMs: parseDuration(settings.inventory.timeout), startRefreshLoop }
  );
}

export async function startServer(options: StartOptions): Promise<void> {
  if (options.verbose) {
    logger.level = 'debug';
  }
  logger.info('starting fleetboot...');

  let settings: ServerSettings;
  let setup: BootSetup;
  try {
    settings = loadSettings(options);
    setup = setupFromSettings(settings);
  } catch (err) {
    logger.error({ err }, 'failed to set up boot handler');
    process.exit(1);
  }

  const dhcp = new DhcpServer({
    listenAddress: settings.dhcp.listenAddress,
    port: settings.dhcp.port,
    serverIdentifier: settings.dhcp.serverIdentifier,
    leaseTimeSeconds: Math.floor(parseDuration(settings.dhcp.leaseTime) / 1000),
    subnetMask: settings.dhcp.subnetMask,
    router: settings.dhcp.router,
    handlers: [setup.handler]
  });
  const api = new StatusAPIServer(setup.cache, settings.api.port, settings.api.host);

  try {
    await dhcp.start();
    await api.start();
  } catch (err) {
    logger.error({ err }, 'failed to start');
    setup.cache.stop();
    await dhcp.stop();
    process.exit(1);
  }

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'shutting down...');

    setup.cache.stop();
    await api.stop();
    await dhcp.stop();
    process.exit(0);
  };

  // keep running until ctrl+c
  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));
}
