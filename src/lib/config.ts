import convict from 'convict';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { isIPv4 } from 'net';
import { ConfigError, errorMessage } from './errors.js';
import { parseDuration, MAX_TIMER_MS } from './duration.js';

export interface ServerSettings {
  inventory: {
    url: string;
    caCert: string;
    timeout: string;
  };
  bootScript: {
    url: string;
  };
  cache: {
    refreshInterval: string;
  };
  dhcp: {
    listenAddress: string;
    port: number;
    serverIdentifier: string;
    leaseTime: string;
    subnetMask: string;
    router: string;
  };
  api: {
    host: string;
    port: number;
  };
}

// values that can also come from cli flags
export interface ConfigOverrides {
  inventoryUrl?: string;
  bootScriptUrl?: string;
  caCert?: string;
  refreshInterval?: string;
  listenAddress?: string;
  port?: number;
  apiPort?: number;
}

convict.addFormat({
  name: 'http-url',
  validate(val: unknown) {
    if (val === '') return;
    if (typeof val !== 'string') throw new Error('must be a url string');
    const url = new URL(val);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new Error('must be an http or https url');
    }
  }
});

convict.addFormat({
  name: 'duration-string',
  validate(val: unknown) {
    if (typeof val !== 'string') throw new Error('must be a duration string like 30s');
    const ms = parseDuration(val);
    if (ms <= 0) throw new Error('must be a positive duration');
    if (ms > MAX_TIMER_MS) throw new Error('must be at most 596h31m23s');
  }
});

convict.addFormat({
  name: 'ipv4-or-empty',
  validate(val: unknown) {
    if (val === '') return;
    if (typeof val !== 'string' || !isIPv4(val)) throw new Error('must be an ipv4 address');
  }
});

const schema: convict.Schema<ServerSettings> = {
  inventory: {
    url: {
      doc: 'base url of the inventory (smd) service',
      format: 'http-url',
      default: '',
      env: 'FLEETBOOT_INVENTORY_URL'
    },
    caCert: {
      doc: 'path to a PEM CA certificate for the inventory service, empty = system trust',
      format: String,
      default: '',
      env: 'FLEETBOOT_CA_CERT'
    },
    timeout: {
      doc: 'timeout for a single inventory request',
      format: 'duration-string',
      default: '10s',
      env: 'FLEETBOOT_INVENTORY_TIMEOUT'
    }
  },
  bootScript: {
    url: {
      doc: 'base url ipxe clients fetch their boot script from',
      format: 'http-url',
      default: '',
      env: 'FLEETBOOT_BOOT_SCRIPT_URL'
    }
  },
  cache: {
    refreshInterval: {
      doc: 'how often the inventory cache is refreshed',
      format: 'duration-string',
      default: '30s',
      env: 'FLEETBOOT_REFRESH_INTERVAL'
    }
  },
  dhcp: {
    listenAddress: {
      doc: 'address the dhcp server binds to',
      format: 'ipv4-or-empty',
      default: '0.0.0.0',
      env: 'FLEETBOOT_DHCP_LISTEN'
    },
    port: {
      doc: 'udp port the dhcp server binds to',
      format: 'port',
      default: 67,
      env: 'FLEETBOOT_DHCP_PORT'
    },
    serverIdentifier: {
      doc: 'address announced in option 54, empty = listen address',
      format: 'ipv4-or-empty',
      default: '',
      env: 'FLEETBOOT_SERVER_ID'
    },
    leaseTime: {
      doc: 'lease time handed to clients',
      format: 'duration-string',
      default: '1h',
      env: 'FLEETBOOT_LEASE_TIME'
    },
    subnetMask: {
      doc: 'subnet mask option, empty = not sent',
      format: 'ipv4-or-empty',
      default: '',
      env: 'FLEETBOOT_SUBNET_MASK'
    },
    router: {
      doc: 'router option, empty = not sent',
      format: 'ipv4-or-empty',
      default: '',
      env: 'FLEETBOOT_ROUTER'
    }
  },
  api: {
    host: {
      doc: 'status api bind address',
      format: String,
      default: '127.0.0.1',
      env: 'FLEETBOOT_API_HOST'
    },
    port: {
      doc: 'status api port',
      format: 'port',
      default: 8067,
      env: 'FLEETBOOT_API_PORT'
    }
  }
};

export interface LoadOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

export class ServerConfig {
  static load(options: LoadOptions = {}): ServerSettings {
    const config = convict(schema, { env: options.env ?? process.env, args: [] });

    if (options.configPath && !existsSync(options.configPath)) {
      throw new ConfigError(`config file not found: ${options.configPath}`);
    }

    // first file that exists wins
    const paths = [
      options.configPath,
      join(process.cwd(), 'fleetboot.config.json'),
      join(homedir(), '.fleetboot', 'config.json')
    ];

    for (const path of paths) {
      if (path && existsSync(path)) {
        try {
          config.load(JSON.parse(readFileSync(path, 'utf8')));
        } catch (err) {
          throw new ConfigError(`failed to load config file ${path}: ${errorMessage(err)}`, { cause: err });
        }
        break;
      }
    }

    applyOverrides(config, options.overrides ?? {});

    try {
      config.validate({ allowed: 'strict' });
    } catch (err) {
      throw new ConfigError(`invalid configuration: ${errorMessage(err)}`, { cause: err });
    }

    return config.getProperties();
  }
}

function applyOverrides(config: convict.Config<ServerSettings>, o: ConfigOverrides): void {
  if (o.inventoryUrl !== undefined) config.set('inventory.url', o.inventoryUrl);
  if (o.bootScriptUrl !== undefined) config.set('bootScript.url', o.bootScriptUrl);
  if (o.caCert !== undefined) config.set('inventory.caCert', o.caCert);
  if (o.refreshInterval !== undefined) config.set('cache.refreshInterval', o.refreshInterval);
  if (o.listenAddress !== undefined) config.set('dhcp.listenAddress', o.listenAddress);
  if (o.port !== undefined) config.set('dhcp.port', o.port);
  if (o.apiPort !== undefined) config.set('api.port', o.apiPort);
}
