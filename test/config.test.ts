import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ServerConfig } from '../src/lib/config.js';
import { ConfigError } from '../src/lib/errors.js';

describe('ServerConfig.load', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fleetboot-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(body: unknown): string {
    const path = join(dir, 'fleetboot.config.json');
    writeFileSync(path, JSON.stringify(body));
    return path;
  }

  it('fills in defaults', () => {
    const settings = ServerConfig.load({ configPath: writeConfig({}), env: {} });

    expect(settings.cache.refreshInterval).toBe('30s');
    expect(settings.dhcp.port).toBe(67);
    expect(settings.dhcp.listenAddress).toBe('0.0.0.0');
    expect(settings.inventory.caCert).toBe('');
    expect(settings.api.port).toBe(8067);
  });

  it('reads values from the config file', () => {
    const settings = ServerConfig.load({
      configPath: writeConfig({
        inventory: { url: 'https://smd.test' },
        bootScript: { url: 'http://10.100.0.1:8081' },
        cache: { refreshInterval: '1m' }
      }),
      env: {}
    });

    expect(settings.inventory.url).toBe('https://smd.test');
    expect(settings.bootScript.url).toBe('http://10.100.0.1:8081');
    expect(settings.cache.refreshInterval).toBe('1m');
  });

  it('lets the environment override the file and flags override both', () => {
    const configPath = writeConfig({ cache: { refreshInterval: '1m' }, dhcp: { port: 1067 } });

    const fromEnv = ServerConfig.load({ configPath, env: { FLEETBOOT_REFRESH_INTERVAL: '45s' } });
    expect(fromEnv.cache.refreshInterval).toBe('45s');
    expect(fromEnv.dhcp.port).toBe(1067);

    const fromFlags = ServerConfig.load({
      configPath,
      env: { FLEETBOOT_REFRESH_INTERVAL: '45s' },
      overrides: { refreshInterval: '5s', port: 2067 }
    });
    expect(fromFlags.cache.refreshInterval).toBe('5s');
    expect(fromFlags.dhcp.port).toBe(2067);
  });

  it('rejects a duration without a unit', () => {
    expect(() => ServerConfig.load({
      configPath: writeConfig({}),
      env: {},
      overrides: { refreshInterval: '30' }
    })).toThrow(ConfigError);
  });

  it('rejects durations a timer cannot wait for', () => {
    expect(() => ServerConfig.load({
      configPath: writeConfig({ dhcp: { leaseTime: '720h' } }),
      env: {}
    })).toThrow(ConfigError);
    expect(() => ServerConfig.load({
      configPath: writeConfig({}),
      env: {},
      overrides: { refreshInterval: '720h' }
    })).toThrow(ConfigError);
  });

  it('rejects a non-http url', () => {
    expect(() => ServerConfig.load({
      configPath: writeConfig({ inventory: { url: 'ftp://smd.test' } }),
      env: {}
    })).toThrow(ConfigError);
  });

  it('rejects unknown keys', () => {
    expect(() => ServerConfig.load({ configPath: writeConfig({ bogus: true }), env: {} })).toThrow(ConfigError);
  });

  it('rejects a config file that is not json', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ not json');
    expect(() => ServerConfig.load({ configPath: path, env: {} })).toThrow(ConfigError);
  });

  it('rejects a config path that does not exist', () => {
    expect(() => ServerConfig.load({ configPath: join(dir, 'nope.json'), env: {} })).toThrow(ConfigError);
  });
});
