// inventory cache - holds the latest complete snapshot from the inventory service
// one background writer swaps whole snapshots in, request handlers read under a shared lock

import { EventEmitter } from 'events';
import { logger } from '../lib/logger.js';
import { ConfigError, errorMessage } from '../lib/errors.js';
import { parseDuration, formatDuration, MAX_TIMER_MS } from '../lib/duration.js';
import { ReadWriteLock } from '../lib/rwlock.js';
import type { InventorySource } from '../lib/inventory-client.js';
import {
  EMPTY_SNAPSHOT,
  type Component,
  type InventorySnapshot,
  type NetworkInterface
} from '../lib/types.js';

// a snapshot older than this many intervals is reported as stale
const STALE_AFTER_INTERVALS = 3;

export interface CacheStatus {
  refreshedAt: Date | null;
  lastAttemptAt: Date | null;
  lastError: string | null;
  consecutiveFailures: number;
  components: number;
  interfaces: number;
  refreshInterval: string;
  stale: boolean;
}

export class InventoryCache extends EventEmitter {
  readonly durationMs: number;
  private source: InventorySource;
  private snapshot: InventorySnapshot = EMPTY_SNAPSHOT;
  private lock = new ReadWriteLock();
  private interval: NodeJS.Timeout | null = null;
  private refreshing: Promise<boolean> | null = null;
  private lastAttemptAt: Date | null = null;
  private lastError: string | null = null;
  private consecutiveFailures = 0;

  constructor(refreshInterval: string, source: InventorySource) {
    super();
    let durationMs: number;
    try {
      durationMs = parseDuration(refreshInterval);
    } catch (err) {
      throw new ConfigError(`failed to parse cache duration: ${errorMessage(err)}`, { cause: err });
    }
    if (durationMs <= 0) {
      throw new ConfigError(`cache duration must be positive, got ${refreshInterval}`);
    }
    if (durationMs > MAX_TIMER_MS) {
      throw new ConfigError(`cache duration must be at most ${formatDuration(MAX_TIMER_MS)}, got ${refreshInterval}`);
    }
    this.durationMs = durationMs;
    this.source = source;
  }

  get duration(): string {
    return formatDuration(this.durationMs);
  }

  // refresh now, then every interval until stop()
  refreshLoop(): void {
    if (this.interval) {
      logger.warn('cache refresh loop already running');
      return;
    }

    logger.info({ interval: this.duration }, 'starting cache refresh loop');

    this.interval = setInterval(() => {
      void this.tick();
    }, this.durationMs);

    void this.tick();
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      logger.info('cache refresh loop stopped');
    }
  }

  /**
   * Runs one fetch-and-swap cycle. Resolves true when a new snapshot was swapped in,
   * false when either fetch failed and the previous snapshot was kept. Never rejects.
   */
  async refresh(): Promise<boolean> {
    this.lastAttemptAt = new Date();
    logger.debug('refreshing inventory cache');

    let components: Component[];
    let interfaces: NetworkInterface[];
    try {
      [components, interfaces] = await Promise.all([
        this.source.fetchComponents(),
        this.source.fetchEthernetInterfaces()
      ]);
    } catch (err) {
      this.consecutiveFailures++;
      this.lastError = errorMessage(err);
      logger.error(
        { err, consecutiveFailures: this.consecutiveFailures, refreshedAt: this.snapshot.refreshedAt },
        'failed to refresh inventory cache, keeping previous snapshot'
      );
      this.emit('refresh-error', err);
      return false;
    }

    // build everything before taking the lock so the swap is the only thing under it
    const next = buildSnapshot(components, interfaces, new Date());

    await this.lock.withWrite(() => {
      this.snapshot = next;
    });

    this.consecutiveFailures = 0;
    this.lastError = null;
    logger.info(
      { components: next.components.size, interfaces: next.interfaces.size },
      'inventory cache refreshed'
    );
    this.emit('refresh-success', { components: next.components.size, interfaces: next.interfaces.size });
    return true;
  }

  /**
   * Runs fn against the current snapshot with the read lock held until fn settles.
   * The snapshot passed in must not be kept past the callback.
   */
  read<T>(fn: (snapshot: InventorySnapshot) => T | Promise<T>): Promise<T> {
    return this.lock.withRead(() => fn(this.snapshot));
  }

  status(now: Date = new Date()): CacheStatus {
    const { refreshedAt, components, interfaces } = this.snapshot;
    const stale = refreshedAt === null
      || now.getTime() - refreshedAt.getTime() > STALE_AFTER_INTERVALS * this.durationMs;

    return {
      refreshedAt,
      lastAttemptAt: this.lastAttemptAt,
      lastError: this.lastError,
      consecutiveFailures: this.consecutiveFailures,
      components: components.size,
      interfaces: interfaces.size,
      refreshInterval: this.duration,
      stale
    };
  }

  // a tick that lands while a refresh is in flight is skipped, there is only ever one writer
  private async tick(): Promise<void> {
    if (this.refreshing) {
      logger.debug('previous cache refresh still running, skipping tick');
      return;
    }
    this.refreshing = this.refresh();
    try {
      await this.refreshing;
    } finally {
      this.refreshing = null;
    }
  }
}

export function buildSnapshot(
  components: Component[],
  interfaces: NetworkInterface[],
  refreshedAt: Date
): InventorySnapshot {
  const componentMap = new Map<string, Component>();
  for (const c of components) {
    componentMap.set(c.id, c);
  }

  const interfaceMap = new Map<string, NetworkInterface>();
  for (const ei of interfaces) {
    if (interfaceMap.has(ei.hardwareAddress)) {
      logger.warn({ mac: ei.hardwareAddress, componentId: ei.componentId }, 'duplicate MAC address in inventory, last one wins');
    }
    interfaceMap.set(ei.hardwareAddress, ei);
  }

  return Object.freeze({ interfaces: interfaceMap, components: componentMap, refreshedAt });
}
