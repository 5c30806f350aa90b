import { z } from 'zod';
import { logger } from '../lib/logger.js';
import { ServerConfig } from '../lib/config.js';

const HealthSchema = z.object({
  status: z.enum(['ok', 'stale', 'empty']),
  refreshedAt: z.string().nullable(),
  consecutiveFailures: z.number()
});

export async function statusCommand(options: { config?: string }) {
  try {
    const settings = ServerConfig.load({ configPath: options.config });
    const url = `http://${settings.api.host}:${settings.api.port}/health`;

    let response: Response;
    try {
      response = await fetch(url);
    } catch {
      console.log('\nfleetboot: 🔴 not reachable');
      console.log(`(no status api at ${url})\n`);
      process.exit(1);
    }

    const health = HealthSchema.parse(await response.json());
    const icon = health.status === 'ok' ? '🟢' : health.status === 'stale' ? '🟡' : '🔴';

    console.log(`\nfleetboot: ${icon} ${health.status}`);
    console.log(`last refresh: ${health.refreshedAt ?? 'never'}`);
    if (health.consecutiveFailures > 0) {
      console.log(`failed refreshes in a row: ${health.consecutiveFailures}`);
    }
    console.log('');
  } catch (err) {
    logger.error({ err }, 'status check failed');
    process.exit(1);
  }
}
