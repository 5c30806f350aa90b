import Fastify, { type FastifyInstance } from 'fastify';
import { logger } from '../lib/logger.js';
import { ResolutionError } from '../lib/errors.js';
import { InventoryCache } from '../services/cache.js';
import { resolve } from '../services/resolver.js';

// read-only status api next to the dhcp server: health, cache state, lookups
export class StatusAPIServer {
  private app: FastifyInstance;
  private cache: InventoryCache;
  private host: string;
  private port: number;

  constructor(cache: InventoryCache, port: number = 8067, host: string = '127.0.0.1') {
    this.cache = cache;
    this.port = port;
    this.host = host;
    this.app = this.build();
  }

  // exposed for inject() in tests
  get instance(): FastifyInstance {
    return this.app;
  }

  private build(): FastifyInstance {
    const app = Fastify();

    app.addHook('onResponse', async (request, reply) => {
      logger.debug({ method: request.method, url: request.url, status: reply.statusCode }, 'api request');
    });

    app.get('/health', async () => {
      const status = this.cache.status();
      return {
        status: status.refreshedAt === null ? 'empty' : status.stale ? 'stale' : 'ok',
        refreshedAt: status.refreshedAt,
        consecutiveFailures: status.consecutiveFailures
      };
    });

    app.get('/cache', async () => this.cache.status());

    app.get<{ Params: { mac: string } }>('/lookup/:mac', async (request, reply) => {
      const { mac } = request.params;
      try {
        const record = await this.cache.read(snapshot => resolve(snapshot, mac));
        return {
          ...record,
          ipAddresses: record.ipAddresses.map(ip => ip.address)
        };
      } catch (err) {
        if (!(err instanceof ResolutionError)) throw err;
        return reply.code(err.reason === 'NotFound' ? 404 : 409).send({
          error: err.reason,
          message: err.message
        });
      }
    });

    return app;
  }

  async start(): Promise<void> {
    await this.app.listen({ port: this.port, host: this.host });
    logger.info({ host: this.host, port: this.port }, 'status api server started');
  }

  async stop(): Promise<void> {
    await this.app.close();
    logger.info('status api server stopped');
  }
}
