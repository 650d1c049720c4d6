import type { FastifyPluginAsync } from 'fastify';

export type HealthCheck = () => Promise<boolean>;

export interface HealthRouteOptions {
  version: string;
  /** Named readiness checks, e.g. database and redis. */
  checks: Record<string, HealthCheck>;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, opts) => {
  fastify.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'docqa-api',
      version: opts.version,
    };
  });

  fastify.get('/ready', async (request, reply) => {
    const entries = await Promise.all(
      Object.entries(opts.checks).map(async ([name, check]) => {
        const healthy = await check().catch(() => false);
        return [name, healthy ? 'ok' : 'unavailable'] as const;
      })
    );
    const ready = entries.every(([, status]) => status === 'ok');

    return reply.code(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks: Object.fromEntries(entries),
    });
  });
};
