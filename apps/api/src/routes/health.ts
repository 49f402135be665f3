import type { FastifyInstance } from 'fastify';

import { runHealthChecks, type HealthCheck } from '@kernel/health-check';

/**
 * GET /health - 200 when every dependency answers, 503 otherwise
 */
export async function healthRoutes(app: FastifyInstance, checks: readonly HealthCheck[]): Promise<void> {
  app.get('/health', async (_req, reply) => {
    const report = await runHealthChecks(checks);
    return reply.status(report.healthy ? 200 : 503).send({
      status: report.healthy ? 'healthy' : 'degraded',
      checks: Object.fromEntries(report.checks.map(c => [c.name, c.healthy ? 'ok' : c.error ?? 'unhealthy'])),
      timestamp: report.timestamp,
    });
  });
}
