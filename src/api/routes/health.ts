import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { DeliveryStats, WatcherStats } from '../../shared/types';

const VERSION = process.env.npm_package_version || '0.2.0';

export interface HealthRouteOptions {
  delivery: () => DeliveryStats;
  watcher: () => WatcherStats;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (
  app: FastifyInstance,
  options: HealthRouteOptions
) => {
  // Basic liveness check - always returns 200 if server is running
  app.get('/live', async () => {
    return { status: 'ok' };
  });

  // Readiness check - both long-running tasks must be up
  app.get('/ready', async (_request, reply) => {
    const delivery = options.delivery();
    const watcher = options.watcher();
    const isReady = delivery.running && watcher.running;

    if (!isReady) {
      reply.status(503);
    }

    return {
      status: isReady ? 'ready' : 'not_ready',
      checks: {
        deliveryWorker: delivery.running ? 'ok' : 'fail',
        callWatcher: watcher.running ? 'ok' : 'fail',
      },
    };
  });

  // Full health check with pipeline counters
  app.get('/health', async (_request, reply) => {
    const delivery = options.delivery();
    const watcher = options.watcher();
    const isHealthy = delivery.running && watcher.running;

    if (!isHealthy) {
      reply.status(503);
    }

    const memory = process.memoryUsage();

    return {
      status: isHealthy ? 'healthy' : 'degraded',
      version: VERSION,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        queue: {
          status: delivery.running ? 'ok' : 'fail',
          pending: delivery.pending,
          delivered: delivery.delivered,
          failed: delivery.failed,
        },
        callWatcher: {
          status: watcher.running ? 'ok' : 'fail',
          restarts: watcher.restarts,
          linesRead: watcher.linesRead,
          triggered: watcher.triggered,
          suppressed: watcher.suppressed,
          trackedCalls: watcher.trackedCalls,
        },
      },
      memory: {
        heapUsed: Math.round(memory.heapUsed / 1024 / 1024),
        heapTotal: Math.round(memory.heapTotal / 1024 / 1024),
        rss: Math.round(memory.rss / 1024 / 1024),
      },
    };
  });
};
