import Fastify from 'fastify';
import { randomUUID } from 'crypto';
import { logger } from '../infra/logging/logger';
import { OutboundQueue } from '../infra/queue/outbound';
import { isAppError, ValidationError } from '../shared/errors';
import { DeliveryStats, WatcherStats } from '../shared/types';
import { correlationMiddleware } from './middleware/correlation';
import { healthRoutes } from './routes/health';
import { sendRoutes } from './routes/send';

export interface ServerDependencies {
  queue: OutboundQueue;
  delivery: () => DeliveryStats;
  watcher: () => WatcherStats;
}

function statusCodeOf(error: Error): number {
  if (isAppError(error)) {
    return error.statusCode;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return 500;
}

function codeOf(error: Error, statusCode: number): string {
  if (isAppError(error)) {
    return error.code;
  }
  return statusCode >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST';
}

export async function buildServer(deps: ServerDependencies) {
  const app = Fastify({
    logger: logger,
    requestIdHeader: 'x-correlation-id',
    genReqId: () => randomUUID(),
  });

  // Correlation ID middleware
  await app.register(correlationMiddleware);

  // Routes
  await app.register(healthRoutes, { delivery: deps.delivery, watcher: deps.watcher });
  await app.register(sendRoutes, { queue: deps.queue });

  // Global error handler
  app.setErrorHandler<Error>((error, request, reply) => {
    const correlationId = request.id;
    const statusCode = statusCodeOf(error);

    const logFields = {
      correlationId,
      error: error.message,
      statusCode,
    };
    if (statusCode >= 500) {
      request.log.error({ ...logFields, stack: error.stack }, 'Request error');
    } else {
      request.log.warn(logFields, 'Request rejected');
    }

    // Don't expose internal errors
    const message = statusCode >= 500 ? 'Internal server error' : error.message;

    reply.status(statusCode).send({
      success: false,
      error: message,
      code: codeOf(error, statusCode),
      correlationId,
      ...(error instanceof ValidationError && { details: error.errors }),
    });
  });

  return app;
}
