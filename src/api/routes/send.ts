import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { OutboundQueue } from '../../infra/queue/outbound';
import { ValidationError } from '../../shared/errors';
import { sendRequestSchema, toFieldErrors } from '../../shared/validation';
import { authMiddleware } from '../middleware/auth';

export interface SendRouteOptions {
  queue: OutboundQueue;
}

export const sendRoutes: FastifyPluginAsync<SendRouteOptions> = async (
  app: FastifyInstance,
  options: SendRouteOptions
) => {
  // Queue a text for delivery through Messages
  app.post('/send', { preHandler: authMiddleware }, async (request) => {
    const parseResult = sendRequestSchema.safeParse(request.body);
    if (!parseResult.success) {
      throw new ValidationError(toFieldErrors(parseResult.error));
    }

    const { to, message } = parseResult.data;
    options.queue.enqueue(to, message);

    request.log.info({ to, pending: options.queue.size }, 'Message queued');

    return { status: 'queued', to };
  });
};
