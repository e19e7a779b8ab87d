import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

const correlationPlugin: FastifyPluginAsync = async (app: FastifyInstance) => {
  app.decorateRequest('correlationId', '');

  app.addHook('onRequest', async (request, reply) => {
    // Use existing correlation ID from header, or fall back to the request id
    const header = request.headers['x-correlation-id'] ?? request.headers['x-request-id'];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : request.id;

    request.correlationId = correlationId;

    reply.header('x-correlation-id', correlationId);

    request.log = request.log.child({ correlationId });
  });
};

export const correlationMiddleware = fp(correlationPlugin, {
  name: 'correlation-middleware',
});
