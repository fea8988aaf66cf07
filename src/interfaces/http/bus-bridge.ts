import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { CHANNEL_HTTP_REQUEST } from '../../domain/index.js';
import type { HostBus, HttpExchange, HttpResponse } from '../../domain/index.js';

export interface BusBridgeOptions {
  bus: HostBus;
}

/**
 * Hands HTTP requests to the host bus.
 *
 * A catch-all route turns every request no other Fastify route owns into
 * an `http_request` event, delivered synchronously. The response attached
 * last is written out; a request nobody answers goes to Fastify's
 * not-found handler.
 *
 * JSON bodies are parsed here so that an empty body under
 * `Content-Type: application/json` (a bodiless DELETE) reaches the bus as
 * `undefined` instead of failing with 400.
 */
async function busBridge(fastify: FastifyInstance, opts: BusBridgeOptions): Promise<void> {
  const { bus } = opts;
  bus.registerChannel(CHANNEL_HTTP_REQUEST);

  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser(
    'application/json',
    { parseAs: 'string' },
    async (_request: FastifyRequest, body: string): Promise<unknown> => {
      if (body.trim() === '') return undefined;
      try {
        return JSON.parse(body);
      } catch (err: unknown) {
        throw Object.assign(new Error('Body is not valid JSON', { cause: err }), { statusCode: 400 });
      }
    },
  );

  fastify.all(
    '*',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const exchange: HttpExchange = {
        method: request.method,
        path: request.url,
        headers: request.headers,
        body: request.body,
      };

      const event = bus.send<HttpExchange, HttpResponse>(CHANNEL_HTTP_REQUEST, exchange);
      const response = event.response;

      if (response === undefined) {
        reply.callNotFound();
        return reply;
      }

      return reply
        .status(response.status)
        .headers(response.headers)
        .type(response.contentType)
        .send(response.body);
    },
  );
}

export default fp(busBridge, {
  name: 'bus-bridge',
  fastify: '5.x',
});
