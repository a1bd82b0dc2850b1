import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ChatRequestPayload, RegenerateRequestPayload } from '../../../shared/types.js';
import { originPolicy } from '../config/cors.js';
import { TurnInProgressError, errorMessage } from '../orchestrator/errors.js';
import type { ChatService, TurnRequest } from '../services/chatStreamService.js';

function openEventStream(request: FastifyRequest, reply: FastifyReply) {
  reply.hijack();
  const headers: Record<string, string> = {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive'
  };
  const allowedOrigin = originPolicy.resolve(request.headers.origin);
  if (allowedOrigin) {
    headers['Access-Control-Allow-Origin'] = allowedOrigin;
    headers['Access-Control-Allow-Credentials'] = 'true';
    headers.Vary = 'Origin';
  }
  reply.raw.writeHead(200, headers);
}

async function streamTurn(request: FastifyRequest, reply: FastifyReply, service: ChatService, turn: TurnRequest) {
  const session = service.session(turn.sessionId);
  if (session.busy) {
    return reply.code(409).send({ error: new TurnInProgressError(session.id).message });
  }

  openEventStream(request, reply);

  const sendEvent = (event: string, data: unknown) => {
    if (!reply.raw.writableEnded) {
      reply.raw.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
    }
  };

  // Client went away before the turn finished: abort it so nothing is committed.
  const disconnect = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) {
      disconnect.abort();
    }
  });

  try {
    const { outcome } = await service.stream({ ...turn, sessionId: session.id }, sendEvent, disconnect.signal);
    request.log.info({ sessionId: session.id, turnId: outcome.turnId, status: outcome.status }, 'stream turn finished');
  } catch (error) {
    request.log.error({ err: error, sessionId: session.id }, 'stream turn failed');
    sendEvent('error', { message: errorMessage(error) });
  } finally {
    reply.raw.end();
  }
  return reply;
}

export async function setupStreamRoute(app: FastifyInstance, service: ChatService) {
  app.post<{ Body: ChatRequestPayload }>('/chat/stream', async (request, reply) => {
    const query = request.body?.query;
    if (typeof query !== 'string' || !query.trim()) {
      return reply.code(400).send({ error: 'Missing query' });
    }
    return streamTurn(request, reply, service, { query, sessionId: request.body.sessionId });
  });

  app.post<{ Body: RegenerateRequestPayload }>('/chat/regenerate', async (request, reply) => {
    const sessionId = request.body?.sessionId;
    const query = service.regenerateQuery(sessionId, request.body?.query);
    if (!query) {
      return reply.code(400).send({ error: 'Nothing to regenerate: send a query or a session with history.' });
    }
    return streamTurn(request, reply, service, { query, sessionId, regenerate: true });
  });
}
