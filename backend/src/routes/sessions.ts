import type { FastifyInstance, FastifySchema } from 'fastify';
import type { ResetResponse } from '../../../shared/types.js';
import type { ChatService } from '../services/chatStreamService.js';

interface SessionParams {
  id: string;
}

const sessionParamsSchema: FastifySchema = {
  params: {
    type: 'object',
    required: ['id'],
    properties: {
      id: { type: 'string', minLength: 1, maxLength: 128, pattern: '^[A-Za-z0-9_-]+$' }
    }
  }
};

export async function setupSessionRoutes(app: FastifyInstance, service: ChatService) {
  app.post('/sessions', async (_request, reply) => {
    const session = service.session();
    const introduction = session.reset();
    return reply.code(201).send({ sessionId: session.id, introduction });
  });

  app.get<{ Params: SessionParams }>('/sessions/:id', { schema: sessionParamsSchema }, async (request, reply) => {
    const transcript = service.transcript(request.params.id);
    if (!transcript) {
      return reply.code(404).send({ error: 'Session not found' });
    }
    return transcript;
  });

  app.post<{ Params: SessionParams; Reply: ResetResponse }>(
    '/sessions/:id/reset',
    { schema: sessionParamsSchema },
    async (request) => {
      const response = service.reset(request.params.id);
      request.log.info({ sessionId: request.params.id }, 'session reset');
      return response;
    }
  );
}
