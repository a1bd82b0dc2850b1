import type { FastifyInstance } from 'fastify';
import type { ChatRequestPayload } from '../../../shared/types.js';
import { config, isDevelopment } from '../config/app.js';
import { TurnInProgressError, errorMessage } from '../orchestrator/errors.js';
import { clearTurnTelemetry, getTurnAggregates, getTurnTelemetry } from '../orchestrator/turnTelemetry.js';
import { createChatService, toChatResponse } from '../services/chatStreamService.js';
import type { ChatService } from '../services/chatStreamService.js';
import { setupStreamRoute } from './chatStream.js';
import { setupSessionRoutes } from './sessions.js';

export async function registerRoutes(app: FastifyInstance, service: ChatService = createChatService()) {
  app.get('/', async () => ({
    name: config.PROJECT_NAME,
    status: 'ok',
    uptimeSeconds: Math.round(process.uptime()),
    endpoints: {
      health: '/health',
      chat: '/chat',
      chatStream: '/chat/stream',
      regenerate: '/chat/regenerate',
      session: '/sessions/:id',
      reset: '/sessions/:id/reset',
      ...(isDevelopment ? { adminTelemetry: '/admin/telemetry' } : {})
    }
  }));

  app.get('/health', async () => ({
    status: 'healthy',
    timestamp: new Date().toISOString()
  }));

  app.post<{ Body: ChatRequestPayload }>('/chat', async (request, reply) => {
    const query = request.body?.query;
    if (typeof query !== 'string' || !query.trim()) {
      return reply.code(400).send({ error: 'Missing query' });
    }

    try {
      const { sessionId, outcome } = await service.chat({ query, sessionId: request.body.sessionId });
      switch (outcome.status) {
        case 'committed':
          return toChatResponse(sessionId, outcome);
        case 'failed':
          return reply.code(502).send({ error: outcome.error, sessionId });
        case 'cancelled':
          return reply.code(409).send({ error: 'The turn was cancelled before an answer was committed.', sessionId });
      }
    } catch (error) {
      if (error instanceof TurnInProgressError) {
        return reply.code(409).send({ error: error.message });
      }
      request.log.error({ err: error }, 'chat request failed');
      const message = isDevelopment ? errorMessage(error) : 'An unexpected error occurred';
      return reply.code(500).send({ error: 'Internal server error', message });
    }
  });

  await setupStreamRoute(app, service);
  await setupSessionRoutes(app, service);

  if (isDevelopment) {
    app.get('/admin/telemetry', async () => ({
      turns: getTurnTelemetry(),
      aggregates: getTurnAggregates(),
      liveSessions: service.registry.size
    }));
    app.post('/admin/telemetry/clear', async () => {
      clearTurnTelemetry();
      return { status: 'cleared' };
    });
  }
}
