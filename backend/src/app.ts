import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config } from './config/app.js';
import { originPolicy } from './config/cors.js';
import { sanitizeInput } from './middleware/sanitize.js';
import { registerRoutes } from './routes/index.js';
import type { ChatService } from './services/chatStreamService.js';
import { loggerOptions } from './utils/logger.js';

export interface BuildAppOptions {
  service?: ChatService;
  rateLimit?: boolean;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: loggerOptions });

  await app.register(cors, {
    origin: (origin, cb) => {
      if (originPolicy.isAllowed(origin)) {
        cb(null, true);
        return;
      }
      app.log.warn({ origin, allowedOrigins: originPolicy.allowedOrigins }, 'CORS origin rejected');
      cb(new Error('Not allowed by CORS'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    credentials: true
  });

  if (options.rateLimit ?? true) {
    await app.register(rateLimit, {
      max: config.RATE_LIMIT_MAX_REQUESTS,
      timeWindow: config.RATE_LIMIT_WINDOW_MS,
      errorResponseBuilder: () => ({
        error: 'Too many requests',
        message: 'Please try again later.'
      })
    });
  }

  app.addHook('preHandler', sanitizeInput);

  await registerRoutes(app, options.service);
  return app;
}
