import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';

const HTML_TAG_REGEX = /<[^>]*>/g;
const SCRIPT_REGEX = /<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi;
export const MAX_QUERY_LENGTH = 4000;
const MAX_SESSION_ID_LENGTH = 128;
const SESSION_ID_REGEX = /^[A-Za-z0-9_-]+$/;

export function sanitizeQueryText(raw: string): string {
  let content = raw.replace(SCRIPT_REGEX, '');
  content = content.replace(/<\/?(code|pre)>/gi, '`');
  content = content.replace(HTML_TAG_REGEX, '');
  content = content.replace(/\r\n?/g, '\n');
  content = content.replace(/\u00a0/g, ' ');
  content = content
    .split('\n')
    .map((line) => line.replace(/\s+$/g, ''))
    .join('\n');
  return content.replace(/\n{3,}/g, '\n\n').trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Cleans `query` and checks `sessionId` on JSON bodies before any handler sees them.
 * Routes still validate presence; this hook only rejects malformed values.
 */
export function sanitizeInput(request: FastifyRequest, reply: FastifyReply, done: HookHandlerDoneFunction) {
  const body = request.body;
  if (!isRecord(body)) {
    done();
    return;
  }

  if (body.query !== undefined) {
    if (typeof body.query !== 'string') {
      reply.code(400).send({ error: 'Query must be a string.' });
      return done();
    }
    if (body.query.length > MAX_QUERY_LENGTH) {
      reply.code(400).send({ error: `Query too long. Maximum ${MAX_QUERY_LENGTH} characters.` });
      return done();
    }
    body.query = sanitizeQueryText(body.query);
  }

  if (body.sessionId !== undefined) {
    if (typeof body.sessionId !== 'string' || body.sessionId.length > MAX_SESSION_ID_LENGTH || !SESSION_ID_REGEX.test(body.sessionId)) {
      reply.code(400).send({ error: 'Invalid session id.' });
      return done();
    }
  }

  done();
}
