import type { ChatResponse, Message, ResetResponse, TurnEvent } from '../../../shared/types.js';
import type { TurnOutcome } from '../orchestrator/index.js';
import { CallbackSink, CollectingSink } from '../orchestrator/sink.js';
import type { StreamingSink } from '../orchestrator/sink.js';
import { sanitizeUserField } from '../utils/session.js';
import { RESET_MESSAGE, getSessionRegistry } from './chatSession.js';
import type { ChatSession, SessionRegistry, SubmitOptions } from './chatSession.js';

export type EventSender = (event: string, data: unknown) => void;

export interface TurnRequest {
  query: string;
  sessionId?: string;
  regenerate?: boolean;
}

export interface TurnResult {
  sessionId: string;
  outcome: TurnOutcome;
}

export interface SessionTranscript {
  sessionId: string;
  busy: boolean;
  messages: readonly Message[];
}

/** Turn options fixed for every request served by one service instance. */
export type ServiceTurnOptions = Pick<SubmitOptions, 'tools' | 'collaborators' | 'maxRetries'>;

export interface ChatService {
  registry: SessionRegistry;
  /** Resolves the session a request targets, creating it when new. */
  session(sessionId?: string): ChatSession;
  stream(request: TurnRequest, sendEvent: EventSender, signal?: AbortSignal): Promise<TurnResult>;
  chat(request: TurnRequest, signal?: AbortSignal): Promise<TurnResult>;
  /** The query a regenerate request re-answers: the one supplied, or the session's last user message. */
  regenerateQuery(sessionId: string | undefined, query: string | undefined): string | undefined;
  reset(sessionId: string): ResetResponse;
  transcript(sessionId: string): SessionTranscript | undefined;
}

function eventPayload(event: TurnEvent): Record<string, unknown> {
  const { type: _type, ...data } = event;
  return data;
}

export function toChatResponse(sessionId: string, outcome: Extract<TurnOutcome, { status: 'committed' }>): ChatResponse {
  return {
    sessionId,
    answer: outcome.message.content,
    message: outcome.message,
    retries: outcome.retries,
    lowConfidence: outcome.lowConfidence
  };
}

export function createChatService(registry: SessionRegistry = getSessionRegistry(), turnOptions: ServiceTurnOptions = {}): ChatService {
  const session = (sessionId?: string) => registry.get(sessionId?.trim() || undefined);

  const run = async (request: TurnRequest, sink: StreamingSink, signal?: AbortSignal): Promise<TurnResult> => {
    const target = session(request.sessionId);
    const outcome = await target.submit(request.query, sink, {
      ...turnOptions,
      signal,
      regenerate: request.regenerate,
      user: sanitizeUserField(target.id)
    });
    return { sessionId: target.id, outcome };
  };

  return {
    registry,
    session,

    async stream(request, sendEvent, signal) {
      const target = session(request.sessionId);
      sendEvent('session', { sessionId: target.id });
      const sink = new CallbackSink((event) => sendEvent(event.type, eventPayload(event)));
      return run({ ...request, sessionId: target.id }, sink, signal);
    },

    chat(request, signal) {
      return run(request, new CollectingSink(), signal);
    },

    regenerateQuery(sessionId, query) {
      const supplied = query?.trim();
      if (supplied) {
        return supplied;
      }
      if (!sessionId) {
        return undefined;
      }
      return registry.find(sessionId)?.lastUserQuery();
    },

    reset(sessionId) {
      const introduction = registry.get(sessionId).reset();
      return { message: RESET_MESSAGE, introduction };
    },

    transcript(sessionId) {
      const found = registry.find(sessionId);
      if (!found) {
        return undefined;
      }
      return { sessionId: found.id, busy: found.busy, messages: found.history.snapshot() };
    }
  };
}
