import { randomUUID } from 'node:crypto';
import type { Message } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { runTurn } from '../orchestrator/index.js';
import type { RunTurnOptions, TurnOutcome } from '../orchestrator/index.js';
import { TurnInProgressError, TurnTimeoutError } from '../orchestrator/errors.js';
import { ConversationHistory } from '../orchestrator/history.js';
import type { StreamingSink } from '../orchestrator/sink.js';
import { componentLogger } from '../utils/logger.js';
import { getSessionStore } from './sessionStore.js';
import type { SessionStore } from './sessionStore.js';

const log = componentLogger('session');

export const RESET_MESSAGE = 'Chat history has been reset';

export const INTRODUCTION = `Hi! I'm your appliance parts assistant. I can help you find refrigerator and dishwasher parts, check compatibility, troubleshoot symptoms and walk through installation.

Try asking:
- "My GE fridge is leaking water inside. What could be wrong?"
- "How hard is it to install this drain pump? Do I need special tools?"
- "Show me compatible replacements for part number PS11752778."`;

export type SubmitOptions = Pick<RunTurnOptions, 'regenerate' | 'user' | 'tools' | 'collaborators' | 'maxRetries'> & {
  /** Caller-side cancellation, e.g. the HTTP client disconnecting. */
  signal?: AbortSignal;
};

interface ActiveTurn {
  turnId: string;
  controller: AbortController;
}

/**
 * One conversation: its history plus the at-most-one turn running against it.
 * Committed history is written to the session store after every commit.
 */
export class ChatSession {
  readonly history: ConversationHistory;
  private active: ActiveTurn | null = null;

  constructor(
    readonly id: string,
    private readonly store: SessionStore,
    initial: readonly Message[] = [],
    private readonly turnTimeoutMs: number = config.TURN_TIMEOUT_MS
  ) {
    this.history = new ConversationHistory(initial);
  }

  get busy(): boolean {
    return this.active !== null;
  }

  /** Most recent user query, used by regenerate when the caller does not resend it. */
  lastUserQuery(): string | undefined {
    return this.history.lastUserMessage()?.content;
  }

  async submit(query: string, sink: StreamingSink, options: SubmitOptions = {}): Promise<TurnOutcome> {
    if (this.active) {
      throw new TurnInProgressError(this.id);
    }

    const { signal, ...turnOptions } = options;
    const turn: ActiveTurn = { turnId: randomUUID(), controller: new AbortController() };
    this.active = turn;

    const timer = setTimeout(() => turn.controller.abort(new TurnTimeoutError(this.turnTimeoutMs)), this.turnTimeoutMs);
    const onCallerAbort = () => turn.controller.abort(signal?.reason);
    if (signal?.aborted) {
      onCallerAbort();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      const outcome = await runTurn({
        ...turnOptions,
        history: this.history,
        query,
        sink,
        signal: turn.controller.signal,
        turnId: turn.turnId,
        sessionId: this.id
      });
      if (outcome.status === 'committed') {
        this.store.saveTranscript(this.id, this.history.snapshot());
      }
      return outcome;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
      if (this.active === turn) {
        this.active = null;
      }
    }
  }

  /** Aborts the running turn, if any. Nothing it produced is committed. */
  cancel(reason?: unknown): boolean {
    if (!this.active) {
      return false;
    }
    this.active.controller.abort(reason);
    return true;
  }

  /**
   * Aborts any running turn, clears history and the stored transcript, and
   * returns the introduction shown to a fresh conversation.
   */
  reset(): string {
    if (this.cancel()) {
      log.info({ sessionId: this.id }, 'reset aborted the in-flight turn');
    }
    this.active = null;
    this.history.reset();
    this.store.removeSession(this.id);
    return INTRODUCTION;
  }
}

export interface SessionRegistryOptions {
  store?: SessionStore;
  turnTimeoutMs?: number;
  /** Live sessions kept in memory; the least recently used idle ones are dropped beyond this. */
  maxLiveSessions?: number;
  /** Idle sessions untouched for this long are dropped. Their transcripts stay in the store. */
  idleTtlMs?: number;
  now?: () => number;
}

interface LiveSession {
  session: ChatSession;
  lastUsed: number;
}

/**
 * Process-wide map of live sessions; a session is hydrated from the store on
 * first use. Entries are kept in least-recently-used order so eviction can stop
 * at the first fresh one.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, LiveSession>();
  private readonly maxLiveSessions: number;
  private readonly idleTtlMs: number;
  private readonly now: () => number;

  constructor(private readonly options: SessionRegistryOptions = {}) {
    this.maxLiveSessions = options.maxLiveSessions ?? config.SESSION_MAX_LIVE;
    this.idleTtlMs = options.idleTtlMs ?? config.SESSION_IDLE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  private get store(): SessionStore {
    return this.options.store ?? getSessionStore();
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Returns the live or stored session without creating one. */
  find(id: string): ChatSession | undefined {
    const live = this.sessions.get(id);
    if (live) {
      return this.track(live.session);
    }
    const stored = this.store.loadTranscript(id);
    if (!stored) {
      return undefined;
    }
    log.debug({ sessionId: id, messages: stored.messages.length }, 'session restored from store');
    return this.track(new ChatSession(id, this.store, stored.messages, this.options.turnTimeoutMs));
  }

  /** Returns the session for `id`, creating an empty one when none exists. */
  get(id: string = randomUUID()): ChatSession {
    return this.find(id) ?? this.track(new ChatSession(id, this.store, [], this.options.turnTimeoutMs));
  }

  private track(session: ChatSession): ChatSession {
    this.sessions.delete(session.id);
    this.sessions.set(session.id, { session, lastUsed: this.now() });
    this.evictIdle(session.id);
    return session;
  }

  /** Drops idle sessions past the TTL, then the least recently used idle ones beyond the cap. Busy sessions stay. */
  private evictIdle(keep: string) {
    const cutoff = this.now() - this.idleTtlMs;
    const evicted: string[] = [];
    for (const [id, live] of this.sessions) {
      const overCap = this.sessions.size - evicted.length > this.maxLiveSessions;
      if (!overCap && live.lastUsed > cutoff) {
        break;
      }
      if (id !== keep && !live.session.busy) {
        evicted.push(id);
      }
    }
    for (const id of evicted) {
      this.sessions.delete(id);
    }
    if (evicted.length) {
      log.debug({ evicted: evicted.length, live: this.sessions.size }, 'evicted idle sessions');
    }
  }
}

let sharedRegistry: SessionRegistry | null = null;

export function getSessionRegistry(): SessionRegistry {
  if (!sharedRegistry) {
    sharedRegistry = new SessionRegistry();
  }
  return sharedRegistry;
}
