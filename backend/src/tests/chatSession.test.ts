import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { QueryAnalysis, ResponseValidation } from '../../../shared/types.js';
import { TurnInProgressError } from '../orchestrator/errors.js';
import type { TurnCollaborators } from '../orchestrator/index.js';
import { CollectingSink } from '../orchestrator/sink.js';
import { ChatSession, INTRODUCTION, SessionRegistry } from '../services/chatSession.js';
import { SessionStore } from '../services/sessionStore.js';

const noRetrieval: QueryAnalysis = { inScope: true, needsRetrieval: false, rationale: '', retrievalHints: [], fallback: false };
const accept: ResponseValidation = { accepted: true, inScope: true, hallucinationDetected: false, appropriate: true, source: 'judge' };

const quickCollaborators = (answer = 'Replace the door gasket.'): Partial<TurnCollaborators> => ({
  analyze: async () => noRetrieval,
  draft: async () => answer,
  validate: async () => accept
});

/** Drafter that only settles once the turn's signal aborts. */
const waitForAbort: TurnCollaborators['draft'] = (request) =>
  new Promise((resolve) => {
    request.signal?.addEventListener('abort', () => resolve('too late'), { once: true });
  });

describe('ChatSession', () => {
  let store: SessionStore;

  beforeEach(() => {
    store = new SessionStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('rejects a second query while a turn is running', async () => {
    let release: (answer: string) => void = () => {};
    const pending = new Promise<string>((resolve) => {
      release = resolve;
    });
    const session = new ChatSession('busy-session', store);
    const first = session.submit('First question', new CollectingSink(), {
      collaborators: { ...quickCollaborators(), draft: () => pending }
    });

    expect(session.busy).toBe(true);
    await expect(session.submit('Second question', new CollectingSink(), { collaborators: quickCollaborators() })).rejects.toThrow(
      TurnInProgressError
    );

    release('First answer');
    const outcome = await first;

    expect(outcome.status).toBe('committed');
    expect(session.busy).toBe(false);
    expect(session.history.snapshot().map((message) => message.content)).toEqual(['First question', 'First answer']);
  });

  it('persists committed history and reloads it in a new registry', async () => {
    const registry = new SessionRegistry({ store });
    const session = registry.get('persisted');

    await session.submit('Fridge too warm', new CollectingSink(), { collaborators: quickCollaborators('Clean the condenser coils.') });

    const reloaded = new SessionRegistry({ store }).find('persisted');
    expect(reloaded?.history.snapshot().map((message) => message.content)).toEqual(['Fridge too warm', 'Clean the condenser coils.']);
    expect(reloaded?.lastUserQuery()).toBe('Fridge too warm');
  });

  it('reset aborts the in-flight turn, clears history and the stored transcript', async () => {
    const session = new ChatSession('reset-me', store);
    await session.submit('Earlier question', new CollectingSink(), { collaborators: quickCollaborators() });

    const sink = new CollectingSink();
    const running = session.submit('Pending question', sink, { collaborators: { ...quickCollaborators(), draft: waitForAbort } });

    const introduction = session.reset();
    const outcome = await running;

    expect(introduction).toBe(INTRODUCTION);
    expect(outcome.status).toBe('cancelled');
    expect(session.history.size).toBe(0);
    expect(store.loadTranscript('reset-me')).toBeNull();
    expect(sink.finalizeCount).toBe(1);
    expect(session.busy).toBe(false);
  });

  it('accepts a new query right after reset', async () => {
    const session = new ChatSession('after-reset', store);
    const running = session.submit('Pending', new CollectingSink(), { collaborators: { ...quickCollaborators(), draft: waitForAbort } });

    session.reset();
    const next = await session.submit('Fresh question', new CollectingSink(), { collaborators: quickCollaborators('Fresh answer') });
    await running;

    expect(next.status).toBe('committed');
    expect(session.history.snapshot().map((message) => message.content)).toEqual(['Fresh question', 'Fresh answer']);
  });

  it('fails the turn with the timeout message when the turn budget runs out', async () => {
    const session = new ChatSession('slow', store, [], 20);
    const sink = new CollectingSink();

    const outcome = await session.submit('Slow question', sink, { collaborators: { ...quickCollaborators(), draft: waitForAbort } });

    const message = 'The request took too long to process. Please try again with a simpler query.';
    expect(outcome).toMatchObject({ status: 'failed', error: message });
    expect(sink.ofType('error')).toEqual([{ type: 'error', message }]);
    expect(session.history.size).toBe(0);
  });

  it('cancels when the caller signal aborts', async () => {
    const session = new ChatSession('disconnect', store);
    const client = new AbortController();

    const running = session.submit('Question', new CollectingSink(), {
      signal: client.signal,
      collaborators: { ...quickCollaborators(), draft: waitForAbort }
    });
    client.abort();
    const outcome = await running;

    expect(outcome.status).toBe('cancelled');
    expect(session.history.size).toBe(0);
    expect(store.loadTranscript('disconnect')).toBeNull();
  });
});

describe('SessionRegistry', () => {
  let store: SessionStore;
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    store = new SessionStore(':memory:');
    clock = 0;
  });

  afterEach(() => {
    store.close();
  });

  it('creates sessions on demand and finds only known ones', () => {
    const registry = new SessionRegistry({ store });

    expect(registry.find('missing')).toBeUndefined();
    const created = registry.get('new-session');
    expect(registry.get('new-session')).toBe(created);
    expect(registry.find('new-session')).toBe(created);
    expect(registry.size).toBe(1);
  });

  it('generates an id when none is given', () => {
    const registry = new SessionRegistry({ store });

    expect(registry.get().id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('caps live sessions by dropping the least recently used', () => {
    const registry = new SessionRegistry({ store, maxLiveSessions: 10, now });

    for (let i = 0; i < 50; i += 1) {
      clock += 1;
      registry.get().reset();
    }

    expect(registry.size).toBe(10);
  });

  it('keeps a recently used session over an older one', () => {
    const registry = new SessionRegistry({ store, maxLiveSessions: 2, now });
    clock = 1;
    const first = registry.get('first');
    clock = 2;
    registry.get('second');
    clock = 3;
    registry.find('first');
    clock = 4;
    registry.get('third');

    expect(registry.size).toBe(2);
    expect(registry.find('first')).toBe(first);
    expect(registry.find('second')).toBeUndefined();
  });

  it('drops sessions idle past the ttl', () => {
    const registry = new SessionRegistry({ store, idleTtlMs: 1000, now });
    registry.get('stale');
    clock = 5000;
    registry.get('fresh');

    expect(registry.size).toBe(1);
    expect(registry.find('stale')).toBeUndefined();
  });

  it('restores an evicted session from its stored transcript', async () => {
    const registry = new SessionRegistry({ store, idleTtlMs: 1000, now });
    const original = registry.get('kept-on-disk');
    await original.submit('Fridge too warm', new CollectingSink(), { collaborators: quickCollaborators('Clean the condenser coils.') });
    clock = 5000;
    registry.get('newcomer');

    const restored = registry.find('kept-on-disk');

    expect(restored).not.toBe(original);
    expect(restored?.history.snapshot().map((message) => message.content)).toEqual(['Fridge too warm', 'Clean the condenser coils.']);
  });

  it('never evicts a session with a turn in progress', async () => {
    let release: (answer: string) => void = () => {};
    const pending = new Promise<string>((resolve) => {
      release = resolve;
    });
    const registry = new SessionRegistry({ store, maxLiveSessions: 1, now });
    const busy = registry.get('busy');
    const running = busy.submit('Question', new CollectingSink(), { collaborators: { ...quickCollaborators(), draft: () => pending } });

    clock = 1;
    registry.get('other');

    expect(registry.size).toBe(2);
    expect(registry.find('busy')).toBe(busy);

    release('Answer');
    await running;
  });
});
