import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { QueryAnalysis, ResponseValidation, ToolResult } from '../../../shared/types.js';
import { dispatchTools } from '../orchestrator/dispatch.js';
import { AnalysisError, GenerationFailure, TurnTimeoutError, ValidationError } from '../orchestrator/errors.js';
import { ConversationHistory, createMessage } from '../orchestrator/history.js';
import { runTurn } from '../orchestrator/index.js';
import type { TurnCollaborators } from '../orchestrator/index.js';
import { CollectingSink } from '../orchestrator/sink.js';
import { clearTurnTelemetry, getTurnAggregates } from '../orchestrator/turnTelemetry.js';
import type { ToolHandler, ToolRegistry } from '../tools/index.js';

const leakAnalysis: QueryAnalysis = {
  inScope: true,
  needsRetrieval: true,
  rationale: 'Refrigerator leak.',
  retrievalHints: [
    { tool: 'search_documents', collection: 'repairs', query: 'GE refrigerator leaking water inside' },
    { tool: 'query_parts', keywords: 'water inlet valve', applianceType: 'refrigerator', brand: 'GE' }
  ],
  fallback: false
};

const accept: ResponseValidation = { accepted: true, inScope: true, hallucinationDetected: false, appropriate: true, source: 'judge' };

const reject = (feedback?: string): ResponseValidation => ({
  accepted: false,
  inScope: true,
  hallucinationDetected: true,
  appropriate: true,
  ...(feedback === undefined ? {} : { feedback }),
  source: 'judge'
});

const guideTool: ToolHandler = async () => ({ kind: 'text', text: 'appliance: refrigerator\nsymptom: leaking\nparts: water inlet valve' });
const partsTool: ToolHandler = async () => ({
  kind: 'records',
  records: [{ part_id: 'PS11752778', part_name: 'Water Inlet Valve', part_price: 39.5 }]
});
const tools: ToolRegistry = { search_documents: guideTool, query_parts: partsTool };

function drafter(...answers: string[]) {
  let call = 0;
  return vi.fn<TurnCollaborators['draft']>(async (request) => {
    const answer = answers[Math.min(call, answers.length - 1)] ?? '';
    call += 1;
    request.sink.emit({ type: 'token', content: answer });
    return answer;
  });
}

function syntheticResults(evidence: readonly ToolResult[]) {
  return evidence.filter((result) => result.isSynthetic);
}

describe('runTurn', () => {
  let history: ConversationHistory;
  let sink: CollectingSink;

  beforeEach(() => {
    history = new ConversationHistory();
    sink = new CollectingSink();
    clearTurnTelemetry();
  });

  it('commits an accepted answer grounded in both retrieval backends', async () => {
    const analyze = vi.fn<TurnCollaborators['analyze']>().mockResolvedValue(leakAnalysis);
    const draft = drafter('Your water inlet valve (PS11752778) is the likely culprit.');
    const validate = vi.fn<TurnCollaborators['validate']>().mockResolvedValue(accept);

    const outcome = await runTurn({
      history,
      query: 'My GE fridge is leaking water inside.',
      sink,
      tools,
      turnId: 'turn-1',
      collaborators: { analyze, draft, validate }
    });

    expect(outcome.status).toBe('committed');
    const evidence = draft.mock.calls[0]?.[0].evidence ?? [];
    expect(evidence.map((result) => result.sourceTool)).toEqual(['search_documents', 'query_parts']);
    expect(syntheticResults(evidence)).toEqual([]);

    const committed = history.snapshot();
    expect(committed.map((message) => [message.role, message.content])).toEqual([
      ['user', 'My GE fridge is leaking water inside.'],
      ['agent', 'Your water inlet valve (PS11752778) is the likely culprit.']
    ]);
    expect(committed[1]?.metadata).toEqual({ turnId: 'turn-1', retries: 0, lowConfidence: false, validationSource: 'judge' });

    expect(sink.tokens()).toBe('Your water inlet valve (PS11752778) is the likely culprit.');
    expect(sink.finalizeCount).toBe(1);
    expect(sink.ofType('status').map((event) => event.stage)).toEqual(['analyzing', 'retrieving', 'drafting', 'validating', 'committing']);
    expect(sink.ofType('tool_results')).toEqual([
      {
        type: 'tool_results',
        results: [
          { sourceTool: 'search_documents', ok: true },
          { sourceTool: 'query_parts', ok: true }
        ]
      }
    ]);
    expect(sink.ofType('done')).toEqual([{ type: 'done', message: committed[1], retries: 0, lowConfidence: false }]);
  });

  it('retries with the judge feedback as synthetic evidence and commits the second draft', async () => {
    const draft = drafter('The valve costs $999.', 'The water inlet valve is listed at $39.50.');
    const validate = vi
      .fn<TurnCollaborators['validate']>()
      .mockResolvedValueOnce(reject('The $999 price is not in the catalog record.'))
      .mockResolvedValueOnce(accept);

    const outcome = await runTurn({
      history,
      query: 'How much is the inlet valve?',
      sink,
      tools,
      collaborators: { analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue(leakAnalysis), draft, validate }
    });

    expect(draft).toHaveBeenCalledTimes(2);
    expect(syntheticResults(draft.mock.calls[0]?.[0].evidence ?? [])).toEqual([]);
    expect(syntheticResults(draft.mock.calls[1]?.[0].evidence ?? [])).toEqual([
      {
        isSynthetic: true,
        sourceTool: 'response_validator',
        round: 1,
        payload: { kind: 'feedback', feedback: 'The $999 price is not in the catalog record.' }
      }
    ]);

    expect(history.snapshot()[1]?.content).toBe('The water inlet valve is listed at $39.50.');
    expect(history.snapshot()[1]?.metadata?.retries).toBe(1);
    expect(sink.ofType('retry')).toEqual([{ type: 'retry', round: 1, feedback: 'The $999 price is not in the catalog record.' }]);
    expect(outcome.rounds.map((round) => round.validation.accepted)).toEqual([false, true]);
    expect(outcome.status === 'committed' && outcome.lowConfidence).toBe(false);
  });

  it('still drafts when every tool call times out', async () => {
    const hang: ToolHandler = () => new Promise(() => {});
    const draft = drafter('I could not reach the parts catalog, but a leak usually means a clogged defrost drain.');

    const outcome = await runTurn({
      history,
      query: 'My GE fridge is leaking water inside.',
      sink,
      tools: { search_documents: hang, query_parts: hang },
      collaborators: {
        analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue(leakAnalysis),
        dispatch: (batch, options) => dispatchTools(batch, { ...options, timeoutMs: 10 }),
        draft,
        validate: vi.fn<TurnCollaborators['validate']>().mockResolvedValue(accept)
      }
    });

    expect(outcome.status).toBe('committed');
    const evidence = draft.mock.calls[0]?.[0].evidence ?? [];
    expect(evidence.map((result) => result.payload.kind === 'failure' && result.payload.timedOut)).toEqual([true, true]);
    expect(sink.ofType('tool_results')[0]?.results.map((result) => result.ok)).toEqual([false, false]);
    expect(history.size).toBe(2);
  });

  it('surfaces a drafter failure as an error event and commits nothing', async () => {
    const validate = vi.fn<TurnCollaborators['validate']>();

    const outcome = await runTurn({
      history,
      query: 'Dishwasher not draining',
      sink,
      tools,
      collaborators: {
        analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue(leakAnalysis),
        draft: vi.fn<TurnCollaborators['draft']>().mockRejectedValue(new GenerationFailure('Draft generation failed: model offline')),
        validate
      }
    });

    expect(outcome).toMatchObject({ status: 'failed', error: 'Draft generation failed: model offline' });
    expect(history.size).toBe(0);
    expect(validate).not.toHaveBeenCalled();
    expect(sink.ofType('error')).toEqual([{ type: 'error', message: 'Draft generation failed: model offline' }]);
    expect(sink.ofType('done')).toEqual([]);
    expect(sink.finalizeCount).toBe(1);
  });

  it('commits the rejected draft as low confidence when the redraft fails', async () => {
    const draft = vi
      .fn<TurnCollaborators['draft']>()
      .mockImplementationOnce(async (request) => {
        request.sink.emit({ type: 'token', content: 'first draft' });
        return 'first draft';
      })
      .mockRejectedValueOnce(new GenerationFailure('Draft generation failed: model offline'));

    const outcome = await runTurn({
      history,
      query: 'Dishwasher not draining',
      sink,
      tools,
      collaborators: {
        analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue(leakAnalysis),
        draft,
        validate: vi.fn<TurnCollaborators['validate']>().mockResolvedValue(reject('Name the drain pump part number.'))
      }
    });

    expect(outcome).toMatchObject({ status: 'committed', retries: 1, lowConfidence: true });
    expect(draft).toHaveBeenCalledTimes(2);
    expect(history.snapshot().map((message) => message.content)).toEqual(['Dishwasher not draining', 'first draft']);
    expect(history.snapshot()[1]?.metadata).toMatchObject({ lowConfidence: true, retries: 1, validationSource: 'judge' });
    expect(sink.ofType('error')).toEqual([]);
    expect(sink.ofType('done')).toHaveLength(1);
    expect(sink.finalizeCount).toBe(1);
  });

  it('stamps the user message with the time the question arrived', async () => {
    vi.useFakeTimers();
    try {
      vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));
      const slowDraft = vi.fn<TurnCollaborators['draft']>(async () => {
        vi.setSystemTime(new Date('2026-03-01T10:00:30.000Z'));
        return 'Replace the door gasket.';
      });

      await runTurn({
        history,
        query: 'Fridge door sweating',
        sink,
        tools,
        collaborators: {
          analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue({ ...leakAnalysis, needsRetrieval: false, retrievalHints: [] }),
          draft: slowDraft,
          validate: vi.fn<TurnCollaborators['validate']>().mockResolvedValue(accept)
        }
      });
    } finally {
      vi.useRealTimers();
    }

    expect(history.snapshot().map((message) => message.timestamp)).toEqual(['2026-03-01T10:00:00.000Z', '2026-03-01T10:00:30.000Z']);
  });

  it('commits the last draft as low confidence once the retry budget is exhausted', async () => {
    const draft = drafter('draft one', 'draft two', 'draft three');
    const validate = vi.fn<TurnCollaborators['validate']>().mockResolvedValue(reject('Still unsupported.'));

    const outcome = await runTurn({
      history,
      query: 'Which valve fits my fridge?',
      sink,
      tools,
      maxRetries: 2,
      collaborators: { analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue(leakAnalysis), draft, validate }
    });

    expect(draft).toHaveBeenCalledTimes(3);
    expect(validate).toHaveBeenCalledTimes(3);
    expect(outcome).toMatchObject({ status: 'committed', retries: 2, lowConfidence: true });
    expect(history.snapshot()[1]).toMatchObject({ content: 'draft three', metadata: { retries: 2, lowConfidence: true } });
    expect(sink.ofType('done')[0]?.lowConfidence).toBe(true);
    expect(syntheticResults(outcome.evidence).map((result) => result.isSynthetic && result.round)).toEqual([1, 2]);
    expect(sink.finalizeCount).toBe(1);
  });

  it('commits without retrying when the rejection carries no feedback', async () => {
    const draft = drafter('only draft');

    const outcome = await runTurn({
      history,
      query: 'Which valve fits my fridge?',
      sink,
      tools,
      collaborators: {
        analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue(leakAnalysis),
        draft,
        validate: vi.fn<TurnCollaborators['validate']>().mockResolvedValue(reject())
      }
    });

    expect(draft).toHaveBeenCalledTimes(1);
    expect(outcome).toMatchObject({ status: 'committed', retries: 0, lowConfidence: true });
    expect(sink.ofType('retry')).toEqual([]);
  });

  it('falls back to retrieving from both backends when analysis fails', async () => {
    const dispatch = vi.fn<TurnCollaborators['dispatch']>().mockResolvedValue([]);

    await runTurn({
      history,
      query: 'dishwasher smells bad',
      sink,
      collaborators: {
        analyze: vi.fn<TurnCollaborators['analyze']>().mockRejectedValue(new AnalysisError('Analyzer call failed: timeout')),
        dispatch,
        draft: drafter('Clean the filter.'),
        validate: vi.fn<TurnCollaborators['validate']>().mockResolvedValue(accept)
      }
    });

    expect(dispatch.mock.calls[0]?.[0]).toEqual([
      { toolName: 'search_documents', arguments: { collection: 'repairs', query: 'dishwasher smells bad' } },
      { toolName: 'query_parts', arguments: { keywords: 'dishwasher smells bad' } }
    ]);
    expect(sink.ofType('analysis')).toEqual([{ type: 'analysis', inScope: true, needsRetrieval: true, fallback: true }]);
    expect(getTurnAggregates().analyzerFallbacks).toBe(1);
  });

  it('accepts via fallback when the judge fails and records it separately', async () => {
    const outcome = await runTurn({
      history,
      query: 'Is the drain pump hard to install?',
      sink,
      tools,
      collaborators: {
        analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue(leakAnalysis),
        draft: drafter('It is rated easy.'),
        validate: vi.fn<TurnCollaborators['validate']>().mockRejectedValue(new ValidationError('Judge call failed: 500'))
      }
    });

    expect(outcome).toMatchObject({ status: 'committed', lowConfidence: false });
    expect(history.snapshot()[1]?.metadata?.validationSource).toBe('fallback');
    expect(getTurnAggregates()).toMatchObject({ committed: 1, validatorFallbacks: 1 });
  });

  it('skips retrieval when the analyzer says none is needed', async () => {
    const dispatch = vi.fn<TurnCollaborators['dispatch']>();

    await runTurn({
      history,
      query: 'Thanks!',
      sink,
      collaborators: {
        analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue({ ...leakAnalysis, needsRetrieval: false, retrievalHints: [] }),
        dispatch,
        draft: drafter('You are welcome!'),
        validate: vi.fn<TurnCollaborators['validate']>().mockResolvedValue(accept)
      }
    });

    expect(dispatch).not.toHaveBeenCalled();
    expect(sink.ofType('status').map((event) => event.stage)).toEqual(['analyzing', 'drafting', 'validating', 'committing']);
  });

  it('drafts from a snapshot and does not touch history before commit', async () => {
    history.appendExchange(createMessage('user', 'Hi'), createMessage('agent', 'Hello!'));
    const sizes: number[] = [];
    const draft = vi.fn<TurnCollaborators['draft']>(async (request) => {
      sizes.push(history.size, request.history.length);
      return 'answer';
    });

    await runTurn({
      history,
      query: 'Next question',
      sink,
      tools,
      collaborators: {
        analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue(leakAnalysis),
        draft,
        validate: vi.fn<TurnCollaborators['validate']>().mockResolvedValue(accept)
      }
    });

    expect(sizes).toEqual([2, 2]);
    expect(history.size).toBe(4);
  });

  it('commits nothing when cancelled during drafting', async () => {
    const controller = new AbortController();
    const validate = vi.fn<TurnCollaborators['validate']>();
    const draft = vi.fn<TurnCollaborators['draft']>(async (request) => {
      request.sink.emit({ type: 'token', content: 'partial' });
      controller.abort();
      return 'partial answer';
    });

    const outcome = await runTurn({
      history,
      query: 'Dishwasher not draining',
      sink,
      tools,
      signal: controller.signal,
      collaborators: { analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue(leakAnalysis), draft, validate }
    });

    expect(outcome.status).toBe('cancelled');
    expect(history.size).toBe(0);
    expect(validate).not.toHaveBeenCalled();
    expect(sink.ofType('done')).toEqual([]);
    expect(sink.ofType('error')).toEqual([]);
    expect(sink.finalizeCount).toBe(1);
  });

  it('reports a turn timeout as an error event', async () => {
    const controller = new AbortController();
    const dispatch = vi.fn<TurnCollaborators['dispatch']>(async () => {
      controller.abort(new TurnTimeoutError(120000));
      return [];
    });

    const outcome = await runTurn({
      history,
      query: 'Dishwasher not draining',
      sink,
      signal: controller.signal,
      collaborators: { analyze: vi.fn<TurnCollaborators['analyze']>().mockResolvedValue(leakAnalysis), dispatch }
    });

    const message = 'The request took too long to process. Please try again with a simpler query.';
    expect(outcome).toMatchObject({ status: 'failed', error: message });
    expect(sink.ofType('error')).toEqual([{ type: 'error', message }]);
    expect(history.size).toBe(0);
    expect(sink.finalizeCount).toBe(1);
  });

  it('does nothing but finalize when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const analyze = vi.fn<TurnCollaborators['analyze']>();

    const outcome = await runTurn({ history, query: 'q', sink, signal: controller.signal, collaborators: { analyze } });

    expect(outcome.status).toBe('cancelled');
    expect(analyze).not.toHaveBeenCalled();
    expect(sink.events).toEqual([]);
    expect(sink.finalizeCount).toBe(1);
  });
});
