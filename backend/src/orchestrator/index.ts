import { randomUUID } from 'node:crypto';
import type {
  ExternalToolResult,
  Message,
  QueryAnalysis,
  ResponseValidation,
  RoundRecord,
  SyntheticToolResult,
  ToolResult,
  TurnState
} from '../../../shared/types.js';
import { config } from '../config/app.js';
import type { ToolRegistry } from '../tools/index.js';
import { componentLogger } from '../utils/logger.js';
import { analyzeQuery, defaultAnalysis } from './analyzer.js';
import type { AnalyzeOptions } from './analyzer.js';
import { buildToolCalls, dispatchTools } from './dispatch.js';
import type { DispatchOptions } from './dispatch.js';
import { generateDraft } from './draft.js';
import type { DraftRequest } from './draft.js';
import { TurnTimeoutError, errorMessage } from './errors.js';
import { isFailedResult } from './evidence.js';
import { createMessage } from './history.js';
import type { ConversationHistory } from './history.js';
import { guardSink } from './sink.js';
import type { StreamingSink } from './sink.js';
import { annotateActiveSpan, traced } from './telemetry.js';
import { createTurnRecorder } from './turnTelemetry.js';
import { fallbackValidation, isActionableRejection, validateResponse } from './validator.js';
import type { ValidateRequest } from './validator.js';

const log = componentLogger('turn');

/** The four model/retrieval seams of a turn. Each defaults to the production implementation. */
export interface TurnCollaborators {
  analyze: (history: readonly Message[], query: string, options: AnalyzeOptions) => Promise<QueryAnalysis>;
  dispatch: typeof dispatchTools;
  draft: (request: DraftRequest) => Promise<string>;
  validate: (request: ValidateRequest) => Promise<ResponseValidation>;
}

export interface RunTurnOptions {
  history: ConversationHistory;
  query: string;
  sink: StreamingSink;
  signal?: AbortSignal;
  turnId?: string;
  sessionId?: string;
  /** End-user identifier forwarded to the model provider. */
  user?: string;
  regenerate?: boolean;
  maxRetries?: number;
  tools?: ToolRegistry;
  collaborators?: Partial<TurnCollaborators>;
}

interface TurnTrail {
  turnId: string;
  rounds: RoundRecord[];
  evidence: ToolResult[];
}

export type TurnOutcome =
  | (TurnTrail & { status: 'committed'; message: Message; retries: number; lowConfidence: boolean })
  | (TurnTrail & { status: 'failed'; error: string })
  | (TurnTrail & { status: 'cancelled' });

const defaultCollaborators: TurnCollaborators = {
  analyze: analyzeQuery,
  dispatch: dispatchTools,
  draft: generateDraft,
  validate: validateResponse
};

function feedbackResult(round: number, feedback: string): SyntheticToolResult {
  return {
    isSynthetic: true,
    sourceTool: 'response_validator',
    round,
    payload: { kind: 'feedback', feedback }
  };
}

/**
 * Runs one user query through analyze → retrieve → draft → validate → commit.
 *
 * Rejected drafts with actionable feedback loop back to drafting at most
 * `maxRetries` times; the feedback joins the evidence as a synthetic tool
 * result. When the budget runs out, or the judge rejects without saying why,
 * the last candidate is committed with `lowConfidence`; so is the previous
 * candidate when a redraft fails.
 *
 * History is read once as a snapshot and written once, at commit. A failed
 * first draft, a turn timeout or an aborted signal leaves it untouched. The sink is
 * finalized exactly once whatever the outcome.
 */
export async function runTurn(options: RunTurnOptions): Promise<TurnOutcome> {
  const { history, query, signal, sessionId, user, regenerate = false, tools } = options;
  const collaborators: TurnCollaborators = { ...defaultCollaborators, ...options.collaborators };
  const maxRetries = options.maxRetries ?? config.VALIDATION_MAX_RETRIES;
  const turnId = options.turnId ?? randomUUID();
  const askedAt = new Date().toISOString();
  const sink = guardSink(options.sink);
  const recorder = createTurnRecorder({ turnId, sessionId, question: query, regenerate });
  const turnLog = log.child({ turnId, sessionId });

  const trail: TurnTrail = { turnId, rounds: [], evidence: [] };
  const snapshot = history.snapshot();

  const enter = (stage: TurnState, round?: number) => {
    recorder.status(stage, round);
    sink.emit(round === undefined ? { type: 'status', stage } : { type: 'status', stage, round });
  };

  const halt = (): TurnOutcome | undefined => {
    if (!signal?.aborted) {
      return undefined;
    }
    if (signal.reason instanceof TurnTimeoutError) {
      const message = signal.reason.message;
      turnLog.warn({ timeoutMs: signal.reason.timeoutMs }, 'turn timed out');
      sink.emit({ type: 'error', message });
      sink.finalize();
      recorder.complete('failed', { error: message });
      return { ...trail, status: 'failed', error: message };
    }
    turnLog.info('turn cancelled before commit');
    sink.finalize();
    recorder.complete('cancelled');
    return { ...trail, status: 'cancelled' };
  };

  return traced(
    'turn',
    async (): Promise<TurnOutcome> => {
      const early = halt();
      if (early) return early;

      // Analyze
      enter('analyzing');
      const analysis = await traced('turn.analyze', async () => {
        try {
          return await collaborators.analyze(snapshot, query, { signal, user });
        } catch (error) {
          if (signal?.aborted) {
            return defaultAnalysis('Turn aborted during analysis.');
          }
          turnLog.warn({ err: error }, 'query analysis failed; using default analysis');
          return defaultAnalysis(`Analyzer unavailable: ${errorMessage(error)}`);
        }
      });
      const afterAnalysis = halt();
      if (afterAnalysis) return afterAnalysis;

      recorder.analysis(analysis.fallback);
      annotateActiveSpan({
        'turn.in_scope': analysis.inScope,
        'turn.needs_retrieval': analysis.needsRetrieval,
        'turn.analysis_fallback': analysis.fallback
      });
      sink.emit({ type: 'analysis', inScope: analysis.inScope, needsRetrieval: analysis.needsRetrieval, fallback: analysis.fallback });

      // Retrieve
      const batch = buildToolCalls(analysis, query);
      if (batch.length) {
        enter('retrieving');
        const dispatchOptions: DispatchOptions = { signal, ...(tools ? { tools } : {}) };
        const results: ExternalToolResult[] = await traced(
          'turn.retrieve',
          () => collaborators.dispatch(batch, dispatchOptions),
          { 'turn.tool_calls': batch.length }
        );
        const afterRetrieval = halt();
        if (afterRetrieval) return afterRetrieval;

        trail.evidence.push(...results);
        const summary = results.map((result) => ({ sourceTool: result.sourceTool, ok: !isFailedResult(result) }));
        recorder.tools(summary.map(({ sourceTool, ok }) => ({ tool: sourceTool, ok })));
        sink.emit({ type: 'tool_results', results: summary });
      }

      // Draft / validate
      let candidate = '';
      let validation: ResponseValidation = fallbackValidation();
      let lowConfidence = false;
      let retries = 0;

      for (let round = 1; ; round += 1) {
        retries = round - 1;
        enter('drafting', round);
        try {
          candidate = await traced(
            'turn.draft',
            () =>
              collaborators.draft({
                history: snapshot,
                query,
                analysis,
                evidence: [...trail.evidence],
                sink,
                signal,
                regenerate,
                user
              }),
            { 'turn.round': round }
          );
        } catch (error) {
          const stopped = halt();
          if (stopped) return stopped;

          const message = errorMessage(error);
          if (trail.rounds.length) {
            turnLog.warn({ err: error, round }, 'redraft failed; committing the previous draft as low confidence');
            lowConfidence = true;
            break;
          }
          turnLog.error({ err: error, round }, 'draft generation failed');
          sink.emit({ type: 'error', message });
          sink.finalize();
          recorder.complete('failed', { error: message });
          return { ...trail, status: 'failed', error: message };
        }
        const afterDraft = halt();
        if (afterDraft) return afterDraft;

        enter('validating', round);
        const draft = candidate;
        validation = await traced(
          'turn.validate',
          async () => {
            try {
              return await collaborators.validate({ candidate: draft, evidence: [...trail.evidence], analysis, query, signal, user });
            } catch (error) {
              if (!signal?.aborted) {
                turnLog.warn({ err: error, round }, 'response validation failed; accepting draft via fallback');
              }
              return fallbackValidation();
            }
          },
          { 'turn.round': round }
        );
        const afterValidation = halt();
        if (afterValidation) return afterValidation;

        trail.rounds.push({ round, candidate, validation });
        recorder.round(round, validation.accepted, validation.source, validation.feedback);

        if (validation.accepted) {
          break;
        }
        if (!isActionableRejection(validation)) {
          turnLog.info({ round }, 'draft rejected without actionable feedback; committing as low confidence');
          lowConfidence = true;
          break;
        }
        if (round > maxRetries) {
          turnLog.info({ round, maxRetries }, 'retry budget exhausted; committing as low confidence');
          lowConfidence = true;
          break;
        }

        trail.evidence.push(feedbackResult(round, validation.feedback));
        sink.emit({ type: 'retry', round, feedback: validation.feedback });
      }

      // Commit
      const beforeCommit = halt();
      if (beforeCommit) return beforeCommit;

      enter('committing');
      const userMessage = createMessage('user', query, undefined, askedAt);
      const agentMessage = createMessage('agent', candidate, {
        turnId,
        retries,
        lowConfidence,
        validationSource: validation.source
      });
      history.appendExchange(userMessage, agentMessage);

      annotateActiveSpan({ 'turn.retries': retries, 'turn.low_confidence': lowConfidence, 'turn.validation_source': validation.source });
      turnLog.info({ retries, lowConfidence, validationSource: validation.source }, 'turn committed');

      sink.emit({ type: 'done', message: agentMessage, retries, lowConfidence });
      sink.finalize();
      recorder.complete('committed', { lowConfidence });
      return { ...trail, status: 'committed', message: agentMessage, retries, lowConfidence };
    },
    { 'turn.id': turnId, 'turn.regenerate': regenerate }
  );
}
