import type { TurnState, ValidationSource } from '../../../shared/types.js';

export type TurnOutcomeKind = 'committed' | 'failed' | 'cancelled';

interface StatusEntry {
  stage: TurnState;
  round?: number;
  timestamp: number;
}

export interface TurnTelemetryRecord {
  turnId: string;
  sessionId?: string;
  question: string;
  regenerate: boolean;
  startedAt: number;
  completedAt?: number;
  statusHistory: StatusEntry[];
  analysisFallback?: boolean;
  toolCalls: Array<{ tool: string; ok: boolean }>;
  rounds: Array<{ round: number; accepted: boolean; source: ValidationSource; feedback?: string }>;
  outcome?: TurnOutcomeKind;
  lowConfidence?: boolean;
  error?: string;
}

export interface TurnAggregates {
  totalTurns: number;
  committed: number;
  failed: number;
  cancelled: number;
  lowConfidence: number;
  analyzerFallbacks: number;
  validatorFallbacks: number;
  retries: number;
}

const MAX_RECORDS = 100;
const turnTelemetry: TurnTelemetryRecord[] = [];

const emptyAggregates = (): TurnAggregates => ({
  totalTurns: 0,
  committed: 0,
  failed: 0,
  cancelled: 0,
  lowConfidence: 0,
  analyzerFallbacks: 0,
  validatorFallbacks: 0,
  retries: 0
});

let aggregates = emptyAggregates();

const EMAIL_REGEX = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_REGEX = /\b(?:\+?1[ .-]?)?\(?\d{3}\)?[ .-]?\d{3}[ .-]?\d{4}\b/g;
const CREDIT_CARD_REGEX = /\b(?:\d{4}[ -]?){3}\d{4}\b/g;

export function redactSensitive(text: string): string {
  return text
    .replace(EMAIL_REGEX, '[EMAIL]')
    .replace(CREDIT_CARD_REGEX, '[CARD]')
    .replace(PHONE_REGEX, '[PHONE]');
}

function pushRecord(record: TurnTelemetryRecord) {
  turnTelemetry.unshift(record);
  if (turnTelemetry.length > MAX_RECORDS) {
    turnTelemetry.length = MAX_RECORDS;
  }
}

export interface TurnRecorder {
  status(stage: TurnState, round?: number): void;
  analysis(fallback: boolean): void;
  tools(results: Array<{ tool: string; ok: boolean }>): void;
  round(round: number, accepted: boolean, source: ValidationSource, feedback?: string): void;
  complete(outcome: TurnOutcomeKind, details?: { lowConfidence?: boolean; error?: string }): void;
}

export function createTurnRecorder(options: { turnId: string; sessionId?: string; question: string; regenerate?: boolean }): TurnRecorder {
  const state: TurnTelemetryRecord = {
    turnId: options.turnId,
    sessionId: options.sessionId,
    question: redactSensitive(options.question),
    regenerate: Boolean(options.regenerate),
    startedAt: Date.now(),
    statusHistory: [],
    toolCalls: [],
    rounds: []
  };
  let completed = false;

  return {
    status(stage, round) {
      state.statusHistory.push({ stage, ...(round === undefined ? {} : { round }), timestamp: Date.now() });
    },
    analysis(fallback) {
      state.analysisFallback = fallback;
    },
    tools(results) {
      state.toolCalls.push(...results);
    },
    round(round, accepted, source, feedback) {
      state.rounds.push({ round, accepted, source, ...(feedback ? { feedback } : {}) });
    },
    complete(outcome, details = {}) {
      if (completed) {
        return;
      }
      completed = true;
      state.completedAt = Date.now();
      state.outcome = outcome;
      state.lowConfidence = details.lowConfidence;
      state.error = details.error;

      aggregates.totalTurns += 1;
      aggregates[outcome] += 1;
      if (details.lowConfidence) aggregates.lowConfidence += 1;
      if (state.analysisFallback) aggregates.analyzerFallbacks += 1;
      aggregates.validatorFallbacks += state.rounds.filter((entry) => entry.source === 'fallback').length;
      aggregates.retries += Math.max(0, state.rounds.length - 1);

      pushRecord(structuredClone(state));
    }
  };
}

export function getTurnTelemetry(): TurnTelemetryRecord[] {
  return turnTelemetry.map((record) => structuredClone(record));
}

export function getTurnAggregates(): TurnAggregates {
  return { ...aggregates };
}

export function clearTurnTelemetry() {
  turnTelemetry.length = 0;
  aggregates = emptyAggregates();
}
