export type OrchestratorErrorCode =
  | 'ANALYSIS_ERROR'
  | 'RETRIEVAL_FAILURE'
  | 'GENERATION_FAILURE'
  | 'VALIDATION_ERROR'
  | 'TURN_IN_PROGRESS'
  | 'TURN_TIMEOUT';

export abstract class OrchestratorError extends Error {
  abstract readonly code: OrchestratorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Analyzer call failed or returned output that does not fit the analysis shape. */
export class AnalysisError extends OrchestratorError {
  readonly code = 'ANALYSIS_ERROR' as const;
}

/** One tool call in a batch failed or timed out. Absorbed into a failure-marked result. */
export class RetrievalFailure extends OrchestratorError {
  readonly code = 'RETRIEVAL_FAILURE' as const;

  constructor(
    readonly toolName: string,
    message: string,
    readonly timedOut = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Drafter call itself failed. Fatal to the turn. */
export class GenerationFailure extends OrchestratorError {
  readonly code = 'GENERATION_FAILURE' as const;
}

/** Judge call failed or returned unparsable output. */
export class ValidationError extends OrchestratorError {
  readonly code = 'VALIDATION_ERROR' as const;
}

export class TurnInProgressError extends OrchestratorError {
  readonly code = 'TURN_IN_PROGRESS' as const;

  constructor(readonly sessionId: string) {
    super(`A turn is already in progress for session ${sessionId}.`);
  }
}

export class TurnTimeoutError extends OrchestratorError {
  readonly code = 'TURN_TIMEOUT' as const;

  constructor(readonly timeoutMs: number) {
    super('The request took too long to process. Please try again with a simpler query.');
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
