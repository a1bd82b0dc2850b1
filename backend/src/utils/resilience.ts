import { SpanStatusCode } from '@opentelemetry/api';
import { getTracer } from '../orchestrator/telemetry.js';
import { componentLogger } from './logger.js';

const log = componentLogger('resilience');

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  retryableErrors?: string[];
  /** Caller-owned signal; aborting it stops the current attempt and all further retries. */
  signal?: AbortSignal;
}

export interface RetryInvocationContext {
  attempt: number;
}

export class OperationTimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

function errorFields(error: unknown): { message: string; code: string; status: string } {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error), code: '', status: '' };
  }
  const status = 'status' in error ? error.status : undefined;
  return {
    message: 'message' in error && typeof error.message === 'string' ? error.message : '',
    code: 'code' in error && typeof error.code === 'string' ? error.code : '',
    status: typeof status === 'number' || typeof status === 'string' ? String(status) : ''
  };
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }
  const error = new Error(typeof reason === 'string' ? reason : 'The operation was aborted');
  error.name = 'AbortError';
  return error;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error('aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `fn` with a hard per-attempt timeout. The attempt's signal is aborted on
 * timeout or when the caller's signal aborts; the caller's abort reason is rethrown as-is.
 */
export async function withTimeout<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    throw abortReason(parentSignal);
  }

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const guards = new Promise<never>((_, reject) => {
    if (timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        const timeoutError = new OperationTimeoutError(operation, timeoutMs);
        controller.abort(timeoutError);
        reject(timeoutError);
      }, timeoutMs);
    }
    if (parentSignal) {
      onParentAbort = () => {
        const reason = abortReason(parentSignal);
        controller.abort(reason);
        reject(reason);
      };
      parentSignal.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), guards]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener('abort', onParentAbort);
    }
  }
}

export async function withRetry<T>(
  operation: string,
  fn: (signal: AbortSignal, context?: RetryInvocationContext) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    timeoutMs = 30000,
    retryableErrors = ['ECONNRESET', 'ETIMEDOUT', '429', '503'],
    signal
  } = options;

  const tracer = getTracer();

  return tracer.startActiveSpan(`retry:${operation}`, async (span) => {
    span.setAttribute('retry.operation', operation);
    span.setAttribute('retry.max', maxRetries);

    let attempt = 0;

    try {
      while (true) {
        try {
          const result = await withTimeout(operation, (attemptSignal) => fn(attemptSignal, { attempt }), timeoutMs, signal);

          if (attempt > 0) {
            log.info({ operation, attempt }, 'operation succeeded after retries');
            span.addEvent('retry.success', { attempt });
          }

          span.setAttribute('retry.attempts', attempt);
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error: unknown) {
          const { message, code, status } = errorFields(error);
          const callerAborted = signal?.aborted ?? false;
          const isRetryable =
            !callerAborted &&
            retryableErrors.some((candidate) => message.includes(candidate) || code.includes(candidate) || status.includes(candidate));

          span.addEvent('retry.failure', { attempt, message });

          if (!isRetryable || attempt >= maxRetries) {
            if (error instanceof Error) {
              span.recordException(error);
            }
            span.setStatus({ code: SpanStatusCode.ERROR, message });
            throw error;
          }

          attempt += 1;
          const waitTime = Math.min(initialDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
          span.addEvent('retry.wait', { attempt, waitTime });
          log.warn({ operation, attempt, maxRetries, waitTime }, 'operation failed, retrying');
          await sleep(waitTime, signal);
        }
      }
    } finally {
      span.end();
    }
  });
}
