import { performance } from 'node:perf_hooks';
import type { BatchToolCall, ExternalToolResult, QueryAnalysis, RetrievalHint, ToolCall } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { defaultTools, QUERY_PARTS, SEARCH_DOCUMENTS } from '../tools/index.js';
import type { ToolRegistry } from '../tools/index.js';
import { componentLogger } from '../utils/logger.js';
import { OperationTimeoutError, withTimeout } from '../utils/resilience.js';
import { RetrievalFailure, errorMessage } from './errors.js';

const log = componentLogger('dispatch');

export interface DispatchOptions {
  tools?: ToolRegistry;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export function hintToToolCall(hint: RetrievalHint): ToolCall {
  if (hint.tool === 'search_documents') {
    return { toolName: SEARCH_DOCUMENTS, arguments: { collection: hint.collection, query: hint.query } };
  }

  const args: ToolCall['arguments'] = {};
  if (hint.partNumber) args.partNumber = hint.partNumber;
  if (hint.keywords) args.keywords = hint.keywords;
  if (hint.applianceType) args.applianceType = hint.applianceType;
  if (hint.brand) args.brand = hint.brand;
  return { toolName: QUERY_PARTS, arguments: args };
}

/**
 * Translates analyzer hints into one concurrent batch. When retrieval is needed
 * but no usable hint survived (including the fail-open default analysis), the
 * query goes to both backends: repair guides and the parts catalog.
 */
export function buildToolCalls(analysis: QueryAnalysis, query: string): BatchToolCall {
  if (!analysis.needsRetrieval) {
    return [];
  }
  if (analysis.retrievalHints.length) {
    return analysis.retrievalHints.map(hintToToolCall);
  }
  return [
    { toolName: SEARCH_DOCUMENTS, arguments: { collection: 'repairs', query } },
    { toolName: QUERY_PARTS, arguments: { keywords: query } }
  ];
}

function failureResult(failure: RetrievalFailure): ExternalToolResult {
  return {
    isSynthetic: false,
    sourceTool: failure.toolName,
    payload: { kind: 'failure', error: failure.message, timedOut: failure.timedOut }
  };
}

async function executeCall(call: ToolCall, tools: ToolRegistry, timeoutMs: number, signal?: AbortSignal): Promise<ExternalToolResult> {
  const handler = tools[call.toolName];
  if (!handler) {
    return failureResult(new RetrievalFailure(call.toolName, `Unknown tool: ${call.toolName}`));
  }

  const started = performance.now();
  try {
    const payload = await withTimeout(`tool:${call.toolName}`, (callSignal) => handler(call.arguments, { signal: callSignal }), timeoutMs, signal);
    log.debug({ tool: call.toolName, latencyMs: Math.round(performance.now() - started) }, 'tool call completed');
    return { isSynthetic: false, sourceTool: call.toolName, payload };
  } catch (error) {
    const timedOut = error instanceof OperationTimeoutError;
    const failure = new RetrievalFailure(call.toolName, errorMessage(error), timedOut, { cause: error });
    log.warn(
      { tool: call.toolName, timedOut, latencyMs: Math.round(performance.now() - started), err: error },
      'tool call failed; recording failure marker'
    );
    return failureResult(failure);
  }
}

/**
 * Runs every call of the batch concurrently and returns exactly one result per
 * call, in input order. Never throws and never retries: a failed or timed-out
 * call becomes a failure-marked result.
 */
export async function dispatchTools(batch: BatchToolCall, options: DispatchOptions = {}): Promise<ExternalToolResult[]> {
  const tools = options.tools ?? defaultTools;
  const timeoutMs = options.timeoutMs ?? config.TOOL_TIMEOUT_MS;
  return Promise.all(batch.map((call) => executeCall(call, tools, timeoutMs, options.signal)));
}
