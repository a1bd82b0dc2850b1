import type { Message, QueryAnalysis, ToolResult } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { streamCompletion } from '../azure/openaiClient.js';
import { withTimeout } from '../utils/resilience.js';
import { GenerationFailure, errorMessage } from './errors.js';
import { historyToModelMessages, isFailedResult, renderEvidence } from './evidence.js';
import type { StreamingSink } from './sink.js';

const DRAFTER_PROMPT = `You are a customer-support assistant for refrigerator and dishwasher parts and repairs.

Rules:
- Ground every part number, price, availability, install difficulty and repair step in the Evidence section. Never invent part numbers, prices or URLs.
- When evidence includes repair guides or catalog records, mention the relevant ones (part name and number, difficulty, links) and explain how they address the problem.
- If a source is marked RETRIEVAL FAILED or evidence is missing, say what you could not look up and give only general, safe guidance.
- Reviewer feedback entries describe problems in an earlier draft of this answer. Fix every issue they raise.
- If the question is outside refrigerator and dishwasher parts and repairs, politely decline and explain what you can help with.
- Be concise and practical. Use markdown lists for steps.`;

export interface DraftRequest {
  history: readonly Message[];
  query: string;
  analysis: QueryAnalysis;
  evidence: readonly ToolResult[];
  sink: StreamingSink;
  signal?: AbortSignal;
  /** Asks for a fresh alternative to an answer the user already saw. */
  regenerate?: boolean;
  user?: string;
}

export function buildDraftPrompt(request: Pick<DraftRequest, 'query' | 'analysis' | 'evidence' | 'regenerate'>): string {
  const { query, analysis, evidence, regenerate } = request;
  const sections = [`Question: ${query}`];

  sections.push(
    `Triage: ${analysis.inScope ? 'in scope' : 'OUT OF SCOPE'}${analysis.rationale ? ` (${analysis.rationale})` : ''}`
  );

  if (evidence.length) {
    const allFailed = evidence.every((result) => result.isSynthetic || isFailedResult(result));
    sections.push(`Evidence:\n${renderEvidence(evidence)}`);
    if (allFailed && evidence.some((result) => !result.isSynthetic)) {
      sections.push('Note: every lookup failed for this question. Answer from the conversation only and say so.');
    }
  } else if (analysis.needsRetrieval) {
    sections.push('Evidence: none available.');
  }

  if (regenerate) {
    sections.push('The user asked for a different answer than the previous one. Provide a fresh response.');
  }

  return sections.join('\n\n');
}

/**
 * Streams a candidate answer. Every delta goes to the sink as a `token` event
 * and into a buffer; the buffered text is returned for validation.
 * Throws GenerationFailure if the call fails, times out or yields nothing.
 */
export async function generateDraft(request: DraftRequest): Promise<string> {
  const { history, sink, signal } = request;

  let answer = '';
  try {
    await withTimeout(
      'drafter',
      async (callSignal) => {
        const deltas = streamCompletion({
          model: config.MODEL_DRAFTER,
          temperature: config.DRAFTER_TEMPERATURE,
          maxTokens: config.DRAFTER_MAX_TOKENS,
          signal: callSignal,
          user: request.user,
          messages: [
            { role: 'system', content: DRAFTER_PROMPT },
            ...historyToModelMessages(history),
            { role: 'user', content: buildDraftPrompt(request) }
          ]
        });
        for await (const delta of deltas) {
          if (callSignal.aborted) {
            break;
          }
          answer += delta;
          sink.emit({ type: 'token', content: delta });
        }
      },
      config.MODEL_TIMEOUT_MS,
      signal
    );
  } catch (error) {
    throw new GenerationFailure(`Draft generation failed: ${errorMessage(error)}`, { cause: error });
  }

  const trimmed = answer.trim();
  if (!trimmed) {
    throw new GenerationFailure('Draft generation returned an empty answer.');
  }
  return trimmed;
}
