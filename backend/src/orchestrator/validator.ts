import type { QueryAnalysis, ResponseValidation, ToolResult } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { createCompletion } from '../azure/openaiClient.js';
import { parseModelJson } from '../utils/openai.js';
import { withRetry } from '../utils/resilience.js';
import { ValidationError, errorMessage } from './errors.js';
import { renderEvidence } from './evidence.js';
import { JudgeSchema, JudgeValidator } from './schemas.js';

const JUDGE_PROMPT = `You are an impartial reviewer of answers written by a refrigerator and dishwasher parts assistant. You did not write the answer.

Run three independent checks:
1. in_scope: the answer stays on refrigerator/dishwasher parts and repairs, or politely declines an off-topic question.
2. hallucination_detected: true if the answer states part numbers, prices, availability, URLs, difficulty ratings or repair steps that are not supported by the Evidence, or contradicts it. General safety advice is allowed.
3. appropriate: the answer is helpful, safe, polite and actually addresses the question.

verdict: "accept" only if in_scope is true, hallucination_detected is false and appropriate is true; otherwise "reject".
feedback: when rejecting, concrete instructions the writer can act on (what to remove, fix or add). Use an empty string when accepting.

Return ONLY a JSON object with keys in_scope, hallucination_detected, appropriate, verdict, feedback.`;

export interface ValidateRequest {
  candidate: string;
  evidence: readonly ToolResult[];
  analysis: QueryAnalysis;
  query: string;
  signal?: AbortSignal;
  user?: string;
}

/** Used when the judge is unavailable: accept, but mark the verdict as not coming from the judge. */
export function fallbackValidation(): ResponseValidation {
  return {
    accepted: true,
    inScope: true,
    hallucinationDetected: false,
    appropriate: true,
    source: 'fallback'
  };
}

/** A rejection the drafter can act on: it must carry non-empty feedback. */
export function isActionableRejection(validation: ResponseValidation): validation is ResponseValidation & { feedback: string } {
  return !validation.accepted && typeof validation.feedback === 'string' && validation.feedback.trim().length > 0;
}

function buildJudgeInput({ candidate, evidence, analysis, query }: ValidateRequest): string {
  // Only retrieved evidence: earlier feedback is not ground truth for the hallucination check.
  const retrieved = renderEvidence(evidence, { includeSynthetic: false });
  return [
    `Question: ${query}`,
    `Triage: ${analysis.inScope ? 'in scope' : 'out of scope'}${analysis.rationale ? ` (${analysis.rationale})` : ''}`,
    `Evidence:\n${retrieved || '(no evidence was retrieved)'}`,
    `Answer to review:\n${candidate}`
  ].join('\n\n');
}

/**
 * Judges a complete candidate answer. Verdict folds the three checks: the
 * answer is accepted only when the judge accepts and every check passes.
 * Throws ValidationError when the call fails or its output cannot be parsed.
 */
export async function validateResponse(request: ValidateRequest): Promise<ResponseValidation> {
  let raw: string;
  try {
    raw = await withRetry(
      'judge',
      (signal) =>
        createCompletion({
          model: config.MODEL_JUDGE,
          temperature: 0,
          maxTokens: 600,
          jsonSchema: JudgeSchema,
          signal,
          user: request.user,
          messages: [
            { role: 'system', content: JUDGE_PROMPT },
            { role: 'user', content: buildJudgeInput(request) }
          ]
        }),
      { maxRetries: config.MODEL_MAX_RETRIES, timeoutMs: config.MODEL_TIMEOUT_MS, signal: request.signal }
    );
  } catch (error) {
    throw new ValidationError(`Judge call failed: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = parseModelJson(raw, JudgeValidator);
  if (!parsed.ok) {
    throw new ValidationError(parsed.error);
  }

  const verdict = parsed.value;
  const accepted = verdict.verdict === 'accept' && verdict.in_scope && !verdict.hallucination_detected && verdict.appropriate;
  const feedback = verdict.feedback?.trim();

  return {
    accepted,
    inScope: verdict.in_scope,
    hallucinationDetected: verdict.hallucination_detected,
    appropriate: verdict.appropriate,
    ...(accepted || !feedback ? {} : { feedback }),
    source: 'judge'
  };
}
