import { config } from '../config/app.js';
import { createCompletion } from '../azure/openaiClient.js';
import { RelevanceGradeSchema, RelevanceGradeValidator } from '../orchestrator/schemas.js';
import { parseModelJson } from '../utils/openai.js';
import { withTimeout } from '../utils/resilience.js';
import { componentLogger } from '../utils/logger.js';

const log = componentLogger('relevance-grader');

/** Score assigned when grading fails; above the default threshold so the document is kept. */
export const FALLBACK_RELEVANCE_SCORE = 0.6;

const GRADER_PROMPT = `You grade how relevant a document is to a question about appliance parts or repairs.
Respond with a JSON object containing "confidence_score": a number between 0 (not relevant) and 1 (very relevant).
Example: {"confidence_score": 0.85}`;

export interface GradedDocument {
  content: string;
  score: number;
  graded: boolean;
}

export type RelevanceScorer = (question: string, document: string, signal?: AbortSignal) => Promise<number>;

export const scoreWithModel: RelevanceScorer = async (question, document, signal) => {
  const raw = await withTimeout(
    'relevance-grade',
    (attemptSignal) =>
      createCompletion({
        model: config.MODEL_GRADER,
        temperature: 0.1,
        maxTokens: 50,
        jsonSchema: RelevanceGradeSchema,
        signal: attemptSignal,
        messages: [
          { role: 'system', content: GRADER_PROMPT },
          {
            role: 'user',
            content: `Question: ${question}\nDocument: ${document}\n\nHow relevant is this document to the question? Return only valid JSON with confidence_score.`
          }
        ]
      }),
    config.RELEVANCE_GRADE_TIMEOUT_MS,
    signal
  );

  const parsed = parseModelJson(raw, RelevanceGradeValidator);
  if (!parsed.ok) {
    throw new Error(parsed.error);
  }
  return parsed.value.confidence_score;
};

/**
 * Grades every document concurrently and keeps those scoring above the threshold.
 * Documents whose grading fails are kept at FALLBACK_RELEVANCE_SCORE.
 */
export async function filterRelevant(
  question: string,
  documents: readonly string[],
  options: { scorer?: RelevanceScorer; threshold?: number; signal?: AbortSignal } = {}
): Promise<GradedDocument[]> {
  const scorer = options.scorer ?? scoreWithModel;
  const threshold = options.threshold ?? config.RELEVANCE_THRESHOLD;

  const graded = await Promise.all(
    documents.map(async (content): Promise<GradedDocument> => {
      try {
        const score = await scorer(question, content, options.signal);
        return { content, score, graded: true };
      } catch (error) {
        if (options.signal?.aborted) {
          throw error;
        }
        log.warn({ err: error }, 'relevance grading failed; keeping document');
        return { content, score: FALLBACK_RELEVANCE_SCORE, graded: false };
      }
    })
  );

  const relevant = graded.filter((doc) => doc.score > threshold);
  log.info(
    { relevant: relevant.length, total: graded.length, scores: graded.map((doc) => Math.round(doc.score * 100) / 100) },
    'graded retrieved documents'
  );
  return relevant;
}
