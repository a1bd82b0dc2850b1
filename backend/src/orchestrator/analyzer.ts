import type { DocumentCollection, Message, QueryAnalysis, RetrievalHint } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { createCompletion } from '../azure/openaiClient.js';
import { withRetry } from '../utils/resilience.js';
import { parseModelJson } from '../utils/openai.js';
import { AnalysisError, errorMessage } from './errors.js';
import { historyToModelMessages } from './evidence.js';
import { AnalysisSchema, AnalysisValidator, RawRetrievalHintValidator } from './schemas.js';

const MAX_HINT_QUERY_CHARS = 512;

const ANALYZER_PROMPT = `You triage questions for an assistant that only helps with refrigerator and dishwasher parts and repairs.

Decide:
1. in_scope: true if the latest user message is about refrigerator or dishwasher parts, symptoms, repairs, installation, compatibility, ordering or follow-ups to the conversation about them. Greetings and thanks are in scope but need no retrieval.
2. needs_retrieval: true if answering requires repair guides, blog articles or catalog data (part numbers, prices, availability, install difficulty).
3. retrieval_hints: the lookups to run, most useful first.
   - {"tool": "search_documents", "collection": "repairs" | "blogs", "query": "..."} searches repair guides (appliance, symptom, parts, difficulty) or how-to blog posts.
   - {"tool": "query_parts", "part_number": "...", "keywords": "...", "appliance_type": "refrigerator" | "dishwasher", "brand": "..."} queries the parts catalog. Use part_number for PS numbers or manufacturer part numbers.
   Use null for fields that do not apply.
4. rationale: one sentence.

Return ONLY a JSON object with keys in_scope, needs_retrieval, rationale, retrieval_hints.`;

export interface AnalyzeOptions {
  signal?: AbortSignal;
  user?: string;
}

/** Fail-open analysis used when the analyzer cannot be trusted: assume in scope and retrieve. */
export function defaultAnalysis(rationale = 'Analyzer unavailable; defaulting to retrieval.'): QueryAnalysis {
  return {
    inScope: true,
    needsRetrieval: true,
    rationale,
    retrievalHints: [],
    fallback: true
  };
}

function capQuery(value: string) {
  return value.length > MAX_HINT_QUERY_CHARS ? value.slice(0, MAX_HINT_QUERY_CHARS) : value;
}

function toCollection(value: string | undefined): DocumentCollection {
  return value?.toLowerCase() === 'blogs' ? 'blogs' : 'repairs';
}

export function sanitizeHints(rawHints: readonly unknown[], query: string): RetrievalHint[] {
  const hints: RetrievalHint[] = [];
  const seen = new Set<string>();

  for (const raw of rawHints) {
    const parsed = RawRetrievalHintValidator.safeParse(raw);
    if (!parsed.success) {
      continue;
    }
    const candidate = parsed.data;
    let hint: RetrievalHint;

    if (candidate.tool === 'search_documents') {
      hint = {
        tool: 'search_documents',
        collection: toCollection(candidate.collection),
        query: capQuery(candidate.query ?? query)
      };
    } else if (candidate.tool === 'query_parts') {
      const partNumber = candidate.part_number?.toUpperCase();
      const keywords = candidate.keywords ? capQuery(candidate.keywords) : undefined;
      hint = {
        tool: 'query_parts',
        ...(partNumber ? { partNumber } : {}),
        ...(keywords || !partNumber ? { keywords: keywords ?? capQuery(query) } : {}),
        ...(candidate.appliance_type ? { applianceType: candidate.appliance_type.toLowerCase() } : {}),
        ...(candidate.brand ? { brand: candidate.brand } : {})
      };
    } else {
      continue;
    }

    const key = JSON.stringify(hint);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    hints.push(hint);

    if (hints.length >= config.ANALYZER_MAX_HINTS) {
      break;
    }
  }

  return hints;
}

/**
 * Classifies the new query against the conversation so far. Reads `history`
 * but never changes it. Throws AnalysisError on any model or parse failure.
 */
export async function analyzeQuery(history: readonly Message[], query: string, options: AnalyzeOptions = {}): Promise<QueryAnalysis> {
  const trimmed = query.trim();
  if (!trimmed) {
    throw new AnalysisError('Cannot analyze an empty query.');
  }

  let raw: string;
  try {
    raw = await withRetry(
      'analyzer',
      (signal) =>
        createCompletion({
          model: config.MODEL_ANALYZER,
          temperature: 0,
          maxTokens: 800,
          jsonSchema: AnalysisSchema,
          signal,
          user: options.user,
          messages: [
            { role: 'system', content: ANALYZER_PROMPT },
            ...historyToModelMessages(history),
            { role: 'user', content: trimmed }
          ]
        }),
      { maxRetries: config.MODEL_MAX_RETRIES, timeoutMs: config.MODEL_TIMEOUT_MS, signal: options.signal }
    );
  } catch (error) {
    throw new AnalysisError(`Analyzer call failed: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = parseModelJson(raw, AnalysisValidator);
  if (!parsed.ok) {
    throw new AnalysisError(parsed.error);
  }

  const { in_scope: inScope, needs_retrieval: needsRetrieval, rationale, retrieval_hints: rawHints } = parsed.value;
  const retrieve = inScope && needsRetrieval;

  return {
    inScope,
    needsRetrieval: retrieve,
    rationale: rationale.trim(),
    retrievalHints: retrieve ? sanitizeHints(rawHints, trimmed) : [],
    fallback: false
  };
}
