import { z } from 'zod';
import type { JsonSchemaFormat } from '../azure/openaiClient.js';

export const AnalysisSchema: JsonSchemaFormat = {
  name: 'query_analysis',
  schema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      in_scope: { type: 'boolean' },
      needs_retrieval: { type: 'boolean' },
      rationale: { type: 'string' },
      retrieval_hints: {
        type: 'array',
        maxItems: 6,
        items: {
          type: 'object',
          additionalProperties: false,
          properties: {
            tool: { enum: ['search_documents', 'query_parts'] },
            collection: { enum: ['repairs', 'blogs', null] },
            query: { type: ['string', 'null'] },
            part_number: { type: ['string', 'null'] },
            keywords: { type: ['string', 'null'] },
            appliance_type: { type: ['string', 'null'] },
            brand: { type: ['string', 'null'] }
          },
          required: ['tool', 'collection', 'query', 'part_number', 'keywords', 'appliance_type', 'brand']
        }
      }
    },
    required: ['in_scope', 'needs_retrieval', 'rationale', 'retrieval_hints']
  }
};

export const JudgeSchema: JsonSchemaFormat = {
  name: 'response_validation',
  schema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      in_scope: { type: 'boolean' },
      hallucination_detected: { type: 'boolean' },
      appropriate: { type: 'boolean' },
      verdict: { enum: ['accept', 'reject'] },
      feedback: { type: 'string' }
    },
    required: ['in_scope', 'hallucination_detected', 'appropriate', 'verdict', 'feedback']
  }
};

export const RelevanceGradeSchema: JsonSchemaFormat = {
  name: 'relevance_grade',
  schema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      confidence_score: { type: 'number', minimum: 0, maximum: 1 }
    },
    required: ['confidence_score']
  }
};

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

export const RawRetrievalHintValidator = z.object({
  tool: z.string(),
  collection: optionalText,
  query: optionalText,
  part_number: optionalText,
  keywords: optionalText,
  appliance_type: optionalText,
  brand: optionalText
});

export const AnalysisValidator = z.object({
  in_scope: z.boolean(),
  needs_retrieval: z.boolean(),
  rationale: z.string().default(''),
  retrieval_hints: z.array(z.unknown()).default([])
});

export const JudgeValidator = z.object({
  in_scope: z.boolean(),
  hallucination_detected: z.boolean(),
  appropriate: z.boolean(),
  verdict: z.enum(['accept', 'reject']),
  feedback: z.string().nullish()
});

export const RelevanceGradeValidator = z.object({
  confidence_score: z.coerce.number().min(0).max(1)
});
