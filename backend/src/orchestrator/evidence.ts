import type { CatalogRecord, Message, ToolResult } from '../../../shared/types.js';
import type { ModelMessage } from '../azure/openaiClient.js';

const MAX_RECORD_FIELD_CHARS = 400;

function renderRecord(record: CatalogRecord): string {
  return Object.entries(record)
    .filter(([, value]) => value !== null && value !== '')
    .map(([key, value]) => {
      const text = String(value);
      return `${key}: ${text.length > MAX_RECORD_FIELD_CHARS ? `${text.slice(0, MAX_RECORD_FIELD_CHARS)}…` : text}`;
    })
    .join('; ');
}

function renderBody(result: ToolResult): string {
  const { payload } = result;
  switch (payload.kind) {
    case 'text':
      return payload.text;
    case 'records':
      return payload.records.length ? payload.records.map((record, idx) => `(${idx + 1}) ${renderRecord(record)}`).join('\n') : 'No matching catalog records.';
    case 'failure':
      return `RETRIEVAL FAILED${payload.timedOut ? ' (timed out)' : ''}: ${payload.error}`;
    case 'feedback':
      return payload.feedback;
  }
}

/**
 * Numbered evidence block shared by the drafter and the judge. Synthetic results
 * are labelled as reviewer feedback so the drafter can tell them apart from retrieved data.
 */
export function renderEvidence(results: readonly ToolResult[], options: { includeSynthetic?: boolean } = {}): string {
  const includeSynthetic = options.includeSynthetic ?? true;
  const blocks: string[] = [];
  let index = 0;

  for (const result of results) {
    if (result.isSynthetic && !includeSynthetic) {
      continue;
    }
    index += 1;
    const label = result.isSynthetic
      ? `[${index}] Reviewer feedback on draft ${result.round} (correct these issues)`
      : `[${index}] Source: ${result.sourceTool}`;
    blocks.push(`${label}\n${renderBody(result)}`);
  }

  return blocks.join('\n\n');
}

export function isFailedResult(result: ToolResult): boolean {
  return !result.isSynthetic && result.payload.kind === 'failure';
}

export function historyToModelMessages(history: readonly Message[]): ModelMessage[] {
  return history.map((message) => ({
    role: message.role === 'agent' ? 'assistant' : 'user',
    content: message.content
  }));
}
