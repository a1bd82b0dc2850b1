import { DefaultAzureCredential } from '@azure/identity';
import { AzureKeyCredential, SearchClient } from '@azure/search-documents';
import type { DocumentCollection } from '../../../shared/types.js';
import { config } from '../config/app.js';

/**
 * Shape of a row in the `repairs` and `blogs` indexes. Repair rows carry the
 * appliance/symptom/parts/difficulty fields; blog rows only title and url.
 */
export interface GuideDocument {
  id: string;
  title?: string | null;
  appliance?: string | null;
  symptom?: string | null;
  description?: string | null;
  parts?: string | null;
  difficulty?: string | null;
  url?: string | null;
  content?: string | null;
}

const clients = new Map<DocumentCollection, SearchClient<GuideDocument>>();

function indexName(collection: DocumentCollection) {
  return collection === 'blogs' ? config.AZURE_SEARCH_BLOGS_INDEX : config.AZURE_SEARCH_REPAIRS_INDEX;
}

function getSearchClient(collection: DocumentCollection): SearchClient<GuideDocument> {
  const existing = clients.get(collection);
  if (existing) {
    return existing;
  }
  if (!config.AZURE_SEARCH_ENDPOINT) {
    throw new Error('Document search is not configured (AZURE_SEARCH_ENDPOINT is unset).');
  }

  const credential = config.AZURE_SEARCH_API_KEY
    ? new AzureKeyCredential(config.AZURE_SEARCH_API_KEY)
    : new DefaultAzureCredential();
  const client = new SearchClient<GuideDocument>(config.AZURE_SEARCH_ENDPOINT, indexName(collection), credential);
  clients.set(collection, client);
  return client;
}

/** Flattens a search hit into the `field: value` page text the grader and drafter read. */
export function documentText(doc: GuideDocument): string {
  const fields: Array<[string, string | null | undefined]> = [
    ['title', doc.title],
    ['appliance', doc.appliance],
    ['symptom', doc.symptom],
    ['description', doc.description],
    ['parts', doc.parts],
    ['difficulty', doc.difficulty],
    ['url', doc.url],
    ['content', doc.content]
  ];
  return fields
    .filter((entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim().length > 0)
    .map(([key, value]) => `${key}: ${value.trim()}`)
    .join('\n');
}

export async function searchGuides(
  collection: DocumentCollection,
  query: string,
  options: { top?: number; signal?: AbortSignal } = {}
): Promise<string[]> {
  const client = getSearchClient(collection);
  const response = await client.search(query, {
    top: options.top ?? config.SEARCH_TOP_K,
    abortSignal: options.signal
  });

  const documents: string[] = [];
  for await (const result of response.results) {
    const text = documentText(result.document);
    if (text) {
      documents.push(text);
    }
  }
  return documents;
}
