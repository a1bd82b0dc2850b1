import type { CatalogRecord, DocumentCollection, ToolArgument, ToolPayload } from '../../../shared/types.js';
import { searchGuides } from '../azure/documentSearch.js';
import { getCatalogStore } from '../retrieval/catalogStore.js';
import type { CatalogStore, PartRow } from '../retrieval/catalogStore.js';
import { filterRelevant } from '../retrieval/relevanceGrader.js';
import type { RelevanceScorer } from '../retrieval/relevanceGrader.js';

export const SEARCH_DOCUMENTS = 'search_documents';
export const QUERY_PARTS = 'query_parts';

export const NO_RELEVANT_DOCUMENTS = 'No relevant documents found.';

export interface ToolContext {
  signal: AbortSignal;
}

export type ToolArguments = Record<string, ToolArgument>;

/** Retrieval collaborator: returns a payload or throws. The dispatcher owns timeouts and normalization. */
export type ToolHandler = (args: ToolArguments, context: ToolContext) => Promise<ToolPayload>;

export type ToolRegistry = Readonly<Record<string, ToolHandler>>;

function stringArg(args: ToolArguments, key: string): string | undefined {
  const value = args[key];
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function isCollection(value: string | undefined): value is DocumentCollection {
  return value === 'repairs' || value === 'blogs';
}

export interface DocumentSearchDeps {
  search?: (collection: DocumentCollection, query: string, signal: AbortSignal) => Promise<string[]>;
  scorer?: RelevanceScorer;
}

export function createDocumentSearchTool(deps: DocumentSearchDeps = {}): ToolHandler {
  const search = deps.search ?? ((collection, query, signal) => searchGuides(collection, query, { signal }));

  return async (args, { signal }) => {
    const collection = stringArg(args, 'collection');
    const query = stringArg(args, 'query');
    if (!isCollection(collection)) {
      throw new Error(`Invalid collection: ${collection ?? '(missing)'}`);
    }
    if (!query) {
      throw new Error('search_documents requires a query.');
    }

    const documents = await search(collection, query, signal);
    if (!documents.length) {
      return { kind: 'text', text: NO_RELEVANT_DOCUMENTS };
    }

    const relevant = await filterRelevant(query, documents, { scorer: deps.scorer, signal });
    if (!relevant.length) {
      return { kind: 'text', text: NO_RELEVANT_DOCUMENTS };
    }
    return { kind: 'text', text: relevant.map((doc) => doc.content).join('\n---\n') };
  };
}

function toRecord(row: PartRow): CatalogRecord {
  return { ...row };
}

export function createPartsQueryTool(getStore: () => CatalogStore = getCatalogStore): ToolHandler {
  return async (args) => {
    const partNumber = stringArg(args, 'partNumber');
    const keywords = stringArg(args, 'keywords');
    const applianceType = stringArg(args, 'applianceType');
    const brand = stringArg(args, 'brand');

    if (!partNumber && !keywords && !applianceType && !brand) {
      throw new Error('query_parts requires a part number, keywords, appliance type or brand.');
    }

    const store = getStore();
    if (partNumber) {
      const exact = store.findByPartNumber(partNumber);
      if (exact.length || !keywords) {
        return { kind: 'records', records: exact.map(toRecord) };
      }
    }

    const rows = store.searchParts({ keywords, applianceType, brand });
    return { kind: 'records', records: rows.map(toRecord) };
  };
}

export const defaultTools: ToolRegistry = {
  [SEARCH_DOCUMENTS]: createDocumentSearchTool(),
  [QUERY_PARTS]: createPartsQueryTool()
};
