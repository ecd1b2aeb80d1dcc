import { Collection } from "../../shared/types/document.types";
import { SearchHit, SearchIndex, SearchIndexHealth, SearchQuery, StoredDocument } from "./search-index";

export type SeedDocuments = Partial<Record<Collection, Record<string, Record<string, unknown>>>>;

/**
 * Process-local stand-in for the search index. Evaluates the query shapes the
 * match query builder emits: term and range score their boost, bool scores the
 * sum of its satisfied clauses times its own boost.
 */
export class InMemorySearchIndex implements SearchIndex {
  private readonly collections: Record<Collection, Map<string, Record<string, unknown>>> = {
    jobs: new Map(),
    candidates: new Map(),
  };

  constructor(seed: SeedDocuments = {}) {
    for (const collection of ["jobs", "candidates"] as const) {
      for (const [id, source] of Object.entries(seed[collection] ?? {})) {
        this.put(collection, id, source);
      }
    }
  }

  put(collection: Collection, id: string, source: Record<string, unknown>): void {
    this.collections[collection].set(id, { ...source });
  }

  async getDocument(collection: Collection, id: string): Promise<Record<string, unknown> | null> {
    const source = this.collections[collection].get(id);
    return source ? { ...source } : null;
  }

  async getDocuments(collection: Collection, ids: ReadonlyArray<string>): Promise<StoredDocument[]> {
    const documents: StoredDocument[] = [];
    for (const id of ids) {
      const source = this.collections[collection].get(id);
      if (source) {
        documents.push({ id, source: { ...source } });
      }
    }
    return documents;
  }

  async search(collection: Collection, query: SearchQuery, maxResults: number): Promise<SearchHit[]> {
    const hits: SearchHit[] = [];
    for (const [id, source] of this.collections[collection]) {
      const score = scoreQuery(query, source);
      if (score !== null) {
        hits.push({ id, score });
      }
    }
    return hits
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, Math.max(0, maxResults));
  }

  async getHealth(): Promise<SearchIndexHealth> {
    return { status: "yellow", mock_mode: true };
  }
}

/** Score for a matching document, or null when it does not match. */
function scoreQuery(query: SearchQuery, doc: Record<string, unknown>): number | null {
  if ("bool" in query) {
    const { should, minimum_should_match: minimumShouldMatch, boost = 1 } = query.bool;
    let matched = 0;
    let total = 0;
    for (const clause of should) {
      const score = scoreQuery(clause, doc);
      if (score !== null) {
        matched += 1;
        total += score;
      }
    }
    if (matched < minimumShouldMatch) {
      return null;
    }
    return total * boost;
  }

  if ("term" in query) {
    for (const [field, { value, boost = 1 }] of Object.entries(query.term)) {
      if (!fieldContains(doc[field], value)) {
        return null;
      }
      return boost;
    }
    return null;
  }

  for (const [field, { gte, lte, boost = 1 }] of Object.entries(query.range)) {
    const value = doc[field];
    if (typeof value !== "number") {
      return null;
    }
    if ((gte !== undefined && value < gte) || (lte !== undefined && value > lte)) {
      return null;
    }
    return boost;
  }
  return null;
}

// Keyword fields are compared through a lowercase normalizer.
function fieldContains(fieldValue: unknown, value: string): boolean {
  const expected = value.toLowerCase();
  const values: unknown[] = Array.isArray(fieldValue) ? fieldValue : [fieldValue];
  return values.some((item) => typeof item === "string" && item.toLowerCase() === expected);
}
