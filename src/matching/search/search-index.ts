import { Collection } from "../../shared/types/document.types";

export interface TermQuery {
  term: Record<string, { value: string; boost?: number }>;
}

export interface RangeQuery {
  range: Record<string, { gte?: number; lte?: number; boost?: number }>;
}

export interface BoolQuery {
  bool: {
    should: SearchQuery[];
    minimum_should_match: number;
    boost?: number;
  };
}

export type SearchQuery = TermQuery | RangeQuery | BoolQuery;

export interface SearchHit {
  id: string;
  score: number;
}

export interface StoredDocument {
  id: string;
  source: Record<string, unknown>;
}

export interface SearchIndexHealth {
  status: string;
  [key: string]: unknown;
}

export interface SearchIndex {
  getDocument(collection: Collection, id: string): Promise<Record<string, unknown> | null>;
  getDocuments(collection: Collection, ids: ReadonlyArray<string>): Promise<StoredDocument[]>;
  search(collection: Collection, query: SearchQuery, maxResults: number): Promise<SearchHit[]>;
  getHealth(): Promise<SearchIndexHealth>;
}
