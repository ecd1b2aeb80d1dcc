import { Logger } from "../../config/logger";
import { MatchSource } from "../../matching/match-source";
import { buildMatchQuery } from "../../matching/search/match-query.builder";
import { SearchIndex } from "../../matching/search/search-index";
import { MatchFilterSet, MatchQueryOptions, MatchResult } from "../../shared/types/matching.types";

export interface MatchSearchConfig extends MatchQueryOptions {
  pageSize: number;
}

export async function searchMatches(
  searchIndex: SearchIndex,
  source: MatchSource,
  filters: MatchFilterSet,
  config: MatchSearchConfig,
  logger: Logger,
): Promise<MatchResult[]> {
  const { collection, query } = buildMatchQuery(source, filters, config);
  logger.debug("Executing match query", {
    collection,
    filters: Array.from(filters),
    query,
  });
  const hits = await searchIndex.search(collection, query, config.pageSize);
  return hits.map((hit) => ({ id: hit.id, score: hit.score }));
}
