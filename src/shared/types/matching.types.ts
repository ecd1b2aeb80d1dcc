export type DocumentType = "job" | "candidate";

export type MatchFilter = "skill" | "seniority" | "salary";

export type MatchFilterSet = ReadonlySet<MatchFilter>;

export interface FilterConfig {
  weight: number;
}

export type FilterConfigs = Readonly<Record<MatchFilter, FilterConfig>>;

/**
 * `index` surfaces the relevance score assigned by the search index.
 * `weighted` re-scores each hit with the bounded weighted average.
 */
export type ScoringStrategy = "index" | "weighted";

export interface MatchResult {
  id: string;
  score: number;
}

export interface MatchQueryOptions {
  minMatchingSkills: number;
  filterConfigs: FilterConfigs;
}
