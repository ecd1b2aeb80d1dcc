import { CandidateRepository, JobRepository } from "../../domain/repositories";
import { FilterConfigs, MatchFilterSet, MatchResult, ScoringStrategy } from "../../shared/types/matching.types";
import { MatchSource } from "../match-source";
import { calculateMatchScore } from "./weighted-score";

export interface ScoreRequest {
  source: MatchSource;
  hits: ReadonlyArray<MatchResult>;
  filters: MatchFilterSet;
}

export interface MatchScorer {
  readonly strategy: ScoringStrategy;
  score(request: ScoreRequest): Promise<MatchResult[]>;
}

/** Surfaces the search index relevance verbatim. Unbounded, index-defined ordering. */
export class IndexRelevanceScorer implements MatchScorer {
  readonly strategy = "index";

  async score(request: ScoreRequest): Promise<MatchResult[]> {
    return request.hits.map((hit) => ({ id: hit.id, score: hit.score }));
  }
}

/**
 * Re-scores every hit with the weighted average in [0, 1], from the job's
 * perspective in both directions, and orders by that score.
 */
export class WeightedMatchScorer implements MatchScorer {
  readonly strategy = "weighted";

  constructor(
    private readonly jobsRepository: JobRepository,
    private readonly candidatesRepository: CandidateRepository,
    private readonly configs: FilterConfigs,
  ) {}

  async score(request: ScoreRequest): Promise<MatchResult[]> {
    const ids = request.hits.map((hit) => hit.id);
    const { source, filters } = request;

    let scored: MatchResult[];
    if (source.type === "job") {
      const candidates = await this.candidatesRepository.getByIds(ids);
      scored = candidates.map((candidate) => ({
        id: candidate.id,
        score: calculateMatchScore(source.job, candidate, filters, this.configs),
      }));
    } else {
      const jobs = await this.jobsRepository.getByIds(ids);
      scored = jobs.map((job) => ({
        id: job.id,
        score: calculateMatchScore(job, source.candidate, filters, this.configs),
      }));
    }

    return scored.sort((a, b) => b.score - a.score);
  }
}
