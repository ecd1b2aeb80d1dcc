import { Candidate } from "../domain/candidate.entity";
import { Job } from "../domain/job.entity";
import { CandidateRepository, JobRepository } from "../domain/repositories";
import { NotFoundError, ValidationError } from "../shared/errors";
import {
  DocumentType,
  MatchFilterSet,
  MatchResult,
  ScoringStrategy,
} from "../shared/types/matching.types";
import { MatchScorer } from "./scoring/match-scorers";

export interface MatchingServiceDeps {
  jobsRepository: JobRepository;
  candidatesRepository: CandidateRepository;
  scorers: ReadonlyArray<MatchScorer>;
}

/**
 * Orchestrates a match request: fetch the source entity, query the
 * counterpart collection, then score the hits with the requested strategy.
 * Holds no state besides the injected collaborators.
 */
export class MatchingService {
  private readonly scorers: ReadonlyMap<ScoringStrategy, MatchScorer>;

  constructor(private readonly deps: MatchingServiceDeps) {
    this.scorers = new Map(deps.scorers.map((scorer) => [scorer.strategy, scorer]));
  }

  async findMatches(
    id: string,
    type: DocumentType,
    filters: MatchFilterSet,
    scoring: ScoringStrategy = "index",
  ): Promise<MatchResult[]> {
    if (filters.size === 0) {
      throw new ValidationError("At least one filter must be enabled");
    }
    const scorer = this.scorers.get(scoring);
    if (!scorer) {
      throw new ValidationError(`Unsupported scoring strategy: ${scoring}`);
    }

    if (type === "job") {
      return this.findMatchesForJob(id, filters, scorer);
    }
    return this.findMatchesForCandidate(id, filters, scorer);
  }

  private async findMatchesForJob(
    jobId: string,
    filters: MatchFilterSet,
    scorer: MatchScorer,
  ): Promise<MatchResult[]> {
    const job = await this.requireJob(jobId);
    const hits = await this.deps.candidatesRepository.findMatchesForJob(job, filters);
    return scorer.score({ source: { type: "job", job }, hits, filters });
  }

  private async findMatchesForCandidate(
    candidateId: string,
    filters: MatchFilterSet,
    scorer: MatchScorer,
  ): Promise<MatchResult[]> {
    const candidate = await this.requireCandidate(candidateId);
    const hits = await this.deps.jobsRepository.findMatchesForCandidate(candidate, filters);
    return scorer.score({ source: { type: "candidate", candidate }, hits, filters });
  }

  private async requireJob(jobId: string): Promise<Job> {
    const job = await this.deps.jobsRepository.getById(jobId);
    if (!job) {
      throw new NotFoundError(`Job with ID ${jobId} not found`);
    }
    return job;
  }

  private async requireCandidate(candidateId: string): Promise<Candidate> {
    const candidate = await this.deps.candidatesRepository.getById(candidateId);
    if (!candidate) {
      throw new NotFoundError(`Candidate with ID ${candidateId} not found`);
    }
    return candidate;
  }
}
