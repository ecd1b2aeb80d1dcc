import { Logger } from "../../config/logger";
import { Candidate } from "../../domain/candidate.entity";
import { Job } from "../../domain/job.entity";
import { JobRepository } from "../../domain/repositories";
import { SearchIndex } from "../../matching/search/search-index";
import { MatchFilterSet, MatchResult } from "../../shared/types/matching.types";
import { jobFromDocument } from "../mappers/job.mapper";
import { MatchSearchConfig, searchMatches } from "./match-search";

const JOBS = "jobs";

export class JobsRepository implements JobRepository {
  constructor(
    private readonly searchIndex: SearchIndex,
    private readonly config: MatchSearchConfig,
    private readonly logger: Logger,
  ) {}

  async getById(jobId: string): Promise<Job | null> {
    const doc = await this.searchIndex.getDocument(JOBS, jobId);
    if (!doc) {
      this.logger.warn("Job not found in search index", { jobId });
      return null;
    }
    return jobFromDocument(jobId, doc);
  }

  async getByIds(jobIds: ReadonlyArray<string>): Promise<Job[]> {
    if (jobIds.length === 0) {
      return [];
    }
    const docs = await this.searchIndex.getDocuments(JOBS, jobIds);
    return docs.map((doc) => jobFromDocument(doc.id, doc.source));
  }

  async findMatchesForCandidate(candidate: Candidate, filters: MatchFilterSet): Promise<MatchResult[]> {
    const matches = await searchMatches(
      this.searchIndex,
      { type: "candidate", candidate },
      filters,
      this.config,
      this.logger,
    );
    this.logger.info("Jobs matched for candidate", {
      candidateId: candidate.id,
      matches: matches.length,
    });
    return matches;
  }
}
