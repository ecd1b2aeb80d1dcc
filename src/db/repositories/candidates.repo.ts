import { Logger } from "../../config/logger";
import { Candidate } from "../../domain/candidate.entity";
import { Job } from "../../domain/job.entity";
import { CandidateRepository } from "../../domain/repositories";
import { SearchIndex } from "../../matching/search/search-index";
import { MatchFilterSet, MatchResult } from "../../shared/types/matching.types";
import { candidateFromDocument } from "../mappers/candidate.mapper";
import { MatchSearchConfig, searchMatches } from "./match-search";

const CANDIDATES = "candidates";

export class CandidatesRepository implements CandidateRepository {
  constructor(
    private readonly searchIndex: SearchIndex,
    private readonly config: MatchSearchConfig,
    private readonly logger: Logger,
  ) {}

  async getById(candidateId: string): Promise<Candidate | null> {
    const doc = await this.searchIndex.getDocument(CANDIDATES, candidateId);
    if (!doc) {
      this.logger.warn("Candidate not found in search index", { candidateId });
      return null;
    }
    return candidateFromDocument(candidateId, doc);
  }

  async getByIds(candidateIds: ReadonlyArray<string>): Promise<Candidate[]> {
    if (candidateIds.length === 0) {
      return [];
    }
    const docs = await this.searchIndex.getDocuments(CANDIDATES, candidateIds);
    return docs.map((doc) => candidateFromDocument(doc.id, doc.source));
  }

  async findMatchesForJob(job: Job, filters: MatchFilterSet): Promise<MatchResult[]> {
    const matches = await searchMatches(
      this.searchIndex,
      { type: "job", job },
      filters,
      this.config,
      this.logger,
    );
    this.logger.info("Candidates matched for job", {
      jobId: job.id,
      matches: matches.length,
    });
    return matches;
  }
}
