import { MatchFilterSet, MatchResult } from "../shared/types/matching.types";
import { Candidate } from "./candidate.entity";
import { Job } from "./job.entity";

export interface JobRepository {
  getById(jobId: string): Promise<Job | null>;
  getByIds(jobIds: ReadonlyArray<string>): Promise<Job[]>;
  /** Jobs the candidate qualifies for, in index order. */
  findMatchesForCandidate(candidate: Candidate, filters: MatchFilterSet): Promise<MatchResult[]>;
}

export interface CandidateRepository {
  getById(candidateId: string): Promise<Candidate | null>;
  getByIds(candidateIds: ReadonlyArray<string>): Promise<Candidate[]>;
  /** Candidates qualifying for the job, in index order. */
  findMatchesForJob(job: Job, filters: MatchFilterSet): Promise<MatchResult[]>;
}
