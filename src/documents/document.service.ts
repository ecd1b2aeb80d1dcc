import { CandidateRepository, JobRepository } from "../domain/repositories";
import { candidateToDocument } from "../db/mappers/candidate.mapper";
import { jobToDocument } from "../db/mappers/job.mapper";
import { NotFoundError } from "../shared/errors";
import { CandidateView, JobView } from "../shared/types/document.types";
import { DocumentType } from "../shared/types/matching.types";

export class DocumentService {
  constructor(
    private readonly jobsRepository: JobRepository,
    private readonly candidatesRepository: CandidateRepository,
  ) {}

  async getDocument(id: string, type: DocumentType): Promise<JobView | CandidateView> {
    return type === "job" ? this.getJob(id) : this.getCandidate(id);
  }

  async getJob(jobId: string): Promise<JobView> {
    const job = await this.jobsRepository.getById(jobId);
    if (!job) {
      throw new NotFoundError(`Job with ID ${jobId} not found`);
    }
    const doc = jobToDocument(job);
    return {
      id: job.id,
      top_skills: doc.top_skills ?? [],
      other_skills: doc.other_skills ?? [],
      seniorities: doc.seniorities ?? [],
      max_salary: doc.max_salary ?? null,
    };
  }

  async getCandidate(candidateId: string): Promise<CandidateView> {
    const candidate = await this.candidatesRepository.getById(candidateId);
    if (!candidate) {
      throw new NotFoundError(`Candidate with ID ${candidateId} not found`);
    }
    const doc = candidateToDocument(candidate);
    return {
      id: candidate.id,
      top_skills: doc.top_skills ?? [],
      other_skills: doc.other_skills ?? [],
      seniority: doc.seniority ?? null,
      salary_expectation: doc.salary_expectation ?? null,
    };
  }
}
