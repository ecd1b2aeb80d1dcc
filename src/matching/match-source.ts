import { Candidate } from "../domain/candidate.entity";
import { Job } from "../domain/job.entity";

export type MatchSource =
  | { type: "job"; job: Job }
  | { type: "candidate"; candidate: Candidate };
