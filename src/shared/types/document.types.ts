export type Collection = "jobs" | "candidates";

export interface JobDocument {
  top_skills?: string[];
  other_skills?: string[];
  seniorities?: string[];
  max_salary?: number | null;
}

export interface CandidateDocument {
  top_skills?: string[];
  other_skills?: string[];
  seniority?: string | null;
  salary_expectation?: number | null;
}

export interface JobView {
  id: string;
  top_skills: string[];
  other_skills: string[];
  seniorities: string[];
  max_salary: number | null;
}

export interface CandidateView {
  id: string;
  top_skills: string[];
  other_skills: string[];
  seniority: string | null;
  salary_expectation: number | null;
}
