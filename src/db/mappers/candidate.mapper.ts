import { Candidate } from "../../domain/candidate.entity";
import { CandidateDocument } from "../../shared/types/document.types";
import { readSalary, readSeniority, readSkills } from "./document-fields";

export function candidateFromDocument(id: string, doc: Record<string, unknown>): Candidate {
  return new Candidate({
    id,
    topSkills: readSkills(doc, "top_skills"),
    otherSkills: readSkills(doc, "other_skills"),
    seniority: readSeniority(doc, "seniority"),
    salaryExpectation: readSalary(doc, "salary_expectation"),
  });
}

export function candidateToDocument(candidate: Candidate): CandidateDocument {
  const doc: CandidateDocument = {
    top_skills: candidate.topSkills.map((skill) => skill.name),
    other_skills: candidate.otherSkills.map((skill) => skill.name),
  };
  if (candidate.seniority) {
    doc.seniority = candidate.seniority;
  }
  if (candidate.salaryExpectation) {
    doc.salary_expectation = candidate.salaryExpectation.value;
  }
  return doc;
}
