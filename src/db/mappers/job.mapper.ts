import { Job } from "../../domain/job.entity";
import { JobDocument } from "../../shared/types/document.types";
import { readSalary, readSeniorities, readSkills } from "./document-fields";

export function jobFromDocument(id: string, doc: Record<string, unknown>): Job {
  return new Job({
    id,
    topSkills: readSkills(doc, "top_skills"),
    otherSkills: readSkills(doc, "other_skills"),
    seniorities: readSeniorities(doc, "seniorities"),
    maxSalary: readSalary(doc, "max_salary"),
  });
}

export function jobToDocument(job: Job): JobDocument {
  const doc: JobDocument = {
    top_skills: job.topSkills.map((skill) => skill.name),
    other_skills: job.otherSkills.map((skill) => skill.name),
    seniorities: [...job.seniorities],
  };
  if (job.maxSalary) {
    doc.max_salary = job.maxSalary.value;
  }
  return doc;
}
