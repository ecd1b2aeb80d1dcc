import { SeedDocuments } from "../../matching/search/in-memory-search.index";

export function seedDocuments(): SeedDocuments {
  return {
    jobs: {
      "job-1": {
        top_skills: ["Python", "AWS", "Machine Learning"],
        other_skills: ["Docker"],
        seniorities: ["midlevel", "senior"],
        max_salary: 85000,
      },
      "job-2": {
        top_skills: ["TypeScript", "React"],
        seniorities: ["junior"],
        max_salary: 60000,
      },
      "job-3": {
        top_skills: ["Go"],
        seniorities: ["lead"],
      },
    },
    candidates: {
      "cand-1": {
        top_skills: ["Python", "AWS", "TypeScript"],
        other_skills: ["React"],
        seniority: "senior",
        salary_expectation: 80000,
      },
      "cand-2": {
        top_skills: ["TypeScript", "React"],
        seniority: "junior",
        salary_expectation: 45000,
      },
      "cand-3": {
        top_skills: ["Go"],
        seniority: "lead",
        salary_expectation: 150000,
      },
      "cand-4": {
        top_skills: ["Python"],
      },
    },
  };
}
