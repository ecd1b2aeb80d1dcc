import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { Candidate } from "../../domain/candidate.entity";
import { Job } from "../../domain/job.entity";
import { Salary } from "../../domain/salary.value";
import { Skill } from "../../domain/skill.value";
import { buildMatchQuery } from "../../matching/search/match-query.builder";
import { FILTER_CONFIGS } from "../../shared/constants";
import { MissingFieldError, ValidationError } from "../../shared/errors";
import { MatchFilter, MatchQueryOptions } from "../../shared/types/matching.types";

const options: MatchQueryOptions = { minMatchingSkills: 2, filterConfigs: FILTER_CONFIGS };

function skills(...names: string[]): Skill[] {
  return names.map((name) => Skill.of(name));
}

const allFilters = new Set<MatchFilter>(["skill", "seniority", "salary"]);

const job = new Job({
  id: "job-1",
  topSkills: skills("Python", " AWS ", "python"),
  seniorities: ["midlevel", "senior"],
  maxSalary: Salary.of(85000),
});

const candidate = new Candidate({
  id: "cand-1",
  topSkills: skills("Python", "AWS", "TypeScript"),
  seniority: "senior",
  salaryExpectation: Salary.of(80000),
});

describe("buildMatchQuery", () => {
  it("targets candidates from a job", () => {
    assert.deepEqual(buildMatchQuery({ type: "job", job }, allFilters, options), {
      collection: "candidates",
      query: {
        bool: {
          should: [
            { range: { salary_expectation: { lte: 85000, boost: 1 } } },
            {
              bool: {
                should: [
                  { term: { top_skills: { value: "python" } } },
                  { term: { top_skills: { value: "aws" } } },
                ],
                minimum_should_match: 2,
                boost: 2,
              },
            },
            {
              bool: {
                should: [
                  { term: { seniority: { value: "midlevel" } } },
                  { term: { seniority: { value: "senior" } } },
                ],
                minimum_should_match: 1,
                boost: 1.5,
              },
            },
          ],
          minimum_should_match: 1,
        },
      },
    });
  });

  it("targets jobs from a candidate", () => {
    assert.deepEqual(buildMatchQuery({ type: "candidate", candidate }, allFilters, options), {
      collection: "jobs",
      query: {
        bool: {
          should: [
            { range: { max_salary: { gte: 80000, boost: 1 } } },
            {
              bool: {
                should: [
                  { term: { top_skills: { value: "python" } } },
                  { term: { top_skills: { value: "aws" } } },
                  { term: { top_skills: { value: "typescript" } } },
                ],
                minimum_should_match: 2,
                boost: 2,
              },
            },
            { term: { seniorities: { value: "senior", boost: 1.5 } } },
          ],
          minimum_should_match: 1,
        },
      },
    });
  });

  it("only builds clauses for enabled filters", () => {
    const { query } = buildMatchQuery({ type: "candidate", candidate }, new Set<MatchFilter>(["seniority"]), options);
    assert.deepEqual(query.bool.should, [{ term: { seniorities: { value: "senior", boost: 1.5 } } }]);
  });

  it("never requires more skills than the source has", () => {
    const single = new Job({ id: "job-2", topSkills: skills("Go") });
    const { query } = buildMatchQuery({ type: "job", job: single }, new Set<MatchFilter>(["skill"]), options);
    assert.deepEqual(query.bool.should[0], {
      bool: {
        should: [{ term: { top_skills: { value: "go" } } }],
        minimum_should_match: 1,
        boost: 2,
      },
    });
  });

  it("applies the configured skill floor", () => {
    const { query } = buildMatchQuery(
      { type: "candidate", candidate },
      new Set<MatchFilter>(["skill"]),
      { ...options, minMatchingSkills: 3 },
    );
    const clause = query.bool.should[0];
    assert.ok("bool" in clause);
    assert.equal(clause.bool.minimum_should_match, 3);
  });

  it("fails when a job has no max salary", () => {
    const noSalary = new Job({ id: "job-3", topSkills: skills("Go"), seniorities: ["lead"] });
    assert.throws(
      () => buildMatchQuery({ type: "job", job: noSalary }, new Set<MatchFilter>(["salary"]), options),
      (error: unknown) => error instanceof MissingFieldError && error.field === "max_salary",
    );
  });

  it("fails when a candidate has no salary expectation", () => {
    const noSalary = new Candidate({ id: "cand-2", topSkills: skills("Go") });
    assert.throws(
      () => buildMatchQuery({ type: "candidate", candidate: noSalary }, new Set<MatchFilter>(["salary", "skill"]), options),
      (error: unknown) => error instanceof MissingFieldError && error.field === "salary_expectation",
    );
  });

  it("fails when the source has no top skills", () => {
    const empty = new Job({ id: "job-4", topSkills: [], maxSalary: Salary.of(1000) });
    assert.throws(
      () => buildMatchQuery({ type: "job", job: empty }, new Set<MatchFilter>(["skill"]), options),
      { name: "MissingFieldError", message: "Source document has no top skills" },
    );
  });

  it("fails when seniority data is missing", () => {
    const noLevels = new Job({ id: "job-5", topSkills: skills("Go") });
    assert.throws(
      () => buildMatchQuery({ type: "job", job: noLevels }, new Set<MatchFilter>(["seniority"]), options),
      (error: unknown) => error instanceof MissingFieldError && error.field === "seniorities",
    );
    const noLevel = new Candidate({ id: "cand-3", topSkills: skills("Go") });
    assert.throws(
      () => buildMatchQuery({ type: "candidate", candidate: noLevel }, new Set<MatchFilter>(["seniority"]), options),
      (error: unknown) => error instanceof MissingFieldError && error.field === "seniority",
    );
  });

  it("treats a missing field as a validation error", () => {
    const noSalary = new Job({ id: "job-6", topSkills: skills("Go") });
    assert.throws(
      () => buildMatchQuery({ type: "job", job: noSalary }, new Set<MatchFilter>(["salary"]), options),
      ValidationError,
    );
  });

  it("fails before querying when no filter is enabled", () => {
    assert.throws(() => buildMatchQuery({ type: "job", job }, new Set<MatchFilter>(), options), {
      name: "ValidationError",
      message: "At least one filter must be enabled",
    });
  });
});
