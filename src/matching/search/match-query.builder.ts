import { MissingFieldError, ValidationError } from "../../shared/errors";
import { Collection } from "../../shared/types/document.types";
import { MatchFilter, MatchFilterSet, MatchQueryOptions } from "../../shared/types/matching.types";
import { MatchSource } from "../match-source";
import { BoolQuery, RangeQuery, SearchQuery } from "./search-index";

/**
 * Clause construction for one side of a match. Jobs search candidates and
 * candidates search jobs with the same rules, so only the field roles differ.
 */
interface SourceRole {
  targetCollection: Collection;
  salaryClause(weight: number): RangeQuery;
  /** Lowercased skill keys; the index fields are expected to use a lowercase normalizer. */
  topSkills(): string[];
  seniorityClause(weight: number): SearchQuery;
}

function jobRole(source: Extract<MatchSource, { type: "job" }>): SourceRole {
  const { job } = source;
  return {
    targetCollection: "candidates",
    salaryClause(weight) {
      if (!job.maxSalary) {
        throw new MissingFieldError("max_salary", "Job document has no max_salary defined");
      }
      return { range: { salary_expectation: { lte: job.maxSalary.value, boost: weight } } };
    },
    topSkills() {
      return job.topSkills.map((skill) => skill.key);
    },
    seniorityClause(weight) {
      if (job.seniorities.length === 0) {
        throw new MissingFieldError("seniorities", "Job document has no seniorities defined");
      }
      return anyOf("seniority", job.seniorities, 1, weight);
    },
  };
}

function candidateRole(source: Extract<MatchSource, { type: "candidate" }>): SourceRole {
  const { candidate } = source;
  return {
    targetCollection: "jobs",
    salaryClause(weight) {
      if (!candidate.salaryExpectation) {
        throw new MissingFieldError(
          "salary_expectation",
          "Candidate document has no salary_expectation defined",
        );
      }
      return { range: { max_salary: { gte: candidate.salaryExpectation.value, boost: weight } } };
    },
    topSkills() {
      return candidate.topSkills.map((skill) => skill.key);
    },
    seniorityClause(weight) {
      if (!candidate.seniority) {
        throw new MissingFieldError("seniority", "Candidate document has no seniority defined");
      }
      return { term: { seniorities: { value: candidate.seniority, boost: weight } } };
    },
  };
}

function resolveRole(source: MatchSource): SourceRole {
  return source.type === "job" ? jobRole(source) : candidateRole(source);
}

function anyOf(
  field: string,
  values: ReadonlyArray<string>,
  minimumShouldMatch: number,
  boost: number,
): BoolQuery {
  return {
    bool: {
      should: values.map((value) => ({ term: { [field]: { value } } })),
      minimum_should_match: minimumShouldMatch,
      boost,
    },
  };
}

function buildClause(role: SourceRole, filter: MatchFilter, options: MatchQueryOptions): SearchQuery {
  const weight = options.filterConfigs[filter].weight;
  switch (filter) {
    case "salary":
      return role.salaryClause(weight);
    case "skill": {
      const topSkills = role.topSkills();
      if (topSkills.length === 0) {
        throw new MissingFieldError("top_skills", "Source document has no top skills");
      }
      const minimumShouldMatch = Math.min(topSkills.length, options.minMatchingSkills);
      return anyOf("top_skills", topSkills, minimumShouldMatch, weight);
    }
    case "seniority":
      return role.seniorityClause(weight);
  }
}

export interface MatchQuery {
  collection: Collection;
  query: BoolQuery;
}

// Order of clauses in the emitted query.
const CLAUSE_ORDER: ReadonlyArray<MatchFilter> = ["salary", "skill", "seniority"];

export function buildMatchQuery(
  source: MatchSource,
  filters: MatchFilterSet,
  options: MatchQueryOptions,
): MatchQuery {
  const role = resolveRole(source);
  const should = CLAUSE_ORDER.filter((filter) => filters.has(filter)).map((filter) =>
    buildClause(role, filter, options),
  );
  if (should.length === 0) {
    throw new ValidationError("At least one filter must be enabled");
  }
  return {
    collection: role.targetCollection,
    query: {
      bool: {
        should,
        minimum_should_match: 1,
      },
    },
  };
}
