import { Candidate } from "../../domain/candidate.entity";
import { Job } from "../../domain/job.entity";
import { FILTER_CONFIGS } from "../../shared/constants";
import { ValidationError } from "../../shared/errors";
import { FilterConfigs, MatchFilterSet } from "../../shared/types/matching.types";

interface ScoreComponent {
  value: number;
  weight: number;
}

/**
 * Weighted average of the enabled criteria, in [0, 1].
 *
 * Skill overlap always contributes when enabled. Seniority and salary are
 * pass/fail: a pass contributes 1.0, a failure drops the criterion instead of
 * adding 0. With no contributing criterion the score is 0.
 */
export function calculateMatchScore(
  job: Job,
  candidate: Candidate,
  filters: MatchFilterSet,
  configs: FilterConfigs = FILTER_CONFIGS,
): number {
  if (filters.size === 0) {
    throw new ValidationError("At least one filter must be enabled");
  }

  const components: ScoreComponent[] = [];

  if (filters.has("skill")) {
    components.push({
      value: job.skillMatchScore(candidate.topSkills),
      weight: configs.skill.weight,
    });
  }
  if (filters.has("seniority") && job.matchesSeniority(candidate.seniority)) {
    components.push({ value: 1, weight: configs.seniority.weight });
  }
  if (filters.has("salary") && job.matchesSalary(candidate.salaryExpectation)) {
    components.push({ value: 1, weight: configs.salary.weight });
  }

  if (components.length === 0) {
    return 0;
  }

  const totalWeight = components.reduce((sum, item) => sum + item.weight, 0);
  const weighted = components.reduce((sum, item) => sum + item.value * item.weight, 0);
  return weighted / totalWeight;
}
