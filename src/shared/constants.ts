import { FilterConfigs } from "./types/matching.types";

export const FILTER_CONFIGS: FilterConfigs = {
  skill: { weight: 2.0 },
  seniority: { weight: 1.5 },
  salary: { weight: 1.0 },
};

export const DEFAULT_MIN_MATCHING_SKILLS = 2;
export const DEFAULT_MATCH_PAGE_SIZE = 100;
