import { ValidationError } from "../shared/errors";

export const SENIORITY_LEVELS = ["none", "junior", "midlevel", "senior", "lead", "principal"] as const;

export type SeniorityLevel = (typeof SENIORITY_LEVELS)[number];

const LEVEL_NAMES: ReadonlyArray<string> = SENIORITY_LEVELS;

export function isSeniorityLevel(value: string): value is SeniorityLevel {
  return LEVEL_NAMES.includes(value);
}

export function parseSeniorityLevel(raw: string): SeniorityLevel {
  const normalized = raw.trim().toLowerCase();
  if (isSeniorityLevel(normalized)) {
    return normalized;
  }
  throw new ValidationError(
    `Invalid seniority level: ${raw}. Valid levels are: ${SENIORITY_LEVELS.join(", ")}`,
    [...SENIORITY_LEVELS],
  );
}
