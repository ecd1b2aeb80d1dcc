import { Salary } from "../../domain/salary.value";
import { SeniorityLevel, parseSeniorityLevel } from "../../domain/seniority.value";
import { Skill } from "../../domain/skill.value";
import { ValidationError } from "../../shared/errors";

export function readSkills(doc: Record<string, unknown>, field: string): Skill[] {
  const raw = doc[field];
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new ValidationError(`Field ${field} must be a list of skill names`, [field]);
  }
  return raw.map((item) => {
    if (typeof item !== "string") {
      throw new ValidationError(`Field ${field} must contain only strings`, [field]);
    }
    return Skill.of(item);
  });
}

export function readSalary(doc: Record<string, unknown>, field: string): Salary | null {
  const raw = doc[field];
  if (raw === undefined || raw === null) {
    return null;
  }
  if (typeof raw !== "number") {
    throw new ValidationError(`Field ${field} must be a number`, [field]);
  }
  return Salary.of(raw);
}

/** Unrecognized levels are dropped from the list rather than failing the document. */
export function readSeniorities(doc: Record<string, unknown>, field: string): SeniorityLevel[] {
  const raw = doc[field];
  if (!Array.isArray(raw)) {
    return [];
  }
  const levels: SeniorityLevel[] = [];
  for (const item of raw) {
    const level = tryParseSeniority(item);
    if (level) {
      levels.push(level);
    }
  }
  return levels;
}

export function readSeniority(doc: Record<string, unknown>, field: string): SeniorityLevel | null {
  return tryParseSeniority(doc[field]);
}

function tryParseSeniority(value: unknown): SeniorityLevel | null {
  if (typeof value !== "string") {
    return null;
  }
  try {
    return parseSeniorityLevel(value);
  } catch (error) {
    if (error instanceof ValidationError) {
      return null;
    }
    throw error;
  }
}
