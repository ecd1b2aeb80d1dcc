import { ValidationError } from "../shared/errors";

export class Skill {
  private constructor(readonly name: string) {}

  static of(raw: string): Skill {
    const name = raw.trim();
    if (!name) {
      throw new ValidationError("Skill name cannot be empty");
    }
    return new Skill(name);
  }

  /** Case-insensitive identity; every set operation on skills goes through it. */
  get key(): string {
    return this.name.toLowerCase();
  }

  equals(other: Skill): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.name;
  }
}

export function uniqueSkills(skills: ReadonlyArray<Skill>): Skill[] {
  const seen = new Set<string>();
  const output: Skill[] = [];
  for (const skill of skills) {
    if (seen.has(skill.key)) {
      continue;
    }
    seen.add(skill.key);
    output.push(skill);
  }
  return output;
}

/**
 * Share of `topSkills` present in `otherPartySkills`, in [0, 1].
 * Zero when either side is empty.
 */
export function skillMatchScore(
  topSkills: ReadonlyArray<Skill>,
  otherPartySkills: ReadonlyArray<Skill>,
): number {
  const required = uniqueSkills(topSkills);
  if (required.length === 0 || otherPartySkills.length === 0) {
    return 0;
  }
  const available = new Set(otherPartySkills.map((skill) => skill.key));
  const matched = required.filter((skill) => available.has(skill.key)).length;
  return matched / required.length;
}
