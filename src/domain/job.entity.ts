import { Salary } from "./salary.value";
import { SeniorityLevel } from "./seniority.value";
import { Skill, skillMatchScore, uniqueSkills } from "./skill.value";

export interface JobProps {
  id: string;
  topSkills: ReadonlyArray<Skill>;
  otherSkills?: ReadonlyArray<Skill>;
  seniorities?: ReadonlyArray<SeniorityLevel>;
  maxSalary?: Salary | null;
}

export class Job {
  readonly id: string;
  readonly topSkills: ReadonlyArray<Skill>;
  readonly otherSkills: ReadonlyArray<Skill>;
  readonly seniorities: ReadonlyArray<SeniorityLevel>;
  readonly maxSalary: Salary | null;

  constructor(props: JobProps) {
    this.id = props.id;
    this.topSkills = Object.freeze(uniqueSkills(props.topSkills));
    this.otherSkills = Object.freeze(uniqueSkills(props.otherSkills ?? []));
    this.seniorities = Object.freeze(Array.from(new Set(props.seniorities ?? [])));
    this.maxSalary = props.maxSalary ?? null;
  }

  matchesSalary(expectation: Salary | null | undefined): boolean {
    if (!this.maxSalary || !expectation) {
      return false;
    }
    return this.maxSalary.atLeast(expectation);
  }

  matchesSeniority(level: SeniorityLevel | null | undefined): boolean {
    if (!level || this.seniorities.length === 0) {
      return false;
    }
    return this.seniorities.includes(level);
  }

  /** Only the job's top skills form the denominator. */
  skillMatchScore(candidateSkills: ReadonlyArray<Skill>): number {
    return skillMatchScore(this.topSkills, candidateSkills);
  }
}
