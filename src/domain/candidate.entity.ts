import { Salary } from "./salary.value";
import { SeniorityLevel } from "./seniority.value";
import { Skill, skillMatchScore, uniqueSkills } from "./skill.value";

export interface CandidateProps {
  id: string;
  topSkills: ReadonlyArray<Skill>;
  otherSkills?: ReadonlyArray<Skill>;
  seniority?: SeniorityLevel | null;
  salaryExpectation?: Salary | null;
}

export class Candidate {
  readonly id: string;
  readonly topSkills: ReadonlyArray<Skill>;
  readonly otherSkills: ReadonlyArray<Skill>;
  readonly seniority: SeniorityLevel | null;
  readonly salaryExpectation: Salary | null;

  constructor(props: CandidateProps) {
    this.id = props.id;
    this.topSkills = Object.freeze(uniqueSkills(props.topSkills));
    this.otherSkills = Object.freeze(uniqueSkills(props.otherSkills ?? []));
    this.seniority = props.seniority ?? null;
    this.salaryExpectation = props.salaryExpectation ?? null;
  }

  get skillPool(): Skill[] {
    return uniqueSkills([...this.topSkills, ...this.otherSkills]);
  }

  matchesSalary(maxSalary: Salary | null | undefined): boolean {
    if (!this.salaryExpectation || !maxSalary) {
      return false;
    }
    return maxSalary.atLeast(this.salaryExpectation);
  }

  matchesSeniority(jobSeniorities: ReadonlyArray<SeniorityLevel>): boolean {
    if (!this.seniority || jobSeniorities.length === 0) {
      return false;
    }
    return jobSeniorities.includes(this.seniority);
  }

  /** Credit for any held skill, top or secondary, against the job's top skills. */
  skillMatchScore(jobTopSkills: ReadonlyArray<Skill>): number {
    return skillMatchScore(jobTopSkills, this.skillPool);
  }
}
