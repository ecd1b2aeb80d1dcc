import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { candidateFromDocument, candidateToDocument } from "../../db/mappers/candidate.mapper";
import { jobFromDocument, jobToDocument } from "../../db/mappers/job.mapper";
import { ValidationError } from "../../shared/errors";

describe("job mapper", () => {
  it("builds a job from an index document", () => {
    const job = jobFromDocument("job-1", {
      top_skills: ["Python", "AWS"],
      other_skills: ["Docker"],
      seniorities: ["midlevel", "Senior"],
      max_salary: 85000,
    });
    assert.equal(job.id, "job-1");
    assert.deepEqual(
      job.topSkills.map((skill) => skill.name),
      ["Python", "AWS"],
    );
    assert.deepEqual(job.seniorities, ["midlevel", "senior"]);
    assert.equal(job.maxSalary?.value, 85000);
  });

  it("drops unrecognized seniority entries", () => {
    const job = jobFromDocument("job-2", {
      top_skills: ["Go"],
      seniorities: ["wizard", "lead", 7, "LEAD"],
    });
    assert.deepEqual(job.seniorities, ["lead"]);
  });

  it("treats absent and null fields as missing", () => {
    const job = jobFromDocument("job-3", { top_skills: ["Go"], max_salary: null });
    assert.equal(job.maxSalary, null);
    assert.deepEqual(job.otherSkills, []);
    assert.deepEqual(job.seniorities, []);
  });

  it("rejects invalid values", () => {
    assert.throws(() => jobFromDocument("job-4", { top_skills: ["Go", " "] }), ValidationError);
    assert.throws(() => jobFromDocument("job-5", { top_skills: "Go" }), ValidationError);
    assert.throws(() => jobFromDocument("job-6", { top_skills: ["Go"], max_salary: -5 }), {
      message: "Salary cannot be negative",
    });
    assert.throws(() => jobFromDocument("job-7", { top_skills: ["Go"], max_salary: "lots" }), {
      message: "Field max_salary must be a number",
    });
  });

  it("round-trips a document", () => {
    const doc = {
      top_skills: ["Python", "AWS", "Machine Learning"],
      other_skills: ["Docker", "Kubernetes"],
      seniorities: ["midlevel", "senior"],
      max_salary: 85000,
    };
    assert.deepEqual(jobToDocument(jobFromDocument("job-1", doc)), doc);
  });
});

describe("candidate mapper", () => {
  it("builds a candidate from an index document", () => {
    const candidate = candidateFromDocument("cand-1", {
      top_skills: ["Python"],
      other_skills: ["React"],
      seniority: "SENIOR",
      salary_expectation: 80000,
    });
    assert.equal(candidate.seniority, "senior");
    assert.equal(candidate.salaryExpectation?.value, 80000);
    assert.deepEqual(
      candidate.skillPool.map((skill) => skill.name),
      ["Python", "React"],
    );
  });

  it("accepts a padded, mixed-case seniority", () => {
    const candidate = candidateFromDocument("cand-4", { top_skills: ["Go"], seniority: " Principal " });
    assert.equal(candidate.seniority, "principal");
  });

  it("drops an unrecognized seniority", () => {
    const candidate = candidateFromDocument("cand-2", { top_skills: ["Go"], seniority: "guru" });
    assert.equal(candidate.seniority, null);
  });

  it("round-trips a complete document", () => {
    const doc = {
      top_skills: ["Python", "AWS", "TypeScript"],
      other_skills: ["React", "Node.js"],
      seniority: "senior",
      salary_expectation: 80000,
    };
    assert.deepEqual(candidateToDocument(candidateFromDocument("cand-1", doc)), doc);
  });

  it("omits missing optional fields", () => {
    const doc = { top_skills: ["Go"], other_skills: [] };
    assert.deepEqual(candidateToDocument(candidateFromDocument("cand-3", doc)), doc);
  });
});
