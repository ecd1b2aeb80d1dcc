import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { loadEnv } from "../../config/env";

describe("loadEnv", () => {
  it("falls back to defaults", () => {
    assert.deepEqual(loadEnv({}), {
      nodeEnv: "development",
      port: 3000,
      logLevel: "info",
      elasticsearchUrl: "http://localhost:9200",
      elasticsearchApiKey: undefined,
      jobsIndex: "jobs",
      candidatesIndex: "candidates",
      elasticsearchStartupRetries: 5,
      elasticsearchStartupDelayMs: 5000,
      minMatchingSkills: 2,
      matchPageSize: 100,
      mockSearchIndex: false,
      mockDocumentsPath: "data/mock-documents.json",
    });
  });

  it("reads overrides", () => {
    const env = loadEnv({
      PORT: "8080",
      LOG_LEVEL: " DEBUG ",
      ELASTICSEARCH_URL: " http://search:9200 ",
      ELASTICSEARCH_API_KEY: "test-key",
      ELASTICSEARCH_JOBS_INDEX: "jobs_v2",
      MIN_MATCHING_SKILLS: "3",
      MATCH_PAGE_SIZE: "25",
      MOCK_SEARCH_INDEX: "yes",
    });
    assert.equal(env.port, 8080);
    assert.equal(env.logLevel, "debug");
    assert.equal(env.elasticsearchUrl, "http://search:9200");
    assert.equal(env.elasticsearchApiKey, "test-key");
    assert.equal(env.jobsIndex, "jobs_v2");
    assert.equal(env.candidatesIndex, "candidates");
    assert.equal(env.minMatchingSkills, 3);
    assert.equal(env.matchPageSize, 25);
    assert.equal(env.mockSearchIndex, true);
  });

  it("rejects invalid values", () => {
    assert.throws(() => loadEnv({ PORT: "abc" }), { message: "Invalid PORT value: abc" });
    assert.throws(() => loadEnv({ LOG_LEVEL: "TRACE" }), { message: "Invalid LOG_LEVEL value: trace" });
    assert.throws(() => loadEnv({ MIN_MATCHING_SKILLS: "0" }), {
      message: "Invalid MIN_MATCHING_SKILLS value: 0",
    });
    assert.throws(() => loadEnv({ MATCH_PAGE_SIZE: "5000" }), /Invalid MATCH_PAGE_SIZE value: 5000/);
    assert.throws(() => loadEnv({ MOCK_SEARCH_INDEX: "maybe" }), { message: "Invalid boolean value: maybe" });
  });
});
