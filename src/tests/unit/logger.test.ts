import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createLogger, logContext } from "../../config/logger";

function captureLogger(minLevel: "debug" | "info" | "warn" | "error") {
  const lines: string[] = [];
  const logger = createLogger({
    minLevel,
    write: (line) => lines.push(line),
    now: () => new Date("2026-01-02T03:04:05.000Z"),
  });
  return { logger, lines };
}

describe("createLogger", () => {
  it("writes one JSON line per entry at or above the minimum level", () => {
    const { logger, lines } = captureLogger("warn");
    logger.info("skipped");
    logger.warn("Slow query", { took: 12 });
    assert.deepEqual(lines, [
      "{\"timestamp\":\"2026-01-02T03:04:05.000Z\",\"level\":\"warn\",\"message\":\"Slow query\",\"meta\":{\"took\":12}}\n",
    ]);
  });

  it("redacts secret-looking meta keys", () => {
    const { logger, lines } = captureLogger("debug");
    logger.debug("Connecting", { apiKey: "test-secret", authorization: "ApiKey test-secret", index: "jobs" });
    assert.deepEqual(JSON.parse(lines[0]), {
      timestamp: "2026-01-02T03:04:05.000Z",
      level: "debug",
      message: "Connecting",
      meta: { apiKey: "[REDACTED]", authorization: "[REDACTED]", index: "jobs" },
    });
  });

  it("merges request context with extra fields", () => {
    const { logger, lines } = captureLogger("info");
    logContext(logger, "error", "Request failed", { route: "POST /matches", status_code: 500 }, { attempt: 1 });
    assert.deepEqual(JSON.parse(lines[0]).meta, { route: "POST /matches", status_code: 500, attempt: 1 });
  });
});
